import { Router, Request, Response } from 'express';
import Joi from 'joi';
import { ApiResponse, ApproveRequest, AuditTrailResponse, GenerateRequest, GenerateResponse } from '../types/api';
import { SarCaseModel } from '../models/SarCase';
import { SarNarrativeModel } from '../models/SarNarrative';
import { AuditTrailModel, StoredAuditRecord } from '../models/AuditTrail';
import { PgReportRepository } from '../services/reportRepository';
import { OllamaNarrativeGenerator } from '../services/llmService';
import { CurrencyAmountValidator } from '../services/amountValidator';
import { PatternDetector } from '../services/patternDetector';
import { KnowledgeGraphService } from '../services/knowledgeGraphService';
import { FileSimilarCaseStore, FileTemplateStore } from '../services/retrievalService';
import { NarrativeValidator } from '../services/narrativeValidator';
import { SarWorkflow } from '../services/sarWorkflow';
import { verifyAuditChain } from '../services/auditLogger';
import { SUPPORTED_JURISDICTIONS } from '../config/jurisdictions';
import { settings } from '../config/settings';
import { STATS_CACHE_KEY, getCache, setCache, invalidateCache } from '../config/redis';
import { logger } from '../config/logger';
import { ValidationError, NotFoundError, asyncHandler } from '../middleware/errorHandler';

const router = Router();

const workflow = new SarWorkflow({
    repository: new PgReportRepository(),
    generator: new OllamaNarrativeGenerator(),
    validationService: new CurrencyAmountValidator(),
    patternDetector: new PatternDetector(),
    knowledgeGraph: new KnowledgeGraphService(),
    templateStore: new FileTemplateStore(),
    similarCaseStore: new FileSimilarCaseStore(),
    narrativeValidator: new NarrativeValidator(),
    settings,
});

const generateSchema = Joi.object<GenerateRequest>({
    caseId: Joi.string().trim().required(),
    forceRegenerate: Joi.boolean().default(false),
    jurisdiction: Joi.string().trim().uppercase().valid(...SUPPORTED_JURISDICTIONS).optional()
});

const listQuerySchema = Joi.object<{ limit: number }>({
    limit: Joi.number().integer().min(1).max(100).default(20)
});

const approveSchema = Joi.object<ApproveRequest>({
    analystName: Joi.string().trim().min(1).max(200).required(),
    notes: Joi.string().max(5000).allow('').optional()
});

router.post('/generate', asyncHandler(async (req: Request, res: Response) => {
    const { error, value } = generateSchema.validate(req.body);
    if (error) {
        throw new ValidationError(`Invalid request data: ${error.details[0].message}`);
    }
    const request: GenerateRequest = value;

    const sarCase = await SarCaseModel.findById(request.caseId);
    if (!sarCase) {
        throw new NotFoundError(`Case ${request.caseId} not found`);
    }

    if (!request.forceRegenerate) {
        const existing = await SarNarrativeModel.findLatestByCaseId(sarCase.caseId);
        if (existing) {
            const existingResponse: ApiResponse<GenerateResponse> = {
                success: true,
                data: {
                    narrativeId: existing.narrativeId,
                    caseId: sarCase.caseId,
                    narrativeText: existing.narrativeText,
                    riskScore: sarCase.riskScore ?? 0,
                    typologies: sarCase.typologies,
                    generationTimeSeconds: existing.generationTimeSeconds ?? 0,
                    auditSteps: await AuditTrailModel.countByNarrativeId(existing.narrativeId),
                    regenerated: false
                },
                message: 'Existing narrative returned',
                timestamp: new Date().toISOString()
            };
            res.json(existingResponse);
            return;
        }
    }

    if (!sarCase.customerId) {
        throw new ValidationError(`Case ${sarCase.caseId} has no customer attached`);
    }

    const result = await workflow.run({
        caseId: sarCase.caseId,
        customerId: sarCase.customerId,
        jurisdiction: request.jurisdiction
    });

    const response: ApiResponse<GenerateResponse> = {
        success: true,
        data: {
            narrativeId: result.narrativeId,
            caseId: result.caseId,
            narrativeText: result.narrative,
            riskScore: result.riskScore,
            typologies: result.typologies,
            generationTimeSeconds: result.generationTimeSeconds,
            auditSteps: result.auditSteps,
            regenerated: true,
            statePath: result.statePath,
            validation: result.validation,
            enrichment: result.enrichment
        },
        message: 'SAR narrative generated',
        timestamp: new Date().toISOString()
    };

    res.status(201).json(response);
}));

router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const { error, value } = listQuerySchema.validate(req.query);
    if (error) {
        throw new ValidationError(`Invalid query parameters: ${error.details[0].message}`);
    }

    const cases = await SarCaseModel.findRecent(value.limit);

    res.json({
        success: true,
        data: cases,
        timestamp: new Date().toISOString()
    });
}));

router.get('/stats/overview', asyncHandler(async (req: Request, res: Response) => {
    const cached = await getCache(STATS_CACHE_KEY);
    if (cached) {
        res.json({
            success: true,
            data: cached,
            cached: true,
            timestamp: new Date().toISOString()
        });
        return;
    }

    const stats = await SarCaseModel.getStats();
    await setCache(STATS_CACHE_KEY, stats);

    res.json({
        success: true,
        data: stats,
        cached: false,
        timestamp: new Date().toISOString()
    });
}));

router.get('/:narrativeId', asyncHandler(async (req: Request, res: Response) => {
    const narrative = await SarNarrativeModel.findById(req.params.narrativeId);
    if (!narrative) {
        throw new NotFoundError(`Narrative ${req.params.narrativeId} not found`);
    }

    res.json({
        success: true,
        data: narrative,
        timestamp: new Date().toISOString()
    });
}));

router.get('/:narrativeId/audit', asyncHandler(async (req: Request, res: Response) => {
    const { narrativeId } = req.params;
    const steps = await AuditTrailModel.findByNarrativeId(narrativeId);
    if (steps.length === 0) {
        throw new NotFoundError(`Audit trail for narrative ${narrativeId} not found`);
    }

    const chainValid = verifyAuditChain(steps);
    if (!chainValid) {
        logger.warn('Audit chain verification failed', { narrativeId });
    }

    const last = steps[steps.length - 1];
    const response: ApiResponse<AuditTrailResponse<StoredAuditRecord>> = {
        success: true,
        data: {
            narrativeId,
            chainValid,
            steps,
            sentenceAttribution: last.confidenceScores.sentence_attribution ?? {}
        },
        timestamp: new Date().toISOString()
    };

    res.json(response);
}));

router.post('/:narrativeId/approve', asyncHandler(async (req: Request, res: Response) => {
    const { error, value } = approveSchema.validate(req.body);
    if (error) {
        throw new ValidationError(`Invalid request data: ${error.details[0].message}`);
    }
    const approval: ApproveRequest = value;
    const { narrativeId } = req.params;

    const caseId = await SarNarrativeModel.approve(narrativeId, approval.analystName, approval.notes);
    if (!caseId) {
        throw new NotFoundError(`Narrative ${narrativeId} not found`);
    }

    await SarCaseModel.updateStatus(caseId, 'approved');
    await invalidateCache(STATS_CACHE_KEY);

    logger.info(`SAR ${narrativeId} approved by ${approval.analystName}`);

    res.json({
        success: true,
        data: {
            narrativeId,
            caseId,
            status: 'approved',
            approvedBy: approval.analystName
        },
        message: 'SAR approved successfully',
        timestamp: new Date().toISOString()
    });
}));

export default router;
