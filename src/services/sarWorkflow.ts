import {
    NarrativeGenerator,
    NarrativeValidationService,
    ReportRepository,
    SimilarCaseStore,
    TemplateStore,
} from '../types/collaborators';
import {
    JsonObject,
    RelationshipAnalysis,
    SentenceAttributionMap,
    StructuralValidation,
    TypologyContext,
    ValidationOutcome,
} from '../types/sar';
import {
    AnalyzedRecord,
    DegradedFlags,
    DraftedRecord,
    EnrichedRecord,
    Enrichment,
    EnrichmentSummary,
    FetchedRecord,
    ValidatedRecord,
    WorkflowRequest,
    WorkflowResult,
    WorkflowState,
} from '../types/workflow';
import { Settings } from '../config/settings';
import { resolveJurisdiction } from '../config/jurisdictions';
import { NotFoundError, WorkflowError } from '../middleware/errorHandler';
import { PatternDetector } from './patternDetector';
import { KnowledgeGraphService } from './knowledgeGraphService';
import { NarrativeValidator } from './narrativeValidator';
import { AuditLogger } from './auditLogger';
import { DEFAULT_TEMPLATE, buildSimilarCaseQuery } from './retrievalService';
import { createSarPrompt } from '../utils/prompts';
import { roundTo } from '../utils/rounding';
import { logger, describeError } from '../config/logger';

export const GRAPH_UNAVAILABLE = 'graph service unavailable';

export interface SarWorkflowDependencies {
    repository: ReportRepository;
    generator: NarrativeGenerator;
    validationService: NarrativeValidationService;
    patternDetector: PatternDetector;
    knowledgeGraph: KnowledgeGraphService;
    templateStore: TemplateStore;
    similarCaseStore: SimilarCaseStore;
    narrativeValidator: NarrativeValidator;
    settings: Pick<Settings, 'jurisdiction' | 'deploymentEnv'>;
    now?: () => Date;
}

const unavailableTypologyContext = (): TypologyContext => ({
    advisories: [],
    evidenceText: `Regulatory context unavailable (${GRAPH_UNAVAILABLE}).`,
    insightText: GRAPH_UNAVAILABLE,
    confidenceScore: 0,
});

const attributionToJson = (attribution: SentenceAttributionMap): JsonObject => {
    const json: JsonObject = {};
    for (const [key, entry] of Object.entries(attribution)) {
        json[key] = {
            text: entry.text,
            transactionIds: entry.transactionIds,
            amounts: entry.amounts,
            accounts: entry.accounts,
            hasDataReference: entry.hasDataReference,
            position: entry.position,
        };
    }
    return json;
};

const degradedToJson = (degraded: DegradedFlags): JsonObject => ({
    typologyContext: degraded.typologyContext,
    relationships: degraded.relationships,
    templates: degraded.templates,
    similarCases: degraded.similarCases,
});

/**
 * Drives one report from raw case data to a persisted, hash-chained audit
 * trail. Each run owns its own ledger and state path, so one instance can
 * serve concurrent requests.
 */
export class SarWorkflow {
    private deps: SarWorkflowDependencies;
    private now: () => Date;

    constructor(deps: SarWorkflowDependencies) {
        this.deps = deps;
        this.now = deps.now ?? (() => new Date());
    }

    async run(request: WorkflowRequest): Promise<WorkflowResult> {
        const startedAt = this.now().getTime();
        const audit = new AuditLogger(this.now);
        const statePath: WorkflowState[] = ['INIT'];
        const current = (): WorkflowState => statePath[statePath.length - 1];

        const fail = (message: string, cause: unknown): WorkflowError => {
            const stage = current();
            statePath.push('FAILED');
            logger.error('SAR workflow failed', { caseId: request.caseId, stage, error: message });
            return new WorkflowError(message, stage, cause, [...statePath]);
        };

        logger.info('Starting SAR workflow', { caseId: request.caseId, customerId: request.customerId });

        let fetched: FetchedRecord;
        try {
            fetched = await this.fetchData(request, audit);
        } catch (error) {
            throw fail(error instanceof NotFoundError ? error.message : `Fetch failed: ${describeError(error)}`, error);
        }
        statePath.push('FETCHED');

        let analyzed: AnalyzedRecord;
        try {
            analyzed = this.analyzePatterns(fetched, audit);
        } catch (error) {
            throw fail(`Pattern analysis failed: ${describeError(error)}`, error);
        }
        statePath.push('PATTERNS_ANALYZED');

        const enriched = await this.enrichContext(analyzed);
        statePath.push('CONTEXT_ENRICHED');

        let drafted: DraftedRecord;
        try {
            drafted = await this.generateNarrative(enriched, audit);
        } catch (error) {
            throw fail(`Narrative generation failed: ${describeError(error)}`, error);
        }
        statePath.push('NARRATIVE_DRAFTED');

        const validated = await this.validateNarrative(drafted, audit);
        statePath.push('VALIDATED');

        let sentenceAttribution: SentenceAttributionMap;
        let generationTimeSeconds: number;
        let narrativeId: string;
        try {
            sentenceAttribution = audit.createSentenceAttribution(validated.narrative, validated.transactions);
            const chainValid = audit.verifyChain();
            generationTimeSeconds = roundTo((this.now().getTime() - startedAt) / 1000, 2);

            audit.logStep(
                'save_results',
                { repository: 'postgresql' },
                { chain_valid: chainValid, sentence_count: Object.keys(sentenceAttribution).length },
                { sentence_attribution: attributionToJson(sentenceAttribution), chain_valid: chainValid },
                1.0
            );

            narrativeId = await this.deps.repository.saveReport({
                caseId: request.caseId,
                narrativeText: validated.narrative,
                riskScore: validated.patterns.riskScore,
                typologies: [...validated.patterns.typologies],
                auditRecords: audit.records,
                generationTimeSeconds,
            });
        } catch (error) {
            throw fail(`Save failed: ${describeError(error)}`, error);
        }
        statePath.push('SAVED');

        logger.info('SAR workflow complete', {
            caseId: request.caseId,
            narrativeId,
            riskScore: validated.patterns.riskScore,
            generationTimeSeconds,
        });

        return {
            caseId: request.caseId,
            narrativeId,
            narrative: validated.narrative,
            riskScore: validated.patterns.riskScore,
            typologies: [...validated.patterns.typologies],
            auditSteps: audit.length,
            auditRecords: [...audit.records],
            sentenceAttribution,
            validation: validated.validation,
            enrichment: this.summarizeEnrichment(validated.enrichment),
            statePath,
            generationTimeSeconds,
        };
    }

    private async fetchData(request: WorkflowRequest, audit: AuditLogger): Promise<FetchedRecord> {
        const customer = await this.deps.repository.findCustomer(request.customerId);
        if (!customer) {
            throw new NotFoundError(`Customer ${request.customerId} not found`);
        }

        const transactions = await this.deps.repository.findTransactions(request.customerId);

        audit.logStep(
            'fetch_data',
            { database: 'postgresql', customer_id: request.customerId },
            { customer_name: customer.name },
            { transaction_count: transactions.length },
            1.0
        );

        return Object.freeze({
            request: Object.freeze({ ...request }),
            customer: Object.freeze({ ...customer }),
            transactions: Object.freeze(transactions.map(tx => Object.freeze({ ...tx }))),
        });
    }

    private analyzePatterns(fetched: FetchedRecord, audit: AuditLogger): AnalyzedRecord {
        const patterns = this.deps.patternDetector.analyze(fetched.transactions);

        audit.logStep(
            'analyze_patterns',
            { algorithm: 'pattern_detector', transaction_count: fetched.transactions.length },
            {
                typologies: [...patterns.typologies],
                velocity_risk: patterns.velocity.risk,
                structuring_likelihood: patterns.structuring.structuringLikelihood,
                hub_detected: patterns.network.hubDetected,
            },
            {
                risk_score: patterns.riskScore,
                total_amount: patterns.volume.totalAmount,
                time_span_days: patterns.velocity.timeSpanDays,
                unique_sources: patterns.network.uniqueSources,
                unique_destinations: patterns.network.uniqueDestinations,
            },
            0.9
        );

        return Object.freeze({ ...fetched, patterns: Object.freeze(patterns) });
    }

    /** Every source of context may fail on its own; a failure is logged and flagged, never fatal. */
    private async enrichContext(analyzed: AnalyzedRecord): Promise<EnrichedRecord> {
        const jurisdiction = resolveJurisdiction(analyzed.request.jurisdiction, this.deps.settings.jurisdiction);
        const { typologies, riskScore } = analyzed.patterns;
        const degraded: DegradedFlags = {
            typologyContext: false,
            relationships: false,
            templates: false,
            similarCases: false,
        };
        const degradedReasons: string[] = [];

        const degrade = (source: keyof DegradedFlags, reason: string): void => {
            logger.warn('Context source degraded', { caseId: analyzed.request.caseId, source, reason });
            degraded[source] = true;
            degradedReasons.push(`${source}: ${reason}`);
        };

        let typologyContext: TypologyContext;
        try {
            typologyContext = this.deps.knowledgeGraph.getTypologyContext(typologies, jurisdiction);
        } catch (error) {
            typologyContext = unavailableTypologyContext();
            degrade('typologyContext', describeError(error));
        }

        let relationships: RelationshipAnalysis;
        try {
            relationships = this.deps.knowledgeGraph.analyzeRelationships(
                analyzed.customer.accountNumber,
                analyzed.transactions
            );
        } catch (error) {
            relationships = {
                ...this.deps.knowledgeGraph.neutralRelationshipAnalysis(analyzed.customer.accountNumber),
                fallbackReason: describeError(error),
            };
        }
        if (relationships.fallbackReason !== undefined) {
            degrade('relationships', relationships.fallbackReason);
        }

        let templates = [{ ...DEFAULT_TEMPLATE }];
        try {
            const retrieved = await this.deps.templateStore.retrieveTemplates(typologies);
            if (retrieved.length > 0) {
                templates = retrieved;
            }
        } catch (error) {
            degrade('templates', describeError(error));
        }

        let similarCases: string[] = [];
        try {
            similarCases = await this.deps.similarCaseStore.retrieveSimilarCases(
                buildSimilarCaseQuery(riskScore, typologies)
            );
        } catch (error) {
            degrade('similarCases', describeError(error));
        }

        const enrichment: Enrichment = {
            jurisdiction,
            typologyContext,
            relationships,
            templates,
            similarCases,
            degraded,
            degradedReasons,
        };

        return Object.freeze({ ...analyzed, enrichment: Object.freeze(enrichment) });
    }

    private async generateNarrative(enriched: EnrichedRecord, audit: AuditLogger): Promise<DraftedRecord> {
        const { enrichment } = enriched;

        const prompt = createSarPrompt({
            customer: enriched.customer,
            transactions: enriched.transactions,
            patterns: enriched.patterns,
            jurisdiction: enrichment.jurisdiction,
            deploymentEnv: this.deps.settings.deploymentEnv,
            templates: enrichment.templates.map(entry => entry.template),
            similarCases: enrichment.similarCases,
            graphEvidence: enrichment.typologyContext.evidenceText,
            graphInsight: `${enrichment.typologyContext.insightText} ${enrichment.relationships.relationshipSummary}`,
        });

        const narrative = await this.deps.generator.generateNarrative(prompt, enrichment.jurisdiction);

        audit.logStep(
            'generate_narrative',
            {
                model: this.deps.generator.modelName,
                advisories: enrichment.typologyContext.advisories.map(advisory => advisory.advisoryId),
                templates: enrichment.templates.map(entry => entry.source),
                similar_cases: enrichment.similarCases.length,
            },
            {
                jurisdiction: enrichment.jurisdiction,
                graph_insight: enrichment.typologyContext.insightText,
                relationship_summary: enrichment.relationships.relationshipSummary,
                degraded: degradedToJson(enrichment.degraded),
                degraded_reasons: [...enrichment.degradedReasons],
            },
            {
                narrative_length: narrative.length,
                prompt_length: prompt.length,
                knowledge_confidence: enrichment.typologyContext.confidenceScore,
                risk_amplification_factor: enrichment.relationships.riskAmplificationFactor,
                cycles_detected: enrichment.relationships.cyclesDetected,
            },
            0.85
        );

        return Object.freeze({ ...enriched, prompt, narrative });
    }

    private async validateNarrative(drafted: DraftedRecord, audit: AuditLogger): Promise<ValidatedRecord> {
        let structural: StructuralValidation;
        try {
            structural = this.deps.narrativeValidator.validate(drafted.narrative, drafted.customer);
        } catch (error) {
            const message = `Structural validation failed: ${describeError(error)}`;
            logger.warn(message);
            structural = { valid: false, errors: [message], warnings: [], wordCount: 0, sectionsFound: 0 };
        }

        let external: ValidationOutcome = { warnings: [], errors: [] };
        let externalFailed = false;
        try {
            external = await this.deps.validationService.validateNarrative(
                drafted.narrative,
                drafted.enrichment.jurisdiction,
                drafted.transactions
            );
        } catch (error) {
            const message = `External validation failed: ${describeError(error)}`;
            logger.warn(message);
            external = { warnings: [], errors: [message] };
            externalFailed = true;
        }

        const errors = [...structural.errors, ...external.errors];
        const warnings = [...structural.warnings, ...external.warnings];
        const valid = structural.valid && external.errors.length === 0;

        audit.logStep(
            'validate_narrative',
            { validators: ['structural', 'amount_consistency'] },
            { valid, word_count: structural.wordCount, sections_found: structural.sectionsFound },
            { errors, warnings },
            valid ? 0.95 : 0.5
        );

        return Object.freeze({
            ...drafted,
            validation: Object.freeze({ structural, external, externalFailed }),
        });
    }

    private summarizeEnrichment(enrichment: Enrichment): EnrichmentSummary {
        return {
            jurisdiction: enrichment.jurisdiction,
            advisoryIds: enrichment.typologyContext.advisories.map(advisory => advisory.advisoryId),
            riskAmplificationFactor: enrichment.relationships.riskAmplificationFactor,
            cyclesDetected: enrichment.relationships.cyclesDetected,
            templateSources: enrichment.templates.map(entry => entry.source),
            similarCaseCount: enrichment.similarCases.length,
            degraded: { ...enrichment.degraded },
        };
    }
}
