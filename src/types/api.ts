import { JsonValue } from './sar';
import { EnrichmentSummary, NarrativeValidationReport, WorkflowState } from './workflow';

export interface ApiResponse<T = unknown> {
    success: boolean;
    data?: T;
    message?: string;
    cached?: boolean;
    timestamp: string;
}

export interface HealthCheckResponse {
    status: 'OK' | 'ERROR';
    timestamp: string;
    uptime: number;
    memory: NodeJS.MemoryUsage;
    version: string;
}

export interface ConfigResponse {
    jurisdiction: string;
    deploymentEnv: string;
    supportedJurisdictions: string[];
}

export interface GenerateRequest {
    caseId: string;
    forceRegenerate: boolean;
    jurisdiction?: string;
}

export interface GenerateResponse {
    narrativeId: string;
    caseId: string;
    narrativeText: string;
    riskScore: number;
    typologies: string[];
    generationTimeSeconds: number;
    auditSteps: number;
    regenerated: boolean;
    statePath?: WorkflowState[];
    validation?: NarrativeValidationReport;
    enrichment?: EnrichmentSummary;
}

export interface ApproveRequest {
    analystName: string;
    notes?: string;
}

export interface AuditTrailResponse<Step> {
    narrativeId: string;
    chainValid: boolean;
    steps: Step[];
    sentenceAttribution: JsonValue;
}
