import { Customer, Transaction } from './transaction';
import {
    AuditRecord,
    PatternAnalysis,
    RelationshipAnalysis,
    SentenceAttributionMap,
    StructuralValidation,
    TypologyContext,
    TypologyLabel,
    ValidationOutcome,
} from './sar';
import { RetrievedTemplate } from './collaborators';

export const WORKFLOW_STATES = [
    'INIT',
    'FETCHED',
    'PATTERNS_ANALYZED',
    'CONTEXT_ENRICHED',
    'NARRATIVE_DRAFTED',
    'VALIDATED',
    'SAVED',
    'FAILED',
] as const;

export type WorkflowState = typeof WORKFLOW_STATES[number];

export interface WorkflowRequest {
    caseId: string;
    customerId: string;
    jurisdiction?: string | null;
}

export interface DegradedFlags {
    typologyContext: boolean;
    relationships: boolean;
    templates: boolean;
    similarCases: boolean;
}

export interface Enrichment {
    jurisdiction: string;
    typologyContext: TypologyContext;
    relationships: RelationshipAnalysis;
    templates: RetrievedTemplate[];
    similarCases: string[];
    degraded: DegradedFlags;
    degradedReasons: string[];
}

export interface NarrativeValidationReport {
    structural: StructuralValidation;
    external: ValidationOutcome;
    externalFailed: boolean;
}

// Each stage receives the previous record and returns a new, frozen one.
export interface FetchedRecord {
    readonly request: Readonly<WorkflowRequest>;
    readonly customer: Readonly<Customer>;
    readonly transactions: ReadonlyArray<Transaction>;
}

export interface AnalyzedRecord extends FetchedRecord {
    readonly patterns: Readonly<PatternAnalysis>;
}

export interface EnrichedRecord extends AnalyzedRecord {
    readonly enrichment: Readonly<Enrichment>;
}

export interface DraftedRecord extends EnrichedRecord {
    readonly prompt: string;
    readonly narrative: string;
}

export interface ValidatedRecord extends DraftedRecord {
    readonly validation: Readonly<NarrativeValidationReport>;
}

export interface EnrichmentSummary {
    jurisdiction: string;
    advisoryIds: string[];
    riskAmplificationFactor: number;
    cyclesDetected: number;
    templateSources: string[];
    similarCaseCount: number;
    degraded: DegradedFlags;
}

export interface WorkflowResult {
    caseId: string;
    narrativeId: string;
    narrative: string;
    riskScore: number;
    typologies: TypologyLabel[];
    auditSteps: number;
    auditRecords: ReadonlyArray<AuditRecord>;
    sentenceAttribution: SentenceAttributionMap;
    validation: NarrativeValidationReport;
    enrichment: EnrichmentSummary;
    statePath: WorkflowState[];
    generationTimeSeconds: number;
}
