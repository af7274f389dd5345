export const TYPOLOGY_LABELS = [
    'layering',
    'structuring',
    'smurfing',
    'integration',
    'round_tripping',
    'funnel_account',
    'general_suspicious',
] as const;

export type TypologyLabel = typeof TYPOLOGY_LABELS[number];

export type RiskTier = 'LOW' | 'MEDIUM' | 'HIGH';

export interface VelocitySignal {
    timeSpanDays: number;
    transactionsPerDay: number;
    risk: RiskTier;
}

export interface VolumeSignal {
    totalAmount: number;
    avgAmount: number;
    maxAmount: number;
    numTransactions: number;
}

export interface StructuringSignal {
    nearThresholdCount: number;
    structuringLikelihood: number;
    suspicious: boolean;
}

export interface NetworkSignal {
    uniqueSources: number;
    uniqueDestinations: number;
    fanInHigh: boolean;
    fanOutHigh: boolean;
    hubDetected: boolean;
    totalNodes: number;
    totalEdges: number;
}

export interface SignalBundle {
    velocity: VelocitySignal;
    volume: VolumeSignal;
    structuring: StructuringSignal;
    network: NetworkSignal;
}

export interface PatternAnalysis extends SignalBundle {
    typologies: TypologyLabel[];
    riskScore: number;
}

export interface RegulatoryAdvisory {
    advisoryId: string;
    title: string;
    issuer: string;
    typology: string;
    jurisdiction: string;
    description: string;
    riskWeight: number;
}

export interface TypologyContext {
    advisories: RegulatoryAdvisory[];
    evidenceText: string;
    insightText: string;
    confidenceScore: number;
}

export interface RelationshipAnalysis {
    relationshipSummary: string;
    centralityScore: number;
    numNodes: number;
    numEdges: number;
    numComponents: number;
    cyclesDetected: number;
    riskAmplificationFactor: number;
    /** Set when the analysis failed and the neutral result stands in for it. */
    fallbackReason?: string;
}

export interface JurisdictionContext {
    regulatoryBody: string;
    currencySymbol: string;
    identityName: string;
    filingThreshold: string;
    legalTerminology: string;
    reportingForm: string;
    sarSections: string[];
}

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface AuditRecord {
    stepName: string;
    dataSources: JsonObject;
    reasoning: JsonObject;
    confidenceScores: JsonObject;
    loggedAt: string;
    previousHash: string;
    currentHash: string;
}

export interface SentenceAttribution {
    text: string;
    transactionIds: string[];
    amounts: number[];
    accounts: string[];
    hasDataReference: boolean;
    position: number;
}

export type SentenceAttributionMap = Record<string, SentenceAttribution>;

export interface ValidationOutcome {
    warnings: string[];
    errors: string[];
}

export interface StructuralValidation extends ValidationOutcome {
    valid: boolean;
    wordCount: number;
    sectionsFound: number;
}
