import { Customer, Transaction } from './transaction';
import { AuditRecord, ValidationOutcome } from './sar';

export interface SaveReportInput {
    caseId: string;
    narrativeText: string;
    riskScore: number;
    typologies: string[];
    auditRecords: ReadonlyArray<AuditRecord>;
    generationTimeSeconds: number;
}

/** Storage boundary of the workflow. `saveReport` commits or rolls back as one unit. */
export interface ReportRepository {
    findCustomer(customerId: string): Promise<Customer | null>;
    findTransactions(customerId: string): Promise<Transaction[]>;
    saveReport(input: SaveReportInput): Promise<string>;
}

export interface NarrativeGenerator {
    readonly modelName: string;
    generateNarrative(prompt: string, jurisdiction: string): Promise<string>;
}

export interface NarrativeValidationService {
    validateNarrative(narrative: string, jurisdiction: string, transactions: ReadonlyArray<Transaction>): Promise<ValidationOutcome>;
}

export interface RetrievedTemplate {
    template: string;
    source: string;
}

export interface TemplateStore {
    retrieveTemplates(typologies: ReadonlyArray<string>, topK?: number): Promise<RetrievedTemplate[]>;
}

export interface SimilarCaseStore {
    retrieveSimilarCases(query: string, topK?: number): Promise<string[]>;
}
