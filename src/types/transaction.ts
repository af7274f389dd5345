export interface Customer {
    customerId: string;
    name: string;
    accountNumber: string;
    occupation: string | null;
    statedIncome: number | null;
    customerSince: string | null;
}

export interface Transaction {
    transactionId: string;
    customerId?: string | null;
    amount: number | null;
    date: string | null;
    sourceAccount: string | null;
    destinationAccount: string | null;
    transactionType: string | null;
}

export type CaseStatus = 'pending' | 'generated' | 'approved';

export interface SarCase {
    caseId: string;
    customerId: string | null;
    status: CaseStatus;
    riskScore: number | null;
    typologies: string[];
    createdAt: string | null;
    updatedAt: string | null;
}

export interface SarNarrative {
    narrativeId: string;
    caseId: string;
    narrativeText: string;
    generatedAt: string | null;
    generationTimeSeconds: number | null;
}
