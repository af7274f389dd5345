import { Customer, Transaction } from '../types/transaction';
import { PatternAnalysis } from '../types/sar';
import { getJurisdictionContext } from '../config/jurisdictions';
import { validAmount } from './coercion';

export const MAX_PROMPT_TRANSACTIONS = 25;
export const MAX_SIMILAR_CASE_CHARS = 1200;

export const SAR_GENERATION_PROMPT = `You are a senior bank compliance analyst writing a Suspicious Activity Report (SAR) for regulatory submission to the {regulatoryBody} in a {deploymentEnv} environment.

**CRITICAL INSTRUCTIONS:**
- Use ONLY the data provided below. DO NOT invent any amounts, dates, or account numbers.
- Every number you write MUST appear in the source data.
- Follow the regulatory format strictly for {jurisdiction} jurisdiction.
- Cite specific transaction details when describing activity.
- Write in formal regulatory language compliant with {legalTerminology}.
- Use {currencySymbol} for all financial amounts.
- This report will be filed using the {reportingForm}.

**CUSTOMER INFORMATION:**
Name: {customerName}
Account Number: {accountNumber}
Occupation: {occupation}
Customer Since: {customerSince}
Stated Income: {statedIncome}
Secondary ID ({identityName}): Provided in KYC

**TRANSACTION SUMMARY ({numTransactions} transactions):**
{transactionsText}

**DETECTED PATTERNS:**
- Risk Score: {riskScore}/10
- Detected Typologies: {typologies}
- Velocity: {velocityDays} days span, {velocityRate} transactions/day ({velocityRisk} risk)
- Total Amount: {currencySymbol}{totalAmount}
- Average Amount: {currencySymbol}{avgAmount}
- Unique Source Accounts: {uniqueSources}
- Unique Destination Accounts: {uniqueDestinations}
- Structuring Likelihood: {structuringLikelihood}
- Near-Threshold Transactions: {nearThresholdCount} (Filing threshold: {filingThreshold})

**KNOWLEDGE GRAPH EVIDENCE:**
{graphEvidence}

**REFERENCE TEMPLATES:**
{templatesText}

**SIMILAR HISTORICAL CASES:**
{similarCases}

**YOUR TASK:**
Write a complete SAR narrative formatted with these jurisdictional sections required by {regulatoryBody}:

{jurisdictionalSections}

**NARRATIVE REQUIREMENTS:**
- Length: 3-4 paragraphs, 400-600 words.
- Tone: Formal, professional regulatory language compliant with {legalTerminology}.
- Subjectivity: Explain why the activity is suspicious based on the source data.
- Knowledge Graph Insight: {graphInsight} Must be integrated into the relevant section.
- Thresholds: Reference the {filingThreshold} limit when discussing structuring.

Write in a factual and specific manner. Reference actual data points.`;

export interface SarPromptInput {
    customer: Customer;
    transactions: ReadonlyArray<Transaction>;
    patterns: PatternAnalysis;
    jurisdiction: string;
    deploymentEnv: string;
    templates: ReadonlyArray<string>;
    similarCases: ReadonlyArray<string>;
    graphEvidence: string;
    graphInsight: string;
}

const money = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
const wholeMoney = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

export const formatMoney = (amount: number): string => money.format(amount);

/** Replaces `{name}` placeholders; unknown placeholders are left untouched. */
export const fillTemplate = (template: string, values: Record<string, string | number>): string =>
    template.replace(/\{(\w+)\}/g, (placeholder, key: string) =>
        Object.prototype.hasOwnProperty.call(values, key) ? String(values[key]) : placeholder
    );

export const formatTransactionLines = (transactions: ReadonlyArray<Transaction>, currencySymbol: string): string => {
    const lines = transactions.slice(0, MAX_PROMPT_TRANSACTIONS).map(tx =>
        `  - ${currencySymbol}${formatMoney(validAmount(tx.amount) ?? 0)} on ${tx.date ?? 'N/A'} ` +
        `from ${tx.sourceAccount ?? 'N/A'} to ${tx.destinationAccount ?? 'N/A'} (${tx.transactionType ?? 'unknown'})`
    );

    if (transactions.length > MAX_PROMPT_TRANSACTIONS) {
        lines.push(`  ... and ${transactions.length - MAX_PROMPT_TRANSACTIONS} more transactions`);
    }

    return lines.join('\n');
};

export const createSarPrompt = (input: SarPromptInput): string => {
    const { customer, transactions, patterns } = input;
    const context = getJurisdictionContext(input.jurisdiction);

    const templatesText = input.templates.length > 0
        ? input.templates.join('\n\n---\n\n')
        : 'No templates available.';
    const similarCases = input.similarCases.length > 0
        ? input.similarCases.map(text => text.slice(0, MAX_SIMILAR_CASE_CHARS)).join('\n\n---\n\n')
        : 'No similar cases found.';

    return fillTemplate(SAR_GENERATION_PROMPT, {
        regulatoryBody: context.regulatoryBody,
        deploymentEnv: input.deploymentEnv,
        jurisdiction: input.jurisdiction,
        legalTerminology: context.legalTerminology,
        currencySymbol: context.currencySymbol,
        reportingForm: context.reportingForm,
        identityName: context.identityName,
        filingThreshold: context.filingThreshold,
        customerName: customer.name || 'Unknown',
        accountNumber: customer.accountNumber || 'N/A',
        occupation: customer.occupation ?? 'N/A',
        customerSince: customer.customerSince ?? 'N/A',
        statedIncome: customer.statedIncome !== null
            ? `${context.currencySymbol}${wholeMoney.format(customer.statedIncome)}`
            : 'N/A',
        numTransactions: transactions.length,
        transactionsText: formatTransactionLines(transactions, context.currencySymbol),
        riskScore: patterns.riskScore,
        typologies: patterns.typologies.join(', '),
        velocityDays: patterns.velocity.timeSpanDays,
        velocityRate: patterns.velocity.transactionsPerDay,
        velocityRisk: patterns.velocity.risk,
        totalAmount: formatMoney(patterns.volume.totalAmount),
        avgAmount: formatMoney(patterns.volume.avgAmount),
        uniqueSources: patterns.network.uniqueSources,
        uniqueDestinations: patterns.network.uniqueDestinations,
        structuringLikelihood: `${(patterns.structuring.structuringLikelihood * 100).toFixed(1)}%`,
        nearThresholdCount: patterns.structuring.nearThresholdCount,
        graphEvidence: input.graphEvidence,
        graphInsight: input.graphInsight,
        templatesText,
        similarCases,
        jurisdictionalSections: context.sarSections.map((section, index) => `${index + 1}. ${section}`).join('\n'),
    });
};
