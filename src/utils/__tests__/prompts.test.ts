import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { Customer, Transaction } from '../../types/transaction';
import { PatternAnalysis } from '../../types/sar';
import { emptySignals } from '../../services/patternDetector';
import { createSarPrompt, fillTemplate, formatMoney, formatTransactionLines, SarPromptInput } from '../prompts';

const customer: Customer = {
    customerId: 'CUST-1',
    name: 'Test Customer',
    accountNumber: 'ACC-0001',
    occupation: 'Shopkeeper',
    statedIncome: 600000,
    customerSince: '2019-04-01',
};

const tx = (index: number, overrides: Partial<Transaction> = {}): Transaction => ({
    transactionId: `TX-${index}`,
    amount: 48000,
    date: '2024-03-01',
    sourceAccount: 'ACC-SRC',
    destinationAccount: 'ACC-0001',
    transactionType: 'transfer',
    ...overrides,
});

const patterns: PatternAnalysis = { ...emptySignals(), typologies: ['structuring'], riskScore: 6 };

const input = (overrides: Partial<SarPromptInput> = {}): SarPromptInput => ({
    customer,
    transactions: [tx(1)],
    patterns,
    jurisdiction: 'IN',
    deploymentEnv: 'production',
    templates: [],
    similarCases: [],
    graphEvidence: 'No specific regulatory advisories matched for these typologies.',
    graphInsight: 'No insight.',
    ...overrides,
});

describe('fillTemplate', () => {
    it('replaces known placeholders and leaves unknown ones', () => {
        assert.equal(fillTemplate('{a} and {b}', { a: 1 }), '1 and {b}');
    });
});

describe('formatMoney', () => {
    it('uses thousands separators and two decimals', () => {
        assert.equal(formatMoney(1234567.5), '1,234,567.50');
        assert.equal(formatMoney(0), '0.00');
    });
});

describe('formatTransactionLines', () => {
    it('renders one line per transaction', () => {
        assert.equal(
            formatTransactionLines([tx(1)], '₹'),
            '  - ₹48,000.00 on 2024-03-01 from ACC-SRC to ACC-0001 (transfer)'
        );
    });

    it('fills gaps with placeholders', () => {
        const line = formatTransactionLines(
            [tx(1, { amount: null, date: null, sourceAccount: null, destinationAccount: null, transactionType: null })],
            '$'
        );
        assert.equal(line, '  - $0.00 on N/A from N/A to N/A (unknown)');
    });

    it('lists at most 25 transactions', () => {
        const transactions = Array.from({ length: 27 }, (_, index) => tx(index));
        const lines = formatTransactionLines(transactions, '₹').split('\n');

        assert.equal(lines.length, 26);
        assert.equal(lines[25], '  ... and 2 more transactions');
    });
});

describe('createSarPrompt', () => {
    it('addresses the Indian regulator in rupees', () => {
        const prompt = createSarPrompt(input());

        assert.ok(prompt.includes('regulatory submission to the Financial Intelligence Unit (FIU-IND) in a production environment'));
        assert.ok(prompt.includes('Use ₹ for all financial amounts.'));
        assert.ok(prompt.includes('Stated Income: ₹600,000'));
        assert.ok(prompt.includes('1. Subject Information'));
    });

    it('switches regulator and currency for the United States', () => {
        const prompt = createSarPrompt(input({ jurisdiction: 'US' }));

        assert.ok(prompt.includes('Financial Crimes Enforcement Network (FinCEN)'));
        assert.ok(prompt.includes('compliant with Bank Secrecy Act (BSA) / USA PATRIOT Act'));
        assert.ok(prompt.includes('  - $48,000.00 on 2024-03-01'));
        assert.ok(prompt.includes('This report will be filed using the FinCEN SAR Form.'));
    });

    it('carries the detected patterns', () => {
        const prompt = createSarPrompt(input());

        assert.ok(prompt.includes('- Risk Score: 6/10'));
        assert.ok(prompt.includes('- Detected Typologies: structuring'));
        assert.ok(prompt.includes('- Structuring Likelihood: 0.0%'));
    });

    it('says so when there are no templates or similar cases', () => {
        const prompt = createSarPrompt(input());

        assert.ok(prompt.includes('**REFERENCE TEMPLATES:**\nNo templates available.'));
        assert.ok(prompt.includes('**SIMILAR HISTORICAL CASES:**\nNo similar cases found.'));
    });

    it('truncates long similar cases', () => {
        const longCase = 'x'.repeat(1500);
        const prompt = createSarPrompt(input({ similarCases: [longCase] }));

        assert.ok(prompt.includes('x'.repeat(1200)));
        assert.ok(!prompt.includes('x'.repeat(1201)));
    });
});
