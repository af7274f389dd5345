import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { Transaction } from '../../types/transaction';
import { CurrencyAmountValidator } from '../amountValidator';

const tx = (id: string, amount: number | null): Transaction => ({
    transactionId: id,
    amount,
    date: '2024-03-01',
    sourceAccount: 'ACC-SRC',
    destinationAccount: 'ACC-DST',
    transactionType: 'transfer',
});

const transactions = [tx('T1', 48000), tx('T2', 47500.5), tx('T3', null)];

describe('CurrencyAmountValidator', () => {
    const validator = new CurrencyAmountValidator();

    it('accepts quoted transaction amounts and the total', async () => {
        const result = await validator.validateNarrative(
            'Deposits of ₹48,000 and ₹47,500.50 totalling ₹95,500.50 were received.',
            'IN',
            transactions
        );

        assert.deepEqual(result, { valid: true, errors: [], warnings: [] });
    });

    it('flags amounts above 1,000 that are not in the data', async () => {
        const result = await validator.validateNarrative(
            'A transfer of ₹12,345 and a fee of ₹500 were also noted.',
            'IN',
            transactions
        );

        assert.deepEqual(result.warnings, ['Amount ₹12,345 not found in source data']);
    });

    it('allows differences under 1.0', async () => {
        const result = await validator.validateNarrative('Roughly ₹48,000.75 and ₹48,001.50 moved.', 'IN', transactions);
        assert.deepEqual(result.warnings, ['Amount ₹48,001.50 not found in source data']);
    });

    it('reads amounts in the jurisdiction currency only', async () => {
        const result = await validator.validateNarrative(
            'A transfer of $ 20,000 followed ₹99,999 in cash.',
            'US',
            transactions
        );

        assert.deepEqual(result.warnings, ['Amount $ 20,000 not found in source data']);
    });

    it('handles multi-letter symbols', async () => {
        const result = await validator.validateNarrative('Transfers of AED 48,000 and AED 60,000.', 'UAE', transactions);
        assert.deepEqual(result.warnings, ['Amount AED 60,000 not found in source data']);
    });
});
