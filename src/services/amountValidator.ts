import { Transaction } from '../types/transaction';
import { ValidationOutcome } from '../types/sar';
import { NarrativeValidationService } from '../types/collaborators';
import { getJurisdictionContext } from '../config/jurisdictions';
import { validAmount } from '../utils/coercion';
import { roundTo } from '../utils/rounding';

const MATCH_TOLERANCE = 1.0;
const MIN_CHECKED_AMOUNT = 1000;

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Cross-checks every currency amount quoted in a narrative against the source
 * transactions. Amounts above 1,000 that match neither a transaction nor the
 * overall total within 1.0 are reported as possible hallucinations.
 */
export class CurrencyAmountValidator implements NarrativeValidationService {
    async validateNarrative(
        narrative: string,
        jurisdiction: string,
        transactions: ReadonlyArray<Transaction>
    ): Promise<ValidationOutcome & { valid: boolean }> {
        const warnings: string[] = [];
        const { currencySymbol } = getJurisdictionContext(jurisdiction);
        const pattern = new RegExp(`${escapeRegExp(currencySymbol)}\\s?[\\d,]+(?:\\.\\d+)?`, 'g');

        const sourceAmounts = transactions
            .map(tx => validAmount(tx.amount))
            .filter((amount): amount is number => amount !== null)
            .map(amount => roundTo(amount, 2));
        const total = roundTo(sourceAmounts.reduce((sum, amount) => sum + amount, 0), 2);
        sourceAmounts.push(total);

        for (const match of narrative.match(pattern) ?? []) {
            const digits = match.slice(currencySymbol.length).replace(/[\s,]/g, '');
            const value = Number(digits);
            if (!Number.isFinite(value) || digits === '') {
                continue;
            }

            const matched = sourceAmounts.some(source => Math.abs(value - source) < MATCH_TOLERANCE);
            if (!matched && value > MIN_CHECKED_AMOUNT) {
                warnings.push(`Amount ${match} not found in source data`);
            }
        }

        return { valid: true, errors: [], warnings };
    }
}
