import { Transaction } from '../types/transaction';
import { AuditRecord, JsonObject, SentenceAttributionMap } from '../types/sar';
import { GENESIS_HASH, computeHash } from '../utils/hash';
import { validAmount } from '../utils/coercion';
import { logger } from '../config/logger';

const TRANSACTION_ID_PREFIX_LENGTH = 8;

/**
 * The persisted column layout of an audit row. Hashes are computed over this
 * shape so any reader of the audit_trail table can re-verify the chain.
 */
export const toHashPayload = (record: Omit<AuditRecord, 'currentHash'>): Record<string, unknown> => ({
    step_name: record.stepName,
    data_sources: record.dataSources,
    reasoning: record.reasoning,
    confidence_scores: record.confidenceScores,
    logged_at: record.loggedAt,
    previous_hash: record.previousHash,
});

export const hashAuditRecord = (record: Omit<AuditRecord, 'currentHash'>): string =>
    computeHash(toHashPayload(record));

/**
 * True when the first record is anchored at the genesis hash, every record
 * points at its predecessor's hash, and every stored hash matches its content.
 */
export const verifyAuditChain = (records: ReadonlyArray<AuditRecord>): boolean => {
    let expectedPrevious = GENESIS_HASH;

    for (const record of records) {
        if (record.previousHash !== expectedPrevious) {
            return false;
        }
        if (record.currentHash !== hashAuditRecord(record)) {
            return false;
        }
        expectedPrevious = record.currentHash;
    }

    return true;
};

const splitSentences = (narrative: string): string[] =>
    narrative
        .split(/[.!?]+/)
        .map(sentence => sentence.trim())
        .filter(sentence => sentence.length > 0);

/**
 * Append-only, hash-chained log of the steps taken to produce one report.
 * One instance belongs to one workflow run; it is not safe for concurrent
 * writers.
 */
export class AuditLogger {
    private logs: AuditRecord[] = [];
    private now: () => Date;

    constructor(now: () => Date = () => new Date()) {
        this.now = now;
    }

    logStep(
        stepName: string,
        dataSources: JsonObject,
        reasoning: JsonObject,
        outputs: JsonObject,
        confidence: number = 0
    ): AuditRecord {
        const entry = {
            stepName,
            dataSources,
            reasoning,
            confidenceScores: { ...outputs, confidence: Math.min(1, Math.max(0, confidence)) },
            loggedAt: this.now().toISOString(),
            previousHash: this.lastHash(),
        };

        const record: AuditRecord = { ...entry, currentHash: hashAuditRecord(entry) };
        this.logs.push(record);

        logger.info(`Audit: ${stepName}`, { hash: record.currentHash.slice(0, 16) });
        return record;
    }

    get records(): ReadonlyArray<AuditRecord> {
        return this.logs;
    }

    get length(): number {
        return this.logs.length;
    }

    verifyChain(): boolean {
        return verifyAuditChain(this.logs);
    }

    /** Same check as verifyChain, for records read back from storage. */
    verifyRecords(records: ReadonlyArray<AuditRecord>): boolean {
        return verifyAuditChain(records);
    }

    /**
     * Maps every sentence of the narrative to the transactions it mentions by
     * literal substring: the first eight characters of a transaction id, the
     * amount as written by String(), or either account number. Paraphrased
     * figures are not recognised.
     */
    createSentenceAttribution(narrative: string, transactions: ReadonlyArray<Transaction>): SentenceAttributionMap {
        const attribution: SentenceAttributionMap = {};

        splitSentences(narrative).forEach((sentence, position) => {
            const transactionIds: string[] = [];
            const amounts = new Set<number>();
            const accounts = new Set<string>();

            for (const tx of transactions) {
                const idPrefix = tx.transactionId.slice(0, TRANSACTION_ID_PREFIX_LENGTH);
                if (idPrefix && sentence.includes(idPrefix)) {
                    transactionIds.push(tx.transactionId);
                }

                const amount = validAmount(tx.amount);
                if (amount !== null && sentence.includes(String(amount))) {
                    amounts.add(amount);
                }

                for (const account of [tx.sourceAccount, tx.destinationAccount]) {
                    if (account && sentence.includes(account)) {
                        accounts.add(account);
                    }
                }
            }

            attribution[`sentence_${position}`] = {
                text: sentence,
                transactionIds,
                amounts: [...amounts],
                accounts: [...accounts],
                hasDataReference: transactionIds.length > 0 || amounts.size > 0 || accounts.size > 0,
                position,
            };
        });

        return attribution;
    }

    reset(): void {
        this.logs = [];
    }

    private lastHash(): string {
        const last = this.logs[this.logs.length - 1];
        return last ? last.currentHash : GENESIS_HASH;
    }
}
