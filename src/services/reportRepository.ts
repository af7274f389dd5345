import { Pool } from 'pg';
import { pool as defaultPool } from '../config/database';
import { STATS_CACHE_KEY, invalidateCache } from '../config/redis';
import { Customer, Transaction } from '../types/transaction';
import { ReportRepository, SaveReportInput } from '../types/collaborators';
import { CustomerModel } from '../models/Customer';
import { TransactionModel } from '../models/Transaction';
import { SarCaseModel } from '../models/SarCase';
import { SarNarrativeModel } from '../models/SarNarrative';
import { AuditTrailModel } from '../models/AuditTrail';
import { DatabaseError } from '../middleware/errorHandler';
import { logger, describeError } from '../config/logger';

export class PgReportRepository implements ReportRepository {
    private pool: Pool;

    constructor(pool: Pool = defaultPool) {
        this.pool = pool;
    }

    findCustomer(customerId: string): Promise<Customer | null> {
        return CustomerModel.findById(customerId);
    }

    findTransactions(customerId: string): Promise<Transaction[]> {
        return TransactionModel.findByCustomerId(customerId);
    }

    /** Narrative, case verdict and the full audit trail land together or not at all. */
    async saveReport(input: SaveReportInput): Promise<string> {
        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');

            const narrativeId = await SarNarrativeModel.insert(client, {
                caseId: input.caseId,
                narrativeText: input.narrativeText,
                generationTimeSeconds: input.generationTimeSeconds,
            });
            await AuditTrailModel.insertMany(client, narrativeId, input.auditRecords);
            await SarCaseModel.markGenerated(client, input.caseId, input.riskScore, input.typologies);

            await client.query('COMMIT');
            logger.info('Saved SAR report', {
                caseId: input.caseId,
                narrativeId,
                auditSteps: input.auditRecords.length,
            });

            await invalidateCache(STATS_CACHE_KEY);
            return narrativeId;
        } catch (error) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                logger.error('Rollback failed', { error: describeError(rollbackError) });
            }
            logger.error('Error saving SAR report', { caseId: input.caseId, error: describeError(error) });
            throw new DatabaseError(`Failed to save SAR report: ${describeError(error)}`);
        } finally {
            client.release();
        }
    }
}
