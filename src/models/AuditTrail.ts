import { PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { pool } from '../config/database';
import { AuditRecord } from '../types/sar';
import { logger, describeError } from '../config/logger';
import { toIsoString, toJsonObject } from '../utils/coercion';

type AuditTrailRow = {
    audit_id: string;
    narrative_id: string;
    position: number;
    step_name: string;
    data_sources: unknown;
    reasoning: unknown;
    confidence_scores: unknown;
    logged_at: Date | string | null;
    previous_hash: string;
    current_hash: string;
};

export interface StoredAuditRecord extends AuditRecord {
    auditId: string;
    narrativeId: string;
    position: number;
}

export const mapAuditRow = (row: AuditTrailRow): StoredAuditRecord => ({
    auditId: row.audit_id,
    narrativeId: row.narrative_id,
    position: row.position,
    stepName: row.step_name,
    dataSources: toJsonObject(row.data_sources),
    reasoning: toJsonObject(row.reasoning),
    confidenceScores: toJsonObject(row.confidence_scores),
    loggedAt: toIsoString(row.logged_at) ?? '',
    previousHash: row.previous_hash,
    currentHash: row.current_hash,
});

export class AuditTrailModel {
    static async findByNarrativeId(narrativeId: string): Promise<StoredAuditRecord[]> {
        try {
            const query = `
            SELECT * FROM audit_trail
            WHERE narrative_id::text = $1
            ORDER BY position ASC`;
            const result = await pool.query<AuditTrailRow>(query, [narrativeId]);
            return result.rows.map(mapAuditRow);
        } catch (error) {
            logger.error('Error finding audit trail', { narrativeId, error: describeError(error) });
            throw error;
        }
    }

    static async countByNarrativeId(narrativeId: string): Promise<number> {
        try {
            const query = 'SELECT COUNT(*) AS total FROM audit_trail WHERE narrative_id::text = $1';
            const result = await pool.query<{ total: string }>(query, [narrativeId]);
            return parseInt(result.rows[0]?.total ?? '0');
        } catch (error) {
            logger.error('Error counting audit trail', { narrativeId, error: describeError(error) });
            throw error;
        }
    }

    static async insertMany(client: PoolClient, narrativeId: string, records: ReadonlyArray<AuditRecord>): Promise<void> {
        const query = `
        INSERT INTO audit_trail (
            audit_id, narrative_id, position, step_name, data_sources, reasoning,
            confidence_scores, logged_at, previous_hash, current_hash
        ) VALUES ($1, $2, $3, $4, $5::jsonb, $6::jsonb, $7::jsonb, $8, $9, $10)`;

        for (const [position, record] of records.entries()) {
            await client.query(query, [
                uuidv4(),
                narrativeId,
                position,
                record.stepName,
                JSON.stringify(record.dataSources),
                JSON.stringify(record.reasoning),
                JSON.stringify(record.confidenceScores),
                record.loggedAt,
                record.previousHash,
                record.currentHash,
            ]);
        }
    }
}
