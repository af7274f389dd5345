import { PoolClient } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { pool } from '../config/database';
import { CaseStatus, SarNarrative } from '../types/transaction';
import { logger, describeError } from '../config/logger';
import { toIsoString, toNumber, toStringArray } from '../utils/coercion';

type SarNarrativeRow = {
    narrative_id: string;
    case_id: string;
    narrative_text: string;
    generated_at: Date | string | null;
    generation_time_seconds: string | number | null;
};

type NarrativeDetailRow = SarNarrativeRow & {
    status: string | null;
    risk_score: string | number | null;
    typologies: unknown;
    customer_name: string | null;
    customer_account: string | null;
    approved_by: string | null;
    approved_at: Date | string | null;
};

export interface NarrativeDetail extends SarNarrative {
    status: CaseStatus | null;
    riskScore: number | null;
    typologies: string[];
    customerName: string | null;
    customerAccount: string | null;
    approvedBy: string | null;
    approvedAt: string | null;
}

export interface NewNarrative {
    caseId: string;
    narrativeText: string;
    generationTimeSeconds: number;
}

const mapNarrativeRow = (row: SarNarrativeRow): SarNarrative => ({
    narrativeId: row.narrative_id,
    caseId: row.case_id,
    narrativeText: row.narrative_text,
    generatedAt: toIsoString(row.generated_at),
    generationTimeSeconds: toNumber(row.generation_time_seconds),
});

const toStatus = (value: string | null): CaseStatus | null =>
    value === 'pending' || value === 'generated' || value === 'approved' ? value : null;

export class SarNarrativeModel {
    static async findById(narrativeId: string): Promise<NarrativeDetail | null> {
        try {
            const query = `
            SELECT n.*, c.status, c.risk_score, c.typologies,
                   cu.name AS customer_name, cu.account_number AS customer_account
            FROM sar_narratives n
            LEFT JOIN sar_cases c ON c.case_id = n.case_id
            LEFT JOIN customers cu ON cu.customer_id = c.customer_id
            WHERE n.narrative_id::text = $1`;
            const result = await pool.query<NarrativeDetailRow>(query, [narrativeId]);
            const row = result.rows[0];
            if (!row) {
                return null;
            }

            return {
                ...mapNarrativeRow(row),
                status: toStatus(row.status),
                riskScore: toNumber(row.risk_score),
                typologies: toStringArray(row.typologies),
                customerName: row.customer_name,
                customerAccount: row.customer_account,
                approvedBy: row.approved_by,
                approvedAt: toIsoString(row.approved_at),
            };
        } catch (error) {
            logger.error('Error finding SAR narrative by ID', { narrativeId, error: describeError(error) });
            throw error;
        }
    }

    static async findLatestByCaseId(caseId: string): Promise<SarNarrative | null> {
        try {
            const query = `
            SELECT narrative_id, case_id, narrative_text, generated_at, generation_time_seconds
            FROM sar_narratives
            WHERE case_id = $1
            ORDER BY generated_at DESC
            LIMIT 1`;
            const result = await pool.query<SarNarrativeRow>(query, [caseId]);
            return result.rows[0] ? mapNarrativeRow(result.rows[0]) : null;
        } catch (error) {
            logger.error('Error finding narrative for case', { caseId, error: describeError(error) });
            throw error;
        }
    }

    static async insert(client: PoolClient, narrative: NewNarrative): Promise<string> {
        const narrativeId = uuidv4();
        const query = `
        INSERT INTO sar_narratives (narrative_id, case_id, narrative_text, generation_time_seconds)
        VALUES ($1, $2, $3, $4)`;
        await client.query(query, [narrativeId, narrative.caseId, narrative.narrativeText, narrative.generationTimeSeconds]);
        return narrativeId;
    }

    static async approve(narrativeId: string, analystName: string, notes?: string): Promise<string | null> {
        try {
            const query = `
            UPDATE sar_narratives
            SET approved_by = $1, approved_at = NOW(), analyst_notes = $2
            WHERE narrative_id::text = $3
            RETURNING case_id`;
            const result = await pool.query<{ case_id: string }>(query, [analystName, notes ?? null, narrativeId]);
            return result.rows[0]?.case_id ?? null;
        } catch (error) {
            logger.error('Error approving SAR narrative', { narrativeId, error: describeError(error) });
            throw error;
        }
    }
}
