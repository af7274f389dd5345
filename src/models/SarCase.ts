import { PoolClient } from 'pg';
import { pool } from '../config/database';
import { CaseStatus, SarCase } from '../types/transaction';
import { logger, describeError } from '../config/logger';
import { toIsoString, toNumber, toStringArray } from '../utils/coercion';

type SarCaseRow = {
    case_id: string;
    customer_id: string | null;
    status: string | null;
    risk_score: string | number | null;
    typologies: unknown;
    created_at: Date | string | null;
    updated_at: Date | string | null;
};

type RecentCaseRow = SarCaseRow & {
    customer_name: string | null;
    customer_account: string | null;
    has_narrative: boolean;
};

type StatsRow = {
    total_sars: string;
    pending_cases: string;
    avg_generation_time: string | null;
    total_customers: string;
    high_risk_cases: string;
};

export interface RecentCase extends SarCase {
    customerName: string;
    customerAccount: string;
    hasNarrative: boolean;
}

export interface CaseStats {
    totalSars: number;
    pendingCases: number;
    avgGenerationTime: number;
    totalCustomers: number;
    highRiskCases: number;
}

export const HIGH_RISK_SCORE = 7;

const CASE_STATUSES: readonly CaseStatus[] = ['pending', 'generated', 'approved'];

const toCaseStatus = (value: string | null): CaseStatus =>
    CASE_STATUSES.find(status => status === value) ?? 'pending';

export const mapSarCaseRow = (row: SarCaseRow): SarCase => ({
    caseId: row.case_id,
    customerId: row.customer_id,
    status: toCaseStatus(row.status),
    riskScore: toNumber(row.risk_score),
    typologies: toStringArray(row.typologies),
    createdAt: toIsoString(row.created_at),
    updatedAt: toIsoString(row.updated_at),
});

export class SarCaseModel {
    static async findById(caseId: string): Promise<SarCase | null> {
        try {
            const query = 'SELECT * FROM sar_cases WHERE case_id = $1';
            const result = await pool.query<SarCaseRow>(query, [caseId]);
            return result.rows[0] ? mapSarCaseRow(result.rows[0]) : null;
        } catch (error) {
            logger.error('Error finding SAR case by ID', { caseId, error: describeError(error) });
            throw error;
        }
    }

    static async findRecent(limit: number = 20): Promise<RecentCase[]> {
        try {
            const query = `
            SELECT c.*,
                   cu.name AS customer_name,
                   cu.account_number AS customer_account,
                   EXISTS (SELECT 1 FROM sar_narratives n WHERE n.case_id = c.case_id) AS has_narrative
            FROM sar_cases c
            LEFT JOIN customers cu ON cu.customer_id = c.customer_id
            ORDER BY c.created_at DESC
            LIMIT $1`;
            const result = await pool.query<RecentCaseRow>(query, [limit]);
            return result.rows.map(row => ({
                ...mapSarCaseRow(row),
                customerName: row.customer_name ?? 'Unknown',
                customerAccount: row.customer_account ?? 'N/A',
                hasNarrative: row.has_narrative,
            }));
        } catch (error) {
            logger.error('Error finding recent SAR cases', { error: describeError(error) });
            throw error;
        }
    }

    /** Records the detector's verdict and moves the case to `generated`, inside the caller's transaction. */
    static async markGenerated(client: PoolClient, caseId: string, riskScore: number, typologies: string[]): Promise<void> {
        const query = `
        UPDATE sar_cases
        SET status = 'generated', risk_score = $1, typologies = $2::jsonb, updated_at = NOW()
        WHERE case_id = $3`;
        await client.query(query, [riskScore, JSON.stringify(typologies), caseId]);
    }

    static async updateStatus(caseId: string, status: CaseStatus): Promise<void> {
        try {
            const query = 'UPDATE sar_cases SET status = $1, updated_at = NOW() WHERE case_id = $2';
            await pool.query(query, [status, caseId]);
            logger.info(`Updated status for case ${caseId}: ${status}`);
        } catch (error) {
            logger.error('Error updating SAR case status', { caseId, error: describeError(error) });
            throw error;
        }
    }

    static async getStats(): Promise<CaseStats> {
        try {
            const query = `
            SELECT
                (SELECT COUNT(*) FROM sar_narratives) AS total_sars,
                (SELECT COUNT(*) FROM sar_cases WHERE status = 'pending') AS pending_cases,
                (SELECT AVG(generation_time_seconds) FROM sar_narratives) AS avg_generation_time,
                (SELECT COUNT(*) FROM customers) AS total_customers,
                (SELECT COUNT(*) FROM sar_cases WHERE risk_score > $1) AS high_risk_cases`;
            const result = await pool.query<StatsRow>(query, [HIGH_RISK_SCORE]);
            const row = result.rows[0];
            const avg = toNumber(row?.avg_generation_time ?? null) ?? 0;

            return {
                totalSars: parseInt(row?.total_sars ?? '0'),
                pendingCases: parseInt(row?.pending_cases ?? '0'),
                avgGenerationTime: Math.round(avg * 10) / 10,
                totalCustomers: parseInt(row?.total_customers ?? '0'),
                highRiskCases: parseInt(row?.high_risk_cases ?? '0'),
            };
        } catch (error) {
            logger.error('Error getting SAR statistics', { error: describeError(error) });
            throw error;
        }
    }
}
