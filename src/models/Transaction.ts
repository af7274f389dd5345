import { pool } from '../config/database';
import { Transaction } from '../types/transaction';
import { logger, describeError } from '../config/logger';
import { toIsoString, toNumber } from '../utils/coercion';

type TransactionRow = {
    transaction_id: string;
    customer_id: string | null;
    amount: string | number | null;
    date: Date | string | null;
    source_account: string | null;
    destination_account: string | null;
    transaction_type: string | null;
};

export const mapTransactionRow = (row: TransactionRow): Transaction => ({
    transactionId: row.transaction_id,
    customerId: row.customer_id,
    amount: toNumber(row.amount),
    date: toIsoString(row.date),
    sourceAccount: row.source_account,
    destinationAccount: row.destination_account,
    transactionType: row.transaction_type,
});

export class TransactionModel {
    static async findByCustomerId(customerId: string): Promise<Transaction[]> {
        try {
            const query = `
            SELECT transaction_id, customer_id, amount, date,
                   source_account, destination_account, transaction_type
            FROM transactions
            WHERE customer_id = $1
            ORDER BY date ASC NULLS LAST, transaction_id ASC`;
            const result = await pool.query<TransactionRow>(query, [customerId]);
            return result.rows.map(mapTransactionRow);
        } catch (error) {
            logger.error('Error finding transactions by customer ID', { customerId, error: describeError(error) });
            throw error;
        }
    }
}
