import { pool } from '../config/database';
import { Customer } from '../types/transaction';
import { logger, describeError } from '../config/logger';
import { toNumber } from '../utils/coercion';

type CustomerRow = {
    customer_id: string;
    name: string;
    account_number: string;
    occupation: string | null;
    stated_income: string | number | null;
    customer_since: string | null;
};

export const mapCustomerRow = (row: CustomerRow): Customer => ({
    customerId: row.customer_id,
    name: row.name,
    accountNumber: row.account_number,
    occupation: row.occupation,
    statedIncome: toNumber(row.stated_income),
    customerSince: row.customer_since,
});

export class CustomerModel {
    static async findById(customerId: string): Promise<Customer | null> {
        try {
            // DATE comes back as text so no timezone shift creeps in
            const query = `
            SELECT customer_id, name, account_number, occupation, stated_income,
                   customer_since::text AS customer_since
            FROM customers
            WHERE customer_id = $1`;
            const result = await pool.query<CustomerRow>(query, [customerId]);
            return result.rows[0] ? mapCustomerRow(result.rows[0]) : null;
        } catch (error) {
            logger.error('Error finding customer by ID', { customerId, error: describeError(error) });
            throw error;
        }
    }
}
