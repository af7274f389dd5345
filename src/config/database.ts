import { Pool, PoolConfig } from 'pg';
import { logger, describeError } from './logger';

const dbConfig: PoolConfig = {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432'),
    database: process.env.DB_NAME || 'sar_pipeline',
    user: process.env.DB_USER || 'sar_user',
    password: process.env.DB_PASSWORD || 'sar_pass',

    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
};

export const pool = new Pool(dbConfig);

pool.on('connect', () => {
    logger.debug('New PostgreSQL client connected');
});

pool.on('error', (err) => {
    logger.error('PostgreSQL client error', { error: err.message });
});

export const testConnection = async (): Promise<boolean> => {
    try {
        const client = await pool.connect();
        try {
            const result = await client.query('SELECT NOW()');
            logger.info('Database connection successful', result.rows[0]);
            return true;
        } finally {
            client.release();
        }
    } catch (error) {
        logger.error('Database connection failed', { error: describeError(error) });
        return false;
    }
};
