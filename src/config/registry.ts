import fs from 'fs';
import path from 'path';
import Joi from 'joi';
import { settings } from './settings';
import { logger } from './logger';

/**
 * Reads a JSON registry from the data directory and validates it. Registries
 * are loaded once at start-up; a malformed file stops the process.
 */
export const loadRegistry = <T>(fileName: string, schema: Joi.Schema<T>, dataDir: string = settings.dataDir): T => {
    const filePath = path.join(dataDir, fileName);
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));

    const { error, value } = schema.validate(raw, { abortEarly: true });
    if (error) {
        throw new Error(`Invalid registry ${fileName}: ${error.message}`);
    }

    logger.debug('Registry loaded', { fileName });
    return value;
};
