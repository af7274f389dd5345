import { createHash } from 'crypto';

export const GENESIS_HASH = '0'.repeat(64);

const canonicalize = (value: unknown): unknown => {
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (Array.isArray(value)) {
        return value.map(item => canonicalize(item === undefined ? null : item));
    }
    if (value !== null && typeof value === 'object') {
        const sorted: Record<string, unknown> = {};
        for (const key of Object.keys(value).sort()) {
            const entry: unknown = Reflect.get(value, key);
            if (entry !== undefined) {
                sorted[key] = canonicalize(entry);
            }
        }
        return sorted;
    }
    return value;
};

/**
 * JSON encoding with object keys sorted at every depth, so two structurally
 * equal values always serialize to the same string.
 */
export const canonicalJson = (value: unknown): string => JSON.stringify(canonicalize(value));

export const sha256 = (input: string): string =>
    createHash('sha256').update(input, 'utf8').digest('hex');

export const computeHash = (data: Record<string, unknown>, excludeKeys: string[] = []): string => {
    const copy: Record<string, unknown> = { ...data };
    for (const key of excludeKeys) {
        delete copy[key];
    }
    return sha256(canonicalJson(copy));
};
