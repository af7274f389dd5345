import { JsonObject } from '../types/sar';

/** Finite, non-negative amount; numeric strings (pg NUMERIC) are accepted. */
export const validAmount = (amount: unknown): number | null => {
    const value = typeof amount === 'string' && amount.trim() !== '' ? Number(amount) : amount;
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
        return null;
    }
    return value;
};

export const validTimestamp = (date: unknown): number | null => {
    if (date instanceof Date) {
        const time = date.getTime();
        return Number.isNaN(time) ? null : time;
    }
    if (typeof date !== 'string' || date.trim() === '') {
        return null;
    }
    const time = Date.parse(date);
    return Number.isNaN(time) ? null : time;
};

// Row mappers: pg hands back NUMERIC as strings, timestamps as Dates and JSONB as parsed values.

export const toNumber = (value: unknown): number | null => {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = parseFloat(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
};

export const toIsoString = (value: unknown): string | null => {
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? null : value.toISOString();
    }
    return typeof value === 'string' && value !== '' ? value : null;
};

const isJsonObject = (value: unknown): value is JsonObject =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

export const toJsonObject = (value: unknown): JsonObject => (isJsonObject(value) ? value : {});

export const toStringArray = (value: unknown): string[] =>
    Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
