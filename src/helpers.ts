import crypto from 'crypto';

/**
 * Creates a deterministic hash of an object by sorting keys.
 */
export const generateHash = (content: unknown): string => {
    const stableStringify = (obj: unknown): string => {
        if (obj instanceof Date) {
            return JSON.stringify(obj.toISOString());
        }
        if (obj === undefined) {
            return 'null';
        }
        if (typeof obj !== 'object' || obj === null) {
            return JSON.stringify(obj);
        }
        if (Array.isArray(obj)) {
            return '[' + obj.map(stableStringify).join(',') + ']';
        }
        const parts = Object.entries(obj)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([key, value]) => `"${key}":${stableStringify(value)}`);
        return '{' + parts.join(',') + '}';
    };

    return crypto.createHash('sha1').update(stableStringify(content)).digest('hex');
};

export const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));

/**
 * Splits a comma separated env value, dropping blanks.
 */
export const splitList = (value: string | undefined): string[] => {
    if (!value) return [];
    return value
        .split(',')
        .map(item => item.trim())
        .filter(item => item.length > 0);
};
