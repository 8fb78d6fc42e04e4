/**
 * Small collection of type-check helpers used across the backend.
 * Keeps common object/array checks in one place to avoid duplication.
 */

export function isNonArrayObject(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export function isStatMap(value: unknown): value is Record<string, number> {
    return isNonArrayObject(value) && Object.values(value).every((stat) => typeof stat === 'number' && Number.isSafeInteger(stat));
}

export function isPositiveSafeInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isSafeInteger(value) && value > 0;
}

/**
 * Accepts integers as numbers or as the numeric strings `pg` returns for BIGINT columns.
 */
export function toSafeInteger(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isSafeInteger(value) ? value : null;
    }
    if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
        const parsed = Number(value.trim());
        return Number.isSafeInteger(parsed) ? parsed : null;
    }
    return null;
}
