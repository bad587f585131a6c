import { LIMITS } from '../../detector/config/constants.js';

/**
 * Trim and collapse internal whitespace runs to a single space, then cut to
 * `maxLength`. Two captures of the same element compare equal regardless of
 * markup whitespace.
 */
export function normalizeText(value: string | null | undefined, maxLength: number = LIMITS.TEXT_MAX_LENGTH): string {
    if (!value) return '';
    return value.replace(/\s+/g, ' ').trim().substring(0, maxLength).trim();
}

/** Case-insensitive key used for de-duplicating triggers by text */
export function textKey(value: string | null | undefined): string {
    return normalizeText(value).toLowerCase();
}
