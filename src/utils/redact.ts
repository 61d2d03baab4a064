/**
 * @fileoverview Redaction helpers for safe logging.
 * @module utils/redact
 * @version 1.0.0
 */

/**
 * Redact credentials commonly carried in media URL query strings.
 *
 * Intended for logging only. This does not guarantee complete sanitization for all cases.
 */
export function redactMediaUrl(value: string | null | undefined): string {
    if (!value) {
        return '';
    }
    return value
        .replace(/\b(access_token|token|key|signature|sig)=[^&\s#]*/gi, '$1=REDACTED')
        .replace(/\/\/[^/@\s]+:[^/@\s]+@/, '//REDACTED@');
}
