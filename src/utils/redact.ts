/**
 * @fileoverview Redaction helpers for safe logging.
 * @module utils/redact
 * @version 1.0.0
 */

/**
 * Redact common credential-bearing query values in a stream or playlist URL.
 *
 * Intended for logging only. This does not guarantee complete sanitization for all cases.
 */
export function redactSensitiveTokens(value: string): string {
    return value
        .replace(/access_token=[^&\s]*/gi, 'access_token=REDACTED')
        .replace(/\btoken=[^&\s]*/gi, 'token=REDACTED')
        .replace(/\bauth=[^&\s]*/gi, 'auth=REDACTED')
        .replace(/\bpassword=[^&\s]*/gi, 'password=REDACTED')
        .replace(/\/\/([^/@\s:]+):([^/@\s]+)@/g, '//$1:REDACTED@');
}
