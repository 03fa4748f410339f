import crypto from 'crypto';

/**
 * SHA-256 hex digest of the script exactly as read from disk.
 * Computed before decoding, so it does not depend on parse success.
 */
export function computeContentHash(raw: Uint8Array): string {
    return crypto.createHash('sha256').update(raw).digest('hex');
}
