import { createHash } from 'node:crypto';

/**
 * SHA-256 hex digest of a string (UTF-8) or raw bytes.
 */
export function sha256Hex(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}
