/**
 * Import Security Utilities
 *
 * Buffer zeroization and secret-safe logging for the import flow.
 *
 * NEVER log secrets. NEVER include raw input in errors.
 */

import { logger } from '../../utils/logger';

const TAG = 'Import';

// ============================================
// Buffer Zeroization
// ============================================

/**
 * Overwrite a Uint8Array with zeros to minimize secret exposure in memory.
 * JavaScript GC may still retain copies.
 */
export function zeroizeBuffer(buf: Uint8Array | null | undefined): void {
  if (!buf) return;
  buf.fill(0);
}

// ============================================
// Logging Safety
// ============================================

/**
 * Log an import step. Callers pass only non-secret details
 * (generation, counts, addresses).
 */
export function safeLog(context: string, ...details: unknown[]): void {
  logger.info(TAG, context, ...details);
}

/**
 * Log a failed step. Only the error's name, code and message are printed,
 * never the input that caused it.
 */
export function safeLogError(context: string, error: unknown): void {
  if (error instanceof Error) {
    const code = 'code' in error ? ` (${String(error.code)})` : '';
    logger.error(TAG, `${context}: ${error.name}${code}: ${error.message}`);
    return;
  }
  logger.error(TAG, `${context}: non-error thrown`);
}

// ============================================
// Input Sanitization
// ============================================

/**
 * Mask a secret string for safe display/logging.
 * Shows first and last `showChars` chars, everything else is masked.
 *
 * @example maskSecret("5HpHagT65TZzG1PH3CSu63k8DbpvD8s5ip4nEB3kEsreAnchuDf")
 * // Returns "5HpH...huDf"
 */
export function maskSecret(input: string, showChars: number = 4): string {
  if (input.length <= showChars * 2) return '****';
  return `${input.slice(0, showChars)}...${input.slice(-showChars)}`;
}
