/**
 * Backup File Detector
 *
 * Recognises blockchain wallet backup files before any password is asked for.
 * A v2 envelope is certain; bare base64 is only a candidate for v1, which
 * cannot be confirmed without decrypting.
 *
 * SECURITY: Detection labels never contain file contents.
 */

import { BACKUP_CIPHER } from '../../constants';
import { isBase64Text } from '../../utils/validation';
import type { DetectionResult } from './types';
import { ImportError } from './types';
import { parseBackupEnvelope } from './parsers/backupEnvelope';
import { safeLog } from './security';

/** IV plus one cipher block, base64 encoded */
const MIN_V1_BASE64_LENGTH = Math.ceil(((BACKUP_CIPHER.IV_LENGTH + BACKUP_CIPHER.BLOCK_SIZE) * 4) / 3);

/**
 * Detect whether a file looks like a blockchain wallet backup.
 * Returns null if the format is unrecognized.
 */
export function detectBackupFile(text: string): DetectionResult | null {
  const trimmed = text.trim();
  if (!trimmed) return null;

  let generation: DetectionResult['generation'];
  try {
    generation = parseBackupEnvelope(trimmed).generation;
  } catch (error) {
    if (error instanceof ImportError && error.code === 'INVALID_FORMAT') {
      // An envelope with a bad iteration count is still a v2 file
      return {
        format: 'blockchain_backup',
        confidence: 'likely',
        label: 'Blockchain Wallet Backup (v2, damaged envelope)',
        needsPassword: true,
        generation: 'v2',
      };
    }
    throw error;
  }

  if (generation === 'v2') {
    safeLog('detectBackupFile: v2 envelope');
    return {
      format: 'blockchain_backup',
      confidence: 'definite',
      label: 'Blockchain Wallet Backup (v2)',
      needsPassword: true,
      generation,
    };
  }

  if (isBase64Text(trimmed) && trimmed.replace(/\s+/g, '').length >= MIN_V1_BASE64_LENGTH) {
    safeLog('detectBackupFile: base64 text, possible v1 backup');
    return {
      format: 'blockchain_backup',
      confidence: 'possible',
      label: 'Blockchain Wallet Backup (v1)',
      needsPassword: true,
      generation,
    };
  }

  return null;
}
