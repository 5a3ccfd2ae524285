/**
 * Backup Envelope Parser
 *
 * Two generations of blockchain wallet backup exist:
 *   - v1: the file is the base64 ciphertext itself, 10 PBKDF2 rounds
 *   - v2: `{ "pbkdf2_iterations": <int>, "payload": "<base64>" }`
 *
 * Anything that does not parse as a v2 envelope is read as v1; a file that
 * is neither fails later, at decryption.
 */

import { IMPORT_DEFAULTS } from '../../../constants';
import { isPlainObject, tryParseJson } from '../../../utils/validation';
import type { BackupPayload } from '../types';
import { ImportError } from '../types';
import { safeLog } from '../security';

/**
 * Determine the backup generation and pull out the ciphertext.
 * Never decrypts and never needs a password.
 *
 * @throws ImportError INVALID_FORMAT for a v2 envelope with an unusable iteration count
 */
export function parseBackupEnvelope(text: string): BackupPayload {
  const trimmed = text.trim();
  const data = tryParseJson(trimmed);

  if (isPlainObject(data) && typeof data.payload === 'string' && typeof data.pbkdf2_iterations === 'number') {
    const iterations = data.pbkdf2_iterations;
    if (!Number.isInteger(iterations) || iterations < 1) {
      throw new ImportError('INVALID_FORMAT', 'Backup envelope has an invalid pbkdf2_iterations value');
    }

    safeLog(`parseBackupEnvelope: v2 envelope, ${iterations} iterations`);
    return {
      generation: 'v2',
      iterationCount: iterations,
      ciphertextBase64: data.payload,
    };
  }

  safeLog('parseBackupEnvelope: no v2 envelope, reading as v1 ciphertext');
  return {
    generation: 'v1',
    iterationCount: IMPORT_DEFAULTS.V1_PBKDF2_ITERATIONS,
    ciphertextBase64: trimmed,
  };
}

/**
 * The signal to raise when no main password is on hand: a v2 envelope is
 * a confirmed backup and only needs the password, a v1 file cannot be
 * confirmed without decrypting it.
 */
export function passwordRequirement(payload: BackupPayload): ImportError {
  if (payload.generation === 'v2') {
    return new ImportError('PRIMARY_PASSWORD_REQUIRED', 'Wallet backup recognised; enter the wallet password');
  }
  return new ImportError('PASSWORD_MISSING', 'A password is required to decrypt this backup');
}

/** An envelope together with the main password that will open it */
export interface UnlockableBackup {
  payload: BackupPayload;
  password: string;
}

/**
 * Read the envelope and check a main password is on hand.
 *
 * @param text - Full backup file contents
 * @param password - Main password, if the caller has one yet
 * @throws ImportError PRIMARY_PASSWORD_REQUIRED for a v2 file without a password
 * @throws ImportError PASSWORD_MISSING for a v1 file without a password
 */
export function extractBackupPayload(text: string, password?: string | null): UnlockableBackup {
  const payload = parseBackupEnvelope(text);
  if (password === undefined || password === null) {
    throw passwordRequirement(payload);
  }
  return { payload, password };
}
