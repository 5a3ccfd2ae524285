/**
 * Double Encryption
 *
 * Wallets with `double_encryption: true` encrypt every `priv` field a second
 * time. The inner layer uses the same cipher as the file, keyed with
 * `sharedKey + secondPassword` and the wallet's own iteration count.
 */

import { IMPORT_DEFAULTS } from '../../../constants';
import type { WalletDocument } from '../types';
import { ImportError } from '../types';
import { deriveAndDecrypt } from './passwordCipher';

export interface SecondaryCipherContext {
  sharedKey: string;
  secondPassword: string;
  iterations: number;
}

/**
 * Build the per-key context from the decrypted wallet document.
 *
 * @throws ImportError MALFORMED_DOCUMENT when the wallet has no sharedKey
 */
export function createSecondaryContext(
  document: WalletDocument,
  secondPassword: string,
): SecondaryCipherContext {
  if (!document.sharedKey) {
    throw new ImportError('MALFORMED_DOCUMENT', 'Double-encrypted wallet has no sharedKey');
  }

  return {
    sharedKey: document.sharedKey,
    secondPassword,
    iterations: document.secondaryIterations ?? IMPORT_DEFAULTS.SECONDARY_PBKDF2_ITERATIONS,
  };
}

/** Composed password for the inner layer */
export function composeSecondaryPassword(context: SecondaryCipherContext): string {
  return context.sharedKey + context.secondPassword;
}

/**
 * Remove the inner encryption layer of one private key field.
 *
 * @returns The Base58 private key text
 * @throws ImportError DECRYPTION_FAILED on a wrong second password
 */
export function unwrapDoubleEncryptedKey(encryptedPrivate: string, context: SecondaryCipherContext): string {
  return deriveAndDecrypt(encryptedPrivate, composeSecondaryPassword(context), context.iterations);
}
