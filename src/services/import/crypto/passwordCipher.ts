/**
 * Password Cipher
 *
 * Decrypts blockchain wallet backup ciphertext:
 *   base64( IV[16] || AES-256-CBC(plaintext + ISO-10126 padding) )
 * with the key derived by PBKDF2-HMAC-SHA1(password, salt = IV).
 *
 * The same routine removes the outer file layer and, for double-encrypted
 * wallets, each per-key layer. Callers choose the password and iteration
 * count; salt composition stays with them.
 */

import * as forge from 'node-forge';
import { createDecipheriv } from 'crypto';
import { BACKUP_CIPHER } from '../../../constants';
import { isBase64Text } from '../../../utils/validation';
import { ImportError } from '../types';
import { zeroizeBuffer } from '../security';

/**
 * PKCS#5 password-to-bytes conversion used for PBKDF2 inputs:
 * each UTF-16 character encoded as UTF-8, as a forge binary string.
 */
export function passwordToPbkdf2Bytes(password: string): string {
  try {
    return forge.util.encodeUtf8(password);
  } catch {
    throw new ImportError('INVALID_FORMAT', 'Password is not valid Unicode text');
  }
}

/**
 * Derive the 256-bit AES key for one decrypt call.
 */
export function deriveKey(password: string, salt: Uint8Array, iterations: number): Buffer {
  const derived = forge.pkcs5.pbkdf2(
    passwordToPbkdf2Bytes(password),
    Buffer.from(salt).toString('binary'),
    iterations,
    BACKUP_CIPHER.KEY_LENGTH,
    forge.md.sha1.create(),
  );
  return Buffer.from(derived, 'binary');
}

/**
 * Raw AES-256-CBC decryption with padding left in place. Zeroes the key.
 */
function decryptCbc(key: Buffer, iv: Uint8Array, ciphertext: Uint8Array): Buffer {
  try {
    const decipher = createDecipheriv('aes-256-cbc', key, iv);
    decipher.setAutoPadding(false);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch {
    throw new ImportError('DECRYPTION_FAILED', 'Decryption failed');
  } finally {
    zeroizeBuffer(key);
  }
}

/**
 * Strip ISO-10126 padding: only the final byte (the pad length) is checked,
 * the filler bytes are arbitrary.
 *
 * @returns The unpadded view, or null if the pad length is impossible
 */
export function removeIso10126Padding(data: Uint8Array): Uint8Array | null {
  if (data.length === 0) return null;
  const padLength = data[data.length - 1];
  if (padLength < 1 || padLength > BACKUP_CIPHER.BLOCK_SIZE || padLength > data.length) {
    return null;
  }
  return data.subarray(0, data.length - padLength);
}

/**
 * Decrypt a base64 backup ciphertext with a password.
 *
 * @param ciphertextBase64 - IV-prefixed ciphertext
 * @param password - Main password, or sharedKey + second password for inner layers
 * @param iterations - PBKDF2 rounds
 * @returns UTF-8 plaintext
 * @throws ImportError DECRYPTION_FAILED for malformed input, a rejected pad or non-UTF-8 output
 */
export function deriveAndDecrypt(ciphertextBase64: string, password: string, iterations: number): string {
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new ImportError('INVALID_FORMAT', 'PBKDF2 iteration count must be a positive integer');
  }

  // Buffer's decoder skips stray characters instead of rejecting them
  if (!isBase64Text(ciphertextBase64)) {
    throw new ImportError('DECRYPTION_FAILED', 'Ciphertext is not valid base64');
  }

  const raw = Buffer.from(ciphertextBase64.trim(), 'base64');
  const body = raw.length - BACKUP_CIPHER.IV_LENGTH;
  if (body <= 0 || body % BACKUP_CIPHER.BLOCK_SIZE !== 0) {
    throw new ImportError('DECRYPTION_FAILED', 'Ciphertext is truncated or not block aligned');
  }

  const iv = raw.subarray(0, BACKUP_CIPHER.IV_LENGTH);
  const ciphertext = raw.subarray(BACKUP_CIPHER.IV_LENGTH);

  const padded = decryptCbc(deriveKey(password, iv, iterations), iv, ciphertext);

  try {
    const unpadded = removeIso10126Padding(padded);
    if (!unpadded) {
      throw new ImportError('DECRYPTION_FAILED', 'Wrong password or corrupted backup (bad padding)');
    }

    try {
      return forge.util.decodeUtf8(Buffer.from(unpadded.buffer, unpadded.byteOffset, unpadded.length).toString('binary'));
    } catch {
      throw new ImportError('DECRYPTION_FAILED', 'Wrong password or corrupted backup (invalid text)');
    }
  } finally {
    zeroizeBuffer(padded);
  }
}
