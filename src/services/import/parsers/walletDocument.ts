/**
 * Wallet Document Parser
 *
 * Reads the decrypted JSON of a blockchain wallet backup:
 *
 *   {
 *     "guid": "...",
 *     "sharedKey": "...",
 *     "double_encryption": true,
 *     "options": { "pbkdf2_iterations": 5000 },
 *     "keys": [
 *       { "addr": "1...", "priv": "...", "created_time": 0, "label": "", "tag": 0 }
 *     ]
 *   }
 *
 * Only `keys` and each key's `addr` are required.
 */

import { isPlainObject, tryParseJson } from '../../../utils/validation';
import type { KeyRecord, WalletDocument } from '../types';
import { ImportError } from '../types';
import { maskSecret, safeLog } from '../security';

function malformed(message: string): ImportError {
  return new ImportError('MALFORMED_DOCUMENT', message);
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw malformed(`Field "${field}" must be a string`);
  return value;
}

function optionalInteger(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw malformed(`Field "${field}" must be an integer`);
  }
  return value;
}

function parseKeyRecord(entry: unknown, index: number): KeyRecord {
  if (!isPlainObject(entry)) {
    throw malformed(`Key #${index} is not an object`);
  }
  if (typeof entry.addr !== 'string' || entry.addr.length === 0) {
    throw malformed(`Key #${index} has no address`);
  }

  const priv = optionalString(entry.priv, 'priv');

  return {
    address: entry.addr,
    // An empty priv is treated like a missing one
    rawPrivateField: priv ? priv : undefined,
    creationTime: optionalInteger(entry.created_time, 'created_time'),
    label: optionalString(entry.label, 'label'),
    tag: optionalInteger(entry.tag, 'tag'),
  };
}

/**
 * Parse decrypted wallet JSON.
 *
 * @param plaintext - Output of the outer decryption
 * @throws ImportError DECRYPTION_FAILED if the text is not JSON (wrong password)
 * @throws ImportError MALFORMED_DOCUMENT if required structure is missing
 */
export function parseWalletDocument(plaintext: string): WalletDocument {
  const data = tryParseJson(plaintext);
  if (data === undefined) {
    throw new ImportError('DECRYPTION_FAILED', 'Wrong password or corrupted backup (not a wallet document)');
  }
  if (!isPlainObject(data)) {
    throw malformed('Wallet document is not a JSON object');
  }
  if (!Array.isArray(data.keys)) {
    throw malformed('Wallet document has no keys');
  }

  const keys = data.keys.map((entry: unknown, index: number) => parseKeyRecord(entry, index));

  const doubleEncryption = data.double_encryption === true;
  const options: Record<string, unknown> = isPlainObject(data.options) ? data.options : {};
  const secondaryIterations = optionalInteger(options.pbkdf2_iterations, 'options.pbkdf2_iterations');
  if (secondaryIterations !== undefined && secondaryIterations < 1) {
    throw malformed('Field "options.pbkdf2_iterations" must be positive');
  }

  const guid = optionalString(data.guid, 'guid');
  safeLog(
    `parseWalletDocument: wallet ${guid ? maskSecret(guid) : '(no guid)'}, ${keys.length} keys, doubleEncryption=${doubleEncryption}`,
  );

  return {
    guid,
    doubleEncryption,
    sharedKey: optionalString(data.sharedKey, 'sharedKey'),
    secondaryIterations,
    keys,
  };
}
