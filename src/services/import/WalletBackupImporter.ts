/**
 * WalletBackupImporter — Blockchain Wallet Backup Import
 *
 * Drives one backup file through:
 *   envelope detection → outer decryption → document parsing
 *   → per-key (optional) inner decryption → key recovery → key store
 *
 * Missing passwords are states, not exceptions:
 *
 *   idle ──start(pw)──────────────┬─▶ complete
 *     │                           ├─▶ needs_secondary_password ──provideSecondaryPassword──▶ complete
 *     └─start()─▶ needs_primary_password ──providePrimaryPassword──▶ (as start(pw))
 *
 * Any fatal error moves to `failed`. Keys already handed to the key store stay
 * there; there is no rollback.
 */

import type { Network } from 'bitcoinjs-lib';
import { ARCHIVED_ADDRESS_TAG, IMPORT_DEFAULTS } from '../../constants';
import type { NetworkName } from '../../constants';
import { logger } from '../../utils/logger';
import { isValidBitcoinAddress } from '../../utils/validation';
import { extractBackupPayload, parseBackupEnvelope } from './parsers/backupEnvelope';
import type { UnlockableBackup } from './parsers/backupEnvelope';
import { parseWalletDocument } from './parsers/walletDocument';
import { decodeBase58PrivateKey, resolveNetwork } from './parsers/base58PrivateKey';
import { deriveAndDecrypt } from './crypto/passwordCipher';
import { createSecondaryContext, unwrapDoubleEncryptedKey } from './crypto/doubleEncryption';
import type { SecondaryCipherContext } from './crypto/doubleEncryption';
import type {
  BackupPayload,
  ImportOptions,
  ImportState,
  ImportStatus,
  ImportSummary,
  KeyRecord,
  RecoveredKey,
  WalletDocument,
} from './types';
import { ImportError } from './types';
import { safeLog, safeLogError } from './security';

/** Running totals threaded through the record fold */
interface ImportAccumulator {
  imported: number;
  skipped: number;
  importedAddresses: string[];
  watchOnlyAddresses: string[];
}

function emptyAccumulator(): ImportAccumulator {
  return { imported: 0, skipped: 0, importedAddresses: [], watchOnlyAddresses: [] };
}

/**
 * Progress for the record at `index` (0-based, before it is counted),
 * using integer division.
 */
export function progressPercent(index: number, total: number): number {
  return total === 0 ? 0 : Math.floor((100 * index) / total);
}

export class WalletBackupImporter {
  private state: ImportState = { status: 'idle' };
  private payload: BackupPayload | undefined;
  private document: WalletDocument | undefined;
  private readonly networkName: NetworkName;
  private readonly network: Network;

  constructor(
    private readonly fileText: string,
    private readonly options: ImportOptions,
  ) {
    this.networkName = options.network ?? IMPORT_DEFAULTS.NETWORK;
    this.network = resolveNetwork(this.networkName);
  }

  getState(): ImportState {
    return this.state;
  }

  // ============================================
  // Transitions
  // ============================================

  /**
   * Begin the import. Without a password a v2 file moves to
   * `needs_primary_password`; a v1 file fails with PASSWORD_MISSING.
   */
  start(password?: string | null): ImportState {
    this.expect('idle', 'start');
    return this.guard(() => {
      let backup: UnlockableBackup;
      try {
        backup = extractBackupPayload(this.fileText, password);
      } catch (error) {
        if (error instanceof ImportError && error.code === 'PRIMARY_PASSWORD_REQUIRED') {
          this.payload = parseBackupEnvelope(this.fileText);
          safeLog('start: v2 backup recognised, waiting for password');
          return { status: 'needs_primary_password', generation: 'v2' };
        }
        throw error;
      }

      this.payload = backup.payload;
      return this.removeOuterLayer(backup.payload, backup.password);
    });
  }

  providePrimaryPassword(password: string): ImportState {
    this.expect('needs_primary_password', 'providePrimaryPassword');
    return this.guard(() => this.removeOuterLayer(this.requirePayload(), password));
  }

  provideSecondaryPassword(secondPassword: string): ImportState {
    this.expect('needs_secondary_password', 'provideSecondaryPassword');
    return this.guard(() => {
      const document = this.document;
      if (!document) {
        throw new ImportError('INVALID_STATE', 'No decrypted wallet document is pending');
      }
      const context = createSecondaryContext(document, secondPassword);
      return this.complete(this.importRecords(document, context));
    });
  }

  // ============================================
  // Pipeline
  // ============================================

  private removeOuterLayer(payload: BackupPayload, password: string): ImportState {
    logger.perfStart('Import: outer decrypt');
    const plaintext = deriveAndDecrypt(payload.ciphertextBase64, password, payload.iterationCount);
    logger.perfEnd('Import: outer decrypt');

    const document = parseWalletDocument(plaintext);
    this.document = document;

    if (document.doubleEncryption) {
      // Fail on a missing sharedKey now rather than after a second prompt
      if (!document.sharedKey) {
        throw new ImportError('MALFORMED_DOCUMENT', 'Double-encrypted wallet has no sharedKey');
      }
      safeLog('removeOuterLayer: wallet is double-encrypted, waiting for second password');
      return {
        status: 'needs_secondary_password',
        generation: payload.generation,
        recordCount: document.keys.length,
      };
    }

    return this.complete(this.importRecords(document));
  }

  private importRecords(document: WalletDocument, secondary?: SecondaryCipherContext): ImportSummary {
    const payload = this.requirePayload();
    const total = document.keys.length;

    const result = document.keys.reduce<ImportAccumulator>((acc, record, index) => {
      const next = this.importRecord(acc, record, secondary);
      this.options.onProgress?.(progressPercent(index, total), record.address);
      return next;
    }, emptyAccumulator());

    safeLog(`importRecords: imported=${result.imported}, skipped=${result.skipped}, total=${total}`);

    return {
      generation: payload.generation,
      doubleEncrypted: document.doubleEncryption,
      total,
      ...result,
    };
  }

  private importRecord(
    acc: ImportAccumulator,
    record: KeyRecord,
    secondary?: SecondaryCipherContext,
  ): ImportAccumulator {
    if (!isValidBitcoinAddress(record.address, this.networkName)) {
      logger.warn('Import', `Address ${record.address} is not valid on ${this.networkName}`);
    }

    if (!record.rawPrivateField) {
      return {
        ...acc,
        skipped: acc.skipped + 1,
        watchOnlyAddresses: [...acc.watchOnlyAddresses, record.address],
      };
    }

    const base58 = secondary
      ? unwrapDoubleEncryptedKey(record.rawPrivateField, secondary)
      : record.rawPrivateField;

    const key: RecoveredKey = {
      ...decodeBase58PrivateKey(base58, record.address, this.network),
      creationTime: record.creationTime,
      label: record.label,
      archived: record.tag === ARCHIVED_ADDRESS_TAG,
    };
    this.options.keyStore.addKey(key, this.network);

    return {
      ...acc,
      imported: acc.imported + 1,
      importedAddresses: [...acc.importedAddresses, record.address],
    };
  }

  // ============================================
  // State helpers
  // ============================================

  private expect(status: ImportStatus, operation: string): void {
    if (this.state.status !== status) {
      throw new ImportError('INVALID_STATE', `Cannot ${operation} while ${this.state.status}`);
    }
  }

  private requirePayload(): BackupPayload {
    if (!this.payload) {
      throw new ImportError('INVALID_STATE', 'Backup envelope has not been read');
    }
    return this.payload;
  }

  private complete(summary: ImportSummary): ImportState {
    this.document = undefined;
    return { status: 'complete', summary };
  }

  /**
   * Run a step and record its resulting state. ImportErrors become the
   * `failed` state; anything else (a key store failure) also fails the
   * import and is rethrown unchanged.
   */
  private guard(step: () => ImportState): ImportState {
    try {
      this.state = step();
    } catch (error) {
      this.document = undefined;
      safeLogError('import', error);
      if (error instanceof ImportError) {
        this.state = { status: 'failed', error };
      } else {
        this.state = {
          status: 'failed',
          error: new ImportError('UNKNOWN', 'Import aborted by an unexpected error'),
        };
        throw error;
      }
    }
    return this.state;
  }
}

// ============================================
// One-call import
// ============================================

export interface WalletBackupImportOptions extends ImportOptions {
  password?: string | null;
  secondPassword?: string | null;
}

/**
 * Import a backup in one call.
 *
 * @returns Summary of the completed import
 * @throws ImportError PRIMARY_PASSWORD_REQUIRED / SECONDARY_PASSWORD_REQUIRED when
 *   a credential is missing (the caller re-invokes with it), or the fatal error
 */
export function importWalletBackup(fileText: string, options: WalletBackupImportOptions): ImportSummary {
  const importer = new WalletBackupImporter(fileText, options);
  let state = importer.start(options.password);

  if (
    state.status === 'needs_secondary_password' &&
    options.secondPassword !== undefined &&
    options.secondPassword !== null
  ) {
    state = importer.provideSecondaryPassword(options.secondPassword);
  }

  switch (state.status) {
    case 'complete':
      return state.summary;
    case 'failed':
      throw state.error;
    case 'needs_primary_password':
      throw new ImportError('PRIMARY_PASSWORD_REQUIRED', 'Wallet backup recognised; enter the wallet password');
    case 'needs_secondary_password':
      throw new ImportError('SECONDARY_PASSWORD_REQUIRED', 'Wallet uses double encryption; enter the second password');
    case 'idle':
      throw new ImportError('INVALID_STATE', 'Import did not start');
  }
}
