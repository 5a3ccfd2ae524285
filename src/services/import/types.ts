/**
 * Wallet Backup Import Types
 *
 * Type definitions for importing encrypted blockchain wallet backups:
 * envelope generations, the decrypted wallet document, recovered keys,
 * the importer state machine, and the error taxonomy.
 *
 * SECURITY: Error messages and detection labels never contain key material
 * or passwords.
 */

import type { Network } from 'bitcoinjs-lib';
import type { NetworkName } from '../../constants';

// ============================================
// Backup Detection
// ============================================

/** Supported import formats */
export type ImportFormat = 'blockchain_backup';

/** Result of format auto-detection */
export interface DetectionResult {
  /** Detected format */
  format: ImportFormat;
  /** How confident the detection is */
  confidence: 'definite' | 'likely' | 'possible';
  /** Human-readable label (NEVER contains raw key material) */
  label: string;
  /** Whether a password is needed to decrypt */
  needsPassword: boolean;
  /** Envelope generation, when it could be determined */
  generation: BackupGeneration;
}

// ============================================
// Backup Envelope
// ============================================

/**
 * v1: the whole file is base64 ciphertext.
 * v2: JSON envelope `{ pbkdf2_iterations, payload }`.
 */
export type BackupGeneration = 'v1' | 'v2';

export interface BackupPayload {
  readonly generation: BackupGeneration;
  readonly iterationCount: number;
  readonly ciphertextBase64: string;
}

// ============================================
// Decrypted Wallet Document
// ============================================

export interface KeyRecord {
  address: string;
  /** Base58 private scalar, or its double-encrypted form. Absent = watch-only */
  rawPrivateField?: string;
  creationTime?: number;
  label?: string;
  tag?: number;
}

export interface WalletDocument {
  guid?: string;
  doubleEncryption: boolean;
  /** Per-wallet salt prepended to the second password */
  sharedKey?: string;
  secondaryIterations?: number;
  keys: KeyRecord[];
}

// ============================================
// Recovered Keys
// ============================================

export interface RecoveredKey {
  privateScalar: bigint;
  /** 32-byte big-endian encoding of privateScalar */
  privateKey: Uint8Array;
  compressed: boolean;
  address: string;
  creationTime?: number;
  label?: string;
  archived: boolean;
}

/** A single imported key with optional metadata */
export interface ImportedKey {
  wif: string;
  compressed: boolean;
  label?: string;
  timestamp?: number;
  address?: string;
}

// ============================================
// Collaborators
// ============================================

/** Receives recovered keys. Ownership of the key transfers on the call. */
export interface KeyStore {
  addKey(key: RecoveredKey, network: Network): void;
}

/** Called once per processed record, in record order */
export type ProgressSink = (percent: number, address: string) => void;

export interface ImportOptions {
  network?: NetworkName;
  keyStore: KeyStore;
  onProgress?: ProgressSink;
}

export interface ImportSummary {
  generation: BackupGeneration;
  doubleEncrypted: boolean;
  total: number;
  imported: number;
  skipped: number;
  importedAddresses: string[];
  watchOnlyAddresses: string[];
}

// ============================================
// Importer State Machine
// ============================================

export type ImportState =
  | { status: 'idle' }
  | { status: 'needs_primary_password'; generation: 'v2' }
  | { status: 'needs_secondary_password'; generation: BackupGeneration; recordCount: number }
  | { status: 'complete'; summary: ImportSummary }
  | { status: 'failed'; error: ImportError };

export type ImportStatus = ImportState['status'];

// ============================================
// Import Errors
// ============================================

/** Error codes for import failures */
export type ImportErrorCode =
  | 'PRIMARY_PASSWORD_REQUIRED'
  | 'SECONDARY_PASSWORD_REQUIRED'
  | 'PASSWORD_MISSING'
  | 'DECRYPTION_FAILED'
  | 'MALFORMED_DOCUMENT'
  | 'KEY_ADDRESS_MISMATCH'
  | 'INVALID_FORMAT'
  | 'INVALID_KEY_ON_CURVE'
  | 'INVALID_STATE'
  | 'UNKNOWN';

/** Import error (never contains raw key material in message) */
export class ImportError extends Error {
  code: ImportErrorCode;

  constructor(code: ImportErrorCode, safeMessage: string) {
    super(safeMessage);
    this.code = code;
    this.name = 'ImportError';
  }

  /** Control signals ask the caller for another credential; they are not failures */
  get isPasswordPrompt(): boolean {
    return this.code === 'PRIMARY_PASSWORD_REQUIRED' || this.code === 'SECONDARY_PASSWORD_REQUIRED';
  }
}
