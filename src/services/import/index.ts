/**
 * Wallet Backup Import Module
 *
 * Re-exports all import-related utilities for convenient access.
 */

// Types
export type {
  ImportFormat,
  DetectionResult,
  BackupGeneration,
  BackupPayload,
  KeyRecord,
  WalletDocument,
  RecoveredKey,
  ImportedKey,
  KeyStore,
  ProgressSink,
  ImportOptions,
  ImportSummary,
  ImportState,
  ImportStatus,
  ImportErrorCode,
} from './types';

export { ImportError } from './types';

// Detector
export { detectBackupFile } from './detector';

// Envelope and document
export { parseBackupEnvelope, extractBackupPayload, passwordRequirement } from './parsers/backupEnvelope';
export type { UnlockableBackup } from './parsers/backupEnvelope';
export { parseWalletDocument } from './parsers/walletDocument';

// Keys
export {
  decodeBase58PrivateKey,
  decodeBase58Scalar,
  deriveP2pkhAddress,
  resolveNetwork,
  toImportedKey,
} from './parsers/base58PrivateKey';

// Crypto
export { deriveAndDecrypt, deriveKey, removeIso10126Padding } from './crypto/passwordCipher';
export {
  createSecondaryContext,
  composeSecondaryPassword,
  unwrapDoubleEncryptedKey,
} from './crypto/doubleEncryption';
export type { SecondaryCipherContext } from './crypto/doubleEncryption';

// Import
export { WalletBackupImporter, importWalletBackup, progressPercent } from './WalletBackupImporter';
export type { WalletBackupImportOptions } from './WalletBackupImporter';
export { InMemoryKeyStore } from './InMemoryKeyStore';
export type { StoredKey } from './InMemoryKeyStore';

// Security
export { zeroizeBuffer, safeLog, safeLogError, maskSecret } from './security';
