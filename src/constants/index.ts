// Bitcoin networks a backup can be imported on
export type NetworkName = 'mainnet' | 'testnet';

// Backup Import Defaults
export const IMPORT_DEFAULTS = {
  /** V1 backups carry no iteration metadata */
  V1_PBKDF2_ITERATIONS: 10,
  /** Used when a double-encrypted wallet omits options.pbkdf2_iterations */
  SECONDARY_PBKDF2_ITERATIONS: 10,
  NETWORK: 'mainnet',
} as const;

// Cipher Parameters (fixed by the backup format)
export const BACKUP_CIPHER = {
  IV_LENGTH: 16,        // also the PBKDF2 salt
  BLOCK_SIZE: 16,
  KEY_LENGTH: 32,       // AES-256
} as const;

// Wallet document key tag for archived addresses
export const ARCHIVED_ADDRESS_TAG = 2;
