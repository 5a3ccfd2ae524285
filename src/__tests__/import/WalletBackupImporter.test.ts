/**
 * WalletBackupImporter — Integration Tests
 *
 * Tests:
 * - v1 and v2 files end to end into an InMemoryKeyStore
 * - password states and resume operations
 * - watch-only records, metadata, progress reporting
 * - double encryption
 * - fatal errors and the absence of rollback
 */

import { WalletBackupImporter, importWalletBackup, progressPercent } from '../../services/import/WalletBackupImporter';
import { InMemoryKeyStore } from '../../services/import/InMemoryKeyStore';
import { resolveNetwork } from '../../services/import/parsers/base58PrivateKey';
import type { ImportState, ImportSummary, KeyStore } from '../../services/import/types';
import { ImportError } from '../../services/import/types';
import {
  base58FromHex,
  captureImportError,
  encryptBackupText,
  KEY_A_HEX,
  KEY_B_HEX,
  KEY_ONE_COMPRESSED_ADDRESS,
  KEY_ONE_HEX,
  OTHER_IV,
  p2pkhAddress,
  v2Envelope,
  walletJson,
} from '../helpers/backupFixtures';
import type { FixtureWallet } from '../helpers/backupFixtures';

const PASSWORD = 'test-password';
const SHARED_KEY = 'test-shared-key';
const SECOND_PASSWORD = 'test-second-password';
const V2_ITERATIONS = 200;

const ADDRESS_A = p2pkhAddress(KEY_A_HEX, false);
const ADDRESS_B = p2pkhAddress(KEY_B_HEX, true);
const WATCH_ADDRESS = p2pkhAddress(KEY_B_HEX, false);

function v1File(wallet: FixtureWallet, password: string = PASSWORD): string {
  return encryptBackupText(walletJson(wallet), password, 10);
}

function v2File(wallet: FixtureWallet, password: string = PASSWORD): string {
  return v2Envelope(encryptBackupText(walletJson(wallet), password, V2_ITERATIONS), V2_ITERATIONS);
}

function failedWith(state: ImportState): ImportError {
  if (state.status !== 'failed') {
    throw new Error(`Expected state failed, got ${state.status}`);
  }
  return state.error;
}

function completedWith(state: ImportState): ImportSummary {
  if (state.status !== 'complete') {
    throw new Error(`Expected state complete, got ${state.status}`);
  }
  return state.summary;
}

const THREE_KEY_WALLET: FixtureWallet = {
  guid: 'test-guid',
  keys: [
    { addr: ADDRESS_A, priv: base58FromHex(KEY_A_HEX), label: 'savings', created_time: 1400000000 },
    { addr: WATCH_ADDRESS, label: 'watched' },
    { addr: ADDRESS_B, priv: base58FromHex(KEY_B_HEX), tag: 2 },
  ],
};

// ============================================
// Single-key v1 file
// ============================================

describe('v1 backup', () => {
  test('imports the one key of a v1 wallet', () => {
    const keyStore = new InMemoryKeyStore();
    const file = v1File({ keys: [{ addr: KEY_ONE_COMPRESSED_ADDRESS, priv: base58FromHex(KEY_ONE_HEX) }] });

    const summary = importWalletBackup(file, { keyStore, password: PASSWORD });

    expect(summary).toEqual({
      generation: 'v1',
      doubleEncrypted: false,
      total: 1,
      imported: 1,
      skipped: 0,
      importedAddresses: [KEY_ONE_COMPRESSED_ADDRESS],
      watchOnlyAddresses: [],
    });
    const key = keyStore.get(KEY_ONE_COMPRESSED_ADDRESS);
    expect(key?.address).toBe(KEY_ONE_COMPRESSED_ADDRESS);
    expect(key?.compressed).toBe(true);
    expect(key?.privateScalar).toBe(1n);
  });

  test('fails with PASSWORD_MISSING when started without a password', () => {
    const importer = new WalletBackupImporter(v1File(THREE_KEY_WALLET), { keyStore: new InMemoryKeyStore() });
    const error = failedWith(importer.start());
    expect(error.code).toBe('PASSWORD_MISSING');
  });

  test('treats an empty password as given and tries it', () => {
    const importer = new WalletBackupImporter(v1File(THREE_KEY_WALLET), { keyStore: new InMemoryKeyStore() });
    expect(failedWith(importer.start('')).code).toBe('DECRYPTION_FAILED');
  });

  test('opens a wallet whose password is empty', () => {
    const keyStore = new InMemoryKeyStore();
    const summary = importWalletBackup(v1File(THREE_KEY_WALLET, ''), { keyStore, password: '' });
    expect(summary.imported).toBe(2);
  });

  test('fails with DECRYPTION_FAILED on a wrong password and stores nothing', () => {
    const keyStore = new InMemoryKeyStore();
    const importer = new WalletBackupImporter(v1File(THREE_KEY_WALLET), { keyStore });

    const error = failedWith(importer.start('wrong-password'));

    expect(error.code).toBe('DECRYPTION_FAILED');
    expect(keyStore.size).toBe(0);
  });
});

// ============================================
// v2 file and password states
// ============================================

describe('v2 backup', () => {
  test('asks for the password without decrypting anything', () => {
    // The payload is not even base64: any decryption attempt would fail
    const file = v2Envelope('!!not-a-ciphertext!!', V2_ITERATIONS);
    const importer = new WalletBackupImporter(file, { keyStore: new InMemoryKeyStore() });

    expect(importer.start(null)).toEqual({ status: 'needs_primary_password', generation: 'v2' });
    expect(importer.getState().status).toBe('needs_primary_password');
  });

  test('the one-call import raises PRIMARY_PASSWORD_REQUIRED', () => {
    const file = v2Envelope('!!not-a-ciphertext!!', V2_ITERATIONS);
    const error = captureImportError(() => importWalletBackup(file, { keyStore: new InMemoryKeyStore() }));
    expect(error.code).toBe('PRIMARY_PASSWORD_REQUIRED');
    expect(error.isPasswordPrompt).toBe(true);
  });

  test('resumes with the password and completes', () => {
    const keyStore = new InMemoryKeyStore();
    const importer = new WalletBackupImporter(v2File(THREE_KEY_WALLET), { keyStore });

    importer.start();
    const summary = completedWith(importer.providePrimaryPassword(PASSWORD));

    expect(summary.generation).toBe('v2');
    expect(summary.imported).toBe(2);
    expect(keyStore.addresses()).toEqual([ADDRESS_A, ADDRESS_B]);
  });

  test('a wrong password after the prompt fails the import', () => {
    const importer = new WalletBackupImporter(v2File(THREE_KEY_WALLET), { keyStore: new InMemoryKeyStore() });
    importer.start();
    const error = failedWith(importer.providePrimaryPassword('wrong-password'));
    expect(error.code).toBe('DECRYPTION_FAILED');
  });
});

// ============================================
// Records
// ============================================

describe('record handling', () => {
  test('skips watch-only records and keeps them out of the key store', () => {
    const keyStore = new InMemoryKeyStore();
    const summary = importWalletBackup(v1File(THREE_KEY_WALLET), { keyStore, password: PASSWORD });

    expect(summary.total).toBe(3);
    expect(summary.imported).toBe(2);
    expect(summary.skipped).toBe(1);
    expect(summary.watchOnlyAddresses).toEqual([WATCH_ADDRESS]);
    expect(keyStore.has(WATCH_ADDRESS)).toBe(false);
    expect(keyStore.size).toBe(2);
  });

  test('attaches creation time, label and archived flag', () => {
    const keyStore = new InMemoryKeyStore();
    importWalletBackup(v1File(THREE_KEY_WALLET), { keyStore, password: PASSWORD });

    const a = keyStore.get(ADDRESS_A);
    expect(a?.label).toBe('savings');
    expect(a?.creationTime).toBe(1400000000);
    expect(a?.archived).toBe(false);
    expect(a?.compressed).toBe(false);

    const b = keyStore.get(ADDRESS_B);
    expect(b?.label).toBeUndefined();
    expect(b?.archived).toBe(true);
    expect(b?.compressed).toBe(true);
  });

  test('reports progress once per record with the pre-increment index', () => {
    const calls: Array<[number, string]> = [];
    importWalletBackup(v1File(THREE_KEY_WALLET), {
      keyStore: new InMemoryKeyStore(),
      password: PASSWORD,
      onProgress: (percent, address) => calls.push([percent, address]),
    });

    expect(calls).toEqual([
      [0, ADDRESS_A],
      [33, WATCH_ADDRESS],
      [66, ADDRESS_B],
    ]);
  });

  test('completes an empty wallet without progress calls', () => {
    const onProgress = jest.fn();
    const summary = importWalletBackup(v1File({ keys: [] }), {
      keyStore: new InMemoryKeyStore(),
      password: PASSWORD,
      onProgress,
    });
    expect(summary.total).toBe(0);
    expect(summary.imported).toBe(0);
    expect(onProgress).not.toHaveBeenCalled();
  });

  test('imports testnet wallets when configured for testnet', () => {
    const keyStore = new InMemoryKeyStore();
    const address = p2pkhAddress(KEY_A_HEX, true, resolveNetwork('testnet'));
    const summary = importWalletBackup(v1File({ keys: [{ addr: address, priv: base58FromHex(KEY_A_HEX) }] }), {
      keyStore,
      password: PASSWORD,
      network: 'testnet',
    });
    expect(summary.imported).toBe(1);
    expect(keyStore.get(address)?.compressed).toBe(true);
  });
});

// ============================================
// Double encryption
// ============================================

describe('double encryption', () => {
  const INNER_ITERATIONS = 50;

  function doubleEncryptedWallet(options: { pbkdf2_iterations?: number } = { pbkdf2_iterations: INNER_ITERATIONS }): FixtureWallet {
    const iterations = options.pbkdf2_iterations ?? 10;
    const wrap = (hex: string) => encryptBackupText(base58FromHex(hex), SHARED_KEY + SECOND_PASSWORD, iterations, OTHER_IV);
    return {
      sharedKey: SHARED_KEY,
      double_encryption: true,
      options,
      keys: [
        { addr: ADDRESS_A, priv: wrap(KEY_A_HEX) },
        { addr: WATCH_ADDRESS },
        { addr: ADDRESS_B, priv: wrap(KEY_B_HEX) },
      ],
    };
  }

  test('waits for the second password after removing the outer layer', () => {
    const importer = new WalletBackupImporter(v1File(doubleEncryptedWallet()), { keyStore: new InMemoryKeyStore() });
    expect(importer.start(PASSWORD)).toEqual({
      status: 'needs_secondary_password',
      generation: 'v1',
      recordCount: 3,
    });
  });

  test('imports with sharedKey + second password and the document iteration count', () => {
    const keyStore = new InMemoryKeyStore();
    const importer = new WalletBackupImporter(v2File(doubleEncryptedWallet()), { keyStore });

    importer.start(PASSWORD);
    const summary = completedWith(importer.provideSecondaryPassword(SECOND_PASSWORD));

    expect(summary.doubleEncrypted).toBe(true);
    expect(summary.imported).toBe(2);
    expect(summary.skipped).toBe(1);
    expect(keyStore.get(ADDRESS_A)?.privateScalar).toBe(BigInt('0x' + KEY_A_HEX));
    expect(keyStore.get(ADDRESS_B)?.privateScalar).toBe(BigInt('0x' + KEY_B_HEX));
  });

  test('uses 10 inner iterations when the document has none', () => {
    const keyStore = new InMemoryKeyStore();
    const summary = importWalletBackup(v1File(doubleEncryptedWallet({})), {
      keyStore,
      password: PASSWORD,
      secondPassword: SECOND_PASSWORD,
    });
    expect(summary.imported).toBe(2);
  });

  test('the one-call import raises SECONDARY_PASSWORD_REQUIRED', () => {
    const error = captureImportError(() =>
      importWalletBackup(v1File(doubleEncryptedWallet()), { keyStore: new InMemoryKeyStore(), password: PASSWORD }),
    );
    expect(error.code).toBe('SECONDARY_PASSWORD_REQUIRED');
  });

  test('a wrong second password fails before any key is stored', () => {
    const keyStore = new InMemoryKeyStore();
    const importer = new WalletBackupImporter(v1File(doubleEncryptedWallet()), { keyStore });
    importer.start(PASSWORD);

    const error = failedWith(importer.provideSecondaryPassword('wrong-second-password'));

    expect(error.code).toBe('DECRYPTION_FAILED');
    expect(keyStore.size).toBe(0);
  });

  test('fails with MALFORMED_DOCUMENT when the sharedKey is missing', () => {
    const wallet = { ...doubleEncryptedWallet(), sharedKey: undefined };
    const importer = new WalletBackupImporter(v1File(wallet), { keyStore: new InMemoryKeyStore() });
    const error = failedWith(importer.start(PASSWORD));
    expect(error.code).toBe('MALFORMED_DOCUMENT');
  });
});

// ============================================
// Fatal errors
// ============================================

describe('fatal errors', () => {
  test('a key that matches neither address form aborts the whole run', () => {
    const keyStore = new InMemoryKeyStore();
    const onProgress = jest.fn();
    const file = v1File({
      keys: [
        { addr: ADDRESS_A, priv: base58FromHex(KEY_A_HEX) },
        { addr: ADDRESS_A, priv: base58FromHex(KEY_B_HEX) },
        { addr: ADDRESS_B, priv: base58FromHex(KEY_B_HEX) },
      ],
    });
    const importer = new WalletBackupImporter(file, { keyStore, onProgress });

    const error = failedWith(importer.start(PASSWORD));

    expect(error.code).toBe('KEY_ADDRESS_MISMATCH');
    // No rollback: the first key stays, the third is never reached
    expect(keyStore.addresses()).toEqual([ADDRESS_A]);
    expect(onProgress).toHaveBeenCalledTimes(1);
  });

  test('a document without keys fails with MALFORMED_DOCUMENT', () => {
    const file = encryptBackupText('{"guid":"test-guid"}', PASSWORD, 10);
    const error = captureImportError(() => importWalletBackup(file, { keyStore: new InMemoryKeyStore(), password: PASSWORD }));
    expect(error.code).toBe('MALFORMED_DOCUMENT');
  });

  test('a key store failure fails the import and is rethrown unchanged', () => {
    const failure = new Error('disk full');
    const keyStore: KeyStore = {
      addKey: () => {
        throw failure;
      },
    };
    const importer = new WalletBackupImporter(v1File(THREE_KEY_WALLET), { keyStore });

    expect(() => importer.start(PASSWORD)).toThrow(failure);
    expect(failedWith(importer.getState()).code).toBe('UNKNOWN');
  });
});

// ============================================
// State machine misuse
// ============================================

describe('state transitions', () => {
  test('rejects resume operations from the wrong state', () => {
    const importer = new WalletBackupImporter(v1File(THREE_KEY_WALLET), { keyStore: new InMemoryKeyStore() });
    expect(captureImportError(() => importer.providePrimaryPassword(PASSWORD)).code).toBe('INVALID_STATE');
    expect(captureImportError(() => importer.provideSecondaryPassword(SECOND_PASSWORD)).code).toBe('INVALID_STATE');
  });

  test('cannot be started twice', () => {
    const importer = new WalletBackupImporter(v1File(THREE_KEY_WALLET), { keyStore: new InMemoryKeyStore() });
    completedWith(importer.start(PASSWORD));
    const error = captureImportError(() => importer.start(PASSWORD));
    expect(error).toBeInstanceOf(ImportError);
    expect(error.message).toBe('Cannot start while complete');
  });
});

// ============================================
// progressPercent
// ============================================

describe('progressPercent', () => {
  test('uses integer division of the pre-increment index', () => {
    expect([0, 1, 2, 3].map(i => progressPercent(i, 4))).toEqual([0, 25, 50, 75]);
    expect([0, 1, 2].map(i => progressPercent(i, 3))).toEqual([0, 33, 66]);
  });

  test('is 0 for an empty wallet', () => {
    expect(progressPercent(0, 0)).toBe(0);
  });
});
