/**
 * Base58 Private Key Decoder
 *
 * Blockchain wallet backups store each private key as the raw scalar in
 * Base58: no version byte, no checksum and no compression flag (unlike WIF).
 * The compression flag is recovered by deriving the P2PKH address both ways
 * and keeping the one that matches the address recorded beside the key.
 *
 * SECURITY: Never logs raw key material. All errors use safe messages.
 */

import * as bitcoin from 'bitcoinjs-lib';
import * as ecc from '@bitcoinerlab/secp256k1';
import ECPairFactory from 'ecpair';
import bs58 from 'bs58';
import type { NetworkName } from '../../../constants';
import { IMPORT_DEFAULTS } from '../../../constants';
import type { ImportedKey, RecoveredKey } from '../types';
import { ImportError } from '../types';
import { zeroizeBuffer } from '../security';

const ECPair = ECPairFactory(ecc);

// secp256k1 curve order
const SECP256K1_ORDER = BigInt(
  '0xFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFEBAAEDCE6AF48A03BBFD25E8CD0364141'
);

/** Tried in this order; the first address match wins */
const COMPRESSION_CANDIDATES = [false, true] as const;

export function resolveNetwork(name: NetworkName = IMPORT_DEFAULTS.NETWORK): bitcoin.Network {
  return name === 'testnet' ? bitcoin.networks.testnet : bitcoin.networks.bitcoin;
}

// ============================================
// Scalar Decoding
// ============================================

/**
 * Decode a Base58 string as an unsigned big-endian integer.
 *
 * @throws ImportError INVALID_FORMAT for characters outside the Base58 alphabet
 */
export function decodeBase58Scalar(base58: string): bigint {
  let bytes: Uint8Array;
  try {
    bytes = bs58.decode(base58.trim());
  } catch {
    throw new ImportError('INVALID_FORMAT', 'Private key is not valid Base58');
  }

  let scalar = 0n;
  for (const byte of bytes) {
    scalar = (scalar << 8n) | BigInt(byte);
  }
  zeroizeBuffer(bytes);
  return scalar;
}

/**
 * Encode a scalar as the 32-byte private key buffer.
 *
 * @throws ImportError INVALID_KEY_ON_CURVE unless 0 < scalar < n
 */
export function scalarToPrivateKey(scalar: bigint): Buffer {
  if (scalar <= 0n || scalar >= SECP256K1_ORDER) {
    throw new ImportError('INVALID_KEY_ON_CURVE', 'Key value is outside the valid range');
  }
  return Buffer.from(scalar.toString(16).padStart(64, '0'), 'hex');
}

// ============================================
// Address Derivation
// ============================================

export function deriveP2pkhAddress(
  privateKey: Buffer,
  compressed: boolean,
  network: bitcoin.Network,
): string | undefined {
  const keyPair = ECPair.fromPrivateKey(privateKey, { compressed, network });
  return bitcoin.payments.p2pkh({ pubkey: keyPair.publicKey, network }).address;
}

// ============================================
// Record Decoding
// ============================================

/**
 * Recover a private key and its compression flag from a backup record.
 *
 * @param base58 - Raw Base58 scalar from the record's `priv` field
 * @param expectedAddress - The record's `addr` field
 * @returns The key, with `archived` false and no metadata attached
 * @throws ImportError KEY_ADDRESS_MISMATCH when neither form yields expectedAddress
 */
export function decodeBase58PrivateKey(
  base58: string,
  expectedAddress: string,
  network: bitcoin.Network = resolveNetwork(),
): RecoveredKey {
  const privateScalar = decodeBase58Scalar(base58);
  const privateKey = scalarToPrivateKey(privateScalar);

  for (const compressed of COMPRESSION_CANDIDATES) {
    if (deriveP2pkhAddress(privateKey, compressed, network) === expectedAddress) {
      const owned = new Uint8Array(privateKey);
      zeroizeBuffer(privateKey);
      return {
        privateScalar,
        privateKey: owned,
        compressed,
        address: expectedAddress,
        archived: false,
      };
    }
  }

  zeroizeBuffer(privateKey);
  throw new ImportError(
    'KEY_ADDRESS_MISMATCH',
    `Private key does not match address ${expectedAddress} in either compressed or uncompressed form`,
  );
}

// ============================================
// Conversion
// ============================================

/**
 * Convert a recovered key to the WIF-based ImportedKey shape.
 */
export function toImportedKey(key: RecoveredKey, network: bitcoin.Network = resolveNetwork()): ImportedKey {
  const keyPair = ECPair.fromPrivateKey(Buffer.from(key.privateKey), {
    compressed: key.compressed,
    network,
  });

  return {
    wif: keyPair.toWIF(),
    compressed: key.compressed,
    label: key.label,
    timestamp: key.creationTime,
    address: key.address,
  };
}
