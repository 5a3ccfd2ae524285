/**
 * InMemoryKeyStore — KeyStore kept in a Map, keyed by address.
 *
 * A second key for the same address replaces the first. Used by tests and by
 * callers that collect keys before writing them to their own wallet storage.
 */

import type { Network } from 'bitcoinjs-lib';
import type { KeyStore, RecoveredKey } from './types';
import { zeroizeBuffer } from './security';

export interface StoredKey {
  key: RecoveredKey;
  network: Network;
}

export class InMemoryKeyStore implements KeyStore {
  private readonly keys = new Map<string, StoredKey>();

  addKey(key: RecoveredKey, network: Network): void {
    const previous = this.keys.get(key.address);
    if (previous && previous.key.privateKey !== key.privateKey) {
      zeroizeBuffer(previous.key.privateKey);
    }
    this.keys.set(key.address, { key, network });
  }

  get(address: string): RecoveredKey | undefined {
    return this.keys.get(address)?.key;
  }

  has(address: string): boolean {
    return this.keys.has(address);
  }

  addresses(): string[] {
    return [...this.keys.keys()];
  }

  get size(): number {
    return this.keys.size;
  }

  /** Zero every stored key and empty the store */
  clear(): void {
    for (const { key } of this.keys.values()) {
      zeroizeBuffer(key.privateKey);
    }
    this.keys.clear();
  }
}
