import * as bitcoin from 'bitcoinjs-lib';
import type { NetworkName } from '../constants';

/**
 * Validate a Bitcoin address
 * @param address - Address to validate
 * @param network - Network type
 */
export function isValidBitcoinAddress(
  address: string,
  network: NetworkName = 'mainnet'
): boolean {
  if (!address || address.length === 0) {
    return false;
  }

  const networkConfig = network === 'mainnet'
    ? bitcoin.networks.bitcoin
    : bitcoin.networks.testnet;

  try {
    bitcoin.address.toOutputScript(address, networkConfig);
    return true;
  } catch {
    return false;
  }
}

/**
 * Narrow a parsed JSON value to a plain object
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Whether the text is standard base64 (whitespace between lines allowed)
 */
export function isBase64Text(input: string): boolean {
  const compact = input.replace(/\s+/g, '');
  return compact.length > 0 && compact.length % 4 === 0 && /^[A-Za-z0-9+/]+={0,2}$/.test(compact);
}

/**
 * Parse JSON without throwing
 * @returns The parsed value, or undefined if the text is not JSON
 */
export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
