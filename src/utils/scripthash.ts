/**
 * Electrum scripthash helpers
 *
 * Electrum servers key addresses by the SHA256 of the output script,
 * byte order reversed, hex encoded.
 */

import * as bitcoin from 'bitcoinjs-lib';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';
import type { BitcoinNetworkName } from '../types/index.js';
import { ValidationError } from './errors.js';

const NETWORKS: Record<BitcoinNetworkName, bitcoin.Network> = {
  bitcoin: bitcoin.networks.bitcoin,
  testnet: bitcoin.networks.testnet,
  regtest: bitcoin.networks.regtest,
};

const HEX_SCRIPT = /^(?:[0-9a-f]{2})+$/i;

/**
 * Scripthash for a raw output script given as hex
 */
export function scripthashFromScript(scriptHex: string): string {
  if (!HEX_SCRIPT.test(scriptHex)) {
    throw ValidationError.invalidParameter('script', 'even-length hex string', scriptHex);
  }
  return bytesToHex(sha256(hexToBytes(scriptHex)).reverse());
}

/**
 * @example
 * addressToScripthash('bc1qw508d6qejxtdg4y5r3zarvary0c5xw7kv8f3t4')
 */
export function addressToScripthash(address: string, network: BitcoinNetworkName = 'bitcoin'): string {
  let script: Uint8Array;
  try {
    script = bitcoin.address.toOutputScript(address, NETWORKS[network]);
  } catch (error) {
    throw new ValidationError(
      `Invalid ${network} address`,
      'address',
      `${network} address`,
      address,
      { reason: error instanceof Error ? error.message : String(error) },
    );
  }
  return bytesToHex(sha256(script).reverse());
}

export function isValidScripthash(scripthash: string): boolean {
  return /^[a-f0-9]{64}$/i.test(scripthash);
}

/**
 * scripthash -> address map, the shape the scripthash wrappers take
 */
export function scripthashMap(addresses: readonly string[], network: BitcoinNetworkName = 'bitcoin'): Record<string, string> {
  const map: Record<string, string> = {};
  for (const address of addresses) {
    map[addressToScripthash(address, network)] = address;
  }
  return map;
}
