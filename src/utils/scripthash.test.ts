import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import {
  addressToScripthash,
  isValidScripthash,
  scripthashFromScript,
  scripthashMap,
} from './scripthash.js';
import { ValidationError } from './errors.js';

const P2PKH_ADDRESS = '1PMycacnJaSqwwJqjawXBErnLsZ7RkXUAs';
const P2PKH_SCRIPT = '76a914f54a5851e9372b87810a8e60cdd2e7cfd80b6e3188ac';

const P2WPKH_ADDRESS = 'bc1qw508d6qejxtdg4y5r3zarvary0c5xw7kv8f3t4';
const P2WPKH_SCRIPT = '0014751e76e8199196d454941c45d1b3a323f1433bd6';

function reversedSha256(hex: string): string {
  return Buffer.from(createHash('sha256').update(Buffer.from(hex, 'hex')).digest()).reverse().toString('hex');
}

describe('scripthash', () => {
  describe('scripthashFromScript', () => {
    it('should hash the script and reverse the byte order', () => {
      expect(scripthashFromScript(P2PKH_SCRIPT)).toBe(reversedSha256(P2PKH_SCRIPT));
    });

    it('should reject non-hex input', () => {
      expect(() => scripthashFromScript('abc')).toThrow(ValidationError);
      expect(() => scripthashFromScript('zz')).toThrow(ValidationError);
    });
  });

  describe('addressToScripthash', () => {
    it('should derive the scripthash of a legacy address', () => {
      expect(addressToScripthash(P2PKH_ADDRESS)).toBe(reversedSha256(P2PKH_SCRIPT));
    });

    it('should derive the scripthash of a segwit address', () => {
      const scripthash = addressToScripthash(P2WPKH_ADDRESS, 'bitcoin');
      expect(scripthash).toBe(reversedSha256(P2WPKH_SCRIPT));
      expect(isValidScripthash(scripthash)).toBe(true);
    });

    it('should reject an address from another network', () => {
      expect(() => addressToScripthash(P2WPKH_ADDRESS, 'testnet')).toThrow(ValidationError);
    });

    it('should reject garbage', () => {
      expect(() => addressToScripthash('not-an-address')).toThrow(ValidationError);
    });
  });

  describe('scripthashMap', () => {
    it('should key addresses by scripthash', () => {
      const map = scripthashMap([P2PKH_ADDRESS, P2WPKH_ADDRESS]);
      expect(map).toEqual({
        [reversedSha256(P2PKH_SCRIPT)]: P2PKH_ADDRESS,
        [reversedSha256(P2WPKH_SCRIPT)]: P2WPKH_ADDRESS,
      });
    });
  });
});
