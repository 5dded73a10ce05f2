/** throwaway rsa keys for signing tests */

import { generateKeyPairSync } from 'node:crypto';

/** a pem encoded rsa key pair */
export interface TestKeyPair {
  /** pkcs#8 private key */
  privateKey: string;
  /** spki public key */
  publicKey: string;
}

/**
 * generates a fresh 2048-bit rsa key pair
 * @returns pem encoded keys
 */
export function createKeyPair(): TestKeyPair {
  return generateKeyPairSync('rsa', {
    modulusLength: 2048,
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    publicKeyEncoding: { type: 'spki', format: 'pem' },
  });
}

/** a key pair shared by the specs of one file */
export const testKeys = createKeyPair();
