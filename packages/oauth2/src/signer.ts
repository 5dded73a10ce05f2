/**
 * @file rs256 signing with service account keys
 *
 * keys are parsed once with node:crypto; jose accepts the resulting key
 * objects for jwt signing and node:crypto signs raw bytes with them
 */

import { createPrivateKey, sign } from 'node:crypto';

import { SignJWT } from 'jose';

import { CredentialConfigError } from '#errors';

import type { KeyObject } from 'node:crypto';

import type { JWTPayload } from 'jose';

/** credentials able to sign bytes as a service account */
export interface ServiceAccountSigner {
  /**
   * returns the account that signs
   * @returns service account email
   */
  getAccount(): string | Promise<string>;

  /**
   * signs bytes with the account's key
   * @param bytes data to sign
   * @returns rsa-sha256 signature
   */
  sign(bytes: Uint8Array): Promise<Uint8Array>;
}

/**
 * parses a pkcs#8 pem private key
 * @param pem private key in pem format
 * @returns the key
 * @throws {CredentialConfigError} when the key cannot be parsed
 */
export function parsePrivateKey(pem: string): KeyObject {
  try {
    return createPrivateKey({ key: pem, format: 'pem' });
  } catch (exception) {
    throw new CredentialConfigError('invalid pkcs#8 private key', {
      cause: exception,
    });
  }
}

/**
 * signs a jwt with rs256
 * @param claims claims of the token, including iat and exp
 * @param key private key
 * @param keyId identifier of the key, sent as the kid header
 * @returns compact serialized jwt
 */
export async function signJwt(
  claims: JWTPayload,
  key: KeyObject,
  keyId?: string,
): Promise<string> {
  return new SignJWT(claims)
    .setProtectedHeader({
      alg: 'RS256',
      typ: 'JWT',
      ...(keyId ? { kid: keyId } : {}),
    })
    .sign(key);
}

/**
 * signs bytes with rsa-sha256
 * @param key private key
 * @param bytes data to sign
 * @returns signature
 */
export function signBytes(key: KeyObject, bytes: Uint8Array): Uint8Array {
  return new Uint8Array(sign('sha256', bytes, key));
}
