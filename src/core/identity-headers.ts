/**
 * Outbound request headers for the documentation catalog.
 *
 * The caller's network address is never sent in the clear: it is encrypted
 * with AES-CBC under a shared key and sent as `hex(iv):hex(cipherText)` in
 * the `mcp-client-ip` header. Decryption happens upstream only.
 */

import { createCipheriv, randomBytes } from 'node:crypto';
import { EncryptionConfigError } from './tool-error.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Header carrying the encrypted caller address. */
export const CLIENT_IP_HEADER = 'mcp-client-ip';

/** Header carrying the bearer credential. */
export const AUTHORIZATION_HEADER = 'Authorization';

const IV_LENGTH = 16;

/** AES key length in bytes → cipher name. */
const CIPHERS: ReadonlyMap<number, string> = new Map([
  [16, 'aes-128-cbc'],
  [24, 'aes-192-cbc'],
  [32, 'aes-256-cbc'],
]);

// ---------------------------------------------------------------------------
// Key handling
// ---------------------------------------------------------------------------

/**
 * Decode a hex-encoded AES key.
 *
 * @throws EncryptionConfigError if the string is not hex or does not decode
 *   to 16, 24 or 32 bytes.
 */
export function parseEncryptionKey(hex: string): Buffer {
  if (!/^(?:[0-9a-fA-F]{2})+$/.test(hex)) {
    throw new EncryptionConfigError('Encryption key must be a hex-encoded byte string');
  }
  const key = Buffer.from(hex, 'hex');
  if (!CIPHERS.has(key.length)) {
    throw new EncryptionConfigError(
      `Encryption key must be 16, 24 or 32 bytes, got ${key.length}`,
    );
  }
  return key;
}

// ---------------------------------------------------------------------------
// encryptIdentity()
// ---------------------------------------------------------------------------

/**
 * Encrypt a caller address with AES-CBC (PKCS7 padding) and a fresh random
 * IV. Two calls with the same input produce different output.
 *
 * @returns `hex(iv) + ":" + hex(cipherText)`
 */
export function encryptIdentity(address: string, key: Uint8Array): string {
  const cipherName = CIPHERS.get(key.length);
  if (cipherName === undefined) {
    throw new EncryptionConfigError(
      `Encryption key must be 16, 24 or 32 bytes, got ${key.length}`,
    );
  }

  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(cipherName, key, iv);
  const cipherText = Buffer.concat([cipher.update(address, 'utf-8'), cipher.final()]);
  return `${iv.toString('hex')}:${cipherText.toString('hex')}`;
}

// ---------------------------------------------------------------------------
// buildHeaders()
// ---------------------------------------------------------------------------

export interface BuildHeadersOptions {
  /** Caller network address to encrypt into {@link CLIENT_IP_HEADER}. */
  address?: string;
  /** Bearer credential for {@link AUTHORIZATION_HEADER}. */
  credential?: string;
  /** Headers copied into the result before the identity headers are added. */
  extra?: Readonly<Record<string, string>>;
  /** Encryption key, required when `address` is set. */
  key?: Uint8Array;
}

/**
 * Assemble outbound headers. `extra` passes through unchanged; the
 * identity header is added iff an address is given, the authorization
 * header iff a credential is given.
 */
export function buildHeaders(options: BuildHeadersOptions = {}): Record<string, string> {
  const headers: Record<string, string> = { ...options.extra };

  if (options.address) {
    if (options.key === undefined) {
      throw new EncryptionConfigError('No encryption key configured for caller identity');
    }
    headers[CLIENT_IP_HEADER] = encryptIdentity(options.address, options.key);
  }
  if (options.credential) {
    headers[AUTHORIZATION_HEADER] = `Bearer ${options.credential}`;
  }

  return headers;
}
