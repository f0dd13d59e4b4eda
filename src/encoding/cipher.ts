/**
 * Session cipher for chlorinator characteristics.
 *
 * Every characteristic payload is XORed with the per-connection session key and
 * then run through AES-128-ECB twice under the shared secret: once over bytes
 * [0, 16) and once over bytes [4, end). The overlap is part of the protocol.
 */

import { createCipheriv, createDecipheriv } from 'node:crypto';
import { InvalidPayloadLengthError } from '../exceptions';

/** Fixed AES-128 key shared by every device of the product family. */
export const SHARED_SECRET = new Uint8Array([
  0x2b, 0x7e, 0x15, 0x16, 0x28, 0xae, 0xd2, 0xa6,
  0xab, 0xf7, 0x15, 0x88, 0x09, 0xcf, 0x4f, 0x3c,
]);

export const BLOCK_SIZE = 16;
export const SESSION_KEY_LENGTH = 16;

/** Bytes left in the clear by the second pass. */
const SECOND_PASS_OFFSET = 4;

/**
 * XOR two byte sequences, left-aligned.
 *
 * The shorter operand is zero-padded on the right, so the result has the
 * length of the longer one.
 */
export function xorAlign(a: Uint8Array, b: Uint8Array): Uint8Array {
  const result = new Uint8Array(Math.max(a.length, b.length));
  for (let i = 0; i < result.length; i++) {
    result[i] = (a[i] ?? 0) ^ (b[i] ?? 0);
  }
  return result;
}

function aesEcb(data: Uint8Array, direction: 'encrypt' | 'decrypt'): Uint8Array {
  const cipher =
    direction === 'encrypt'
      ? createCipheriv('aes-128-ecb', SHARED_SECRET, null)
      : createDecipheriv('aes-128-ecb', SHARED_SECRET, null);
  cipher.setAutoPadding(false);
  return new Uint8Array(Buffer.concat([cipher.update(data), cipher.final()]));
}

function assertSessionKey(sessionKey: Uint8Array): void {
  if (sessionKey.length !== SESSION_KEY_LENGTH) {
    throw new InvalidPayloadLengthError(
      `Session key must be ${SESSION_KEY_LENGTH} bytes, got ${sessionKey.length}`,
      sessionKey.length
    );
  }
}

function assertPayloadLength(payload: Uint8Array): void {
  const secondPass = payload.length - SECOND_PASS_OFFSET;
  if (secondPass < BLOCK_SIZE || secondPass % BLOCK_SIZE !== 0) {
    throw new InvalidPayloadLengthError(
      `Payload length ${payload.length} is not ${SECOND_PASS_OFFSET} + a multiple of ${BLOCK_SIZE}`,
      payload.length
    );
  }
}

/**
 * Derive the authentication token written back to the device.
 *
 * The XOR of session key and access code is fitted to exactly one block
 * (truncated or zero-padded) before encryption.
 */
export function deriveAuthToken(sessionKey: Uint8Array, accessCode: string): Uint8Array {
  assertSessionKey(sessionKey);
  const xored = xorAlign(sessionKey, new TextEncoder().encode(accessCode));
  const block = new Uint8Array(BLOCK_SIZE);
  block.set(xored.subarray(0, BLOCK_SIZE));
  return aesEcb(block, 'encrypt');
}

/**
 * Encrypt a plaintext characteristic payload.
 *
 * @throws {InvalidPayloadLengthError} If the payload or key length is unsupported
 */
export function encryptPayload(plaintext: Uint8Array, sessionKey: Uint8Array): Uint8Array {
  assertSessionKey(sessionKey);
  assertPayloadLength(plaintext);

  const result = xorAlign(plaintext, sessionKey);
  result.set(aesEcb(result.subarray(0, BLOCK_SIZE), 'encrypt'), 0);
  result.set(aesEcb(result.subarray(SECOND_PASS_OFFSET), 'encrypt'), SECOND_PASS_OFFSET);
  return result;
}

/**
 * Decrypt a characteristic payload read or notified by the device.
 *
 * @throws {InvalidPayloadLengthError} If the payload or key length is unsupported
 */
export function decryptPayload(ciphertext: Uint8Array, sessionKey: Uint8Array): Uint8Array {
  assertSessionKey(sessionKey);
  assertPayloadLength(ciphertext);

  const result = new Uint8Array(ciphertext);
  result.set(aesEcb(result.subarray(SECOND_PASS_OFFSET), 'decrypt'), SECOND_PASS_OFFSET);
  result.set(aesEcb(result.subarray(0, BLOCK_SIZE), 'decrypt'), 0);
  return xorAlign(result, sessionKey);
}
