import { describe, expect, it } from 'vitest';
import { InvalidPayloadLengthError } from '../exceptions';
import { fromHex, toHex } from './bytes';
import { decryptPayload, deriveAuthToken, encryptPayload, xorAlign } from './cipher';

const SESSION_KEY = fromHex('000102030405060708090a0b0c0d0e0f');

describe('xorAlign', () => {
  it('should zero-pad the shorter operand on the right', () => {
    expect(Array.from(xorAlign(Uint8Array.of(0xff, 0x0f, 0x01), Uint8Array.of(0x0f)))).toEqual([0xf0, 0x0f, 0x01]);
  });

  it('should be its own inverse', () => {
    const a = fromHex('00112233445566778899');
    const b = fromHex('a5a5a5');
    expect(toHex(xorAlign(xorAlign(a, b), b))).toBe('00112233445566778899');
  });
});

describe('deriveAuthToken', () => {
  it('should encrypt the session key XOR access code under the shared secret', () => {
    expect(toHex(deriveAuthToken(SESSION_KEY, '1234'))).toBe('b94f6c239b404d503de47b86b574546a');
  });

  it('should reduce to plain AES when key and code cancel out', () => {
    // 6bc1bee22e409f96e93d7e117393172a is the first AES-128 test block
    const key = fromHex('6bc1bee22e409f96e93d7e117393172a');
    const token = deriveAuthToken(xorAlign(key, new TextEncoder().encode('0000')), '0000');
    expect(toHex(token)).toBe('3ad77bb40d7a3660a89ecaf32466ef97');
  });

  it('should reject a session key that is not 16 bytes', () => {
    expect(() => deriveAuthToken(new Uint8Array(15), '1234')).toThrow(InvalidPayloadLengthError);
  });
});

describe('encryptPayload', () => {
  it('should encrypt a poll action packet', () => {
    const plaintext = fromHex('0200000000000000000000000000000000000000');
    expect(toHex(encryptPayload(plaintext, SESSION_KEY))).toBe('83c8737e381cbd25159e2babaa26dc4b9bfb71f8');
  });

  it('should encrypt a notification-variant action packet', () => {
    const plaintext = fromHex('03f4010b5a000000000000000000000000000000');
    expect(toHex(encryptPayload(plaintext, SESSION_KEY))).toBe('65259afd086c1e38d09a394a70267d0728ec83f1');
  });

  it('should not modify its input', () => {
    const plaintext = fromHex('0258020000000000000000000000000000000000');
    encryptPayload(plaintext, SESSION_KEY);
    expect(toHex(plaintext)).toBe('0258020000000000000000000000000000000000');
  });

  it.each([0, 16, 19, 21, 32])('should reject a %i-byte payload', (length) => {
    expect(() => encryptPayload(new Uint8Array(length), SESSION_KEY)).toThrow(InvalidPayloadLengthError);
  });

  it('should accept 4 + 32 bytes', () => {
    expect(encryptPayload(new Uint8Array(36), SESSION_KEY)).toHaveLength(36);
  });
});

describe('decryptPayload', () => {
  it('should invert encryptPayload', () => {
    const ciphertext = fromHex('8ee6a5c0fea65f6377624f751e2c404b1364dad8');
    expect(toHex(decryptPayload(ciphertext, SESSION_KEY))).toBe('0258020000000000000000000000000000000000');
  });

  it('should recover arbitrary 36-byte payloads', () => {
    const plaintext = Uint8Array.from({ length: 36 }, (_, i) => (i * 37) & 0xff);
    const roundTrip = decryptPayload(encryptPayload(plaintext, SESSION_KEY), SESSION_KEY);
    expect(toHex(roundTrip)).toBe(toHex(plaintext));
  });

  it('should give a different result under a different session key', () => {
    const ciphertext = fromHex('8ee6a5c0fea65f6377624f751e2c404b1364dad8');
    const otherKey = new Uint8Array(16).fill(0x55);
    expect(toHex(decryptPayload(ciphertext, otherKey))).not.toBe('0258020000000000000000000000000000000000');
  });

  it('should report the offending length', () => {
    try {
      decryptPayload(new Uint8Array(10), SESSION_KEY);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidPayloadLengthError);
      expect(error).toMatchObject({ actual: 10 });
    }
  });
});
