import { describe, expect, it } from 'vitest';
import { ShortBufferError, UnknownEnumValueError } from '../exceptions';
import { ByteReader, enumDomain, fromHex, hexPreview, toHex } from './bytes';

enum Colour {
  NONE = -1,
  RED = 0,
  GREEN = 2,
}

const COLOURS = enumDomain<Colour>(Colour);

describe('ByteReader', () => {
  const data = fromHex('0102030405060708ff');

  it('should read little-endian integers at fixed offsets', () => {
    const r = new ByteReader('Test', data, 9);
    expect(r.u8(0)).toBe(0x01);
    expect(r.u16(0)).toBe(0x0201);
    expect(r.u24(1)).toBe(0x040302);
    expect(r.u32(4)).toBe(0x08070605);
    expect(r.bool(0)).toBe(true);
  });

  it('should read signed 32-bit values', () => {
    const r = new ByteReader('Test', fromHex('feffffff'), 4);
    expect(r.i32(0)).toBe(-2);
  });

  it('should throw ShortBufferError when the buffer is shorter than the record', () => {
    expect(() => new ByteReader('Test', fromHex('010203'), 4)).toThrow(ShortBufferError);
    expect(() => new ByteReader('Test', fromHex('010203'), 4)).toThrow('Test too short: 3 bytes (need 4)');
  });

  it('should ignore trailing bytes past the record size', () => {
    const r = new ByteReader('Test', data, 2);
    expect(() => r.u8(2)).toThrow(RangeError);
    expect(Array.from(r.bytes(0, 5))).toEqual([0x01, 0x02]);
  });

  it('should honour the byte offset of a subarray', () => {
    const r = new ByteReader('Test', data.subarray(3), 2);
    expect(r.u16(0)).toBe(0x0504);
  });

  describe('enumValue', () => {
    const r = new ByteReader('Test', data, 9);

    it('should map members of the domain', () => {
      expect(r.enumValue('colour', COLOURS, 2)).toBe(Colour.GREEN);
    });

    it('should map the sentinel wire value', () => {
      expect(r.enumValue('colour', COLOURS, 0xff, { wire: 0xff, value: Colour.NONE })).toBe(Colour.NONE);
    });

    it('should throw UnknownEnumValueError outside the domain', () => {
      expect(() => r.enumValue('colour', COLOURS, 7)).toThrow(UnknownEnumValueError);
      expect(() => r.enumValue('colour', COLOURS, 0x1f)).toThrow('Test.colour: unknown value 31 (0x1f)');
    });
  });
});

describe('enumDomain', () => {
  it('should collect only numeric members', () => {
    expect([...COLOURS].sort()).toEqual([-1, 0, 2]);
  });
});

describe('hex helpers', () => {
  it('should preview the leading bytes', () => {
    expect(hexPreview(fromHex('aabbccddee'))).toBe('aabbccdd…(5 bytes)');
    expect(hexPreview(fromHex('aabb'))).toBe('aabb');
  });

  it('should convert to and from hex', () => {
    expect(toHex(fromHex('00ff10'))).toBe('00ff10');
    expect(toHex(fromHex('00ff10').subarray(1))).toBe('ff10');
  });
});
