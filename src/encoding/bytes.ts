/**
 * Fixed-layout little-endian reader used by every record decoder.
 */

import { ShortBufferError, UnknownEnumValueError } from '../exceptions';

/**
 * Build the set of numeric members of a TypeScript numeric enum.
 */
export function enumDomain<E extends number>(
  enumType: Record<string, E | string>
): ReadonlySet<E> {
  const values = new Set<E>();
  for (const value of Object.values(enumType)) {
    if (typeof value === 'number') {
      values.add(value);
    }
  }
  return values;
}

/**
 * Reads fields at fixed offsets from a record payload.
 *
 * Buffers shorter than the record's size are rejected at construction; bytes
 * past `size` are never read.
 */
export class ByteReader {
  private readonly view: DataView;

  constructor(
    readonly record: string,
    private readonly data: Uint8Array,
    readonly size: number
  ) {
    if (data.length < size) {
      throw new ShortBufferError(record, size, data.length);
    }
    this.view = new DataView(data.buffer, data.byteOffset, size);
  }

  u8(offset: number): number {
    return this.view.getUint8(offset);
  }

  u16(offset: number): number {
    return this.view.getUint16(offset, true);
  }

  /** 3-byte little-endian unsigned integer */
  u24(offset: number): number {
    return this.u8(offset) | (this.u8(offset + 1) << 8) | (this.u8(offset + 2) << 16);
  }

  u32(offset: number): number {
    return this.view.getUint32(offset, true);
  }

  i32(offset: number): number {
    return this.view.getInt32(offset, true);
  }

  bool(offset: number): boolean {
    return this.u8(offset) !== 0;
  }

  bytes(offset: number, length: number): Uint8Array {
    return this.data.slice(offset, Math.min(offset + length, this.size));
  }

  /**
   * Map a raw integer onto an enum, failing on values outside its domain.
   *
   * When `sentinel` is given, the all-ones wire value decodes to that member.
   */
  enumValue<E extends number>(
    field: string,
    domain: ReadonlySet<E>,
    raw: number,
    sentinel?: { wire: number; value: E }
  ): E {
    if (sentinel && raw === sentinel.wire) {
      return sentinel.value;
    }
    for (const member of domain) {
      if (member === raw) {
        return member;
      }
    }
    throw new UnknownEnumValueError(this.record, field, raw);
  }
}

/**
 * Format the leading bytes of a buffer as hex for logs.
 */
export function hexPreview(data: Uint8Array, bytes: number = 4): string {
  const shown = Array.from(data.subarray(0, bytes), (b) => b.toString(16).padStart(2, '0')).join('');
  return data.length > bytes ? `${shown}…(${data.length} bytes)` : shown;
}

export function toHex(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('hex');
}

export function fromHex(hex: string): Uint8Array {
  return new Uint8Array(Buffer.from(hex, 'hex'));
}
