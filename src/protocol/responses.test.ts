import { describe, expect, it } from 'vitest';
import { fromHex } from '../encoding/bytes';
import { InvalidPayloadLengthError } from '../exceptions';
import { parseNotification, unpackCommandTag } from './responses';

describe('unpackCommandTag', () => {
  it('should read the little-endian tag after the type byte', () => {
    expect(unpackCommandTag(fromHex('02f401'))).toBe(500);
    expect(unpackCommandTag(fromHex('0214050000'))).toBe(1300);
  });

  it('should honour the byte offset of a subarray', () => {
    expect(unpackCommandTag(fromHex('ff025802').subarray(1))).toBe(600);
  });
});

describe('parseNotification', () => {
  const packet = fromHex('02090000030a0b0c0d0e0f101112131415161799');

  it('should split type, tag and data', () => {
    const notification = parseNotification(packet);
    expect(notification.type).toBe(0x02);
    expect(notification.tag).toBe(9);
    expect(notification.data).toHaveLength(17);
    expect(notification.data[0]).toBe(0x00);
    expect(notification.data[16]).toBe(0x99);
  });

  it('should copy the data out of the packet', () => {
    const { data } = parseNotification(packet);
    data[0] = 0xaa;
    expect(packet[3]).toBe(0x00);
  });

  it.each([16, 19, 21])('should reject a %i-byte packet', (length) => {
    expect(() => parseNotification(new Uint8Array(length))).toThrow(InvalidPayloadLengthError);
  });
});
