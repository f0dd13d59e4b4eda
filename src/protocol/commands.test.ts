import { describe, expect, it } from 'vitest';
import { fromHex, toHex } from '../encoding/bytes';
import { ConfigurationError, InvalidPayloadLengthError, ProtocolError } from '../exceptions';
import { HaloAction, HeaterAction, LightAction, PollAction, SolarAction } from '../models/enums';
import {
  buildHaloAction,
  buildHeaterAction,
  buildLightAction,
  buildPollAction,
  buildReadRequest,
  buildSolarAction,
  parseActionPacket,
} from './commands';
import { CommandTag } from './constants';

describe('buildPollAction', () => {
  it('should place the action in byte 0 of a 20-byte packet', () => {
    expect(toHex(buildPollAction(PollAction.AUTO))).toBe('0200000000000000000000000000000000000000');
  });

  it('should write the period as a little-endian int32', () => {
    expect(toHex(buildPollAction(PollAction.DISABLE_ACID_DOSING_FOR_PERIOD, 300))).toBe(
      '0b2c010000000000000000000000000000000000'
    );
  });

  it.each([1.5, 0x80000000, -0x80000001, Number.NaN])('should reject the parameter %s', (parameter) => {
    expect(() => buildPollAction(PollAction.DISABLE_ACID_DOSING_FOR_PERIOD, parameter)).toThrow(ConfigurationError);
  });
});

describe('buildHaloAction', () => {
  it('should prefix the chlorinator action tag', () => {
    expect(toHex(buildHaloAction(HaloAction.DISABLE_ACID_DOSING_FOR_PERIOD, 90))).toBe(
      '03f4010b5a000000000000000000000000000000'
    );
  });

  it('should default the parameter to zero', () => {
    expect(toHex(buildHaloAction(HaloAction.ALL_OFF))).toBe('03f4010e00000000000000000000000000000000');
  });

  it('should reject a parameter outside the int32 range', () => {
    expect(() => buildHaloAction(HaloAction.DISABLE_ACID_DOSING_FOR_PERIOD, 2 ** 31)).toThrow(
      'Action parameter must be a 32-bit integer, got 2147483648'
    );
  });
});

describe('accessory actions', () => {
  it('should build a light action under tag 501', () => {
    expect(toHex(buildLightAction(LightAction.TURN_ON_ZONE))).toBe('03f5010400000000000000000000000000000000');
  });

  it('should build a heater action under tag 502', () => {
    expect(toHex(buildHeaterAction(HeaterAction.HEATER_ON))).toBe('03f6010500000000000000000000000000000000');
  });

  it('should build a solar action under tag 503', () => {
    expect(toHex(buildSolarAction(SolarAction.WINTER))).toBe('03f7010500000000000000000000000000000000');
  });
});

describe('buildReadRequest', () => {
  it('should encode a read of the tag', () => {
    expect(toHex(buildReadRequest(CommandTag.PROBE_STATISTICS))).toBe('0258020000000000000000000000000000000000');
  });
});

describe('parseActionPacket', () => {
  it('should recover a poll action and its parameter', () => {
    expect(parseActionPacket(buildPollAction(PollAction.DISABLE_ACID_DOSING_FOR_PERIOD, 300), 'poll')).toEqual({
      tag: null,
      action: PollAction.DISABLE_ACID_DOSING_FOR_PERIOD,
      parameter: 300,
    });
  });

  it('should recover a chlorinator action and its parameter', () => {
    expect(parseActionPacket(buildHaloAction(HaloAction.FILTER_FOR_PERIOD, 45), 'halo')).toEqual({
      tag: CommandTag.CHLORINATOR_ACTION,
      action: HaloAction.FILTER_FOR_PERIOD,
      parameter: 45,
    });
  });

  it('should report no parameter for accessory actions', () => {
    const packet = buildSolarAction(SolarAction.SUMMER);
    packet[5] = 0x7f;
    expect(parseActionPacket(packet, 'halo')).toEqual({
      tag: CommandTag.SOLAR_ACTION,
      action: SolarAction.SUMMER,
      parameter: 0,
    });
  });

  it('should reject packets that are not 20 bytes', () => {
    expect(() => parseActionPacket(new Uint8Array(16), 'poll')).toThrow(InvalidPayloadLengthError);
  });

  it('should reject a read request', () => {
    expect(() => parseActionPacket(buildReadRequest(CommandTag.STATE), 'halo')).toThrow(
      'Expected message type 0x03, got 0x02'
    );
  });

  it('should reject a write to a non-action tag', () => {
    const packet = fromHex('0368000100000000000000000000000000000000');
    expect(() => parseActionPacket(packet, 'halo')).toThrow(ProtocolError);
    expect(() => parseActionPacket(packet, 'halo')).toThrow('Tag 104 is not an action tag');
  });
});
