import { describe, expect, it } from 'vitest';
import { fromHex } from '../encoding/bytes';
import { encryptPayload } from '../encoding/cipher';
import { InvalidPayloadLengthError } from '../exceptions';
import { CommandTag } from '../protocol/constants';
import type { Codec } from '../protocol/registry';
import { notificationPlaintext, TEST_SESSION_KEY } from '../testing/fake-device';
import { createTestLogger } from '../testing/logger';
import { NotificationDemultiplexer } from './demultiplexer';
import type { HaloSnapshot } from './snapshot';

const TEMPERATURE = fromHex('0003fa000401c800e6000190012c0102');
const PROBE_STATISTICS = fromHex('4e462c01c800');
// Solar water temperature 25.0, where the temperature record reports 23.0
const SOLAR_STATE = fromHex('9001fa0000000101030101000002');

function encrypted(tag: number, data: Uint8Array, counter = 0): Uint8Array {
  return encryptPayload(notificationPlaintext(tag, data, counter), TEST_SESSION_KEY);
}

function createDemux(options: { idleTimeoutMs?: number; codecs?: ReadonlyMap<number, Codec<HaloSnapshot>> } = {}) {
  const logger = createTestLogger();
  const demux = new NotificationDemultiplexer(TEST_SESSION_KEY, { idleTimeoutMs: 1000, ...options, logger });
  return { demux, logger };
}

describe('NotificationDemultiplexer', () => {
  it('should merge every packet received before stop', async () => {
    const { demux } = createDemux();
    demux.onNotification(encrypted(CommandTag.TEMPERATURE, TEMPERATURE, 0));
    demux.onNotification(encrypted(CommandTag.PROBE_STATISTICS, PROBE_STATISTICS, 1));
    demux.stop('disconnected');

    const snapshot = await demux.run();
    expect(snapshot.get('waterTemperature')).toBe(26);
    expect(snapshot.get('highestOrpMeasured')).toBe(300);
    expect(demux.recordCount).toBe(2);
  });

  it('should merge packets that arrive while running', async () => {
    const { demux } = createDemux();
    const merged = demux.run();
    demux.onNotification(encrypted(CommandTag.PROBE_STATISTICS, PROBE_STATISTICS));
    await Promise.resolve();
    demux.stop('disconnected');
    expect((await merged).get('lowestOrpMeasured')).toBe(200);
  });

  it('should let the later of two overlapping records win', async () => {
    const first = createDemux();
    first.demux.onNotification(encrypted(CommandTag.TEMPERATURE, TEMPERATURE));
    first.demux.onNotification(encrypted(CommandTag.SOLAR_STATE, SOLAR_STATE));
    first.demux.stop('done');
    expect((await first.demux.run()).get('solarWaterTemperature')).toBe(25);

    const second = createDemux();
    second.demux.onNotification(encrypted(CommandTag.SOLAR_STATE, SOLAR_STATE));
    second.demux.onNotification(encrypted(CommandTag.TEMPERATURE, TEMPERATURE));
    second.demux.stop('done');
    expect((await second.demux.run()).get('solarWaterTemperature')).toBe(23);
  });

  it('should drop tags without a codec', async () => {
    const { demux, logger } = createDemux();
    demux.onNotification(encrypted(4242, TEMPERATURE));
    demux.stop('done');

    const snapshot = await demux.run();
    expect(snapshot.isEmpty).toBe(true);
    expect(demux.recordCount).toBe(0);
    expect(logger.debug).toHaveBeenCalledWith('No codec for tag 4242; dropped');
  });

  it('should drop packets that cannot be decrypted', async () => {
    const { demux, logger } = createDemux();
    demux.onNotification(new Uint8Array(10));
    demux.onNotification(encrypted(CommandTag.PROBE_STATISTICS, PROBE_STATISTICS));
    demux.stop('done');

    await demux.run();
    expect(demux.recordCount).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith(
      'Dropping undecryptable notification (10 bytes):',
      expect.any(InvalidPayloadLengthError)
    );
  });

  it('should skip records that fail to decode and keep going', async () => {
    const { demux, logger } = createDemux();
    const badTemperature = new Uint8Array(TEMPERATURE);
    badTemperature[10] = 7;
    demux.onNotification(encrypted(CommandTag.TEMPERATURE, badTemperature));
    demux.onNotification(encrypted(CommandTag.PROBE_STATISTICS, PROBE_STATISTICS));
    demux.stop('done');

    const snapshot = await demux.run();
    expect(snapshot.has('waterTemperature')).toBe(false);
    expect(snapshot.get('highestPhMeasured')).toBe(7.8);
    expect(logger.warn).toHaveBeenCalledWith(
      'Skipping Temperature (tag 9): Temperature.waterTemperatureValid: unknown value 7 (0x7)'
    );
  });

  it('should return what it has once the stream goes idle', async () => {
    const { demux } = createDemux({ idleTimeoutMs: 20 });
    demux.onNotification(encrypted(CommandTag.PROBE_STATISTICS, PROBE_STATISTICS));
    const snapshot = await demux.run();
    expect(snapshot.get('highestPhMeasured')).toBe(7.8);
  });

  it('should ignore packets that arrive after stop', async () => {
    const { demux } = createDemux();
    demux.stop('done');
    demux.onNotification(encrypted(CommandTag.PROBE_STATISTICS, PROBE_STATISTICS));
    expect(demux.isStopped).toBe(true);
    expect((await demux.run()).isEmpty).toBe(true);
  });

  it('should propagate errors that are not decode failures', async () => {
    const failing: Codec<HaloSnapshot> = {
      name: 'Failing',
      size: 1,
      decode: () => ({}),
      apply: () => {
        throw new Error('boom');
      },
    };
    const { demux } = createDemux({ codecs: new Map([[CommandTag.TEMPERATURE, failing]]) });
    demux.onNotification(encrypted(CommandTag.TEMPERATURE, TEMPERATURE));
    demux.stop('done');
    await expect(demux.run()).rejects.toThrow('boom');
  });
});
