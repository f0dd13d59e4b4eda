import { describe, expect, it } from 'vitest';
import { fromHex, toHex } from './encoding/bytes';
import { CharacteristicIOError, ConfigurationError, SessionBusyError } from './exceptions';
import { HaloChlorinatorDevice } from './halo-device';
import { GpoDeviceType, HaloAction, HeaterAction, LightAction, MainText, SolarAction } from './models/enums';
import type { HaloDeviceOptions } from './options';
import { CommandTag, DEFAULT_REQUEST_TAGS, HaloCharacteristic } from './protocol/constants';
import { FakeChlorinator, type FakeDeviceOptions, type FakeNotification } from './testing/fake-device';
import { createTestLogger } from './testing/logger';

const DEVICE_ID = 'AA:BB:CC:DD:EE:FF';

const ANSWERS = new Map<number, FakeNotification[]>([
  [
    CommandTag.FLEX_SETTINGS,
    [
      { tag: CommandTag.TEMPERATURE, data: fromHex('0003fa000401c800e6000190012c0102') },
      { tag: CommandTag.STATE, data: fromHex('0305b80bff09bc020949060c1ebd0200') },
      { tag: CommandTag.GPO_NAMES, data: fromHex('07010102030001') },
    ],
  ],
  [CommandTag.PROBE_STATISTICS, [{ tag: CommandTag.PROBE_STATISTICS, data: fromHex('4e462c01c800') }]],
  [CommandTag.POWER_BOARD_STATISTICS, [{ tag: CommandTag.POWER_BOARD_STATISTICS, data: fromHex('e8030000') }]],
]);

function setup(fakeOptions: Partial<FakeDeviceOptions> = {}, deviceOptions: Partial<HaloDeviceOptions> = {}) {
  const fake = new FakeChlorinator({
    accessCode: '1234',
    notifications: ANSWERS,
    disconnectAfterRequests: DEFAULT_REQUEST_TAGS.length,
    ...fakeOptions,
  });
  const logger = createTestLogger();
  const device = new HaloChlorinatorDevice(fake, DEVICE_ID, { accessCode: '1234', logger, ...deviceOptions });
  return { fake, device, logger };
}

describe('HaloChlorinatorDevice', () => {
  describe('gatherData', () => {
    it('should merge every notification until the device disconnects', async () => {
      const { fake, device } = setup();
      const snapshot = await device.gatherData();

      expect(snapshot.get('waterTemperature')).toBe(26);
      expect(snapshot.get('mainText')).toBe(MainText.NONE);
      expect(snapshot.get('isInPoolSelection')).toBe(false);
      expect(snapshot.get('highestOrpMeasured')).toBe(300);
      expect(snapshot.get('powerBoardRuntime')).toBe(1000);
      expect(snapshot.gpoSetups[2]).toMatchObject({ deviceType: GpoDeviceType.CONNECT_1, index: 1 });
      expect(fake.activeConnections).toBe(0);
    });

    it('should request the default tags in order', async () => {
      const { fake, device } = setup();
      await device.gatherData();
      expect(fake.writes.map((w) => w.uuid)).toEqual(DEFAULT_REQUEST_TAGS.map(() => HaloCharacteristic.RX));
      expect(fake.writes.map((w) => new DataView(w.plaintext.buffer).getUint16(1, true))).toEqual([
        ...DEFAULT_REQUEST_TAGS,
      ]);
    });

    it('should return a partial snapshot when the device disconnects early', async () => {
      const { device } = setup({ disconnectAfterRequests: 1 });
      const snapshot = await device.gatherData();
      expect(snapshot.get('waterTemperature')).toBe(26);
      expect(snapshot.has('highestOrpMeasured')).toBe(false);
    });

    it('should return what it has when the session times out', async () => {
      const { device } = setup({ disconnectAfterRequests: undefined }, { sessionTimeoutMs: 50 });
      const snapshot = await device.gatherData();
      expect(snapshot.get('powerBoardRuntime')).toBe(1000);
    });

    it('should unsubscribe from TX before disconnecting', async () => {
      const { fake, device } = setup({ disconnectAfterRequests: undefined }, { sessionTimeoutMs: 50 });
      await device.gatherData();
      expect(fake.isSubscribed(HaloCharacteristic.TX)).toBe(false);
      expect(fake.activeConnections).toBe(0);
    });

    it('should only request the configured tags', async () => {
      const { fake, device } = setup(
        { disconnectAfterRequests: 1 },
        { requestTags: [CommandTag.PROBE_STATISTICS] }
      );
      const snapshot = await device.gatherData();
      expect(fake.writes).toHaveLength(1);
      expect(snapshot.has('waterTemperature')).toBe(false);
      expect(snapshot.get('lowestOrpMeasured')).toBe(200);
    });

    it('should never run two sessions at once', async () => {
      const { fake, device } = setup();
      const [first, second] = await Promise.all([device.gatherData(), device.gatherData()]);

      expect(fake.connectCount).toBe(2);
      expect(fake.maxConcurrentConnections).toBe(1);
      expect(first.get('waterTemperature')).toBe(26);
      expect(second.get('waterTemperature')).toBe(26);
      expect(device.isBusy).toBe(false);
    });

    it('should give up waiting for a busy device after the lock timeout', async () => {
      const { device } = setup({ disconnectAfterRequests: undefined }, { sessionTimeoutMs: 100, lockTimeoutMs: 20 });
      const first = device.gatherData();
      await expect(device.gatherData()).rejects.toThrow(SessionBusyError);
      await expect(first).resolves.toBeDefined();
    });

    it('should fail and release the device when a request write fails', async () => {
      const { fake, device } = setup({ failingCharacteristic: HaloCharacteristic.RX });
      await expect(device.gatherData()).rejects.toThrow(CharacteristicIOError);
      expect(fake.activeConnections).toBe(0);
      expect(device.isBusy).toBe(false);
    });
  });

  describe('actions', () => {
    it('should authenticate and write a chlorinator action', async () => {
      const { fake, device } = setup();
      await device.writeAction(HaloAction.DISABLE_ACID_DOSING_FOR_PERIOD, 90);

      expect(fake.reads).toEqual([HaloCharacteristic.SESSION_KEY]);
      expect(fake.writes).toHaveLength(1);
      expect(fake.writes[0].uuid).toBe(HaloCharacteristic.RX);
      expect(toHex(fake.writes[0].plaintext)).toBe('03f4010b5a000000000000000000000000000000');
      expect(fake.activeConnections).toBe(0);
    });

    it('should write accessory actions under their own tags', async () => {
      const { fake, device } = setup();
      await device.writeHeaterAction(HeaterAction.HEATER_ON);
      await device.writeSolarAction(SolarAction.WINTER);
      await device.writeLightAction(LightAction.TURN_ON_ZONE);

      expect(fake.writes.map((w) => toHex(w.plaintext.subarray(0, 4)))).toEqual(['03f60105', '03f70105', '03f50104']);
    });
  });

  describe('options', () => {
    it.each<[string, Partial<HaloDeviceOptions>]>([
      ['an empty access code', { accessCode: '' }],
      ['an access code longer than one block', { accessCode: '12345678901234567' }],
      ['a zero session timeout', { sessionTimeoutMs: 0 }],
      ['a negative lock timeout', { lockTimeoutMs: -1 }],
    ])('should reject %s', (_name, options) => {
      expect(() => setup({}, options)).toThrow(ConfigurationError);
    });
  });
});
