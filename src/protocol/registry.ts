/**
 * Codec registries: map a characteristic UUID or command tag to the record
 * decoder for its bytes and the rule for merging the record into a snapshot.
 */

import {
  ChlorinatorCapabilities,
  ChlorinatorSettings,
  ChlorinatorSetup,
  ChlorinatorState,
  ChlorinatorStatistics,
  ChlorinatorTimers,
} from '../models/chlorinator';
import {
  EquipmentMode,
  EquipmentParameter,
  GpoSetup,
  LightCapabilities,
  LightSetup,
  LightState,
  RelaySetup,
  ValveSetup,
} from '../models/halo-equipment';
import {
  HeaterCapabilities,
  HeaterConfig,
  HeaterCooldownState,
  HeaterState,
  SolarCapabilities,
  SolarConfig,
  SolarState,
} from '../models/halo-heating';
import {
  CellStatistics,
  DeviceProfile,
  HaloCapabilities,
  HaloSettings,
  HaloState,
  MaintenanceState,
  PowerBoardStatistics,
  ProbeStatistics,
  SetPoint,
  Temperature,
  WaterVolume,
} from '../models/halo-status';
import type { HaloFields, HaloSnapshot, PollFields, PollSnapshot } from '../session/snapshot';
import { CommandTag, PollCharacteristic } from './constants';

/**
 * A record model: an exact size and a decoder.
 */
export interface RecordModel<R> {
  readonly SIZE: number;
  fromBytes(data: Uint8Array): R;
}

export interface Codec<S> {
  readonly name: string;
  /** Minimum payload length */
  readonly size: number;
  /**
   * @throws {ShortBufferError} If data is shorter than `size`
   * @throws {UnknownEnumValueError} If an enumerated field is out of range
   */
  decode(data: Uint8Array): object;
  /** Decode `data` and merge the record into `snapshot`; returns the record. */
  apply(snapshot: S, data: Uint8Array): object;
}

function codec<R extends object, S>(
  name: string,
  model: RecordModel<R>,
  merge: (snapshot: S, record: R) => void
): Codec<S> {
  return {
    name,
    size: model.SIZE,
    decode: (data) => model.fromBytes(data),
    apply(snapshot, data) {
      const record = model.fromBytes(data);
      merge(snapshot, record);
      return record;
    },
  };
}

function pollFields<R extends Partial<PollFields>>(name: string, model: RecordModel<R>): Codec<PollSnapshot> {
  return codec<R, PollSnapshot>(name, model, (snapshot, record) => snapshot.mergeFields(record));
}

function haloFields<R extends Partial<HaloFields>>(name: string, model: RecordModel<R>): Codec<HaloSnapshot> {
  return codec<R, HaloSnapshot>(name, model, (snapshot, record) => snapshot.mergeFields(record));
}

/**
 * Poll-variant codecs, keyed by characteristic UUID.
 */
export const POLL_CODECS: ReadonlyMap<string, Codec<PollSnapshot>> = new Map<string, Codec<PollSnapshot>>([
  [PollCharacteristic.CHLORINATOR_STATE, pollFields('ChlorinatorState', ChlorinatorState)],
  [PollCharacteristic.CHLORINATOR_CAPABILITIES, pollFields('ChlorinatorCapabilities', ChlorinatorCapabilities)],
  [PollCharacteristic.CHLORINATOR_SETUP, pollFields('ChlorinatorSetup', ChlorinatorSetup)],
  [PollCharacteristic.CHLORINATOR_TIMERS, pollFields('ChlorinatorTimers', ChlorinatorTimers)],
  [PollCharacteristic.CHLORINATOR_STATISTICS, pollFields('ChlorinatorStatistics', ChlorinatorStatistics)],
  [PollCharacteristic.CHLORINATOR_SETTINGS, pollFields('ChlorinatorSettings', ChlorinatorSettings)],
]);

/**
 * Notification-variant codecs, keyed by command tag.
 */
export const NOTIFICATION_CODECS: ReadonlyMap<number, Codec<HaloSnapshot>> = new Map<number, Codec<HaloSnapshot>>([
  [CommandTag.PROFILE, haloFields('DeviceProfile', DeviceProfile)],
  [CommandTag.TEMPERATURE, haloFields('Temperature', Temperature)],
  [CommandTag.SETTINGS, haloFields('HaloSettings', HaloSettings)],
  [CommandTag.WATER_VOLUME, haloFields('WaterVolume', WaterVolume)],
  [CommandTag.SET_POINT, haloFields('SetPoint', SetPoint)],
  [CommandTag.STATE, haloFields('HaloState', HaloState)],
  [CommandTag.CAPABILITIES, haloFields('HaloCapabilities', HaloCapabilities)],
  [CommandTag.MAINTENANCE_STATE, haloFields('MaintenanceState', MaintenanceState)],
  [CommandTag.EQUIPMENT_CONFIG, haloFields('EquipmentMode', EquipmentMode)],
  [CommandTag.EQUIPMENT_PARAMETER, haloFields('EquipmentParameter', EquipmentParameter)],
  [CommandTag.LIGHT_STATE, haloFields('LightState', LightState)],
  [CommandTag.LIGHT_CAPABILITIES, haloFields('LightCapabilities', LightCapabilities)],
  [CommandTag.LIGHT_ZONE_NAMES, haloFields('LightSetup', LightSetup)],
  [CommandTag.PROBE_STATISTICS, haloFields('ProbeStatistics', ProbeStatistics)],
  [CommandTag.CELL_STATISTICS, haloFields('CellStatistics', CellStatistics)],
  [CommandTag.POWER_BOARD_STATISTICS, haloFields('PowerBoardStatistics', PowerBoardStatistics)],
  [CommandTag.HEATER_CAPABILITIES, haloFields('HeaterCapabilities', HeaterCapabilities)],
  [CommandTag.HEATER_CONFIG, haloFields('HeaterConfig', HeaterConfig)],
  [CommandTag.HEATER_STATE, haloFields('HeaterState', HeaterState)],
  [CommandTag.HEATER_COOLDOWN_STATE, haloFields('HeaterCooldownState', HeaterCooldownState)],
  [CommandTag.SOLAR_CAPABILITIES, haloFields('SolarCapabilities', SolarCapabilities)],
  [CommandTag.SOLAR_CONFIG, haloFields('SolarConfig', SolarConfig)],
  [CommandTag.SOLAR_STATE, haloFields('SolarState', SolarState)],
  [CommandTag.GPO_NAMES, codec<GpoSetup, HaloSnapshot>('GpoSetup', GpoSetup, (s, r) => s.mergeGpoSetup(r))],
  [CommandTag.RELAY_NAMES, codec<RelaySetup, HaloSnapshot>('RelaySetup', RelaySetup, (s, r) => s.mergeRelaySetup(r))],
  [CommandTag.VALVE_NAMES, codec<ValveSetup, HaloSnapshot>('ValveSetup', ValveSetup, (s, r) => s.mergeValveSetup(r))],
]);
