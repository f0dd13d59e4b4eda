/**
 * Accumulated device state built from decoded records.
 */

import type {
  ChlorinatorCapabilities,
  ChlorinatorSettings,
  ChlorinatorSetup,
  ChlorinatorState,
  ChlorinatorStatistics,
  ChlorinatorTimers,
} from '../models/chlorinator';
import {
  GpoSetup,
  RELAY_COUNT,
  VALVE_COUNT,
  type EquipmentMode,
  type EquipmentParameter,
  type LightCapabilities,
  type LightSetup,
  type LightState,
  type RelaySetup,
  type ValveSetup,
} from '../models/halo-equipment';
import type {
  HeaterCapabilities,
  HeaterConfig,
  HeaterCooldownState,
  HeaterState,
  SolarCapabilities,
  SolarConfig,
  SolarState,
} from '../models/halo-heating';
import type {
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

/** Every field a poll-variant session can report. */
export type PollFields = ChlorinatorState &
  ChlorinatorSetup &
  ChlorinatorCapabilities &
  ChlorinatorSettings &
  ChlorinatorStatistics &
  ChlorinatorTimers;

/** Every field a notification-variant session can report, besides slotted setups. */
export type HaloFields = DeviceProfile &
  Temperature &
  HaloSettings &
  WaterVolume &
  SetPoint &
  HaloState &
  HaloCapabilities &
  MaintenanceState &
  EquipmentMode &
  EquipmentParameter &
  LightState &
  LightCapabilities &
  LightSetup &
  ProbeStatistics &
  CellStatistics &
  PowerBoardStatistics &
  HeaterCapabilities &
  HeaterConfig &
  HeaterState &
  HeaterCooldownState &
  SolarCapabilities &
  SolarConfig &
  SolarState;

/**
 * Union of the fields of every record merged so far. Later records overwrite
 * earlier values of the same field.
 */
export class StateSnapshot<F extends object> {
  private readonly values: Partial<F> = {};

  mergeFields(record: Partial<F>): void {
    Object.assign(this.values, record);
  }

  get<K extends keyof F>(key: K): F[K] | undefined {
    return this.values[key];
  }

  has(key: keyof F): boolean {
    return key in this.values;
  }

  get fields(): Readonly<Partial<F>> {
    return this.values;
  }

  get isEmpty(): boolean {
    return Object.keys(this.values).length === 0;
  }
}

export class PollSnapshot extends StateSnapshot<PollFields> {}

function slots<T>(count: number): (T | null)[] {
  return Array.from({ length: count }, () => null);
}

/**
 * Notification-variant snapshot. Outlet, relay and valve setups arrive one
 * notification per slot and are kept in fixed-size arrays.
 */
export class HaloSnapshot extends StateSnapshot<HaloFields> {
  readonly gpoSetups = slots<GpoSetup>(GpoSetup.SLOT_COUNT);
  readonly relaySetups = slots<RelaySetup>(RELAY_COUNT);
  readonly valveSetups = slots<ValveSetup>(VALVE_COUNT);

  mergeGpoSetup(record: GpoSetup): void {
    this.gpoSetups[record.slot] = record;
  }

  mergeRelaySetup(record: RelaySetup): void {
    this.relaySetups[record.index] = record;
  }

  mergeValveSetup(record: ValveSetup): void {
    this.valveSetups[record.index] = record;
  }
}
