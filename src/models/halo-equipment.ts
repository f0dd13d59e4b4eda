/**
 * Notification-variant equipment and lighting records.
 *
 * Outlets, valves, relays and lighting zones are decoded into fixed-size
 * arrays indexed by slot.
 */

import { ByteReader, enumDomain } from '../encoding/bytes';
import { DecodeError } from '../exceptions';
import {
  GpoDeviceType,
  GpoFunction,
  GpoMode,
  GpoName,
  LightZoneName,
  Mode,
  RelayName,
  SpeedLevel,
  ValveName,
} from './enums';

const MODES = enumDomain<Mode>(Mode);
const GPO_MODES = enumDomain<GpoMode>(GpoMode);
const SPEED_LEVELS = enumDomain<SpeedLevel>(SpeedLevel);
const LIGHT_ZONE_NAMES = enumDomain<LightZoneName>(LightZoneName);
const GPO_DEVICE_TYPES = enumDomain<GpoDeviceType>(GpoDeviceType);
const GPO_FUNCTIONS = enumDomain<GpoFunction>(GpoFunction);
const GPO_NAMES = enumDomain<GpoName>(GpoName);
const RELAY_NAMES = enumDomain<RelayName>(RelayName);
const VALVE_NAMES = enumDomain<ValveName>(ValveName);

export const GPO_COUNT = 4;
export const VALVE_COUNT = 4;
export const RELAY_COUNT = 2;
export const LIGHT_ZONE_COUNT = 4;

/**
 * Mode and live state of one switched output.
 */
export interface OutputMode {
  mode: GpoMode;
  state: boolean;
  autoEnabled: boolean;
}

/**
 * Equipment modes (tag 201).
 *
 * Size: 16 bytes
 *
 * The state and auto-enabled bitfields share one layout: bit 0 is the filter
 * pump, bits 1-4 the GPOs, bits 5-8 the valves and bits 9-10 the relays.
 */
export interface EquipmentMode {
  equipmentEnabled: boolean;
  filterPumpMode: Mode;
  stateBitfield: number;
  autoEnabledBitfield: number;
  filterPumpState: boolean;
  filterPumpAutoEnabled: boolean;
  gpos: OutputMode[];
  valves: OutputMode[];
  relays: OutputMode[];

  /** Filter pump mode under the key shared with the poll variant */
  mode: Mode;
  pumpIsOperating: boolean;
}

export namespace EquipmentMode {
  export const SIZE = 16;

  const FILTER_PUMP_BIT = 0;
  const GPO_FIRST_BIT = 1;
  const VALVE_FIRST_BIT = GPO_FIRST_BIT + GPO_COUNT;
  const RELAY_FIRST_BIT = VALVE_FIRST_BIT + VALVE_COUNT;

  export function fromBytes(data: Uint8Array): EquipmentMode {
    const r = new ByteReader('EquipmentMode', data, SIZE);
    const state = r.u16(12);
    const autoEnabled = r.u16(14);

    const outputs = (field: string, modeOffset: number, firstBit: number, count: number) => {
      const result: OutputMode[] = [];
      for (let i = 0; i < count; i++) {
        const bit = 1 << (firstBit + i);
        result.push({
          mode: r.enumValue(field, GPO_MODES, r.u8(modeOffset + i)),
          state: !!(state & bit),
          autoEnabled: !!(autoEnabled & bit),
        });
      }
      return result;
    };

    const filterPumpMode = r.enumValue('filterPumpMode', MODES, r.u8(1));
    const filterPumpState = !!(state & (1 << FILTER_PUMP_BIT));

    return {
      equipmentEnabled: r.bool(0),
      filterPumpMode,
      stateBitfield: state,
      autoEnabledBitfield: autoEnabled,
      filterPumpState,
      filterPumpAutoEnabled: !!(autoEnabled & (1 << FILTER_PUMP_BIT)),
      gpos: outputs('gpoMode', 2, GPO_FIRST_BIT, GPO_COUNT),
      valves: outputs('valveMode', 6, VALVE_FIRST_BIT, VALVE_COUNT),
      relays: outputs('relayMode', 10, RELAY_FIRST_BIT, RELAY_COUNT),

      mode: filterPumpMode,
      pumpIsOperating: filterPumpState,
    };
  }
}

/**
 * Equipment parameters (tag 202).
 *
 * Size: 11 bytes. Output parameters are passed through.
 */
export interface EquipmentParameter {
  filterPumpSpeed: SpeedLevel;
  gpoParameters: number[];
  valveParameters: number[];
  relayParameters: number[];

  /** Filter pump speed under the key shared with the poll variant */
  pumpSpeed: SpeedLevel;
}

export namespace EquipmentParameter {
  export const SIZE = 11;

  export function fromBytes(data: Uint8Array): EquipmentParameter {
    const r = new ByteReader('EquipmentParameter', data, SIZE);
    const speed = r.enumValue('filterPumpSpeed', SPEED_LEVELS, r.u8(0), {
      wire: 0xff,
      value: SpeedLevel.NOT_SET,
    });
    return {
      filterPumpSpeed: speed,
      gpoParameters: Array.from(r.bytes(1, GPO_COUNT)),
      valveParameters: Array.from(r.bytes(5, VALVE_COUNT)),
      relayParameters: Array.from(r.bytes(9, RELAY_COUNT)),
      pumpSpeed: speed,
    };
  }
}

export interface LightZone {
  mode: Mode;
  colour: number;
  on: boolean;
}

/**
 * Lighting zone state (tag 300).
 *
 * Size: 9 bytes: [mode x4][colour x4][zone-on flags]
 */
export interface LightState {
  zones: LightZone[];
  zoneStateFlags: number;
}

export namespace LightState {
  export const SIZE = 9;

  export function fromBytes(data: Uint8Array): LightState {
    const r = new ByteReader('LightState', data, SIZE);
    const flags = r.u8(8);
    const zones: LightZone[] = [];
    for (let i = 0; i < LIGHT_ZONE_COUNT; i++) {
      zones.push({
        mode: r.enumValue('zoneMode', MODES, r.u8(i)),
        colour: r.u8(LIGHT_ZONE_COUNT + i),
        on: !!(flags & (1 << i)),
      });
    }
    return { zones, zoneStateFlags: flags };
  }
}

/**
 * Lighting capabilities (tag 301).
 *
 * Size: 5 bytes
 */
export interface LightCapabilities {
  lightingEnabled: boolean;
  onBoardLightEnabled: boolean;
  model: number;
  numZonesInUse: number;
  zoneIsMulticolourFlags: number;
  zoneIsMulticolour: boolean[];
}

export namespace LightCapabilities {
  export const SIZE = 5;

  export function fromBytes(data: Uint8Array): LightCapabilities {
    const r = new ByteReader('LightCapabilities', data, SIZE);
    const multicolour = r.u8(4);
    const zoneIsMulticolour: boolean[] = [];
    for (let i = 0; i < LIGHT_ZONE_COUNT; i++) {
      zoneIsMulticolour.push(!!(multicolour & (1 << i)));
    }
    return {
      lightingEnabled: r.bool(0),
      onBoardLightEnabled: r.bool(1),
      model: r.u8(2),
      numZonesInUse: r.u8(3),
      zoneIsMulticolourFlags: multicolour,
      zoneIsMulticolour,
    };
  }
}

/**
 * Lighting zone names (tag 302).
 *
 * Size: 4 bytes
 */
export interface LightSetup {
  zoneNames: LightZoneName[];
}

export namespace LightSetup {
  export const SIZE = 4;

  export function fromBytes(data: Uint8Array): LightSetup {
    const r = new ByteReader('LightSetup', data, SIZE);
    const zoneNames: LightZoneName[] = [];
    for (let i = 0; i < LIGHT_ZONE_COUNT; i++) {
      zoneNames.push(r.enumValue('zoneName', LIGHT_ZONE_NAMES, r.u8(i)));
    }
    return { zoneNames };
  }
}

function checkSlot(record: string, index: number, count: number): number {
  if (index >= count) {
    throw new DecodeError(`${record} index ${index} out of range (0-${count - 1})`, record);
  }
  return index;
}

/**
 * Setup of one general purpose outlet (tag 1300). One notification per outlet.
 *
 * Size: 7 bytes
 */
export interface GpoSetup {
  deviceType: GpoDeviceType;
  index: number;
  /**
   * Snapshot slot: 1 + index on the first expansion board, 3 + index on the
   * second, 0 for outlets on any other device.
   */
  slot: number;
  outletEnabled: boolean;
  function: GpoFunction;
  name: GpoName;
  lightingZone: number;
  useTimers: boolean;
}

export namespace GpoSetup {
  export const SIZE = 7;
  export const SLOT_COUNT = GPO_COUNT + 1;

  /** Outlets per expansion board */
  const CONNECT_OUTLETS = 2;

  export function slotFor(deviceType: GpoDeviceType, index: number): number {
    switch (deviceType) {
      case GpoDeviceType.CONNECT_1:
        return 1 + checkSlot('GpoSetup', index, CONNECT_OUTLETS);
      case GpoDeviceType.CONNECT_2:
        return 1 + CONNECT_OUTLETS + checkSlot('GpoSetup', index, CONNECT_OUTLETS);
      default:
        return 0;
    }
  }

  export function fromBytes(data: Uint8Array): GpoSetup {
    const r = new ByteReader('GpoSetup', data, SIZE);
    const deviceType = r.enumValue('deviceType', GPO_DEVICE_TYPES, r.u8(0));
    const index = r.u8(1);
    return {
      deviceType,
      index,
      slot: slotFor(deviceType, index),
      outletEnabled: r.bool(2),
      function: r.enumValue('function', GPO_FUNCTIONS, r.u8(3)),
      name: r.enumValue('name', GPO_NAMES, r.u8(4)),
      lightingZone: r.u8(5),
      useTimers: r.bool(6),
    };
  }
}

/**
 * Setup of one relay (tag 1301).
 *
 * Size: 5 bytes
 */
export interface RelaySetup {
  index: number;
  enabled: boolean;
  name: RelayName;
  /** uint8, passed through */
  action: number;
  useTimers: boolean;
}

export namespace RelaySetup {
  export const SIZE = 5;

  export function fromBytes(data: Uint8Array): RelaySetup {
    const r = new ByteReader('RelaySetup', data, SIZE);
    return {
      index: checkSlot('RelaySetup', r.u8(0), RELAY_COUNT),
      enabled: r.bool(1),
      name: r.enumValue('name', RELAY_NAMES, r.u8(2)),
      action: r.u8(3),
      useTimers: r.bool(4),
    };
  }
}

/**
 * Setup of one valve (tag 1302).
 *
 * Size: 4 bytes
 */
export interface ValveSetup {
  index: number;
  enabled: boolean;
  name: ValveName;
  useTimers: boolean;
}

export namespace ValveSetup {
  export const SIZE = 4;

  export function fromBytes(data: Uint8Array): ValveSetup {
    const r = new ByteReader('ValveSetup', data, SIZE);
    return {
      index: checkSlot('ValveSetup', r.u8(0), VALVE_COUNT),
      enabled: r.bool(1),
      name: r.enumValue('name', VALVE_NAMES, r.u8(2)),
      useTimers: r.bool(3),
    };
  }
}
