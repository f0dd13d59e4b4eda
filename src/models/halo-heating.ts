/**
 * Notification-variant heater and solar records.
 */

import { ByteReader, enumDomain } from '../encoding/bytes';
import {
  HeaterForced,
  HeaterMode,
  HeatPumpMode,
  Mode,
  SolarMessage,
  SpeedLevel,
  TemperatureValidity,
} from './enums';

const MODES = enumDomain<Mode>(Mode);
const SPEED_LEVELS = enumDomain<SpeedLevel>(SpeedLevel);
const HEATER_MODES = enumDomain<HeaterMode>(HeaterMode);
const HEAT_PUMP_MODES = enumDomain<HeatPumpMode>(HeatPumpMode);
const HEATER_FORCED = enumDomain<HeaterForced>(HeaterForced);
const TEMPERATURE_VALIDITIES = enumDomain<TemperatureValidity>(TemperatureValidity);
const SOLAR_MESSAGES = enumDomain<SolarMessage>(SolarMessage);

/**
 * Heater capabilities (tag 1100).
 *
 * Size: 5 bytes
 */
export interface HeaterCapabilities {
  heaterEnabled: boolean;
  filterPumpThreeSpeed: boolean;
  heaterPumpThreeSpeed: boolean;
  heaterPumpInstalled: boolean;
  heaterPumpTimerBit: number;
}

export namespace HeaterCapabilities {
  export const SIZE = 5;

  export function fromBytes(data: Uint8Array): HeaterCapabilities {
    const r = new ByteReader('HeaterCapabilities', data, SIZE);
    return {
      heaterEnabled: r.bool(0),
      filterPumpThreeSpeed: r.bool(1),
      heaterPumpThreeSpeed: r.bool(2),
      heaterPumpInstalled: r.bool(3),
      heaterPumpTimerBit: r.u8(4),
    };
  }
}

/**
 * Heater pump configuration (tag 1101).
 *
 * Size: 2 bytes
 */
export interface HeaterConfig {
  heaterPumpEnabled: boolean;
  heaterMinPumpSpeed: SpeedLevel;
}

export namespace HeaterConfig {
  export const SIZE = 2;

  export function fromBytes(data: Uint8Array): HeaterConfig {
    const r = new ByteReader('HeaterConfig', data, SIZE);
    return {
      heaterPumpEnabled: r.bool(0),
      heaterMinPumpSpeed: r.enumValue('heaterMinPumpSpeed', SPEED_LEVELS, r.u8(1), {
        wire: 0xff,
        value: SpeedLevel.NOT_SET,
      }),
    };
  }
}

/**
 * Heater state (tag 1102).
 *
 * Size: 12 bytes
 */
export interface HeaterState {
  heaterStatusFlags: number;
  heaterPumpMode: Mode;
  heaterMode: HeaterMode;
  heaterSetpoint: number;
  heatPumpMode: HeatPumpMode;
  heaterForced: HeaterForced;
  heaterForcedTimeHours: number;
  heaterForcedTimeMinutes: number;
  heaterWaterTemperatureValid: TemperatureValidity;
  heaterWaterTemperature: number;
  heaterError: number;

  heaterOn: boolean;
  heaterPressure: boolean;
  heaterGasValve: boolean;
  heaterFlame: boolean;
  heaterLockout: boolean;
  generalServiceRequired: boolean;
  ignitionServiceRequired: boolean;
  coolingAvailable: boolean;
}

export namespace HeaterState {
  export const SIZE = 12;

  export const Flag = {
    HEATER_ON: 0x01,
    PRESSURE: 0x02,
    GAS_VALVE: 0x04,
    FLAME: 0x08,
    LOCKOUT: 0x10,
    GENERAL_SERVICE_REQUIRED: 0x20,
    IGNITION_SERVICE_REQUIRED: 0x40,
    COOLING_AVAILABLE: 0x80,
  } as const;

  export function fromBytes(data: Uint8Array): HeaterState {
    const r = new ByteReader('HeaterState', data, SIZE);
    const flags = r.u8(0);

    return {
      heaterStatusFlags: flags,
      heaterPumpMode: r.enumValue('heaterPumpMode', MODES, r.u8(1)),
      heaterMode: r.enumValue('heaterMode', HEATER_MODES, r.u8(2)),
      heaterSetpoint: r.u8(3),
      heatPumpMode: r.enumValue('heatPumpMode', HEAT_PUMP_MODES, r.u8(4)),
      heaterForced: r.enumValue('heaterForced', HEATER_FORCED, r.u8(5)),
      heaterForcedTimeHours: r.u8(6),
      heaterForcedTimeMinutes: r.u8(7),
      heaterWaterTemperatureValid: r.enumValue(
        'heaterWaterTemperatureValid',
        TEMPERATURE_VALIDITIES,
        r.u8(8)
      ),
      heaterWaterTemperature: r.u16(9) / 10,
      heaterError: r.u8(11),

      heaterOn: !!(flags & Flag.HEATER_ON),
      heaterPressure: !!(flags & Flag.PRESSURE),
      heaterGasValve: !!(flags & Flag.GAS_VALVE),
      heaterFlame: !!(flags & Flag.FLAME),
      heaterLockout: !!(flags & Flag.LOCKOUT),
      generalServiceRequired: !!(flags & Flag.GENERAL_SERVICE_REQUIRED),
      ignitionServiceRequired: !!(flags & Flag.IGNITION_SERVICE_REQUIRED),
      coolingAvailable: !!(flags & Flag.COOLING_AVAILABLE),
    };
  }
}

/**
 * Heater cooldown progress (tag 1104).
 *
 * Size: 8 bytes
 */
export interface HeaterCooldownState {
  heaterCooldownEventOccurred: boolean;
  heaterCooldownState: number;
  heaterCooldownTargetMode: number;
  /** Seconds */
  remainingCooldownTime: number;
  /** Seconds */
  totalHeaterCooldownTime: number;
}

export namespace HeaterCooldownState {
  export const SIZE = 8;

  export function fromBytes(data: Uint8Array): HeaterCooldownState {
    const r = new ByteReader('HeaterCooldownState', data, SIZE);
    return {
      heaterCooldownEventOccurred: r.bool(0),
      heaterCooldownState: r.u8(1),
      // byte 2 unused
      heaterCooldownTargetMode: r.u8(3),
      remainingCooldownTime: r.u16(4),
      totalHeaterCooldownTime: r.u16(6),
    };
  }
}

/**
 * Solar capabilities (tag 1200).
 *
 * Size: 1 byte
 */
export interface SolarCapabilities {
  solarEnabled: boolean;
}

export namespace SolarCapabilities {
  export const SIZE = 1;

  export function fromBytes(data: Uint8Array): SolarCapabilities {
    const r = new ByteReader('SolarCapabilities', data, SIZE);
    return { solarEnabled: r.bool(0) };
  }
}

/**
 * Solar pump configuration (tag 1201).
 *
 * Size: 10 bytes
 */
export interface SolarConfig {
  /** Minutes after midnight */
  solarPumpStartMinutes: number;
  solarPumpStopMinutes: number;
  solarEnableFlush: boolean;
  /** Minutes after midnight */
  solarFlushTimeMinutes: number;
  solarDifferential: number;
  solarEnableExclusionPeriod: boolean;
}

export namespace SolarConfig {
  export const SIZE = 10;

  export function fromBytes(data: Uint8Array): SolarConfig {
    const r = new ByteReader('SolarConfig', data, SIZE);
    return {
      solarPumpStartMinutes: r.u8(0) * 60 + r.u8(1),
      solarPumpStopMinutes: r.u8(2) * 60 + r.u8(3),
      solarEnableFlush: r.bool(4),
      solarFlushTimeMinutes: r.u8(5) * 60 + r.u8(6),
      solarDifferential: r.u16(7),
      solarEnableExclusionPeriod: r.bool(9),
    };
  }
}

/**
 * Solar state (tag 1202).
 *
 * Size: 14 bytes
 */
export interface SolarState {
  solarRoofTemperature: number;
  solarWaterTemperature: number;
  /** uint16, passed through */
  solarTemperature: number;
  solarIsSummerMode: boolean;
  solarMode: Mode;
  solarFlags: number;
  solarPumpState: boolean;
  solarFlushActive: boolean;
  solarRoofTemperatureValid: TemperatureValidity;
  solarWaterTemperatureValid: TemperatureValidity;
  /** uint16, passed through */
  solarSpecTemperature: number;
  solarMessage: SolarMessage;
}

export namespace SolarState {
  export const SIZE = 14;

  const PUMP_STATE = 0x01;
  const FLUSH_ACTIVE = 0x02;

  export function fromBytes(data: Uint8Array): SolarState {
    const r = new ByteReader('SolarState', data, SIZE);
    const flags = r.u8(8);
    return {
      solarRoofTemperature: r.u16(0) / 10,
      solarWaterTemperature: r.u16(2) / 10,
      solarTemperature: r.u16(4),
      solarIsSummerMode: r.bool(6),
      solarMode: r.enumValue('solarMode', MODES, r.u8(7)),
      solarFlags: flags,
      solarPumpState: !!(flags & PUMP_STATE),
      solarFlushActive: !!(flags & FLUSH_ACTIVE),
      solarRoofTemperatureValid: r.enumValue('solarRoofTemperatureValid', TEMPERATURE_VALIDITIES, r.u8(9)),
      solarWaterTemperatureValid: r.enumValue('solarWaterTemperatureValid', TEMPERATURE_VALIDITIES, r.u8(10)),
      solarSpecTemperature: r.u16(11),
      solarMessage: r.enumValue('solarMessage', SOLAR_MESSAGES, r.u8(13)),
    };
  }
}
