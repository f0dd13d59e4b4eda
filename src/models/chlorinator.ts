/**
 * Poll-variant chlorinator records.
 *
 * Each characteristic decrypts to a fixed, naturally aligned little-endian
 * layout. Trailing bytes beyond `SIZE` are padding and are ignored.
 */

import { ByteReader, enumDomain } from '../encoding/bytes';
import {
  AcidDosingInhibitStatus,
  ChlorinatorMode,
  ChlorineControlStatus,
  ControlType,
  InfoMessage,
  SpeedLevel,
  VolumeUnits,
} from './enums';

const SPEED_LEVELS = enumDomain<SpeedLevel>(SpeedLevel);
const CHLORINATOR_MODES = enumDomain<ChlorinatorMode>(ChlorinatorMode);
const INFO_MESSAGES = enumDomain<InfoMessage>(InfoMessage);
const CHLORINE_CONTROL_STATUSES = enumDomain<ChlorineControlStatus>(ChlorineControlStatus);
const CONTROL_TYPES = enumDomain<ControlType>(ControlType);
const ACID_DOSING_INHIBIT_STATUSES = enumDomain<AcidDosingInhibitStatus>(AcidDosingInhibitStatus);

const SPEED_NOT_SET = { wire: 0xff, value: SpeedLevel.NOT_SET };

/**
 * Chlorinator state (characteristic 0x0200).
 *
 * Size: 11 bytes
 */
export interface ChlorinatorState {
  mode: ChlorinatorMode;
  pumpSpeed: SpeedLevel;
  /** uint8 - Index of the timer currently running */
  activeTimer: number;
  infoMessage: InfoMessage;
  /** uint8 bitfield - see ChlorinatorState.Flag */
  stateFlags: number;
  /** pH, one decimal */
  phMeasurement: number;
  chlorineControlStatus: ChlorineControlStatus;
  /** Device clock */
  timeHours: number;
  timeMinutes: number;
  timeSeconds: number;

  chemistryValuesCurrent: boolean;
  chemistryValuesValid: boolean;
  spaSelection: boolean;
  pumpIsPriming: boolean;
  pumpIsOperating: boolean;
  cellIsOperating: boolean;
  userSettingsHaveChanged: boolean;
  sanitisingUntilNextTimerTomorrow: boolean;
}

export namespace ChlorinatorState {
  export const SIZE = 11;

  export const Flag = {
    CHEMISTRY_VALUES_CURRENT: 0x01,
    CHEMISTRY_VALUES_VALID: 0x02,
    SPA_SELECTION: 0x04,
    PUMP_IS_PRIMING: 0x08,
    PUMP_IS_OPERATING: 0x10,
    CELL_IS_OPERATING: 0x20,
    USER_SETTINGS_HAVE_CHANGED: 0x40,
    SANITISING_UNTIL_NEXT_TIMER_TOMORROW: 0x80,
  } as const;

  export function fromBytes(data: Uint8Array): ChlorinatorState {
    const r = new ByteReader('ChlorinatorState', data, SIZE);
    const flags = r.u8(5);

    return {
      mode: r.enumValue('mode', CHLORINATOR_MODES, r.u8(0)),
      pumpSpeed: r.enumValue('pumpSpeed', SPEED_LEVELS, r.u8(1), SPEED_NOT_SET),
      activeTimer: r.u8(2),
      infoMessage: r.enumValue('infoMessage', INFO_MESSAGES, r.u8(3)),
      // byte 4 reserved
      stateFlags: flags,
      phMeasurement: r.u8(6) / 10,
      chlorineControlStatus: r.enumValue(
        'chlorineControlStatus',
        CHLORINE_CONTROL_STATUSES,
        r.u8(7),
        { wire: 0xff, value: ChlorineControlStatus.UNKNOWN }
      ),
      timeHours: r.u8(8),
      timeMinutes: r.u8(9),
      timeSeconds: r.u8(10),

      chemistryValuesCurrent: !!(flags & Flag.CHEMISTRY_VALUES_CURRENT),
      chemistryValuesValid: !!(flags & Flag.CHEMISTRY_VALUES_VALID),
      spaSelection: !!(flags & Flag.SPA_SELECTION),
      pumpIsPriming: !!(flags & Flag.PUMP_IS_PRIMING),
      pumpIsOperating: !!(flags & Flag.PUMP_IS_OPERATING),
      cellIsOperating: !!(flags & Flag.CELL_IS_OPERATING),
      userSettingsHaveChanged: !!(flags & Flag.USER_SETTINGS_HAVE_CHANGED),
      sanitisingUntilNextTimerTomorrow: !!(flags & Flag.SANITISING_UNTIL_NEXT_TIMER_TOMORROW),
    };
  }
}

/**
 * Chlorinator setup (characteristic 0x0202).
 *
 * Size: 5 bytes
 */
export interface ChlorinatorSetup {
  defaultManualOnSpeed: SpeedLevel;
  /** pH, one decimal */
  phControlSetpoint: number;
  /** uint16 - ORP setpoint (mV) or manual chlorine level, depending on control type */
  chlorineControlSetpoint: number;
  setupFlags: number;
  isNoTimerModel: boolean;
  isTimerMasterPresentInSystem: boolean;
}

export namespace ChlorinatorSetup {
  export const SIZE = 5;

  export const Flag = {
    NO_TIMER_MODEL: 0x01,
    TIMER_MASTER_IS_PRESENT_IN_SYSTEM: 0x02,
  } as const;

  export function fromBytes(data: Uint8Array): ChlorinatorSetup {
    const r = new ByteReader('ChlorinatorSetup', data, SIZE);
    const flags = r.u8(4);

    return {
      defaultManualOnSpeed: r.enumValue('defaultManualOnSpeed', SPEED_LEVELS, r.u8(0), SPEED_NOT_SET),
      phControlSetpoint: r.u8(1) / 10,
      chlorineControlSetpoint: r.u16(2),
      setupFlags: flags,
      isNoTimerModel: !!(flags & Flag.NO_TIMER_MODEL),
      isTimerMasterPresentInSystem: !!(flags & Flag.TIMER_MASTER_IS_PRESENT_IN_SYSTEM),
    };
  }
}

/**
 * Chlorinator capabilities (characteristic 0x0201).
 *
 * Size: 20 bytes (uint16 spa volume aligned at offset 18)
 */
export interface ChlorinatorCapabilities {
  minimumManualAcidSetpoint: number;
  maximumManualAcidSetpoint: number;
  minimumManualChlorineSetpoint: number;
  maximumManualChlorineSetpoint: number;
  /** pH, one decimal */
  minimumPhSetpoint: number;
  maximumPhSetpoint: number;
  /** mV; transmitted divided by 10 */
  minimumOrpSetpoint: number;
  maximumOrpSetpoint: number;
  phControlType: ControlType;
  chlorineControlType: ControlType;
  capabilityFlags: number;
  cellSize: number;
  acidPumpSize: number;
  /** One decimal */
  filterPumpSize: number;
  reversalPeriod: number;
  /** 24-bit little-endian; units per `volumeUnits` */
  poolVolume: number;
  spaVolume: number;

  threeSpeedPumpEnabled: boolean;
  aiModeEnabled: boolean;
  volumeUnits: VolumeUnits;
  lightingEnabled: boolean;
  dosingCapableUnit: boolean;
}

export namespace ChlorinatorCapabilities {
  export const SIZE = 20;

  export const Flag = {
    THREE_SPEED_PUMP_ENABLED: 0x01,
    AI_MODE_ENABLED: 0x02,
    VOLUME_UNIT_MASK: 0x0c,
    VOLUME_UNIT_US_GALLONS: 0x04,
    VOLUME_UNIT_IMPERIAL_GALLONS: 0x08,
    LIGHTING_ENABLED: 0x10,
    DOSING_CAPABLE_UNIT: 0x20,
  } as const;

  /**
   * Decode the volume unit bits of the capability flags.
   */
  export function volumeUnitsFromFlags(flags: number): VolumeUnits {
    if (flags & Flag.VOLUME_UNIT_US_GALLONS) {
      return VolumeUnits.US_GALLONS;
    }
    if (flags & Flag.VOLUME_UNIT_IMPERIAL_GALLONS) {
      return VolumeUnits.IMPERIAL_GALLONS;
    }
    return VolumeUnits.LITRES;
  }

  export function fromBytes(data: Uint8Array): ChlorinatorCapabilities {
    const r = new ByteReader('ChlorinatorCapabilities', data, SIZE);
    const flags = r.u8(10);

    return {
      minimumManualAcidSetpoint: r.u8(0),
      maximumManualAcidSetpoint: r.u8(1),
      minimumManualChlorineSetpoint: r.u8(2),
      maximumManualChlorineSetpoint: r.u8(3),
      minimumPhSetpoint: r.u8(4) / 10,
      maximumPhSetpoint: r.u8(5) / 10,
      minimumOrpSetpoint: r.u8(6) * 10,
      maximumOrpSetpoint: r.u8(7) * 10,
      phControlType: r.enumValue('phControlType', CONTROL_TYPES, r.u8(8)),
      chlorineControlType: r.enumValue('chlorineControlType', CONTROL_TYPES, r.u8(9)),
      capabilityFlags: flags,
      cellSize: r.u8(11),
      acidPumpSize: r.u8(12),
      filterPumpSize: r.u8(13) / 10,
      reversalPeriod: r.u8(14),
      poolVolume: r.u24(15),
      spaVolume: r.u16(18),

      threeSpeedPumpEnabled: !!(flags & Flag.THREE_SPEED_PUMP_ENABLED),
      aiModeEnabled: !!(flags & Flag.AI_MODE_ENABLED),
      volumeUnits: volumeUnitsFromFlags(flags),
      lightingEnabled: !!(flags & Flag.LIGHTING_ENABLED),
      dosingCapableUnit: !!(flags & Flag.DOSING_CAPABLE_UNIT),
    };
  }
}

/**
 * Chlorinator settings (characteristic 0x0206).
 *
 * Size: 3 bytes
 */
export interface ChlorinatorSettings {
  /** uint16 - Minutes until acid dosing resumes */
  acidDosingInhibitTimeRemaining: number;
  acidDosingInhibitStatus: AcidDosingInhibitStatus;
}

export namespace ChlorinatorSettings {
  export const SIZE = 3;

  export function fromBytes(data: Uint8Array): ChlorinatorSettings {
    const r = new ByteReader('ChlorinatorSettings', data, SIZE);
    return {
      acidDosingInhibitTimeRemaining: r.u16(0),
      acidDosingInhibitStatus: r.enumValue(
        'acidDosingInhibitStatus',
        ACID_DOSING_INHIBIT_STATUSES,
        r.u8(2)
      ),
    };
  }
}

/**
 * Chlorinator statistics (characteristic 0x0205).
 *
 * Size: 17 bytes (uint32 running times aligned at offsets 8 and 12)
 */
export interface ChlorinatorStatistics {
  highestPhMeasured: number;
  lowestPhMeasured: number;
  highestOrpMeasured: number;
  lowestOrpMeasured: number;
  cellReversalCount: number;
  /** Hours */
  cellRunningTime: number;
  /** Hours */
  lowSaltCellRunningTime: number;
  /** Percent */
  previousDaysCellLoad: number;
}

export namespace ChlorinatorStatistics {
  export const SIZE = 17;

  export function fromBytes(data: Uint8Array): ChlorinatorStatistics {
    const r = new ByteReader('ChlorinatorStatistics', data, SIZE);
    return {
      highestPhMeasured: r.u8(0) / 10,
      lowestPhMeasured: r.u8(1) / 10,
      highestOrpMeasured: r.u16(2),
      lowestOrpMeasured: r.u16(4),
      cellReversalCount: r.u16(6),
      cellRunningTime: r.u32(8),
      lowSaltCellRunningTime: r.u32(12),
      previousDaysCellLoad: r.u8(16),
    };
  }
}

/**
 * A single pump timer. Times are minutes after midnight.
 */
export interface PumpTimer {
  enabled: boolean;
  startMinutes: number;
  stopMinutes: number;
  speedLevel: SpeedLevel;
}

export namespace PumpTimer {
  export const SIZE = 4;
  export const MINUTES_PER_DAY = 24 * 60;

  const START_HOUR_MASK = 0x1f;
  const ENABLED_MASK = 0x20;
  const SPEED_LEVEL_SHIFT = 6;

  /**
   * Parse one timer slot: [startHour|enabled|speed:1][startMinute:1][stopHour:1][stopMinute:1]
   */
  export function fromBytes(r: ByteReader, offset: number): PumpTimer {
    const startHourAndFlags = r.u8(offset);
    return {
      enabled: !!(startHourAndFlags & ENABLED_MASK),
      startMinutes: (startHourAndFlags & START_HOUR_MASK) * 60 + r.u8(offset + 1),
      stopMinutes: r.u8(offset + 2) * 60 + r.u8(offset + 3),
      speedLevel: r.enumValue('speedLevel', SPEED_LEVELS, startHourAndFlags >> SPEED_LEVEL_SHIFT),
    };
  }

  /**
   * Check whether a timer's parameters make no sense.
   *
   * Times past 24:00 are invalid whether or not the timer is enabled. The
   * ordering and speed checks only apply to enabled timers.
   */
  export function isInvalid(timer: PumpTimer): boolean {
    if (timer.startMinutes > MINUTES_PER_DAY || timer.stopMinutes > MINUTES_PER_DAY) {
      return true;
    }
    if (!timer.enabled) {
      return false;
    }
    return timer.startMinutes >= timer.stopMinutes || timer.speedLevel === SpeedLevel.NOT_SET;
  }

  /**
   * Format minutes after midnight as HH:MM.
   */
  export function formatTime(minutes: number): string {
    const hours = Math.floor(minutes / 60);
    return `${String(hours).padStart(2, '0')}:${String(minutes % 60).padStart(2, '0')}`;
  }
}

/**
 * Chlorinator pump timers (characteristic 0x0204).
 *
 * Size: 16 bytes (4 timers x 4 bytes)
 */
export interface ChlorinatorTimers {
  pumpTimers: PumpTimer[];
}

export namespace ChlorinatorTimers {
  export const TIMER_COUNT = 4;
  export const SIZE = TIMER_COUNT * PumpTimer.SIZE;

  export function fromBytes(data: Uint8Array): ChlorinatorTimers {
    const r = new ByteReader('ChlorinatorTimers', data, SIZE);
    const pumpTimers: PumpTimer[] = [];
    for (let i = 0; i < TIMER_COUNT; i++) {
      pumpTimers.push(PumpTimer.fromBytes(r, i * PumpTimer.SIZE));
    }
    return { pumpTimers };
  }
}
