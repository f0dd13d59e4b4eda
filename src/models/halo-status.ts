/**
 * Notification-variant chlorinator records: device profile, water chemistry,
 * maintenance and statistics.
 *
 * Layouts are packed little-endian and start at the data offset of a
 * notification packet (after the type byte and 2-byte command tag).
 */

import { ByteReader, enumDomain } from '../encoding/bytes';
import {
  CalibrateState,
  CellModel,
  ChlorineSubText,
  ControlType,
  DeviceProtocol,
  DeviceType,
  ErrorSubText,
  MainText,
  MaintenanceTaskReturnCode,
  MaintenanceTaskState,
  Mode,
  PhSubText,
  TemperatureValidity,
  TimerSubText,
  VolumeUnits,
} from './enums';

export const DEVICE_TYPES = enumDomain<DeviceType>(DeviceType);
export const DEVICE_PROTOCOLS = enumDomain<DeviceProtocol>(DeviceProtocol);
export const DEVICE_TYPE_UNKNOWN = { wire: 0xff, value: DeviceType.UNKNOWN };
export const DEVICE_PROTOCOL_UNKNOWN = { wire: 0xff, value: DeviceProtocol.UNKNOWN };

const MODES = enumDomain<Mode>(Mode);
const TEMPERATURE_VALIDITIES = enumDomain<TemperatureValidity>(TemperatureValidity);
const CELL_MODELS = enumDomain<CellModel>(CellModel);
const VOLUME_UNITS = enumDomain<VolumeUnits>(VolumeUnits);
const CONTROL_TYPES = enumDomain<ControlType>(ControlType);
const MAIN_TEXTS = enumDomain<MainText>(MainText);
const CHLORINE_SUB_TEXTS = enumDomain<ChlorineSubText>(ChlorineSubText);
const PH_SUB_TEXTS = enumDomain<PhSubText>(PhSubText);
const TIMER_SUB_TEXTS = enumDomain<TimerSubText>(TimerSubText);
const ERROR_SUB_TEXTS = enumDomain<ErrorSubText>(ErrorSubText);
const TASK_STATES = enumDomain<MaintenanceTaskState>(MaintenanceTaskState);
const TASK_RETURN_CODES = enumDomain<MaintenanceTaskReturnCode>(MaintenanceTaskReturnCode);
const CALIBRATE_STATES = enumDomain<CalibrateState>(CalibrateState);

/**
 * Device profile (tag 1).
 *
 * Size: 13 bytes
 */
export interface DeviceProfile {
  deviceType: DeviceType;
  deviceVersion: number;
  deviceProtocol: DeviceProtocol;
  deviceProtocolRevision: number;
  firmwareVersionMajor: number;
  firmwareVersionMinor: number;
  bootloaderVersionMajor: number;
  bootloaderVersionMinor: number;
  hardwareVersion: number;
  serialNumber: number;
}

export namespace DeviceProfile {
  export const SIZE = 13;

  export function fromBytes(data: Uint8Array): DeviceProfile {
    const r = new ByteReader('DeviceProfile', data, SIZE);
    return {
      deviceType: r.enumValue('deviceType', DEVICE_TYPES, r.u8(0), DEVICE_TYPE_UNKNOWN),
      deviceVersion: r.u8(1),
      deviceProtocol: r.enumValue('deviceProtocol', DEVICE_PROTOCOLS, r.u8(2), DEVICE_PROTOCOL_UNKNOWN),
      deviceProtocolRevision: r.u8(3),
      firmwareVersionMajor: r.u8(4),
      firmwareVersionMinor: r.u8(5),
      bootloaderVersionMajor: r.u8(6),
      bootloaderVersionMinor: r.u8(7),
      hardwareVersion: r.u8(8),
      serialNumber: r.u32(9),
    };
  }
}

/**
 * Temperature sensor bitmask shared by the "supports" and "displayed" fields.
 */
export const TemperatureSensor = {
  BOARD: 0x01,
  WATER: 0x02,
  CHLORINATOR_WATER: 0x04,
  SOLAR_WATER: 0x08,
  SOLAR_ROOF: 0x10,
  HEATER: 0x20,
} as const;

/**
 * Temperatures (tag 9).
 *
 * Size: 16 bytes
 *
 * Only the water temperature's /10 scaling is confirmed. The other
 * temperatures are assumed to use the same scaling; treat them as provisional.
 */
export interface Temperature {
  isFahrenheit: boolean;
  /** uint8 bitfield of TemperatureSensor */
  temperatureSupports: number;
  /** Provisional scaling */
  boardTemperature: number;
  waterTemperature: number;
  /** Provisional scaling */
  chlorinatorWaterTemperature: number;
  /** Provisional scaling */
  solarWaterTemperature: number;
  waterTemperatureValid: TemperatureValidity;
  /** Provisional scaling */
  solarRoofTemperature: number;
  /** Provisional scaling */
  heaterTemperature: number;
  /** uint8 bitfield of TemperatureSensor */
  temperatureDisplayed: number;
}

export namespace Temperature {
  export const SIZE = 16;

  export function supports(record: Temperature, sensor: number): boolean {
    return !!(record.temperatureSupports & sensor);
  }

  export function fromBytes(data: Uint8Array): Temperature {
    const r = new ByteReader('Temperature', data, SIZE);
    return {
      isFahrenheit: r.bool(0),
      temperatureSupports: r.u8(1),
      boardTemperature: r.u16(2) / 10,
      waterTemperature: r.u16(4) / 10,
      chlorinatorWaterTemperature: r.u16(6) / 10,
      solarWaterTemperature: r.u16(8) / 10,
      waterTemperatureValid: r.enumValue('waterTemperatureValid', TEMPERATURE_VALIDITIES, r.u8(10)),
      solarRoofTemperature: r.u16(11) / 10,
      heaterTemperature: r.u16(13) / 10,
      temperatureDisplayed: r.u8(15),
    };
  }
}

/**
 * General settings (tag 100).
 *
 * Size: 8 bytes
 */
export interface HaloSettings {
  /** uint16 bitfield - see HaloSettings.General */
  generalFlags: number;
  cellModel: CellModel;
  reversalPeriod: number;
  aiWaterTurns: number;
  acidPumpSize: number;
  filterPumpSize: number;
  /** uint8, passed through */
  defaultManualOnSpeed: number;

  prePurgeEnabled: boolean;
  postPurgeEnabled: boolean;
  acidFlushEnabled: boolean;
  aiEnabledReadOnly: boolean;
  /** Set when AI mode is enabled, including the read-only case */
  aiModeEnabled: boolean;
  displayOrp: boolean;
  isDosingCapable: boolean;
  threeSpeedPumpEnabled: boolean;
  threeSpeedPumpEnabledReadOnly: boolean;
  pumpProtectEnabled: boolean;
  useTemperatureSensor: boolean;
  enableCleaningInterlock: boolean;
  displayPh: boolean;
}

export namespace HaloSettings {
  export const SIZE = 8;

  export const General = {
    PRE_PURGE_ENABLED: 0x0001,
    POST_PURGE_ENABLED: 0x0002,
    ACID_FLUSH_ENABLED: 0x0004,
    AI_ENABLED: 0x0008,
    AI_ENABLED_READ_ONLY: 0x0010,
    DISPLAY_ORP: 0x0020,
    DOSING_ENABLED: 0x0040,
    THREE_SPEED_PUMP_ENABLED: 0x0080,
    THREE_SPEED_PUMP_ENABLED_READ_ONLY: 0x0100,
    PUMP_PROTECT_ENABLE: 0x0200,
    USE_TEMPERATURE_SENSOR: 0x0400,
    ENABLE_CLEANING_INTERLOCK: 0x0800,
    DISPLAY_PH: 0x1000,
  } as const;

  export function fromBytes(data: Uint8Array): HaloSettings {
    const r = new ByteReader('HaloSettings', data, SIZE);
    const general = r.u16(0);
    const aiReadOnly = !!(general & General.AI_ENABLED_READ_ONLY);

    return {
      generalFlags: general,
      cellModel: r.enumValue('cellModel', CELL_MODELS, r.u8(2)),
      reversalPeriod: r.u8(3),
      aiWaterTurns: r.u8(4),
      acidPumpSize: r.u8(5),
      filterPumpSize: r.u8(6),
      defaultManualOnSpeed: r.u8(7),

      prePurgeEnabled: !!(general & General.PRE_PURGE_ENABLED),
      postPurgeEnabled: !!(general & General.POST_PURGE_ENABLED),
      acidFlushEnabled: !!(general & General.ACID_FLUSH_ENABLED),
      aiEnabledReadOnly: aiReadOnly,
      aiModeEnabled: !!(general & General.AI_ENABLED) || aiReadOnly,
      displayOrp: !!(general & General.DISPLAY_ORP),
      isDosingCapable: !!(general & General.DOSING_ENABLED),
      threeSpeedPumpEnabled: !!(general & General.THREE_SPEED_PUMP_ENABLED),
      threeSpeedPumpEnabledReadOnly: !!(general & General.THREE_SPEED_PUMP_ENABLED_READ_ONLY),
      pumpProtectEnabled: !!(general & General.PUMP_PROTECT_ENABLE),
      useTemperatureSensor: !!(general & General.USE_TEMPERATURE_SENSOR),
      enableCleaningInterlock: !!(general & General.ENABLE_CLEANING_INTERLOCK),
      displayPh: !!(general & General.DISPLAY_PH),
    };
  }
}

/**
 * Pool and spa water volumes (tag 101).
 *
 * Size: 14 bytes
 */
export interface WaterVolume {
  volumeUnits: VolumeUnits;
  poolVolume: number;
  spaVolume: number;
  poolLeftFilter: number;
  spaLeftFilter: number;
  waterVolumeFlags: number;
  poolEnabled: boolean;
  spaEnabled: boolean;
  poolSpaEnabled: boolean;
}

export namespace WaterVolume {
  export const SIZE = 14;

  const POOL_ENABLED = 0x01;
  const SPA_ENABLED = 0x02;

  export function fromBytes(data: Uint8Array): WaterVolume {
    const r = new ByteReader('WaterVolume', data, SIZE);
    const flags = r.u8(13);
    const poolEnabled = !!(flags & POOL_ENABLED);
    const spaEnabled = !!(flags & SPA_ENABLED);

    return {
      volumeUnits: r.enumValue('volumeUnits', VOLUME_UNITS, r.u8(0)),
      poolVolume: r.u32(1),
      spaVolume: r.u16(5),
      poolLeftFilter: r.u32(7),
      spaLeftFilter: r.u16(11),
      waterVolumeFlags: flags,
      poolEnabled,
      spaEnabled,
      poolSpaEnabled: poolEnabled && spaEnabled,
    };
  }
}

/**
 * Chemistry setpoints (tag 102).
 *
 * Size: 6 bytes
 */
export interface SetPoint {
  /** pH, one decimal */
  phControlSetpoint: number;
  /** uint16 - ORP setpoint in mV; also reported as the chlorine control setpoint */
  orpControlSetpoint: number;
  chlorineControlSetpoint: number;
  poolChlorineControlSetpoint: number;
  acidControlSetpoint: number;
  spaChlorineControlSetpoint: number;
}

export namespace SetPoint {
  export const SIZE = 6;

  export function fromBytes(data: Uint8Array): SetPoint {
    const r = new ByteReader('SetPoint', data, SIZE);
    const orp = r.u16(1);
    return {
      phControlSetpoint: r.u8(0) / 10,
      orpControlSetpoint: orp,
      chlorineControlSetpoint: orp,
      poolChlorineControlSetpoint: r.u8(3),
      acidControlSetpoint: r.u8(4),
      spaChlorineControlSetpoint: r.u8(5),
    };
  }
}

/**
 * Live chlorinator state (tag 104).
 *
 * Size: 16 bytes
 */
export interface HaloState {
  /** uint8 bitfield - see HaloState.Flag */
  stateFlags: number;
  realCellLevel: number;
  cellCurrentMilliamps: number;
  mainText: MainText;
  chlorineSubText: ChlorineSubText;
  orpMeasurement: number;
  phSubText: PhSubText;
  /** pH, one decimal */
  phMeasurement: number;
  timerSubText: TimerSubText;
  /** Arguments for the timer status line, passed through */
  timerSubTextData: Uint8Array;
  errorSubText: ErrorSubText;
  /** uint8 - trailing flag byte, meaning unknown */
  trailingFlag: number;

  isInPoolSelection: boolean;
  cellIsOperating: boolean;
  isCellReversed: boolean;
  isCoolingFanOn: boolean;
  isLightOutputOn: boolean;
  dosingPumpOn: boolean;
  cellIsReversing: boolean;
  aiModeActive: boolean;

  /** Same value as mainText, under the key the poll variant uses */
  infoMessage: MainText;
  /** Same value as chlorineSubText, under the key the poll variant uses */
  chlorineControlStatus: ChlorineSubText;
}

export namespace HaloState {
  export const SIZE = 16;

  export const Flag = {
    SPA_MODE: 0x01,
    CELL_ON: 0x02,
    CELL_REVERSED: 0x04,
    COOLING_FAN_ON: 0x08,
    LIGHT_OUTPUT_ON: 0x10,
    DOSING_PUMP_ON: 0x20,
    CELL_IS_REVERSING: 0x40,
    AI_MODE_ACTIVE: 0x80,
  } as const;

  export function fromBytes(data: Uint8Array): HaloState {
    const r = new ByteReader('HaloState', data, SIZE);
    const flags = r.u8(0);
    const mainText = r.enumValue('mainText', MAIN_TEXTS, r.u8(4), { wire: 0xff, value: MainText.NONE });
    const chlorineSubText = r.enumValue('chlorineSubText', CHLORINE_SUB_TEXTS, r.u8(5));

    return {
      stateFlags: flags,
      realCellLevel: r.u8(1),
      cellCurrentMilliamps: r.u16(2),
      mainText,
      chlorineSubText,
      orpMeasurement: r.u16(6),
      phSubText: r.enumValue('phSubText', PH_SUB_TEXTS, r.u8(8)),
      phMeasurement: r.u8(9) / 10,
      timerSubText: r.enumValue('timerSubText', TIMER_SUB_TEXTS, r.u8(10)),
      timerSubTextData: r.bytes(11, 2),
      errorSubText: r.enumValue('errorSubText', ERROR_SUB_TEXTS, r.u16(13)),
      trailingFlag: r.u8(15),

      isInPoolSelection: !(flags & Flag.SPA_MODE),
      cellIsOperating: !!(flags & Flag.CELL_ON),
      isCellReversed: !!(flags & Flag.CELL_REVERSED),
      isCoolingFanOn: !!(flags & Flag.COOLING_FAN_ON),
      isLightOutputOn: !!(flags & Flag.LIGHT_OUTPUT_ON),
      dosingPumpOn: !!(flags & Flag.DOSING_PUMP_ON),
      cellIsReversing: !!(flags & Flag.CELL_IS_REVERSING),
      aiModeActive: !!(flags & Flag.AI_MODE_ACTIVE),

      infoMessage: mainText,
      chlorineControlStatus: chlorineSubText,
    };
  }
}

/**
 * Control capabilities (tag 105).
 *
 * Size: 2 bytes. The setpoint limits are not transmitted by this device
 * family; they are fixed.
 */
export interface HaloCapabilities {
  phControlType: ControlType;
  chlorineControlType: ControlType;
  minimumManualAcidSetpoint: number;
  maximumManualAcidSetpoint: number;
  minimumManualChlorineSetpoint: number;
  maximumManualChlorineSetpoint: number;
  minimumOrpSetpoint: number;
  maximumOrpSetpoint: number;
  minimumPhSetpoint: number;
  maximumPhSetpoint: number;
}

export namespace HaloCapabilities {
  export const SIZE = 2;

  export function fromBytes(data: Uint8Array): HaloCapabilities {
    const r = new ByteReader('HaloCapabilities', data, SIZE);
    return {
      phControlType: r.enumValue('phControlType', CONTROL_TYPES, r.u8(0)),
      chlorineControlType: r.enumValue('chlorineControlType', CONTROL_TYPES, r.u8(1)),
      minimumManualAcidSetpoint: 0,
      maximumManualAcidSetpoint: 10,
      minimumManualChlorineSetpoint: 0,
      maximumManualChlorineSetpoint: 8,
      minimumOrpSetpoint: 100,
      maximumOrpSetpoint: 800,
      minimumPhSetpoint: 3.0,
      maximumPhSetpoint: 10.0,
    };
  }
}

/**
 * Maintenance task state (tag 106).
 *
 * Size: 13 bytes
 */
export interface MaintenanceState {
  maintenanceFlags: number;
  acidDosingDisabled: boolean;
  dayRolledOver: boolean;
  doseDisableTimeMinutes: number;
  maintenanceTaskState: MaintenanceTaskState;
  maintenanceTaskReturnCode: MaintenanceTaskReturnCode;
  taskTimeRemaining: number;
  valueToDisplay: number;
  calibrateState: CalibrateState;
  modeAfterComplete: Mode;
}

export namespace MaintenanceState {
  export const SIZE = 13;

  const ACID_DOSING_DISABLED = 0x01;
  const DAY_ROLLED_OVER = 0x02;

  export function fromBytes(data: Uint8Array): MaintenanceState {
    const r = new ByteReader('MaintenanceState', data, SIZE);
    const flags = r.u8(0);

    return {
      maintenanceFlags: flags,
      acidDosingDisabled: !!(flags & ACID_DOSING_DISABLED),
      dayRolledOver: !!(flags & DAY_ROLLED_OVER),
      doseDisableTimeMinutes: r.u16(1),
      maintenanceTaskState: r.enumValue('maintenanceTaskState', TASK_STATES, r.u8(3), {
        wire: 0xff,
        value: MaintenanceTaskState.NO_STATE,
      }),
      maintenanceTaskReturnCode: r.enumValue('maintenanceTaskReturnCode', TASK_RETURN_CODES, r.u8(4)),
      taskTimeRemaining: r.u32(5),
      valueToDisplay: r.u16(9),
      calibrateState: r.enumValue('calibrateState', CALIBRATE_STATES, r.u8(11)),
      modeAfterComplete: r.enumValue('modeAfterComplete', MODES, r.u8(12)),
    };
  }
}

/**
 * Probe statistics (tag 600).
 *
 * Size: 6 bytes
 */
export interface ProbeStatistics {
  highestPhMeasured: number;
  lowestPhMeasured: number;
  highestOrpMeasured: number;
  lowestOrpMeasured: number;
}

export namespace ProbeStatistics {
  export const SIZE = 6;

  export function fromBytes(data: Uint8Array): ProbeStatistics {
    const r = new ByteReader('ProbeStatistics', data, SIZE);
    return {
      highestPhMeasured: r.u8(0) / 10,
      lowestPhMeasured: r.u8(1) / 10,
      highestOrpMeasured: r.u16(2),
      lowestOrpMeasured: r.u16(4),
    };
  }
}

/**
 * Cell statistics (tag 601).
 *
 * Size: 15 bytes
 */
export interface CellStatistics {
  cellReversalCount: number;
  /** Hours */
  cellRunningTime: number;
  /** Hours */
  lowSaltCellRunningTime: number;
  /** Percent, yesterday */
  previousDaysCellLoad: number;
  /** Today */
  dosingPumpSeconds: number;
  /** Today */
  filterPumpMinutes: number;
}

export namespace CellStatistics {
  export const SIZE = 15;

  export function fromBytes(data: Uint8Array): CellStatistics {
    const r = new ByteReader('CellStatistics', data, SIZE);
    return {
      cellReversalCount: r.u16(0),
      cellRunningTime: r.u32(2),
      lowSaltCellRunningTime: r.u32(6),
      previousDaysCellLoad: r.u8(10),
      dosingPumpSeconds: r.u16(11),
      filterPumpMinutes: r.u16(13),
    };
  }
}

/**
 * Power board statistics (tag 602).
 *
 * Size: 4 bytes
 */
export interface PowerBoardStatistics {
  /** Hours */
  powerBoardRuntime: number;
}

export namespace PowerBoardStatistics {
  export const SIZE = 4;

  export function fromBytes(data: Uint8Array): PowerBoardStatistics {
    const r = new ByteReader('PowerBoardStatistics', data, SIZE);
    return { powerBoardRuntime: r.u32(0) };
  }
}
