/**
 * Enums for chlorinator records and actions.
 *
 * Members whose value is -1 are "no value" sentinels. They never appear on the
 * wire as -1; decoders map the field's all-ones value (0xFF for a byte) onto them.
 */

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

/**
 * Pump speed levels.
 */
export enum SpeedLevel {
  NOT_SET = -1,
  LOW = 0,
  MEDIUM = 1,
  HIGH = 2,
  AI = 3,
}

/**
 * Equipment operating mode (notification variant).
 */
export enum Mode {
  OFF = 0,
  AUTO = 1,
  ON = 2,
}

export enum GpoMode {
  OFF = 0,
  AUTO = 1,
  ON = 2,
  NOT_ENABLED = 255,
}

export enum TemperatureValidity {
  INVALID = 0,
  IS_VALID = 1,
  WAS_VALID = 2,
}

export enum VolumeUnits {
  LITRES = 0,
  US_GALLONS = 1,
  IMPERIAL_GALLONS = 2,
}

export enum ControlType {
  NONE = 0,
  MANUAL = 1,
  AUTOMATIC = 2,
}

// ---------------------------------------------------------------------------
// Poll variant
// ---------------------------------------------------------------------------

/**
 * Chlorinator operating mode (poll variant).
 */
export enum ChlorinatorMode {
  OFF = 0,
  MANUAL_ON = 1,
  AUTO = 2,
}

export enum InfoMessage {
  NO_MESSAGE = 0,
  PH_PROBE_NO_COMMS = 1,
  PH_PROBE_OTHER_ERROR = 2,
  PH_PROBE_CLEAN_CALIBRATE = 3,
  ORP_PROBE_NO_COMMS = 4,
  ORP_PROBE_OTHER_ERROR = 5,
  ORP_PROBE_CLEAN_CALIBRATE = 6,
  G4_COMMS_FAILURE = 7,
  NO_WATER_FLOW = 8,
  RTCC_FAULT = 128,
  ORP_PROBE_FITTED_PH_PROBE_MISSING = 129,
  AI_PUMP_SPEED = 130,
  LOW_SALT = 131,
  UNSPECIFIED = 132,
}

/** Info messages at or above this value are warnings. */
export const INFO_MESSAGE_WARNING_LEVEL = 128;

export enum ChlorineControlStatus {
  UNKNOWN = -1,
  INVALID_NO_MEASUREMENT = 0,
  VERY_VERY_LOW = 1,
  VERY_LOW = 2,
  LOW = 3,
  OK = 4,
  HIGH = 5,
  VERY_HIGH = 6,
  VERY_VERY_HIGH = 7,
}

export enum AcidDosingInhibitStatus {
  NOT_INHIBITED = 0,
  INHIBITED_INDEFINITELY = 1,
  INHIBITED_FOR_A_PERIOD = 2,
}

// ---------------------------------------------------------------------------
// Notification variant
// ---------------------------------------------------------------------------

export enum DeviceType {
  UNKNOWN = -1,
  PUMP = 0,
  CHLORINATOR = 1,
  DOSER = 2,
  LIGHT = 3,
  PROBE = 4,
  CHLORINATOR_EMULATOR = 129,
}

export enum DeviceProtocol {
  UNKNOWN = -1,
  PROTOCOL_0 = 0,
  FIRMWARE_57 = 1,
  NEXT_GEN = 2,
}

export enum CellModel {
  MODEL_18 = 0,
  MODEL_25 = 1,
  MODEL_35 = 2,
  MODEL_45 = 3,
}

/**
 * Main status line shown by the controller.
 */
export enum MainText {
  NONE = -1,
  OFF = 0,
  SANITISING = 1,
  AI_MODE_SANITISING = 2,
  AI_MODE_SAMPLING = 3,
  SAMPLING = 4,
  STANDBY = 5,
  PRE_PURGE = 6,
  POST_PURGE = 7,
  SANITISING_UNTIL_FIRST_TIMER = 8,
  FILTERING = 9,
  FILTERING_AND_CLEANING = 10,
  CALIBRATING_SENSOR = 11,
  BACKWASHING = 12,
  PRIMING_ACID_PUMP = 13,
  MANUAL_ACID_DOSE = 14,
  LOW_SPEED_NO_CHLORINATING = 15,
  SANITISING_FOR_PERIOD = 16,
  SANITISING_AND_CLEANING_FOR_PERIOD = 17,
  LOW_TEMPERATURE_REDUCED_OUTPUT = 18,
  HEATER_COOLDOWN_IN_PROGRESS = 19,
}

/** Chlorine / ORP status line */
export enum ChlorineSubText {
  NONE = 0,
  ORP_IS_YELLOW = 1,
  ORP_WAS_YELLOW = 2,
  ORP_IS_GREEN = 3,
  ORP_WAS_GREEN = 4,
  ORP_IS_RED = 5,
  ORP_WAS_RED = 6,
  CHLORINE_IS_LOW = 7,
  CHLORINE_WAS_LOW = 8,
  CHLORINE_IS_OK = 9,
  CHLORINE_WAS_OK = 10,
  CHLORINE_IS_HIGH = 11,
  CHLORINE_WAS_HIGH = 12,
}

/** pH status line */
export enum PhSubText {
  NONE = 0,
  PH_IS_YELLOW = 1,
  PH_WAS_YELLOW = 2,
  PH_IS_GREEN = 3,
  PH_WAS_GREEN = 4,
  PH_IS_RED = 5,
  PH_WAS_RED = 6,
  PH_IS_LOW = 7,
  PH_WAS_LOW = 8,
  PH_IS_OK = 9,
  PH_WAS_OK = 10,
  PH_IS_HIGH = 11,
  PH_WAS_HIGH = 12,
}

/** Timer status line */
export enum TimerSubText {
  NONE = 0,
  SANITISING_POOL_OFF = 1,
  SANITISING_POOL_UNTIL = 2,
  SANITISING_SPA_OFF = 3,
  SANITISING_SPA_UNTIL = 4,
  SANITISING_OFF = 5,
  SANITISING_UNTIL = 6,
  PRIMING_FOR = 7,
  HEATER_COOLDOWN_TIME_REMAINING = 8,
}

/** Error status line */
export enum ErrorSubText {
  NONE = 0,
  IO_EXPANDER = 1,
  EEPROM = 2,
  RTC = 3,
  NO_COM_POWER_TO_USER = 4,
  NO_COM_USER_TO_POWER = 5,
  BACKWASHING = 6,
  SENSOR_CALIBRATION = 7,
  ACCESSORY_PAIRING = 8,
  CHLOR_OVERHEAT = 9,
  TEMP_SHORT_CIRCUIT = 10,
  TEMP_OPEN_CIRCUIT = 11,
  FACTORY_RESET = 12,
  UPDATE_SUCCESS = 50,
  UPDATE_FAILED = 51,
  UPDATE_AVAILABLE = 52,
  LOST_COM = 100,
  LOW_VOLTAGE = 101,
  PUMP_HIGH_TEMP = 102,
  OVER_CURRENT = 103,
  BLOCKED_INLET = 104,
  PUMP_GENERAL_FAULT = 150,
  PUMP_LIMIT_FAULT = 151,
  PUMP_VOLT_FAULT = 152,
  PUMP_COMM_FAULT = 153,
  PUMP_TEMP_FAULT = 154,
  PUMP_SOFT_FAULT = 155,
  PUMP_FAILED_START = 156,
  PUMP_COMM_ERROR = 157,
  PUMP_BLOCKED = 158,
  PH_COM_LOST = 200,
  ORP_COM_LOST = 201,
  PH_HIGH = 202,
  ORP_HIGH = 203,
  PH_LOW = 204,
  ORP_LOW = 205,
  PH_AC_ERROR = 206,
  ORP_AC_ERROR = 207,
  NO_COM_HEATER = 300,
  LOW_WATER_TEMP = 301,
  HIGH_WATER_TEMP = 302,
  MECH_OVERHEAT = 303,
  THERMISTOR_SHORT_CIRCUIT = 304,
  FLAME_ROLL_OUT = 305,
  FLUE_OVERHEAT = 306,
  CONDENSATE_OVERFLOW = 307,
  HX_THERMISTOR_OPEN_CIRCUIT = 308,
  HX_THERMISTOR_SHORT_CIRCUIT = 309,
  WATER_SENSOR_SHORTED = 310,
  WATER_SENSOR_OPEN = 311,
  HEATER_HIGH_TEMP = 312,
  LOW_REFRIGERANT_PRESSURE = 313,
  HIGH_REFRIGERANT_PRESSURE = 314,
  SHORTED_COIL_SENSOR = 315,
  OPEN_COIL_SENSOR = 316,
  INTERLOCK = 317,
  HIGH_LIMIT = 318,
  AIR_SENSOR_SHORTED = 319,
  GPO1_COM_LOST = 400,
  GPO2_COM_LOST = 401,
  LIGHT1_LOST_COM = 500,
  LIGHT2_LOST_COM = 501,
  SOLAR_ROOF_SENSOR_SHORTED = 600,
  SOLAR_ROOF_SENSOR_DISCONNECTED = 601,
  SOLAR_WATER_SENSOR_SHORTED = 602,
  SOLAR_WATER_SENSOR_DISCONNECTED = 603,
  NO_FLOW = 700,
  HIGH_SALT = 701,
  LOW_SALT = 702,
  WATER_TOO_COLD = 703,
  DOWN_RATE_2 = 705,
  DOWN_RATE_1 = 706,
  SAMPLING_ONLY = 707,
  DOSING_DISABLED = 708,
  DAILY_ACID_DOSE_LIMIT = 709,
  CELL_DISABLED = 710,
  PH_BATTERY_LOW = 900,
  ORP_BATTERY_LOW = 901,
  PH_REQUIRED = 902,
  CONNECTION_ERROR = 1400,
  UNKNOWN = 65535,
}

export enum MaintenanceTaskState {
  NO_STATE = -1,
  NO_TASK = 0,
  SANITISE_UNTIL_TIMER = 1,
  FILTER_FOR_PERIOD = 2,
  FILTER_AND_CLEAN_FOR_PERIOD = 3,
  BACKWASH = 4,
  CALIBRATE_PH = 5,
  CALIBRATE_ORP = 6,
  PRIME_ACID = 7,
  DOSE_ACID = 8,
  SANITISE_FOR_PERIOD = 9,
  SANITISE_AND_CLEAN_FOR_PERIOD = 10,
}

export enum MaintenanceTaskReturnCode {
  OK = 0,
  FAILED_SET_START_CONDITIONS = 1,
  TASK_OVERRIDDEN_BY_USER = 2,
  FAILED_SET_SYSTEM_MODE = 3,
  TASK_ABORTED_BY_USER = 4,
  TASK_COMPLETE = 5,
}

export enum CalibrateState {
  IDLE = 0,
  PROBE_CAL_STARTING = 1,
  CONNECT_TO_PROBE = 2,
  CONNECTION_FAILED = 3,
  READ_CAL_VALUE = 4,
  READ_CAL_VALUE_FAILED = 5,
  RUNNING_PUMP = 6,
  TAKING_MEASUREMENT = 7,
  MEASUREMENT_FAILED = 8,
  WAIT_NEW_CAL_VALUE = 9,
  TIMEOUT_WAITING_CALIBRATION = 10,
  WRITING_CALIBRATION_VALUE = 11,
  CALIBRATION_FAILED_TO_WRITE = 12,
  CALIBRATION_SUCCESSFUL = 13,
  CAL_ABORT = 14,
}

export enum LightZoneName {
  POOL = 0,
  SPA = 1,
  POOL_AND_SPA = 2,
  WATERFALL_1 = 3,
  WATERFALL_2 = 4,
  WATERFALL_3 = 5,
  GARDEN = 6,
  OTHER = 7,
}

export enum HeaterMode {
  OFF = 0,
  ON = 1,
}

export enum HeatPumpMode {
  COOLING = 0,
  HEATING = 1,
  AUTO = 2,
}

export enum HeaterForced {
  NOT_FORCED = 0,
  FORCED_ON = 1,
  FORCED_OFF = 2,
}

export enum SolarMessage {
  DISPLAY_NOTHING = 0,
  STANDBY = 1,
  SOLAR_HEATING_ACTIVE = 2,
  SOLAR_FLUSH_ACTIVE = 3,
  SOLAR_EXCLUSION_PERIOD_ACTIVE = 4,
  SOLAR_SYSTEM_FLUSHED = 5,
  PUMP_WILL_RUN_FOR = 6,
}

export enum GpoDeviceType {
  FILTER_PUMP = 0,
  PH_PROBE = 1,
  ORP_PROBE = 2,
  HEATER = 3,
  LIGHT_1 = 4,
  LIGHT_2 = 5,
  LIGHT_FAB = 6,
  CONNECT_1 = 7,
  CONNECT_2 = 8,
}

export enum GpoFunction {
  EQUIPMENT = 0,
  LIGHTING = 1,
  SOLAR = 2,
  HEATING = 3,
}

export enum GpoName {
  NO_NAME = 0,
  OTHER = 1,
  CLEANING_PUMP = 2,
  HEATER_PUMP = 3,
  BOOSTER_PUMP = 4,
  WATERFALL_PUMP = 5,
  FOUNTAIN_PUMP = 6,
  BLOWER = 7,
  JETS = 8,
}

export enum RelayName {
  RELAY_1 = 0,
  RELAY_2 = 1,
}

export enum ValveName {
  NONE = 0,
  OTHER = 1,
  POOL = 2,
  SPA = 3,
  WATER_FEATURE = 4,
  WATERFALL = 5,
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

/**
 * Actions accepted by the poll-variant chlorinator.
 *
 * `periodMinutes` is only meaningful for DISABLE_ACID_DOSING_FOR_PERIOD.
 */
export enum PollAction {
  NO_ACTION = 0,
  OFF = 1,
  AUTO = 2,
  MANUAL = 3,
  LOW = 4,
  MEDIUM = 5,
  HIGH = 6,
  POOL = 7,
  SPA = 8,
  DISMISS_INFO_MESSAGE = 9,
  DISABLE_ACID_DOSING_INDEFINITELY = 10,
  DISABLE_ACID_DOSING_FOR_PERIOD = 11,
  RESET_STATISTICS = 12,
  TRIGGER_CELL_REVERSAL = 13,
}

/**
 * Chlorinator actions accepted by the notification-variant device.
 *
 * The parameter (minutes) is read for DISABLE_ACID_DOSING_FOR_PERIOD and the
 * *_FOR_PERIOD actions; every other action ignores it.
 */
export enum HaloAction {
  NO_ACTION = 0,
  OFF = 1,
  AUTO = 2,
  ON = 3,
  LOW = 4,
  MEDIUM = 5,
  HIGH = 6,
  POOL = 7,
  SPA = 8,
  DISMISS_INFO_MESSAGE = 9,
  DISABLE_ACID_DOSING_INDEFINITELY = 10,
  DISABLE_ACID_DOSING_FOR_PERIOD = 11,
  RESET_STATISTICS = 12,
  TRIGGER_CELL_REVERSAL = 13,
  ALL_OFF = 14,
  ALL_AUTO = 15,
  BACKWASH = 16,
  PRIME_ACID = 17,
  MANUAL_DOSE = 18,
  PROBE_CALIBRATION_START = 19,
  PROBE_CALIBRATION_ACTION = 20,
  ABORT_MAINTENANCE_TASK = 21,
  SANITISE_UNTIL_TIMER_TOMORROW = 22,
  FILTER_FOR_PERIOD = 23,
  FILTER_AND_CLEAN_FOR_PERIOD = 24,
  RESET_TO_FACTORY_DEFAULTS = 25,
  POOL_FAVOURITE = 26,
  SPA_FAVOURITE = 27,
  FAVOURITE_1 = 28,
  FAVOURITE_2 = 29,
  CLEAR_EVENT_LIST = 30,
  SANITISE_FOR_PERIOD = 31,
  SANITISE_AND_CLEAN_FOR_PERIOD = 32,
  OVERRIDE_HEATER_COOLDOWN = 33,
}

export enum HeaterAction {
  NO_ACTION = 0,
  HEATER_PUMP_OFF = 1,
  HEATER_PUMP_AUTO = 2,
  HEATER_PUMP_ON = 3,
  HEATER_OFF = 4,
  HEATER_ON = 5,
  INCREASE_SETPOINT = 6,
  DECREASE_SETPOINT = 7,
  POOL = 8,
  SPA = 9,
  DISABLE_USE_TIMERS = 10,
  ENABLE_USE_TIMERS = 11,
  MODE_HEATING = 12,
  MODE_COOLING = 13,
}

export enum SolarAction {
  NO_ACTION = 0,
  OFF = 1,
  AUTO = 2,
  ON = 3,
  SUMMER = 4,
  WINTER = 5,
  INCREASE_SETPOINT = 6,
  DECREASE_SETPOINT = 7,
}

export enum LightAction {
  NO_ACTION = 0,
  SET_ZONE_MODE_TO_MANUAL = 1,
  SET_ZONE_MODE_TO_AUTO = 2,
  TURN_OFF_ZONE = 3,
  TURN_ON_ZONE = 4,
  SET_ZONE_COLOUR = 5,
  SYNCHRONISE_ZONE_COLOUR = 6,
}
