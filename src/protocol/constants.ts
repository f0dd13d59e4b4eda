/**
 * BLE protocol constants for both chlorinator families.
 */

/**
 * GATT characteristics of the poll-variant chlorinator.
 */
export const PollCharacteristic = {
  SERVICE: '45000001-98b7-4e29-a03f-160174643001',
  SESSION_KEY: '45000002-98b7-4e29-a03f-160174643001',
  AUTHENTICATION: '45000003-98b7-4e29-a03f-160174643001',
  DEVICE_TIME: '45000006-98b7-4e29-a03f-160174643001',
  DEVICE_PROFILE: '45000007-98b7-4e29-a03f-160174643001',
  DEVICE_NAME: '45000008-98b7-4e29-a03f-160174643001',
  DEVICE_DEBUG: '45000009-98b7-4e29-a03f-160174643001',

  CHLORINATOR_STATE: '45000200-98b7-4e29-a03f-160174643001',
  CHLORINATOR_CAPABILITIES: '45000201-98b7-4e29-a03f-160174643001',
  CHLORINATOR_SETUP: '45000202-98b7-4e29-a03f-160174643001',
  CHLORINATOR_APP_ACTION: '45000203-98b7-4e29-a03f-160174643001',
  CHLORINATOR_TIMERS: '45000204-98b7-4e29-a03f-160174643001',
  CHLORINATOR_STATISTICS: '45000205-98b7-4e29-a03f-160174643001',
  CHLORINATOR_SETTINGS: '45000206-98b7-4e29-a03f-160174643001',

  LIGHTING_STATE: '45000300-98b7-4e29-a03f-160174643001',
  LIGHTING_CAPABILITIES: '45000301-98b7-4e29-a03f-160174643001',
  LIGHTING_SETUP: '45000302-98b7-4e29-a03f-160174643001',
  LIGHTING_APP_ACTION: '45000303-98b7-4e29-a03f-160174643001',
  LIGHTING_TIMERS: '45000304-98b7-4e29-a03f-160174643001',
} as const;

/**
 * GATT characteristics of the notification-variant (Halo) chlorinator.
 *
 * The session key lives on the service UUID itself.
 */
export const HaloCharacteristic = {
  SERVICE: '45000001-98b7-4e29-a03f-160174643002',
  SESSION_KEY: '45000001-98b7-4e29-a03f-160174643002',
  AUTHENTICATION: '45000002-98b7-4e29-a03f-160174643002',
  /** Device -> app notifications */
  TX: '45000003-98b7-4e29-a03f-160174643002',
  /** App -> device requests and actions */
  RX: '45000004-98b7-4e29-a03f-160174643002',
} as const;

/** Advertised local name of notification-variant devices */
export const HALO_BLE_NAME = 'HCHLOR';

/**
 * Characteristic addresses the handshake needs, per device family.
 */
export interface AuthCharacteristics {
  sessionKey: string;
  authentication: string;
}

/**
 * Command tags carried inline in notification-variant packets.
 */
export enum CommandTag {
  PROFILE = 1,
  TIME = 2,
  DATE = 3,
  UNKNOWN_5 = 5,
  NAME = 6,
  TEMPERATURE = 9,
  SETTINGS = 100,
  WATER_VOLUME = 101,
  SET_POINT = 102,
  STATE = 104,
  CAPABILITIES = 105,
  MAINTENANCE_STATE = 106,
  FLEX_SETTINGS = 107,
  EQUIPMENT_CONFIG = 201,
  EQUIPMENT_PARAMETER = 202,
  LIGHT_STATE = 300,
  LIGHT_CAPABILITIES = 301,
  LIGHT_ZONE_NAMES = 302,
  TIMER_CAPABILITIES = 400,
  TIMER_SETUP = 401,
  TIMER_STATE = 402,
  TIMER_CONFIG = 403,
  CHLORINATOR_ACTION = 500,
  LIGHT_ACTION = 501,
  HEATER_ACTION = 502,
  SOLAR_ACTION = 503,
  PROBE_STATISTICS = 600,
  CELL_STATISTICS = 601,
  POWER_BOARD_STATISTICS = 602,
  INFO_LOG = 603,
  HEATER_CAPABILITIES = 1100,
  HEATER_CONFIG = 1101,
  HEATER_STATE = 1102,
  HEATER_COOLDOWN_STATE = 1104,
  SOLAR_CAPABILITIES = 1200,
  SOLAR_CONFIG = 1201,
  SOLAR_STATE = 1202,
  GPO_NAMES = 1300,
  RELAY_NAMES = 1301,
  VALVE_NAMES = 1302,
}

/**
 * First byte of a notification-variant packet.
 */
export enum MessageType {
  READ = 0x02,
  WRITE = 0x03,
}

/** Every packet on the wire, in either direction, is this long. */
export const PACKET_LENGTH = 20;

// Notification packet layout: [type:1][tag:2 LE][data:17]
export const NOTIFICATION_TAG_OFFSET = 1;
export const NOTIFICATION_DATA_OFFSET = 3;
/** The final data byte is a packet counter rather than record data. */
export const NOTIFICATION_DATA_LENGTH = 17;

/**
 * Tags requested after subscribing, in order. The device answers each with
 * one or more notifications.
 */
export const DEFAULT_REQUEST_TAGS: readonly CommandTag[] = [
  CommandTag.FLEX_SETTINGS,
  CommandTag.UNKNOWN_5,
  CommandTag.PROBE_STATISTICS,
  CommandTag.CELL_STATISTICS,
  CommandTag.POWER_BOARD_STATISTICS,
  CommandTag.INFO_LOG,
];

/**
 * Characteristics that must be read after authenticating a poll-variant
 * session, or the device drops the connection. Their values are discarded.
 */
export const POLL_KEEPALIVE_READS: readonly string[] = [
  PollCharacteristic.CHLORINATOR_STATE,
  PollCharacteristic.CHLORINATOR_SETUP,
  PollCharacteristic.CHLORINATOR_TIMERS,
  PollCharacteristic.CHLORINATOR_SETTINGS,
  PollCharacteristic.LIGHTING_STATE,
  PollCharacteristic.LIGHTING_SETUP,
  PollCharacteristic.LIGHTING_TIMERS,
];
