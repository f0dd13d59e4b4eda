/**
 * Chlorinator BLE protocol library.
 *
 * Main entry point exporting the public API.
 */

// Core device API
export { ChlorinatorDevice } from './device';
export { HaloChlorinatorDevice } from './halo-device';
export type { DeviceOptions, HaloDeviceOptions } from './options';

// Models and types
export * from './models';

// Protocol and sessions
export * from './protocol';
export {
  BLOCK_SIZE,
  SESSION_KEY_LENGTH,
  SHARED_SECRET,
  decryptPayload,
  deriveAuthToken,
  encryptPayload,
  xorAlign,
} from './encoding/cipher';
export { NotificationDemultiplexer, type DemultiplexerOptions } from './session/demultiplexer';
export {
  AuthenticatedSession,
  NotificationSession,
  authenticate,
  performNotificationHandshake,
  performPollHandshake,
  type NotificationHandler,
} from './session/handshake';
export { SessionLock } from './session/session-lock';
export { HaloSnapshot, PollSnapshot, StateSnapshot, type HaloFields, type PollFields } from './session/snapshot';

// Transport
export { PacketChannel, type ChannelMessage, type PacketChannelOptions } from './transport/packet-channel';
export type { GattConnection, GattTransport, NotificationListener, Subscription } from './transport/types';

// Logging and exceptions
export { consoleLogger, type Logger } from './logger';
export * from './exceptions';
