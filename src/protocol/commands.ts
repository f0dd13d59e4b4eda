/**
 * BLE command builders for both chlorinator families.
 *
 * Builders return plaintext packets; encryption happens at the session layer.
 */

import { ConfigurationError, InvalidPayloadLengthError, ProtocolError } from '../exceptions';
import type { HaloAction, HeaterAction, LightAction, PollAction, SolarAction } from '../models/enums';
import { CommandTag, MessageType, PACKET_LENGTH } from './constants';

/**
 * An action and its optional parameter, as decoded from an action packet.
 */
export interface ActionCommand {
  /** Action tag for notification-variant packets, null for the poll variant */
  tag: CommandTag | null;
  action: number;
  parameter: number;
}

export type ActionFamily = 'poll' | 'halo';

const ACTION_TAGS: ReadonlySet<number> = new Set([
  CommandTag.CHLORINATOR_ACTION,
  CommandTag.LIGHT_ACTION,
  CommandTag.HEATER_ACTION,
  CommandTag.SOLAR_ACTION,
]);

// Notification-variant packets: [type:1][tag:2 LE][action:1][parameter:4 LE]
const HALO_TAG_OFFSET = 1;
const HALO_ACTION_OFFSET = 3;
const HALO_PARAMETER_OFFSET = 4;

// Poll-variant packets: [action:1][parameter:4 LE]
const POLL_PARAMETER_OFFSET = 1;

function packet(): [Uint8Array, DataView] {
  const buffer = new ArrayBuffer(PACKET_LENGTH);
  return [new Uint8Array(buffer), new DataView(buffer)];
}

function haloHeader(view: DataView, type: MessageType, tag: CommandTag): void {
  view.setUint8(0, type);
  view.setUint16(HALO_TAG_OFFSET, tag, true);
}

function assertInt32(parameter: number): void {
  if (!Number.isInteger(parameter) || parameter < -0x80000000 || parameter > 0x7fffffff) {
    throw new ConfigurationError(`Action parameter must be a 32-bit integer, got ${parameter}`);
  }
}

/**
 * Build a poll-variant action packet.
 *
 * @param parameter - Minutes, for DISABLE_ACID_DOSING_FOR_PERIOD; ignored otherwise
 * @returns Command bytes: [action:1][parameter:4 LE][zero padding], 20 bytes
 * @throws {ConfigurationError} If the parameter is not a 32-bit integer
 */
export function buildPollAction(action: PollAction, parameter: number = 0): Uint8Array {
  assertInt32(parameter);
  const [bytes, view] = packet();
  view.setUint8(0, action);
  view.setInt32(POLL_PARAMETER_OFFSET, parameter, true);
  return bytes;
}

/**
 * Build a notification-variant chlorinator action packet.
 *
 * @param parameter - Minutes, for the period actions; ignored otherwise
 * @returns Command bytes: [0x03][0x01F4 LE][action:1][parameter:4 LE][zero padding]
 * @throws {ConfigurationError} If the parameter is not a 32-bit integer
 */
export function buildHaloAction(action: HaloAction, parameter: number = 0): Uint8Array {
  assertInt32(parameter);
  const [bytes, view] = packet();
  haloHeader(view, MessageType.WRITE, CommandTag.CHLORINATOR_ACTION);
  view.setUint8(HALO_ACTION_OFFSET, action);
  view.setInt32(HALO_PARAMETER_OFFSET, parameter, true);
  return bytes;
}

function buildAccessoryAction(tag: CommandTag, action: number): Uint8Array {
  const [bytes, view] = packet();
  haloHeader(view, MessageType.WRITE, tag);
  view.setUint8(HALO_ACTION_OFFSET, action);
  return bytes;
}

/** @returns Command bytes: [0x03][0x01F6 LE][action:1][zero padding] */
export function buildHeaterAction(action: HeaterAction): Uint8Array {
  return buildAccessoryAction(CommandTag.HEATER_ACTION, action);
}

/** @returns Command bytes: [0x03][0x01F7 LE][action:1][zero padding] */
export function buildSolarAction(action: SolarAction): Uint8Array {
  return buildAccessoryAction(CommandTag.SOLAR_ACTION, action);
}

/** @returns Command bytes: [0x03][0x01F5 LE][action:1][zero padding] */
export function buildLightAction(action: LightAction): Uint8Array {
  return buildAccessoryAction(CommandTag.LIGHT_ACTION, action);
}

/**
 * Build a request asking the device to notify the record behind `tag`.
 *
 * @returns Command bytes: [0x02][tag:2 LE][zero padding], 20 bytes
 */
export function buildReadRequest(tag: CommandTag): Uint8Array {
  const [bytes, view] = packet();
  haloHeader(view, MessageType.READ, tag);
  return bytes;
}

/**
 * Decode a plaintext action packet built by one of the action builders.
 *
 * @throws {InvalidPayloadLengthError} If the packet is not 20 bytes
 * @throws {ProtocolError} If a notification-variant packet is not an action write
 */
export function parseActionPacket(data: Uint8Array, family: ActionFamily): ActionCommand {
  if (data.length !== PACKET_LENGTH) {
    throw new InvalidPayloadLengthError(
      `Action packet must be ${PACKET_LENGTH} bytes, got ${data.length}`,
      data.length
    );
  }
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);

  if (family === 'poll') {
    return {
      tag: null,
      action: view.getUint8(0),
      parameter: view.getInt32(POLL_PARAMETER_OFFSET, true),
    };
  }

  const type = view.getUint8(0);
  if (type !== MessageType.WRITE) {
    throw new ProtocolError(`Expected message type 0x03, got 0x${type.toString(16).padStart(2, '0')}`);
  }
  const tag = view.getUint16(HALO_TAG_OFFSET, true);
  if (!isActionTag(tag)) {
    throw new ProtocolError(`Tag ${tag} is not an action tag`);
  }
  return {
    tag,
    action: view.getUint8(HALO_ACTION_OFFSET),
    parameter: tag === CommandTag.CHLORINATOR_ACTION ? view.getInt32(HALO_PARAMETER_OFFSET, true) : 0,
  };
}

function isActionTag(tag: number): tag is CommandTag {
  return ACTION_TAGS.has(tag);
}
