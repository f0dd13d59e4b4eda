/**
 * Notification packet parsing.
 */

import { InvalidPayloadLengthError } from '../exceptions';
import {
  NOTIFICATION_DATA_LENGTH,
  NOTIFICATION_DATA_OFFSET,
  NOTIFICATION_TAG_OFFSET,
  PACKET_LENGTH,
} from './constants';

/**
 * A decrypted notification split into its header fields and record data.
 */
export interface NotificationPacket {
  /** uint8 - message type echoed by the device */
  type: number;
  /** uint16 - command tag of the record carried in `data` */
  tag: number;
  /**
   * Record bytes [3, 20). The last byte is a packet counter and is never
   * part of a record layout.
   */
  data: Uint8Array;
}

/**
 * Extract the 2-byte little-endian command tag from a decrypted notification.
 */
export function unpackCommandTag(packet: Uint8Array): number {
  const view = new DataView(packet.buffer, packet.byteOffset + NOTIFICATION_TAG_OFFSET, 2);
  return view.getUint16(0, true);
}

/**
 * Split a decrypted notification into type, tag and data.
 *
 * @throws {InvalidPayloadLengthError} If the packet is not 20 bytes
 */
export function parseNotification(packet: Uint8Array): NotificationPacket {
  if (packet.length !== PACKET_LENGTH) {
    throw new InvalidPayloadLengthError(
      `Notification must be ${PACKET_LENGTH} bytes, got ${packet.length}`,
      packet.length
    );
  }
  return {
    type: new DataView(packet.buffer, packet.byteOffset, 1).getUint8(0),
    tag: unpackCommandTag(packet),
    data: packet.slice(NOTIFICATION_DATA_OFFSET, NOTIFICATION_DATA_OFFSET + NOTIFICATION_DATA_LENGTH),
  };
}
