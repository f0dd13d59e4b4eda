/**
 * BLE advertisement data structures.
 */

import { ByteReader } from '../encoding/bytes';
import { DecodeError } from '../exceptions';
import { DeviceProtocol, DeviceType } from './enums';
import {
  DEVICE_PROTOCOLS,
  DEVICE_PROTOCOL_UNKNOWN,
  DEVICE_TYPES,
  DEVICE_TYPE_UNKNOWN,
} from './halo-status';

/**
 * Parsed scan response manufacturer data of a notification-variant device.
 *
 * Scan response format (21 bytes, manufacturer ID already stripped):
 *
 * - [0-3]: Device type, version, protocol, protocol revision
 * - [4]: Device status
 * - [5]: Reserved
 * - [6-9]: Unique ID (little-endian uint32)
 * - [10-13]: Pairing access code, all zero unless the device is in pairing mode
 * - [14-17]: Firmware major/minor, bootloader major/minor
 * - [18-19]: Hardware platform ID (lo, hi)
 * - [20]: Time alive
 */
export interface ScanResponse {
  deviceType: DeviceType;
  deviceVersion: number;
  deviceProtocol: DeviceProtocol;
  deviceProtocolRevision: number;
  deviceStatus: number;
  deviceUniqueId: number;
  /** Raw access code bytes */
  accessCodeBytes: Uint8Array;
  firmwareMajorVersion: number;
  firmwareMinorVersion: number;
  bootloaderMajorVersion: number;
  bootloaderMinorVersion: number;
  hardwarePlatformId: number;
  timeAlive: number;

  /** True while the device is in pairing mode and advertising its access code */
  isPairable: boolean;
}

export namespace ScanResponse {
  export const SIZE = 21;

  /** Access code reported by devices that are not pairable */
  export const DEFAULT_ACCESS_CODE = '0000';

  /**
   * Decode the access code advertised by a device in pairing mode.
   *
   * @throws {DecodeError} If the code bytes are not valid UTF-8
   */
  export function accessCode(response: ScanResponse): string {
    if (!response.isPairable) {
      return DEFAULT_ACCESS_CODE;
    }
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(response.accessCodeBytes);
    } catch (error) {
      throw new DecodeError(
        `Access code is not valid UTF-8: ${error instanceof Error ? error.message : String(error)}`,
        'ScanResponse'
      );
    }
  }
}

/**
 * Parse scan response manufacturer data.
 *
 * @param data - Raw manufacturer data (21 bytes, without the manufacturer ID prefix)
 * @throws {ShortBufferError} If data is too short
 */
export function parseScanResponse(data: Uint8Array): ScanResponse {
  const r = new ByteReader('ScanResponse', data, ScanResponse.SIZE);
  const accessCodeBytes = r.bytes(10, 4);

  return {
    deviceType: r.enumValue('deviceType', DEVICE_TYPES, r.u8(0), DEVICE_TYPE_UNKNOWN),
    deviceVersion: r.u8(1),
    deviceProtocol: r.enumValue('deviceProtocol', DEVICE_PROTOCOLS, r.u8(2), DEVICE_PROTOCOL_UNKNOWN),
    deviceProtocolRevision: r.u8(3),
    deviceStatus: r.u8(4),
    // byte 5 reserved
    deviceUniqueId: r.u32(6),
    accessCodeBytes,
    firmwareMajorVersion: r.u8(14),
    firmwareMinorVersion: r.u8(15),
    bootloaderMajorVersion: r.u8(16),
    bootloaderMinorVersion: r.u8(17),
    hardwarePlatformId: r.u16(18),
    timeAlive: r.u8(20),

    isPairable: accessCodeBytes.some((b) => b !== 0),
  };
}
