/**
 * Device options and their validation.
 */

import { BLOCK_SIZE } from './encoding/cipher';
import { ConfigurationError } from './exceptions';
import type { Logger } from './logger';
import type { CommandTag } from './protocol/constants';

export interface DeviceOptions {
  /** Access code shown by the device while pairing */
  accessCode: string;
  logger?: Logger;
}

export interface HaloDeviceOptions extends DeviceOptions {
  /** Tags requested after subscribing, in order */
  requestTags?: readonly CommandTag[];
  /** Longest a data session may run before the snapshot is returned as is */
  sessionTimeoutMs?: number;
  /** Longest to wait for another session on the same device; unbounded if omitted */
  lockTimeoutMs?: number;
  /** Packet backlog that triggers a warning */
  highWaterMark?: number;
}

/**
 * @throws {ConfigurationError} If the access code is empty or longer than one cipher block
 */
export function validateAccessCode(accessCode: string): void {
  const length = new TextEncoder().encode(accessCode).length;
  if (length === 0) {
    throw new ConfigurationError('Access code must not be empty');
  }
  if (length > BLOCK_SIZE) {
    throw new ConfigurationError(`Access code must encode to at most ${BLOCK_SIZE} bytes, got ${length}`);
  }
}

/**
 * @throws {ConfigurationError} If the value is not a positive finite number
 */
export function validatePositive(name: string, value: number | undefined): void {
  if (value !== undefined && !(Number.isFinite(value) && value > 0)) {
    throw new ConfigurationError(`${name} must be a positive number, got ${value}`);
  }
}
