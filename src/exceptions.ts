/**
 * Exception classes for the chlorinator BLE library.
 */

export class ChlorinatorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChlorinatorError';
  }
}

/**
 * The transport could not open a connection to the device.
 */
export class ConnectionError extends ChlorinatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * A characteristic read, write or subscription failed.
 */
export class CharacteristicIOError extends ChlorinatorError {
  constructor(
    message: string,
    readonly characteristic: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CharacteristicIOError';
  }
}

/**
 * The authentication sequence broke. The session is unusable; reconnect.
 */
export class HandshakeFailedError extends ChlorinatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HandshakeFailedError';
  }
}

/**
 * Another session held the device for longer than the caller was willing to wait.
 */
export class SessionBusyError extends ChlorinatorError {
  constructor(message: string) {
    super(message);
    this.name = 'SessionBusyError';
  }
}

export class ConfigurationError extends ChlorinatorError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ProtocolError extends ChlorinatorError {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/**
 * A cipher input (payload or session key) has a length the transform cannot handle.
 */
export class InvalidPayloadLengthError extends ProtocolError {
  constructor(
    message: string,
    readonly actual: number
  ) {
    super(message);
    this.name = 'InvalidPayloadLengthError';
  }
}

/**
 * Base class for record decoding failures.
 */
export class DecodeError extends ProtocolError {
  constructor(
    message: string,
    readonly record: string
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

export class ShortBufferError extends DecodeError {
  constructor(
    record: string,
    readonly expected: number,
    readonly actual: number
  ) {
    super(`${record} too short: ${actual} bytes (need ${expected})`, record);
    this.name = 'ShortBufferError';
  }
}

/**
 * A wire value fell outside the known domain of an enumerated field.
 */
export class UnknownEnumValueError extends DecodeError {
  constructor(
    record: string,
    readonly field: string,
    readonly value: number
  ) {
    super(`${record}.${field}: unknown value ${value} (0x${value.toString(16)})`, record);
    this.name = 'UnknownEnumValueError';
  }
}
