/**
 * Protocol layer exports for chlorinator BLE communication.
 */

export * from './constants';
export * from './commands';
export * from './responses';
export * from './registry';
