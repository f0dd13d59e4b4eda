/**
 * Models layer exports for chlorinator records.
 */

export * from './enums';
export * from './chlorinator';
export * from './halo-status';
export * from './halo-equipment';
export * from './halo-heating';
export * from './advertisement';
