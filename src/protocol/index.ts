/**
 * Protocol layer exports for CoolLED BLE communication.
 */

export * from './constants';
export * from './commands';
export * from './frame';
export * from './hex';
export * from './responses';
export * from './decoder';
