/**
 * coolled-sign - Node.js driver for CoolLED Bluetooth LED matrix signs
 *
 * Main entry point exporting the public API.
 */

// Core device API
export { CoolLedDevice, type CoolLedDeviceOptions } from './device';
export { discoverSigns, matchesScanTarget, toDiscoveredSign, type DiscoveredSign } from './discovery';

// Transports
export { DeviceLink, type DeviceLinkOptions } from './transport/connection';
export { AckSlot } from './transport/ack-slot';
export { NobleTransport } from './transport/noble-transport';
export type { Transport, ScanTarget, ScanResult, NotificationListener } from './transport/types';

// Models and types
export * from './models';

// Protocol
export * from './protocol';

// Rendering
export * from './encoding';

// Exceptions
export * from './exceptions';
