/**
 * Models layer exports for CoolLED sign structures.
 */

export * from './enums';
export * from './panel';
export * from './advertisement';
export * from './hardware';
