/**
 * Rendering layer exports.
 */

export * from './colors';
export * from './raster';
export * from './fitting';
export * from './bitplanes';
export * from './text';
export * from './images';
export * from './animation';
export * from './jt';
