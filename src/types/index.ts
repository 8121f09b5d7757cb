export * from './archive.js';
export * from './catalog.js';
export * from './config.js';
export * from './manifest.js';
export * from './native.js';
export * from './registry.js';
export * from './setup.js';
