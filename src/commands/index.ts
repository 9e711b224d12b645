export * from './scan.js';
export * from './pattern.js';
export * from './fields.js';
export * from './config.js';
