export * from './types.js';
export * from './errors.js';
export * from './id-generator.js';
export * from './verbs.js';
export * from './compact.js';
export * from './structured.js';
export * from './detect.js';
export * from './converter.js';
export * from './codec.js';
export * from './schemas.js';
