export * from './env.js';
export * from './types.js';
export * from './loader.js';
