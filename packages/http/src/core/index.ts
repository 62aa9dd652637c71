export * from './http-utils.js';
export * from './types.js';
