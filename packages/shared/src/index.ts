export * from './constants.js';
export * from './schemas/index.js';
export type * from './types/index.js';
