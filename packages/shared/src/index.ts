/**
 * @hoist/shared
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './schemas/index.js';
export * from './constants/index.js';
