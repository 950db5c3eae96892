export * from './types/index.js';
export * from './errors.js';
export * from './config/index.js';
export * from './installer/index.js';
export * from './hooks/index.js';
export * from './utils/logger.js';
