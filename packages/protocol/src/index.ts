export * from './json.js';
export * from './epss.js';
export * from './result.js';
export * from './providers.js';
export * from './config.js';
export * from './validation.js';
