export * from './config.js';
export * from './language.js';
export * from './stats.js';
