export * from './database.js';
export * from './api.js';
export * from './errors.js';
