export * from './errors.js';
export * from './apiErrors.js';
