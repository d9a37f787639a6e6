export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
export * from './interfaces/http/index.js';
