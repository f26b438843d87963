export * from './types.js';
export * from './logger.js';
export * from './server.js';
export * from './http-transport.js';
