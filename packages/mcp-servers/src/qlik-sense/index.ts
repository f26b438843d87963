export * from './errors.js';
export * from './config.js';
export * from './session.js';
export * from './http.js';
export * from './types.js';
export * from './client.js';
export * from './tools.js';
export * from './create-server.js';
export { BrowserSessionAcquirer, DirectSessionAcquirer, createSessionAcquirer, type SessionAcquirerDeps } from './auth/index.js';
export type { BrowserAuthConfig, BrowserSessionAcquirerOptions } from './auth/browser.js';
export type { DirectAuthConfig, DirectSessionAcquirerOptions } from './auth/direct.js';
