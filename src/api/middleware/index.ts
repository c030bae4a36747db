export * from './error-handler.js';
export * from './request-id.js';
export * from './cors.js';
