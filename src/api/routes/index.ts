export { createProcessRouter, processHandler, ProcessRequestSchema, MAX_CONTENT_CHARS } from './process.js';
export type { ContentProcessor, ProcessRequest } from './process.js';
export { createHealthRouter, healthHandler } from './health.js';
export type { HealthCheck, HealthProviders, ProviderStatus } from './health.js';
