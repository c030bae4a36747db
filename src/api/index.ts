export { createApp, type AppDependencies } from './app.js';
export * from './middleware/index.js';
export * from './routes/index.js';
