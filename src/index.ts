// quotecast - quote delivery scheduling and engagement streaks
// Main entry point for library usage

export * from './config/index.js';
export * from './errors/index.js';
export * from './cache/index.js';
export * from './streaks/index.js';
export * from './schedules/index.js';
export * from './storage/index.js';
export * from './delivery/index.js';
export * from './utils/index.js';
export { App, createApp, setupGracefulShutdown, type AppOptions } from './app.js';
