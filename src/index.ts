/**
 * chatmd - ChatGPT export to Markdown converter
 * Main library entry point
 */

// Re-export modules for programmatic use
export * from './config/index.js';
export * from './ingest/chatgpt/index.js';
export * from './export/index.js';
export * from './convert.js';
export { getLogger, createLogger, resetLogger, silentLogger } from './utils/logger.js';
export { version } from './version.js';
