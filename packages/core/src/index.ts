export * from './dotenv/index.js';
export * from './environment/index.js';

// Logging
export * from './logging/index.js';
