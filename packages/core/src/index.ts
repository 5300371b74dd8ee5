// Errors
export * from './errors/index.js';

// Logging
export * from './logger/index.js';

// Configuration
export * from './config/index.js';

// Data model and coercion helpers
export * from './data/index.js';

// Upstream connectors and demo data
export * from './connectors/index.js';

// Paths
export * from './utils/index.js';
