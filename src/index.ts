/**
 * testsmith: signature extraction and static validation for generated
 * Python tests.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Extraction
export * from './core/extraction/index.js';

// Validation
export * from './core/validation/index.js';

// Python parsing
export * from './validators/tree-sitter/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
