// Types
export * from './types/index.js';

// Zod schemas (input + options)
export * from './schemas/index.js';

// Validation (AJV)
export * from './validation/index.js';

// Pure utils (constants, logger)
export * from './utils/index.js';
