// Export all models

export * from './types.js';
