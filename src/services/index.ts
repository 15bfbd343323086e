// Export all services

export * from './config/config-service.js';
export * from './resolver/index.js';
export * from './validation/index.js';
export * from './report/reporter.js';
