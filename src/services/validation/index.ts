export * from './schema-validator.js';
export * from './schema-includes.js';
export * from './validation-service.js';
