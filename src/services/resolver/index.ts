export * from './resource-resolver.js';
export * from './http-fetcher.js';
export * from './ftp-fetcher.js';
