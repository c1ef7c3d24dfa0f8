// Main entry point for @catalog/shared

export * from './types';
export * from './utils/errors';
export * from './utils/fetch';
export * from './utils/query';
