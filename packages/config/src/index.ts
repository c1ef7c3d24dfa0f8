// Main entry point for @catalog/config package

export * from './spotify';
export * from './env';
