export * from './options.js';
export * from './reporter.js';
export * from './run.js';
export * from './schemas.js';
