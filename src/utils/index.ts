export * from './errors.js';
export * from './fs.js';
export * from './logger.js';
export * from './pio-runner.js';
