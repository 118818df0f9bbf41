export * from './assets.js';
export * from './pipeline.js';
export * from './prerequisites.js';
export * from './stages.js';
export * from './summary.js';
