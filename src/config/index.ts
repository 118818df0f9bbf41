export * from './project.js';
export * from './settings.js';
export * from './targets.js';
