export * from './format.js';
export * from './progress.js';
export * from './profile.js';
export * from './stats.js';
