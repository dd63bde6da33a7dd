export * from './bump.js';
export * from './ranges.js';
export * from './snapshot.js';
