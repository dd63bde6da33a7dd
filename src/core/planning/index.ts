export * from './manifest-edits.js';
export * from './version-planner.js';
