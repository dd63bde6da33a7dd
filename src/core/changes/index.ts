export * from './change-attributor.js';
export * from './file-categories.js';
