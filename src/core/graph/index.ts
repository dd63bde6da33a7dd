export * from './graph-builder.js';
export * from './graph-query.js';
