export * from './changeset-id.js';
export * from './changeset-store.js';
