export * from './store.js';
export * from './substitution.js';
