export * from './erasure.js';
export * from './objection.js';
export * from './rectification.js';
export * from './restriction.js';
