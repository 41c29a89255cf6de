export * from './chains.js';
export * from './engines.js';
export * from './kinds/index.js';
export * from './marketingPreferences.js';
export * from './objectionEngine.js';
export * from './restrictionEngine.js';
export * from './rightsRequestEngine.js';
export * from './thirdPartyTracker.js';
export * from './types.js';
