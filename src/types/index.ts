export * from './selector.js';
export * from './site.js';
export * from './credentials.js';
export * from './step-result.js';
export * from './workflow.js';
