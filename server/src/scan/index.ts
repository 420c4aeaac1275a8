export * from './aggregate.js';
export * from './bucketing.js';
export * from './budget.js';
export * from './digest.js';
export * from './errors.js';
export * from './exclusions.js';
export * from './names.js';
export * from './placeholder.js';
export * from './progress.js';
export * from './report.js';
export * from './scanJob.js';
export * from './scanner.js';
export type * from './types.js';
