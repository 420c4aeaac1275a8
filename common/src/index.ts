export * from './logging.js';
export * from './scan.js';
export * from './versionInfo.js';
