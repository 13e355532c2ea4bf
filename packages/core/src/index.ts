// Public API - mirror engine used by the CLI
export * from './config/index.js';
export * from './errors.js';
export * from './digest.js';
export * from './exclude.js';
export * from './metadata.js';
export * from './copy-file.js';
export * from './walker.js';
export * from './report.js';
export * from './mirror.js';
