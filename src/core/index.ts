// Conversion core module
export * from './constants';
export * from './logger';
export * from './errors';
export * from './error-handler';
export * from './config-manager';
export * from './batch-processor';
export * from './format-validator';
export * from './conversion-orchestrator';
