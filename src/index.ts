// Main entry point for the image converter library

export * from './types';
export * from './core';
export * from './services/codec';
export * from './services/local';
export * from './services/request-source';
export * from './progress';
export { createProgram, runCli, EXIT_CODES } from './cli/program';
export type { CliDependencies } from './cli/program';
