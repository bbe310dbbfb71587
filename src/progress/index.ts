// Reporting and terminal progress for conversion batches

export * from './conversion-reporter';
export * from './cli-progress-display';
