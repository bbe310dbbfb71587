export * from './interfaces';
export * from './request-builder';
export * from './static-request-source';
export * from './cli-request-source';
export * from './interactive-request-source';
