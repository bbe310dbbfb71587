export * from './types';
export * from './path-utils';
export * from './directory-manager';
export * from './file-writer';
