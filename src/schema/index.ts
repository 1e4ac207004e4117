// src/schema/index.ts

export * from './config';
export * from './hooks';
export * from './record-type';
export * from './endpoint';
export * from './collection';
export * from './generation';

/**
 * Directory (relative to the project root) holding config.* and the state file.
 */
export const SYNC_ROOT_DIR = '.postman-sync';
