// src/index.ts

export * from './schema';

export { Logger, defaultLogger, type LogLevel, type LogSink } from './util/logger';

export * from './core/errors';
export * from './core/schema-source';
export * from './core/source-scanner';
export * from './core/method-discovery';
export * from './core/endpoint-builder';
export * from './core/field-template';
export * from './core/request-renderer';
export * from './core/reconciler';
export * from './core/collection-builder';
export * from './core/collection-client';
export * from './core/state-store';
export * from './core/hook-runner';
export * from './core/sync';
export * from './core/generator';
export { loadSyncConfig, parseSyncConfig, type LoadSyncConfigOptions, type LoadSyncConfigResult } from './core/config-loader';
export { createContext, requireSyncer, runOnce, type RunOptions, type SyncContext } from './core/runner';
export { applySchemaChanges, ChangeBatcher, watchSchemas, type ChangeBatch, type ChangeKind, type WatchOptions } from './core/watcher';
export { initConfig, type InitConfigOptions } from './core/init-config';
