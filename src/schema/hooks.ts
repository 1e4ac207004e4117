// src/schema/hooks.ts

import type { GenerationRecord } from './generation';

/**
 * Lifecycle stages at which user hooks may run.
 */
export type SyncHookKind = 'preGenerate' | 'postGenerate' | 'preSync' | 'postSync';

/**
 * Context object passed to all hooks.
 */
export interface HookContext {
   kind: SyncHookKind;
   /**
    * Record type name, module name, or `"*"` for a whole-collection sync.
    */
   targetName: string;
   generationKind?: GenerationRecord['kind'];
   /**
    * Present for post-generate hooks.
    */
   record?: GenerationRecord;
   /**
    * Present for post-sync hooks: names of the folders written.
    */
   folders?: string[];
}

/**
 * Common filter options. Patterns are minimatch globs evaluated
 * against `targetName`.
 */
export interface HookFilter {
   include?: string[];
   exclude?: string[];
}

export type SyncHookFn = (ctx: HookContext) => void | Promise<void>;

export interface SyncHookConfig extends HookFilter {
   fn: SyncHookFn;
}
