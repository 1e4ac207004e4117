// src/core/hook-runner.ts

import { minimatch } from 'minimatch';
import type {
   HookContext,
   HookFilter,
   SyncConfig,
   SyncHookConfig,
   SyncHookKind,
} from '../schema';

export function matchesFilter(targetName: string, cfg: HookFilter): boolean {
   const { include, exclude } = cfg;

   if (include?.length) {
      const ok = include.some((p) => minimatch(targetName, p));
      if (!ok) return false;
   }

   if (exclude?.length) {
      const blocked = exclude.some((p) => minimatch(targetName, p));
      if (blocked) return false;
   }

   return true;
}

export class HookRunner {
   constructor(private readonly hooks: SyncConfig['hooks'] = {}) { }

   /**
    * Run every hook registered for `kind` whose filter accepts
    * `ctx.targetName`, one after another. A throwing hook stops the chain.
    */
   async run(kind: SyncHookKind, ctx: Omit<HookContext, 'kind'>): Promise<void> {
      const configs: SyncHookConfig[] = this.hooks?.[kind] ?? [];
      for (const cfg of configs) {
         if (!matchesFilter(ctx.targetName, cfg)) continue;
         await cfg.fn({ ...ctx, kind });
      }
   }
}
