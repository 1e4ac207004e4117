// src/core/method-discovery.ts

import path from 'path';

import type { DiscoveredMethod, DiscoveryConfig, RemoteMethodDeclaration, ScanMode } from '../schema';
import { lastSegment, toSnakeName } from '../util/naming';
import { defaultLogger, type Logger } from '../util/logger';
import { ConfigError, errorMessage } from './errors';
import { scanSources } from './source-scanner';

export const DEFAULT_METHOD_CACHE_TTL_MS = 60 * 60 * 1000;

/**
 * Explicit list of remotely callable methods, keyed by grouping.
 */
export class MethodRegistry {
   private readonly byGrouping = new Map<string, DiscoveredMethod[]>();

   register(decl: RemoteMethodDeclaration): void {
      if (!decl.grouping.trim()) {
         throw new ConfigError(`Remote method "${decl.path}" has no grouping.`);
      }
      if (!decl.path.includes('.')) {
         throw new ConfigError(
            `Remote method path "${decl.path}" must be a dotted import path.`,
         );
      }

      const methodName = lastSegment(decl.path);
      const list = this.byGrouping.get(decl.grouping) ?? [];
      list.push({
         path: decl.path,
         methodName,
         description: decl.description ?? `Remote method: ${methodName}`,
         source: 'registry',
      });
      this.byGrouping.set(decl.grouping, list);
   }

   methodsFor(grouping: string): DiscoveredMethod[] {
      return [...(this.byGrouping.get(grouping) ?? [])];
   }
}

interface CacheSlot {
   methods: DiscoveredMethod[];
   expiresAt: number;
}

/**
 * Discovered methods per grouping, each entry expiring `ttlMs` after it
 * was stored. Lists go in and come out as copies.
 */
export class MethodCache {
   private readonly slots = new Map<string, CacheSlot>();

   constructor(
      private readonly ttlMs: number = DEFAULT_METHOD_CACHE_TTL_MS,
      private readonly now: () => number = Date.now,
   ) { }

   get(grouping: string): DiscoveredMethod[] | undefined {
      const slot = this.slots.get(grouping);
      if (!slot) return undefined;
      if (this.now() >= slot.expiresAt) {
         this.slots.delete(grouping);
         return undefined;
      }
      return slot.methods.map((m) => ({ ...m }));
   }

   set(grouping: string, methods: DiscoveredMethod[]): void {
      this.slots.set(grouping, {
         methods: methods.map((m) => ({ ...m })),
         expiresAt: this.now() + this.ttlMs,
      });
   }
}

export interface MethodDiscoveryOptions {
   config?: DiscoveryConfig;
   /**
    * Absolute package root for the source-scan fallback.
    */
   sourceRoot?: string;
   /**
    * Absolute package roots keyed by grouping; these take precedence over
    * `sourceRoot`.
    */
   sourceRoots?: Record<string, string>;
   registry?: MethodRegistry;
   cache?: MethodCache;
   logger?: Logger;
}

/**
 * Finds remotely callable methods for a grouping: declared manifest
 * entries, then registry entries, then (depending on the scan mode)
 * methods found by scanning sources. Results are de-duplicated by path
 * and cached per grouping.
 */
export class MethodDiscovery {
   readonly registry: MethodRegistry;
   readonly cache: MethodCache;
   private readonly config: DiscoveryConfig;
   private readonly sourceRoot: string | undefined;
   private readonly sourceRoots: Record<string, string>;
   private readonly scanMode: ScanMode;
   private readonly logger: Logger;

   constructor(options: MethodDiscoveryOptions = {}) {
      this.config = options.config ?? {};
      this.sourceRoot = options.sourceRoot;
      this.sourceRoots = options.sourceRoots ?? {};
      this.scanMode = this.config.scan ?? 'fallback';
      this.registry = options.registry ?? new MethodRegistry();
      this.cache = options.cache ?? new MethodCache(this.config.cacheTtlMs);
      this.logger = options.logger ?? defaultLogger.child('[discovery]');

      for (const decl of this.config.methods ?? []) {
         this.registry.register(decl);
      }
   }

   discoverMethods(groupingId: string): DiscoveredMethod[] {
      const cached = this.cache.get(groupingId);
      if (cached) {
         this.logger.debug(`Cache hit for "${groupingId}" (${cached.length} method(s)).`);
         return cached;
      }

      const declared = [
         ...this.fromManifest(groupingId),
         ...this.registry.methodsFor(groupingId),
      ];

      const runScan =
         this.scanMode === 'always' || (this.scanMode === 'fallback' && declared.length === 0);
      const scanned = runScan ? this.fromSources(groupingId) : [];

      const methods = dedupeByPath([...declared, ...scanned]);
      this.cache.set(groupingId, methods);

      this.logger.debug(
         `Discovered ${methods.length} method(s) for "${groupingId}" (declared=${declared.length}, scanned=${scanned.length}).`,
      );
      return methods;
   }

   private fromManifest(groupingId: string): DiscoveredMethod[] {
      const paths = this.config.manifest?.[groupingId] ?? [];
      const out: DiscoveredMethod[] = [];
      for (const p of paths) {
         if (!p.includes('.')) {
            this.logger.warn(`Ignoring manifest entry "${p}" for "${groupingId}": not a dotted path.`);
            continue;
         }
         const methodName = lastSegment(p);
         out.push({
            path: p,
            methodName,
            description: `Remote method from manifest: ${methodName}`,
            source: 'manifest',
         });
      }
      return out;
   }

   /**
    * Scanned methods belonging to `groupingId`: everything under its own
    * entry in `sourceRoots`, otherwise the part of `sourceRoot` that lives
    * in the grouping's module directory. A grouping named after the
    * package gets the whole package.
    */
   private fromSources(groupingId: string): DiscoveredMethod[] {
      const ownRoot = this.sourceRoots[groupingId];
      if (ownRoot) return this.scan(ownRoot);

      if (!this.sourceRoot) return [];
      const packageName = this.config.packageName ?? path.basename(this.sourceRoot);
      const moduleDir = toSnakeName(groupingId);
      const all = this.scan(this.sourceRoot, packageName);
      if (moduleDir === packageName.toLowerCase()) return all;
      return all.filter((m) => m.source.startsWith(`${moduleDir}/`));
   }

   private scan(sourceRoot: string, packageName?: string): DiscoveredMethod[] {
      try {
         return scanSources({
            sourceRoot,
            packageName,
            include: this.config.include,
            markers: this.config.markers,
            logger: this.logger.child('[scan]'),
         });
      } catch (err) {
         this.logger.error(`Source scan under ${sourceRoot} failed: ${errorMessage(err)}`);
         return [];
      }
   }
}

function dedupeByPath(methods: DiscoveredMethod[]): DiscoveredMethod[] {
   const seen = new Set<string>();
   return methods.filter((m) => {
      if (seen.has(m.path)) return false;
      seen.add(m.path);
      return true;
   });
}
