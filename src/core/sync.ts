// src/core/sync.ts

import pluralize from 'pluralize';

import type { GenerationRecord, RemoteNode } from '../schema';
import { defaultLogger, type Logger } from '../util/logger';
import { buildFoldersForRecord, toRemoteFolder } from './collection-builder';
import type { CollectionClient, EnvironmentPayload } from './collection-client';
import { errorMessage, RemoteServiceError, SyncError, type SyncStep } from './errors';
import { HookRunner } from './hook-runner';
import { collapseDuplicateFolders, mergeFolders } from './reconciler';
import type { SchemaSource } from './schema-source';
import type { StateStore } from './state-store';

export type SyncOutcome =
   | { status: 'synced'; collectionId: string; folders: string[]; itemCount: number }
   | { status: 'failed'; step: SyncStep; message: string };

export type SyncNowResult = SyncOutcome | { status: 'skipped'; reason: string };

export interface ConnectionResult {
   status: 'success' | 'error';
   message: string;
}

export interface CollectionSummary {
   id: string;
   name: string;
   itemCount: number;
   updatedAt?: string;
}

export interface InspectedItem {
   name: string;
   /**
    * Number of direct children; undefined for plain requests.
    */
   subItemCount?: number;
   subItems: string[];
}

/**
 * Where and how to sync, taken from configuration.
 */
export interface SyncTarget {
   workspaceId: string;
   collectionId: string;
   baseUrl: string;
   autoSync: boolean;
   siteName?: string;
}

export interface CollectionSyncerOptions {
   client: CollectionClient;
   store: StateStore;
   schema: SchemaSource;
   target: SyncTarget;
   hooks?: HookRunner;
   logger?: Logger;
   now?: () => Date;
}

const INSPECT_ITEM_LIMIT = 10;
const INSPECT_SUB_ITEM_LIMIT = 5;

/**
 * Host part of a URL, or the input unchanged when it cannot be parsed.
 */
export function siteNameFor(baseUrl: string): string {
   try {
      return new URL(baseUrl).host || baseUrl;
   } catch {
      return baseUrl;
   }
}

export function environmentFor(target: SyncTarget): EnvironmentPayload {
   const siteName = target.siteName ?? siteNameFor(target.baseUrl);
   return {
      name: `${siteName} API Environment`,
      values: [
         { key: 'base_url', value: target.baseUrl, type: 'default', enabled: true },
         { key: 'api_key', value: '{{your_api_key}}', type: 'secret', enabled: true },
         { key: 'site_name', value: siteName, type: 'default', enabled: true },
      ],
   };
}

/**
 * Pushes generation records to the remote collection. A sync is always
 * one fetch, an in-memory merge of named folders, and one replace.
 */
export class CollectionSyncer {
   private readonly client: CollectionClient;
   private readonly store: StateStore;
   private readonly schema: SchemaSource;
   private readonly target: SyncTarget;
   private readonly hooks: HookRunner;
   private readonly logger: Logger;
   private readonly now: () => Date;

   constructor(options: CollectionSyncerOptions) {
      this.client = options.client;
      this.store = options.store;
      this.schema = options.schema;
      this.target = options.target;
      this.hooks = options.hooks ?? new HookRunner();
      this.logger = options.logger ?? defaultLogger.child('[sync]');
      this.now = options.now ?? (() => new Date());
   }

   get autoSyncReady(): boolean {
      return this.target.autoSync && this.store.getSettings().status === 'Active';
   }

   syncAll(records: readonly GenerationRecord[]): Promise<SyncOutcome> {
      return this.run(records, '*');
   }

   syncOne(record: GenerationRecord): Promise<SyncOutcome> {
      return this.run([record], record.targetName);
   }

   /**
    * Manual sync of every Active record. Skips unless auto-sync is enabled
    * (or `force` is set) and the settings status is Active; a failed sync
    * is raised as {@link SyncError}.
    */
   async syncNow(options: { force?: boolean } = {}): Promise<SyncNowResult> {
      if (!this.target.autoSync && !options.force) {
         this.logger.info('Auto-sync is disabled; nothing to do.');
         return { status: 'skipped', reason: 'auto-sync disabled' };
      }

      const { status } = this.store.getSettings();
      if (status !== 'Active') {
         this.logger.warn(`Settings status is ${status}; validate the connection first.`);
         return { status: 'skipped', reason: `settings status is ${status}` };
      }

      const outcome = await this.syncAll(this.store.list('Active'));
      if (outcome.status === 'failed') {
         throw new SyncError(`Failed to sync to Postman: ${outcome.message}`, outcome.step);
      }

      this.store.updateSettings({ lastSync: this.now().toISOString() });
      this.store.save();
      return outcome;
   }

   /**
    * Fetch the workspace and then the collection, recording the result
    * as the settings status.
    */
   async validateConnection(): Promise<ConnectionResult> {
      let result: ConnectionResult;
      try {
         const workspace = await this.client.getWorkspace(this.target.workspaceId);
         const tree = await this.client.getCollection(this.target.collectionId);
         this.store.updateSettings({ status: 'Active' });
         result = {
            status: 'success',
            message: `Connected to workspace "${workspace.name || workspace.id}" and collection "${tree.info.name}".`,
         };
      } catch (err) {
         this.store.updateSettings({ status: 'Error' });
         result = {
            status: 'error',
            message: `Error validating Postman connection: ${errorMessage(err)}`,
         };
      }
      this.store.save();
      return result;
   }

   async collectionInfo(): Promise<CollectionSummary> {
      const tree = await this.client.getCollection(this.target.collectionId);
      const { _postman_id: postmanId, updatedAt } = tree.info;
      return {
         id: typeof postmanId === 'string' ? postmanId : this.target.collectionId,
         name: tree.info.name,
         itemCount: tree.item.length,
         updatedAt: typeof updatedAt === 'string' ? updatedAt : undefined,
      };
   }

   /**
    * First top-level items of the collection with the names of their
    * first children.
    */
   async inspect(): Promise<InspectedItem[]> {
      const tree = await this.client.getCollection(this.target.collectionId);
      return tree.item.slice(0, INSPECT_ITEM_LIMIT).map((node) => ({
         name: node.name,
         subItemCount: node.item?.length,
         subItems: (node.item ?? []).slice(0, INSPECT_SUB_ITEM_LIMIT).map((c) => c.name),
      }));
   }

   /**
    * Replace the collection's items with an empty list. Info and other
    * top-level keys are kept.
    */
   async clear(): Promise<void> {
      const tree = await this.client.getCollection(this.target.collectionId);
      await this.client.replaceCollection(this.target.collectionId, { ...tree, item: [] });
      this.logger.info(`Cleared ${pluralize('item', tree.item.length, true)} from "${tree.info.name}".`);
   }

   createEnvironment(): Promise<{ id: string | undefined }> {
      return this.client.createEnvironment(environmentFor(this.target));
   }

   private async run(records: readonly GenerationRecord[], targetName: string): Promise<SyncOutcome> {
      const { collectionId } = this.target;
      let step: SyncStep = 'run-hooks';
      let folders: RemoteNode[];
      let itemCount: number;

      try {
         await this.hooks.run('preSync', { targetName });

         step = 'fetch-collection';
         const tree = await this.client.getCollection(collectionId);

         step = 'build-folders';
         const ctx = { schema: this.schema, baseUrl: this.target.baseUrl };
         const built = records.flatMap((r) => buildFoldersForRecord(r, ctx)).map(toRemoteFolder);
         folders = collapseDuplicateFolders(built, (name) =>
            this.logger.warn(`Folder "${name}" was built more than once; keeping the last one.`),
         );
         const merged = mergeFolders(tree.item, folders);
         itemCount = merged.length;

         step = 'replace-collection';
         await this.client.replaceCollection(collectionId, { ...tree, item: merged });
      } catch (err) {
         return this.fail(err instanceof RemoteServiceError ? err.step : step, err);
      }

      const names = folders.map((f) => f.name);
      this.logger.info(
         `Synced ${pluralize('folder', names.length, true)} to collection ${collectionId}.`,
      );

      try {
         await this.hooks.run('postSync', { targetName, folders: names });
      } catch (err) {
         this.logger.warn(`postSync hook failed for ${targetName}: ${errorMessage(err)}`);
      }

      return { status: 'synced', collectionId, folders: names, itemCount };
   }

   private fail(step: SyncStep, err: unknown): SyncOutcome {
      const message = errorMessage(err);
      if (err instanceof RemoteServiceError && err.status !== undefined) {
         this.logger.error(`Sync failed at ${step} (status ${err.status}): ${message}`, err.body);
      } else {
         this.logger.error(`Sync failed at ${step}: ${message}`);
      }
      return { status: 'failed', step, message };
   }
}
