// src/core/generator.ts

import pluralize from 'pluralize';

import type {
   EndpointDescriptor,
   FieldType,
   GenerationRecord,
   ModuleGenerationRecord,
   SingleGenerationRecord,
} from '../schema';
import { defaultLogger, type Logger } from '../util/logger';
import { resourcePath, type EndpointBuilder } from './endpoint-builder';
import { errorMessage, ok, skip, type Outcome } from './errors';
import { HookRunner } from './hook-runner';
import type { SchemaSource } from './schema-source';
import type { StateStore } from './state-store';
import type { CollectionSyncer } from './sync';

/**
 * Platform record types that never get generated automatically.
 */
export const SYSTEM_RECORD_TYPES: ReadonlySet<string> = new Set([
   'DocType',
   'DocField',
   'Custom Field',
   'Property Setter',
   'Custom DocPerm',
   'User',
   'Role',
   'Permission',
   'Has Role',
   'Communication',
   'Version',
   'Error Log',
   'Activity Log',
   'File',
   'ToDo',
   'Comment',
   'Assignment',
   'Tag',
   'Tag Link',
]);

export function isSystemRecordType(name: string): boolean {
   return SYSTEM_RECORD_TYPES.has(name);
}

export function moduleRecordName(moduleName: string): string {
   return `${moduleName} Module`;
}

export interface BulkResult {
   name: string;
   status: 'success' | 'error';
   message?: string;
}

export interface DocumentedField {
   name: string;
   label: string;
   kind: FieldType;
   required: boolean;
   readOnly: boolean;
   options?: string;
}

interface ExampleRequest {
   method: string;
   url: string;
   headers: Record<string, string>;
   body?: Record<string, string>;
}

export interface ApiDocumentation {
   recordType: string;
   module: string;
   description: string;
   fields: DocumentedField[];
   endpoints: EndpointDescriptor[];
   authentication: { type: string; header: string; description: string };
   baseUrl: string;
   examples: { createRecord: ExampleRequest; getRecords: ExampleRequest };
}

export interface GenerationServiceOptions {
   schema: SchemaSource;
   builder: EndpointBuilder;
   store: StateStore;
   baseUrl: string;
   /**
    * When present, records are pushed after generation if auto-sync is
    * enabled and the settings status is Active.
    */
   syncer?: CollectionSyncer;
   hooks?: HookRunner;
   logger?: Logger;
   now?: () => Date;
}

interface GenerateOptions {
   createdByHook?: boolean;
   /**
    * Push the record once generated. Default true.
    */
   sync?: boolean;
}

const AUTH_HEADER = 'token <your_api_key>';

/**
 * Creates and refreshes generation records, then hands them to the
 * syncer. Missing record types and failing hooks are logged and
 * reported as skipped outcomes.
 */
export class GenerationService {
   private readonly logger: Logger;
   private readonly hooks: HookRunner;
   private readonly now: () => Date;

   constructor(private readonly options: GenerationServiceOptions) {
      this.logger = options.logger ?? defaultLogger.child('[generate]');
      this.hooks = options.hooks ?? new HookRunner();
      this.now = options.now ?? (() => new Date());
   }

   async generateForRecordType(
      name: string,
      opts: GenerateOptions = {},
   ): Promise<Outcome<SingleGenerationRecord>> {
      const { schema, builder, store } = this.options;
      const existing = store.get(name);

      const meta = schema.getRecordType(name);
      if (!meta.ok) {
         this.logger.warn(`Skipping ${name}: ${meta.reason}`);
         this.markError(existing);
         return skip(meta.reason);
      }

      const pre = await this.runHook('preGenerate', name, 'single');
      if (!pre.ok) return skip(pre.reason);

      let endpoints: EndpointDescriptor[];
      try {
         endpoints = builder.buildCrudEndpoints(name);
      } catch (err) {
         const reason = `error generating APIs for ${name}: ${errorMessage(err)}`;
         this.logger.error(reason);
         this.markError(existing);
         return skip(reason);
      }

      const record: SingleGenerationRecord = {
         kind: 'single',
         name,
         targetName: name,
         moduleName: meta.value.module,
         endpoints,
         status: 'Active',
         autoGenerate: existing?.autoGenerate ?? true,
         createdByHook: existing?.createdByHook ?? opts.createdByHook ?? false,
         description: existing?.description,
         collectionTitle: existing?.collectionTitle,
         updatedAt: this.now().toISOString(),
      };

      await this.persist(record, opts);
      return ok(record);
   }

   /**
    * One record for every non-table record type of `moduleName`. Types
    * whose endpoints cannot be built are left out.
    */
   async generateForModule(
      moduleName: string,
      opts: GenerateOptions = {},
   ): Promise<Outcome<ModuleGenerationRecord>> {
      const { schema, builder, store } = this.options;

      const name = moduleRecordName(moduleName);
      const existing = store.get(name, 'module');

      const types = schema.listRecordTypes(moduleName);
      if (types.length === 0) {
         const reason = `no record types found in module "${moduleName}"`;
         this.logger.warn(`Skipping module ${moduleName}: ${reason}`);
         this.markError(existing);
         return skip(reason);
      }

      const pre = await this.runHook('preGenerate', moduleName, 'module');
      if (!pre.ok) return skip(pre.reason);

      const endpoints: Record<string, EndpointDescriptor[]> = {};
      for (const typeName of types) {
         try {
            endpoints[typeName] = builder.buildCrudEndpoints(typeName);
         } catch (err) {
            this.logger.error(`Error generating APIs for ${typeName}: ${errorMessage(err)}`);
         }
      }

      const generated = Object.keys(endpoints).length;
      const record: ModuleGenerationRecord = {
         kind: 'module',
         name,
         targetName: moduleName,
         moduleName,
         endpoints,
         status: 'Active',
         autoGenerate: existing?.autoGenerate ?? false,
         createdByHook: existing?.createdByHook ?? opts.createdByHook ?? false,
         description: `Generated APIs for ${pluralize('record type', generated, true)} in module ${moduleName}`,
         collectionTitle: `${moduleName} Module API Collection`,
         updatedAt: this.now().toISOString(),
      };

      await this.persist(record, opts);
      return ok(record);
   }

   async bulkGenerate(names: string[]): Promise<BulkResult[]> {
      const results: BulkResult[] = [];
      for (const name of names) {
         const outcome = await this.generateForRecordType(name);
         results.push(
            outcome.ok ? { name, status: 'success' } : { name, status: 'error', message: outcome.reason },
         );
      }
      return results;
   }

   /**
    * Generate a record for every non-system, non-table record type that
    * has none yet, then push all of them in a single sync.
    */
   async backfill(): Promise<SingleGenerationRecord[]> {
      const { schema, store, syncer } = this.options;
      const created: SingleGenerationRecord[] = [];

      for (const name of schema.listRecordTypes()) {
         if (isSystemRecordType(name) || store.has(name)) continue;
         const outcome = await this.generateForRecordType(name, { sync: false });
         if (outcome.ok) created.push(outcome.value);
      }

      this.logger.info(`Created generation records for ${pluralize('existing record type', created.length, true)}.`);

      if (created.length > 0 && syncer?.autoSyncReady) {
         await syncer.syncAll(created);
      }
      return created;
   }

   async onRecordTypeCreated(name: string): Promise<Outcome<SingleGenerationRecord>> {
      if (isSystemRecordType(name)) {
         this.logger.debug(`Skipping system record type ${name}.`);
         return skip(`${name} is a system record type`);
      }
      if (this.options.store.has(name)) {
         this.logger.debug(`Generation record for ${name} already exists.`);
         return skip(`generation record for ${name} already exists`);
      }
      return this.generateForRecordType(name, { createdByHook: true });
   }

   /**
    * Regenerate on schema change, creating the record if it is missing.
    * Records with auto-generation switched off are left alone.
    */
   async onRecordTypeUpdated(name: string): Promise<Outcome<SingleGenerationRecord>> {
      if (isSystemRecordType(name)) {
         return skip(`${name} is a system record type`);
      }
      const existing = this.options.store.get(name);
      if (existing && !existing.autoGenerate) {
         this.logger.debug(`Auto-generation disabled for ${name}.`);
         return skip(`auto-generation disabled for ${name}`);
      }
      return this.generateForRecordType(name, { createdByHook: true });
   }

   onInstalled(): Promise<SingleGenerationRecord[]> {
      return this.backfill();
   }

   getApiDocumentation(recordTypeName: string): Outcome<ApiDocumentation> {
      const meta = this.options.schema.getRecordType(recordTypeName);
      if (!meta.ok) return skip(meta.reason);

      const endpoints = this.storedEndpoints(recordTypeName);
      if (!endpoints) return skip(`no generation record covers ${recordTypeName}`);

      const url = resourcePath(recordTypeName);
      return ok({
         recordType: recordTypeName,
         module: meta.value.module,
         description: meta.value.description ?? `API endpoints for ${recordTypeName}`,
         fields: meta.value.fields
            .filter((f) => !f.hidden)
            .map((f) => ({
               name: f.name,
               label: f.label,
               kind: f.kind,
               required: f.required,
               readOnly: f.readOnly,
               options: f.kind === 'Link' || f.kind === 'Select' ? f.options : undefined,
            })),
         endpoints,
         authentication: {
            type: 'Token',
            header: `Authorization: ${AUTH_HEADER}`,
            description: 'Include your API key in the Authorization header',
         },
         baseUrl: this.options.baseUrl,
         examples: {
            createRecord: {
               method: 'POST',
               url,
               headers: { 'Content-Type': 'application/json', Authorization: AUTH_HEADER },
               body: { field_name: 'field_value' },
            },
            getRecords: {
               method: 'GET',
               url,
               headers: { Authorization: AUTH_HEADER },
            },
         },
      });
   }

   private storedEndpoints(recordTypeName: string): EndpointDescriptor[] | undefined {
      const own = this.options.store.get(recordTypeName);
      if (own?.kind === 'single') return own.endpoints;

      for (const record of this.options.store.list()) {
         if (record.kind === 'module' && recordTypeName in record.endpoints) {
            return record.endpoints[recordTypeName];
         }
      }
      return undefined;
   }

   /**
    * Take a record whose regeneration failed out of syncing until it is
    * regenerated successfully.
    */
   private markError(record: GenerationRecord | undefined): void {
      if (!record || record.status === 'Error') return;
      const { store } = this.options;
      store.set({ ...record, status: 'Error', updatedAt: this.now().toISOString() });
      store.save();
      this.logger.warn(`Marked generation record ${record.name} as Error.`);
   }

   private async runHook(
      kind: 'preGenerate' | 'postGenerate',
      targetName: string,
      generationKind: GenerationRecord['kind'],
      record?: GenerationRecord,
   ): Promise<Outcome<void>> {
      try {
         await this.hooks.run(kind, { targetName, generationKind, record });
         return ok(undefined);
      } catch (err) {
         const reason = `${kind} hook failed for ${targetName}: ${errorMessage(err)}`;
         this.logger.error(reason);
         return skip(reason);
      }
   }

   private async persist(record: GenerationRecord, opts: GenerateOptions): Promise<void> {
      const { store, syncer } = this.options;
      store.set(record);
      store.save();

      const count =
         record.kind === 'single'
            ? record.endpoints.length
            : Object.values(record.endpoints).reduce((n, list) => n + list.length, 0);
      this.logger.info(`Generated ${pluralize('endpoint', count, true)} for ${record.name}.`);

      await this.runHook('postGenerate', record.targetName, record.kind, record);

      if (opts.sync !== false && syncer?.autoSyncReady) {
         await syncer.syncOne(record);
      }
   }
}
