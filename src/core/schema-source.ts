// src/core/schema-source.ts

import fs from 'fs';
import path from 'path';
import { minimatch } from 'minimatch';

import { isFieldType, type FieldSchema, type RecordTypeSchema } from '../schema';
import { listFilesSync, relativeInside } from '../util/fs-utils';
import { defaultLogger, type Logger } from '../util/logger';
import { errorMessage, ok, skip, type Outcome } from './errors';

/**
 * Read access to record-type definitions.
 */
export interface SchemaSource {
   getRecordType(name: string): Outcome<RecordTypeSchema>;

   /**
    * Names of non-table record types, optionally limited to one module,
    * in name order.
    */
   listRecordTypes(module?: string): string[];

   exists(name: string): boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function truthy(value: unknown): boolean {
   return value === true || value === 1 || value === '1';
}

function optionalString(value: unknown): string | undefined {
   return typeof value === 'string' && value !== '' ? value : undefined;
}

function parseField(raw: unknown): FieldSchema | null {
   if (!isRecord(raw)) return null;
   const name = raw.fieldname;
   if (typeof name !== 'string' || name === '') return null;

   return {
      name,
      label: typeof raw.label === 'string' ? raw.label : name,
      kind: isFieldType(raw.fieldtype) ? raw.fieldtype : 'Data',
      required: truthy(raw.reqd),
      readOnly: truthy(raw.read_only),
      hidden: truthy(raw.hidden),
      options: optionalString(raw.options),
      description: optionalString(raw.description),
   };
}

/**
 * Turn a parsed schema file into a {@link RecordTypeSchema}. Fields
 * without a field name are dropped.
 */
export function parseRecordType(raw: unknown): Outcome<RecordTypeSchema> {
   if (!isRecord(raw)) return skip('schema is not a JSON object');
   const name = raw.name;
   if (typeof name !== 'string' || name === '') return skip('schema has no "name"');

   const fields = Array.isArray(raw.fields)
      ? raw.fields.flatMap((f) => {
         const parsed = parseField(f);
         return parsed ? [parsed] : [];
      })
      : [];

   return ok({
      name,
      module: typeof raw.module === 'string' ? raw.module : '',
      isTable: truthy(raw.istable),
      description: optionalString(raw.description),
      fields,
   });
}

function sortedNames(types: Iterable<RecordTypeSchema>, module?: string): string[] {
   const names: string[] = [];
   for (const t of types) {
      if (t.isTable) continue;
      if (module !== undefined && t.module !== module) continue;
      names.push(t.name);
   }
   return names.sort((a, b) => a.localeCompare(b));
}

/**
 * Schema source backed by a fixed list, for programmatic use.
 */
export class InMemorySchemaSource implements SchemaSource {
   private readonly types = new Map<string, RecordTypeSchema>();

   constructor(types: RecordTypeSchema[] = []) {
      for (const t of types) this.types.set(t.name, t);
   }

   getRecordType(name: string): Outcome<RecordTypeSchema> {
      const found = this.types.get(name);
      return found ? ok(found) : skip(`record type "${name}" not found`);
   }

   listRecordTypes(module?: string): string[] {
      return sortedNames(this.types.values(), module);
   }

   exists(name: string): boolean {
      return this.types.has(name);
   }
}

export const DEFAULT_SCHEMA_INCLUDE = ['**/doctype/*/*.json'];

const DEFAULT_SCHEMA_IGNORE = ['node_modules/**', '.git/**', 'dist/**'];

export interface FileSchemaSourceOptions {
   root: string;
   include?: string[];
   ignore?: string[];
   logger?: Logger;
}

/**
 * Schema source reading one JSON file per record type. The directory is
 * indexed on first use; call {@link FileSchemaSource.reload} after files
 * change.
 */
export class FileSchemaSource implements SchemaSource {
   private readonly root: string;
   private readonly include: string[];
   private readonly ignore: string[];
   private readonly logger: Logger;
   private index: Map<string, { file: string; schema: RecordTypeSchema }> | undefined;

   constructor(options: FileSchemaSourceOptions) {
      this.root = path.resolve(options.root);
      this.include = options.include ?? DEFAULT_SCHEMA_INCLUDE;
      this.ignore = options.ignore ?? DEFAULT_SCHEMA_IGNORE;
      this.logger = options.logger ?? defaultLogger.child('[schema]');
   }

   get rootDir(): string {
      return this.root;
   }

   /**
    * Whether `absPath` is a schema file this source would read.
    */
   matches(absPath: string): boolean {
      const rel = relativeInside(this.root, absPath);
      if (rel === null || rel === '') return false;
      if (this.ignore.some((p) => minimatch(rel, p, { dot: true }))) return false;
      return this.include.some((p) => minimatch(rel, p, { dot: true }));
   }

   reload(): void {
      this.index = undefined;
   }

   /**
    * Parse a single schema file without touching the index.
    */
   readFile(absPath: string): Outcome<RecordTypeSchema> {
      let raw: unknown;
      try {
         raw = JSON.parse(fs.readFileSync(absPath, 'utf8'));
      } catch (err) {
         return skip(`cannot read ${absPath}: ${errorMessage(err)}`);
      }
      return parseRecordType(raw);
   }

   getRecordType(name: string): Outcome<RecordTypeSchema> {
      const entry = this.load().get(name);
      return entry ? ok(entry.schema) : skip(`record type "${name}" not found under ${this.root}`);
   }

   listRecordTypes(module?: string): string[] {
      return sortedNames([...this.load().values()].map((e) => e.schema), module);
   }

   exists(name: string): boolean {
      return this.load().has(name);
   }

   private load(): Map<string, { file: string; schema: RecordTypeSchema }> {
      if (this.index) return this.index;

      const index = new Map<string, { file: string; schema: RecordTypeSchema }>();
      const files = listFilesSync(this.root, {
         skipDir: (name) => name === 'node_modules' || name === '.git',
         onError: (dir, err) => this.logger.warn(`Cannot read ${dir}, skipping.`, err),
      }).filter((abs) => this.matches(abs));

      for (const file of files) {
         const parsed = this.readFile(file);
         if (!parsed.ok) {
            this.logger.warn(`Skipping schema file: ${parsed.reason}`);
            continue;
         }
         const existing = index.get(parsed.value.name);
         if (existing) {
            this.logger.warn(
               `Record type "${parsed.value.name}" defined in both ${existing.file} and ${file}; using the latter.`,
            );
         }
         index.set(parsed.value.name, { file, schema: parsed.value });
      }

      this.logger.debug(`Indexed ${index.size} record type(s) under ${this.root}.`);
      this.index = index;
      return index;
   }
}
