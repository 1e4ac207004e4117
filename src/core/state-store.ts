// src/core/state-store.ts

import fs from 'fs';
import path from 'path';

import {
   HTTP_METHODS,
   PARAMETER_KINDS,
   type EndpointDescriptor,
   type EndpointParameter,
   type GenerationKind,
   type GenerationRecord,
   type RecordStatus,
   type SettingsStatus,
} from '../schema';
import { writeFileAtomicSync } from '../util/fs-utils';
import { defaultLogger } from '../util/logger';

const logger = defaultLogger.child('[state]');

export interface SettingsState {
   status: SettingsStatus;
   lastSync?: string;
}

/**
 * Records are keyed by {@link recordKey}, so a single record and a module
 * record may share a name.
 */
export interface StateFile {
   version: 1;
   settings: SettingsState;
   records: Record<string, GenerationRecord>;
}

export function recordKey(kind: GenerationKind, name: string): string {
   return `${kind}:${name}`;
}

function emptyState(): StateFile {
   return { version: 1, settings: { status: 'Inactive' }, records: {} };
}

function isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const RECORD_STATUSES: readonly RecordStatus[] = ['Active', 'Inactive', 'Error'];

function isStatus(value: unknown): value is RecordStatus {
   return RECORD_STATUSES.some((s) => s === value);
}

function isOptionalString(value: unknown): boolean {
   return value === undefined || typeof value === 'string';
}

function isParameter(value: unknown): value is EndpointParameter {
   if (!isRecord(value)) return false;
   const { kind } = value;
   return (
      typeof value.name === 'string' &&
      PARAMETER_KINDS.some((k) => k === kind) &&
      typeof value.description === 'string' &&
      typeof value.required === 'boolean'
   );
}

function isEndpoint(value: unknown): value is EndpointDescriptor {
   if (!isRecord(value)) return false;
   const { method, parameters } = value;
   return (
      HTTP_METHODS.some((m) => m === method) &&
      typeof value.path === 'string' &&
      typeof value.description === 'string' &&
      Array.isArray(parameters) &&
      parameters.every(isParameter) &&
      typeof value.isCustomMethod === 'boolean' &&
      isOptionalString(value.methodName) &&
      isOptionalString(value.source)
   );
}

function isEndpointList(value: unknown): value is EndpointDescriptor[] {
   return Array.isArray(value) && value.every(isEndpoint);
}

/**
 * Shape check for a persisted generation record, down to every endpoint
 * and parameter. Entries that fail it are dropped on load.
 */
export function isGenerationRecord(value: unknown): value is GenerationRecord {
   if (!isRecord(value)) return false;
   if (typeof value.name !== 'string' || typeof value.targetName !== 'string') return false;
   if (!isStatus(value.status)) return false;
   if (typeof value.autoGenerate !== 'boolean' || typeof value.createdByHook !== 'boolean') return false;
   if (typeof value.updatedAt !== 'string') return false;
   if (!isOptionalString(value.description) || !isOptionalString(value.collectionTitle)) return false;

   if (value.kind === 'single') {
      return isOptionalString(value.moduleName) && isEndpointList(value.endpoints);
   }
   if (value.kind === 'module') {
      return (
         typeof value.moduleName === 'string' &&
         isRecord(value.endpoints) &&
         Object.values(value.endpoints).every(isEndpointList)
      );
   }
   return false;
}

function parseState(raw: unknown): StateFile | null {
   if (!isRecord(raw) || raw.version !== 1) return null;

   const settings: SettingsState = { status: 'Inactive' };
   if (isRecord(raw.settings)) {
      if (isStatus(raw.settings.status)) settings.status = raw.settings.status;
      if (typeof raw.settings.lastSync === 'string') settings.lastSync = raw.settings.lastSync;
   }

   const records: Record<string, GenerationRecord> = {};
   if (isRecord(raw.records)) {
      for (const [key, value] of Object.entries(raw.records)) {
         if (isGenerationRecord(value)) {
            records[recordKey(value.kind, value.name)] = value;
         } else {
            logger.warn(`Dropping malformed generation record "${key}" from state file.`);
         }
      }
   }

   return { version: 1, settings, records };
}

/**
 * Generation records and settings status, persisted as a JSON file.
 */
export class StateStore {
   private state: StateFile = emptyState();

   constructor(
      private readonly projectRoot: string,
      private readonly stateFileRelPath: string,
   ) { }

   get statePathAbs(): string {
      return path.resolve(this.projectRoot, this.stateFileRelPath);
   }

   load(): void {
      const statePath = this.statePathAbs;
      if (!fs.existsSync(statePath)) {
         this.state = emptyState();
         return;
      }

      try {
         const parsed = parseState(JSON.parse(fs.readFileSync(statePath, 'utf8')));
         if (parsed) {
            this.state = parsed;
         } else {
            logger.warn('State file version mismatch or invalid, resetting state.');
            this.state = emptyState();
         }
      } catch (err) {
         logger.warn('Failed to read state file, resetting state.', err);
         this.state = emptyState();
      }
   }

   save(): void {
      writeFileAtomicSync(this.statePathAbs, JSON.stringify(this.state, null, 2));
   }

   getSettings(): SettingsState {
      return { ...this.state.settings };
   }

   updateSettings(patch: Partial<SettingsState>): void {
      this.state.settings = { ...this.state.settings, ...patch };
   }

   get(name: string, kind: GenerationKind = 'single'): GenerationRecord | undefined {
      return this.state.records[recordKey(kind, name)];
   }

   has(name: string, kind: GenerationKind = 'single'): boolean {
      return recordKey(kind, name) in this.state.records;
   }

   set(record: GenerationRecord): void {
      this.state.records[recordKey(record.kind, record.name)] = record;
   }

   /**
    * Records in insertion order, optionally only those with `status`.
    */
   list(status?: RecordStatus): GenerationRecord[] {
      const all = Object.values(this.state.records);
      return status ? all.filter((r) => r.status === status) : all;
   }
}
