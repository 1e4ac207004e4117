// src/schema/generation.ts

import type { EndpointDescriptor } from './endpoint';

export type GenerationKind = 'single' | 'module';

export type RecordStatus = 'Active' | 'Inactive' | 'Error';

interface GenerationRecordBase {
   /**
    * Record key. The record type name for single records,
    * `"<Module> Module"` for module records.
    */
   name: string;
   status: RecordStatus;
   autoGenerate: boolean;
   /**
    * True when a lifecycle hook (record type created/updated) produced it.
    */
   createdByHook: boolean;
   description?: string;
   collectionTitle?: string;
   updatedAt: string;
}

export interface SingleGenerationRecord extends GenerationRecordBase {
   kind: 'single';
   targetName: string;
   moduleName?: string;
   endpoints: EndpointDescriptor[];
}

export interface ModuleGenerationRecord extends GenerationRecordBase {
   kind: 'module';
   targetName: string;
   moduleName: string;
   endpoints: Record<string, EndpointDescriptor[]>;
}

export type GenerationRecord = SingleGenerationRecord | ModuleGenerationRecord;

export type SettingsStatus = 'Active' | 'Inactive' | 'Error';
