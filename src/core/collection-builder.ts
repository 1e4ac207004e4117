// src/core/collection-builder.ts

import pluralize from 'pluralize';

import type {
   EndpointDescriptor,
   Folder,
   GenerationRecord,
   RemoteNode,
   RequestTemplate,
} from '../schema';
import type { SchemaSource } from './schema-source';
import { renderRequest } from './request-renderer';

/**
 * Module names that do not make a useful folder; record-type folders
 * are placed at top level instead.
 */
const UNGROUPED_MODULES = new Set(['', 'unknown']);

export function hasMeaningfulModule(moduleName: string | undefined): boolean {
   return moduleName !== undefined && !UNGROUPED_MODULES.has(moduleName.trim().toLowerCase());
}

export interface FolderBuildContext {
   schema: SchemaSource;
   baseUrl: string;
}

export function buildRecordTypeFolder(
   recordTypeName: string,
   endpoints: readonly EndpointDescriptor[],
   ctx: FolderBuildContext,
): Folder {
   const schema = ctx.schema.getRecordType(recordTypeName);
   return {
      name: recordTypeName,
      description: `Auto-generated CRUD APIs for ${recordTypeName}`,
      children: endpoints.map((e) =>
         renderRequest(e, recordTypeName, schema, { baseUrl: ctx.baseUrl }),
      ),
   };
}

/**
 * Folders a generation record contributes to the collection's top level.
 *
 * - single: one folder named after the record type.
 * - module: one folder named after the module wrapping a folder per
 *   record type, or those record-type folders directly when the module
 *   has no usable name.
 */
export function buildFoldersForRecord(record: GenerationRecord, ctx: FolderBuildContext): Folder[] {
   if (record.kind === 'single') {
      return [buildRecordTypeFolder(record.targetName, record.endpoints, ctx)];
   }

   const typeFolders = Object.entries(record.endpoints).map(([typeName, endpoints]) =>
      buildRecordTypeFolder(typeName, endpoints, ctx),
   );

   if (!hasMeaningfulModule(record.moduleName)) return typeFolders;

   return [
      {
         name: record.moduleName,
         description: `Generated APIs for ${pluralize('record type', typeFolders.length, true)} in module ${record.moduleName}`,
         children: typeFolders,
      },
   ];
}

function isFolder(node: Folder | RequestTemplate): node is Folder {
   return 'children' in node;
}

/**
 * Postman v2.1 representation of a request template.
 */
export function toRemoteRequest(template: RequestTemplate): RemoteNode {
   const url: Record<string, unknown> = {
      raw: template.url.raw,
      protocol: template.url.scheme,
      host: template.url.host ? [template.url.host] : [],
      path: template.url.pathSegments,
   };
   if (template.url.queryParams.length > 0) {
      url.query = template.url.queryParams.map((q) => ({ ...q }));
   }

   const request: Record<string, unknown> = {
      method: template.method,
      header: template.headers.map((h) => ({ ...h })),
      url,
      description: template.description,
   };
   if (template.body) {
      request.body = {
         mode: template.body.mode,
         raw: template.body.raw,
         options: { raw: { language: 'json' } },
      };
   }

   return { name: template.name, request, response: [] };
}

/**
 * Postman v2.1 representation of a folder and everything under it.
 */
export function toRemoteFolder(folder: Folder): RemoteNode {
   const node: RemoteNode = {
      name: folder.name,
      item: folder.children.map((c) => (isFolder(c) ? toRemoteFolder(c) : toRemoteRequest(c))),
   };
   if (folder.description !== undefined) node.description = folder.description;
   return node;
}
