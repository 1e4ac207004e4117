// src/core/endpoint-builder.ts

import type { DiscoveredMethod, EndpointDescriptor, EndpointParameter } from '../schema';
import { toSnakeName } from '../util/naming';
import { defaultLogger, type Logger } from '../util/logger';
import { errorMessage } from './errors';
import type { MethodDiscovery } from './method-discovery';
import type { SchemaSource } from './schema-source';

/**
 * Generic report-view method used for filtered queries on any record type.
 */
export const ADVANCED_QUERY_PATH = '/api/method/frappe.desk.reportview.get';

export function resourcePath(recordTypeName: string): string {
   return `/api/resource/${recordTypeName}`;
}

function param(
   name: string,
   kind: EndpointParameter['kind'],
   description: string,
   required = false,
): EndpointParameter {
   return Object.freeze({ name, kind, description, required });
}

function freeze(descriptor: EndpointDescriptor): EndpointDescriptor {
   return Object.freeze({ ...descriptor, parameters: Object.freeze([...descriptor.parameters]) });
}

/**
 * The six standard endpoints every record type gets: list, get, create,
 * update, delete and the advanced query.
 */
export function buildStandardEndpoints(recordTypeName: string): EndpointDescriptor[] {
   const collection = resourcePath(recordTypeName);
   const item = `${collection}/{name}`;
   const nameParam = param('name', 'path', 'Document name', true);

   const endpoints: EndpointDescriptor[] = [
      {
         method: 'GET',
         path: collection,
         description: `Get list of ${recordTypeName} records`,
         parameters: [
            param('filters', 'query', 'JSON filters'),
            param('fields', 'query', 'Fields to fetch'),
            param('limit_page_length', 'query', 'Number of records per page'),
            param('limit_start', 'query', 'Starting record number'),
         ],
         isCustomMethod: false,
      },
      {
         method: 'GET',
         path: item,
         description: `Get specific ${recordTypeName} record by name`,
         parameters: [nameParam],
         isCustomMethod: false,
      },
      {
         method: 'POST',
         path: collection,
         description: `Create new ${recordTypeName} record`,
         parameters: [param('body', 'body', 'Document data', true)],
         isCustomMethod: false,
      },
      {
         method: 'PUT',
         path: item,
         description: `Update existing ${recordTypeName} record`,
         parameters: [nameParam, param('body', 'body', 'Updated document data', true)],
         isCustomMethod: false,
      },
      {
         method: 'DELETE',
         path: item,
         description: `Delete ${recordTypeName} record`,
         parameters: [nameParam],
         isCustomMethod: false,
      },
      {
         method: 'GET',
         path: ADVANCED_QUERY_PATH,
         description: `Get ${recordTypeName} records with advanced filtering`,
         parameters: [
            param('doctype', 'query', 'Record type name', true),
            param('filters', 'query', 'JSON filters'),
            param('fields', 'query', 'Fields to fetch'),
            param('order_by', 'query', 'Order by field'),
         ],
         isCustomMethod: false,
      },
   ];

   return endpoints.map(freeze);
}

export function customMethodEndpoint(method: DiscoveredMethod): EndpointDescriptor {
   return freeze({
      method: 'POST',
      path: `/api/method/${method.path}`,
      description: method.description,
      parameters: [
         param('args', 'body', 'Method arguments'),
         param('kwargs', 'body', 'Method keyword arguments'),
      ],
      isCustomMethod: true,
      methodName: method.methodName,
      source: method.source,
   });
}

/**
 * Methods whose path mentions the record type's snake-cased name.
 */
export function methodsForRecordType(methods: DiscoveredMethod[], recordTypeName: string): DiscoveredMethod[] {
   const needle = toSnakeName(recordTypeName);
   return methods.filter((m) => m.path.toLowerCase().includes(needle));
}

export interface EndpointBuilderOptions {
   schema: SchemaSource;
   discovery: MethodDiscovery;
   logger?: Logger;
}

/**
 * Builds the endpoint list of a record type: the standard set followed
 * by the custom methods discovered for its grouping.
 */
export class EndpointBuilder {
   private readonly logger: Logger;

   constructor(private readonly options: EndpointBuilderOptions) {
      this.logger = options.logger ?? defaultLogger.child('[endpoints]');
   }

   buildCrudEndpoints(recordTypeName: string): EndpointDescriptor[] {
      const endpoints = buildStandardEndpoints(recordTypeName);
      return [...endpoints, ...this.customEndpoints(recordTypeName)];
   }

   private customEndpoints(recordTypeName: string): EndpointDescriptor[] {
      const meta = this.options.schema.getRecordType(recordTypeName);
      if (!meta.ok) {
         this.logger.debug(`No custom methods for ${recordTypeName}: ${meta.reason}`);
         return [];
      }

      try {
         const methods = this.options.discovery.discoverMethods(meta.value.module);
         return methodsForRecordType(methods, recordTypeName).map(customMethodEndpoint);
      } catch (err) {
         this.logger.warn(`Method discovery failed for ${recordTypeName}: ${errorMessage(err)}`);
         return [];
      }
   }
}
