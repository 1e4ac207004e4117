// src/core/request-renderer.ts

import type {
   EndpointDescriptor,
   FieldSchema,
   KeyValue,
   RecordTypeSchema,
   RequestBody,
   RequestTemplate,
   RequestUrl,
} from '../schema';
import { ADVANCED_QUERY_PATH } from './endpoint-builder';
import type { Outcome } from './errors';
import {
   buildFieldTemplate,
   CUSTOM_METHOD_BODY,
   genericFieldTemplate,
   type BodyTemplate,
} from './field-template';

const JSON_CONTENT_TYPE = 'application/json';

export const DEFAULT_HEADERS: readonly KeyValue[] = [
   { key: 'Content-Type', value: JSON_CONTENT_TYPE },
   { key: 'Authorization', value: 'token {{api_key}}' },
];

const URL_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):\/\/([^/?#]*)([^#]*)/;

function decodeComponent(text: string): string {
   const spaced = text.replace(/\+/g, ' ');
   try {
      return decodeURIComponent(spaced);
   } catch {
      return spaced;
   }
}

/**
 * Split a query string into ordered, percent-decoded pairs. Repeated
 * keys stay repeated.
 */
export function parseQuery(query: string): KeyValue[] {
   if (!query) return [];
   return query
      .split('&')
      .filter((part) => part !== '')
      .map((part) => {
         const eq = part.indexOf('=');
         return eq === -1
            ? { key: decodeComponent(part), value: '' }
            : { key: decodeComponent(part.slice(0, eq)), value: decodeComponent(part.slice(eq + 1)) };
      });
}

/**
 * Join `baseUrl` and `path` and break the result into its parts. Path
 * placeholders such as `{name}` are kept verbatim.
 */
export function buildRequestUrl(baseUrl: string, path: string): RequestUrl {
   const raw = `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
   const match = URL_PATTERN.exec(raw);

   const scheme = match?.[1] ?? 'http';
   const host = match?.[2] ?? '';
   const rest = match ? (match[3] ?? '') : raw;

   const q = rest.indexOf('?');
   const pathname = q === -1 ? rest : rest.slice(0, q);
   const query = q === -1 ? '' : rest.slice(q + 1);

   return {
      raw,
      scheme,
      host,
      pathSegments: pathname.split('/').filter(Boolean),
      queryParams: parseQuery(query),
   };
}

/**
 * Human label for a request, derived from its method and path shape.
 */
export function requestName(descriptor: EndpointDescriptor, recordTypeName: string): string {
   const { method, path } = descriptor;

   if (descriptor.isCustomMethod) {
      return `${method} ${descriptor.methodName ?? 'Custom Method'}`;
   }
   if (path.includes(ADVANCED_QUERY_PATH)) return `Advanced ${recordTypeName} Query`;

   const hasName = path.includes('{name}');
   switch (method) {
      case 'GET':
         return hasName ? `${recordTypeName} by ID` : `List ${recordTypeName} Records`;
      case 'POST':
         return `Create ${recordTypeName} Record`;
      case 'PUT':
      case 'PATCH':
         return hasName ? `Update ${recordTypeName} Record` : `${method} ${recordTypeName} Operation`;
      case 'DELETE':
         return hasName ? `Delete ${recordTypeName} Record` : `${method} ${recordTypeName} Operation`;
   }
}

function describe(descriptor: EndpointDescriptor, recordTypeName: string): string {
   let description = `Auto-generated API for ${recordTypeName} record type`;
   if (!descriptor.isCustomMethod) return description;

   description += `\n\nCustom Method: ${descriptor.methodName ?? 'Unknown'}`;
   description += `\nPath: ${descriptor.path}`;
   if (descriptor.parameters.length > 0) {
      description += '\n\nParameters:';
      for (const p of descriptor.parameters) {
         description += `\n- ${p.name} (${p.kind}): ${p.description}`;
      }
   }
   return description;
}

function jsonBody(template: BodyTemplate): RequestBody {
   return { mode: 'raw', raw: JSON.stringify(template, null, 2), contentType: JSON_CONTENT_TYPE };
}

function hasBody(descriptor: EndpointDescriptor): boolean {
   return descriptor.method === 'POST' || descriptor.method === 'PUT' || descriptor.method === 'PATCH';
}

export interface RenderOptions {
   baseUrl: string;
}

/**
 * Render one endpoint into a request template. `schema` is the outcome
 * of looking up the record type; a failed lookup only degrades the
 * body to a generic three-field skeleton.
 */
export function renderRequest(
   descriptor: EndpointDescriptor,
   recordTypeName: string,
   schema: Outcome<RecordTypeSchema> | FieldSchema[],
   options: RenderOptions,
): RequestTemplate {
   let body: RequestBody | undefined;
   if (hasBody(descriptor)) {
      if (descriptor.isCustomMethod) {
         body = jsonBody(CUSTOM_METHOD_BODY);
      } else {
         const fields = Array.isArray(schema) ? schema : schema.ok ? schema.value.fields : undefined;
         body = jsonBody(
            fields ? buildFieldTemplate(recordTypeName, fields) : genericFieldTemplate(recordTypeName),
         );
      }
   }

   return {
      name: requestName(descriptor, recordTypeName),
      method: descriptor.method,
      url: buildRequestUrl(options.baseUrl, descriptor.path),
      headers: DEFAULT_HEADERS.map((h) => ({ ...h })),
      body,
      description: describe(descriptor, recordTypeName),
   };
}
