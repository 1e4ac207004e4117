// src/schema/endpoint.ts

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export const PARAMETER_KINDS = ['path', 'query', 'body'] as const;

export type ParameterKind = (typeof PARAMETER_KINDS)[number];

export interface EndpointParameter {
   readonly name: string;
   readonly kind: ParameterKind;
   readonly description: string;
   readonly required: boolean;
}

/**
 * A single REST endpoint generated for a record type.
 */
export interface EndpointDescriptor {
   readonly method: HttpMethod;
   /**
    * Path template, e.g. `/api/resource/Invoice/{name}`.
    */
   readonly path: string;
   readonly description: string;
   readonly parameters: readonly EndpointParameter[];
   readonly isCustomMethod: boolean;
   readonly methodName?: string;
   readonly source?: string;
}

/**
 * A remotely callable method found by discovery, before it is turned
 * into an endpoint.
 */
export interface DiscoveredMethod {
   /**
    * Dotted import path, e.g. `billing.billing.doctype.invoice.invoice.submit_invoice`.
    */
   path: string;
   methodName: string;
   description: string;
   /**
    * Where the method came from: `manifest`, `registry`, or the scanned
    * file's path relative to the package root.
    */
   source: string;
}
