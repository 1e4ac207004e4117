// src/core/collection-client.ts

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse, type Method } from 'axios';

import type { CollectionTree, RemoteNode } from '../schema';
import { defaultLogger, type Logger } from '../util/logger';
import { RemoteServiceError, type SyncStep } from './errors';

export const DEFAULT_API_BASE_URL = 'https://api.getpostman.com';

export const DEFAULT_TIMEOUT_MS = 10_000;

export interface EnvironmentValue {
   key: string;
   value: string;
   enabled: boolean;
   type?: 'default' | 'secret';
   description?: string;
}

export interface EnvironmentPayload {
   name: string;
   values: EnvironmentValue[];
}

export interface WorkspaceSummary {
   id: string;
   name: string;
}

export interface CollectionClientOptions {
   apiKey: string;
   apiBaseUrl?: string;
   timeoutMs?: number;
   /**
    * Replaces the network layer; tests pass an in-process adapter.
    */
   adapter?: AxiosAdapter;
   logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isRemoteNode(value: unknown): value is RemoteNode {
   if (!isRecord(value) || typeof value.name !== 'string') return false;
   return value.item === undefined || (Array.isArray(value.item) && value.item.every(isRemoteNode));
}

/**
 * Validate a `GET /collections/{id}` body and pull out the tree.
 */
export function parseCollectionResponse(data: unknown): CollectionTree | null {
   if (!isRecord(data) || !isRecord(data.collection)) return null;
   const { info, item, ...rest } = data.collection;
   if (!isRecord(info) || typeof info.name !== 'string') return null;

   const items = item === undefined ? [] : item;
   if (!Array.isArray(items) || !items.every(isRemoteNode)) return null;

   return { ...rest, info: { ...info, name: info.name }, item: items };
}

function isSuccess(status: number): boolean {
   return status >= 200 && status < 300;
}

/**
 * Thin client for the collection service. Every call carries the
 * `X-Api-Key` header, times out after `timeoutMs` and is never retried;
 * failures surface as {@link RemoteServiceError}.
 */
export class CollectionClient {
   private readonly http: AxiosInstance;
   private readonly logger: Logger;

   constructor(options: CollectionClientOptions) {
      this.logger = options.logger ?? defaultLogger.child('[remote]');
      this.http = axios.create({
         baseURL: (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, ''),
         timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
         headers: {
            'X-Api-Key': options.apiKey,
            'Content-Type': 'application/json',
         },
         validateStatus: () => true,
         adapter: options.adapter,
      });
   }

   async getCollection(collectionId: string): Promise<CollectionTree> {
      const step: SyncStep = 'fetch-collection';
      const resp = await this.send(step, 'GET', `/collections/${encodeURIComponent(collectionId)}`);
      const tree = parseCollectionResponse(resp.data);
      if (!tree) {
         throw new RemoteServiceError(step, 'Malformed collection response', resp.status, resp.data);
      }
      return tree;
   }

   async replaceCollection(collectionId: string, tree: CollectionTree): Promise<void> {
      await this.send('replace-collection', 'PUT', `/collections/${encodeURIComponent(collectionId)}`, {
         collection: tree,
      });
   }

   async getWorkspace(workspaceId: string): Promise<WorkspaceSummary> {
      const step: SyncStep = 'fetch-workspace';
      const resp = await this.send(step, 'GET', `/workspaces/${encodeURIComponent(workspaceId)}`);
      const data: unknown = resp.data;
      const workspace = isRecord(data) && isRecord(data.workspace) ? data.workspace : undefined;
      if (!workspace || typeof workspace.id !== 'string') {
         throw new RemoteServiceError(step, 'Malformed workspace response', resp.status, data);
      }
      return {
         id: workspace.id,
         name: typeof workspace.name === 'string' ? workspace.name : '',
      };
   }

   async createEnvironment(environment: EnvironmentPayload): Promise<{ id: string | undefined }> {
      const resp = await this.send('create-environment', 'POST', '/environments', { environment });
      const data: unknown = resp.data;
      const env = isRecord(data) && isRecord(data.environment) ? data.environment : undefined;
      return { id: env && typeof env.id === 'string' ? env.id : undefined };
   }

   private async send(step: SyncStep, method: Method, url: string, data?: unknown): Promise<AxiosResponse<unknown>> {
      this.logger.debug(`${step}: ${method} ${url}`);

      let resp: AxiosResponse<unknown>;
      try {
         resp = await this.http.request<unknown>({ method, url, data });
      } catch (err) {
         if (axios.isAxiosError(err)) {
            const timedOut = err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT';
            throw new RemoteServiceError(
               step,
               timedOut ? `${method} ${url} timed out` : `${method} ${url} failed: ${err.message}`,
               err.response?.status,
               err.response?.data,
            );
         }
         throw err;
      }

      if (!isSuccess(resp.status)) {
         throw new RemoteServiceError(
            step,
            `${method} ${url} returned ${resp.status}`,
            resp.status,
            resp.data,
         );
      }
      return resp;
   }
}
