// src/schema/collection.ts

import type { HttpMethod } from './endpoint';

export interface KeyValue {
   key: string;
   value: string;
}

export interface RequestUrl {
   raw: string;
   scheme: string;
   host: string;
   pathSegments: string[];
   queryParams: KeyValue[];
}

export interface RequestBody {
   mode: 'raw';
   raw: string;
   contentType: string;
}

/**
 * A fully formed request, ready to be placed in a folder.
 */
export interface RequestTemplate {
   name: string;
   method: HttpMethod;
   url: RequestUrl;
   headers: KeyValue[];
   body?: RequestBody;
   description: string;
}

export interface Folder {
   name: string;
   description?: string;
   children: Array<Folder | RequestTemplate>;
}

/**
 * Item as stored by the remote collection service. Only `name` and the
 * nested `item` list matter for merging; every other key is carried
 * through untouched.
 */
export interface RemoteNode {
   name: string;
   item?: RemoteNode[];
   [key: string]: unknown;
}

export interface CollectionInfo {
   name: string;
   [key: string]: unknown;
}

export interface CollectionTree {
   info: CollectionInfo;
   item: RemoteNode[];
   [key: string]: unknown;
}
