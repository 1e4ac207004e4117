// src/schema/config.ts

import type { SyncHookConfig, SyncHookKind } from './hooks';

export type ScanMode = 'off' | 'fallback' | 'always';

/**
 * A remotely callable method declared explicitly instead of being found
 * by scanning sources.
 */
export interface RemoteMethodDeclaration {
    /**
     * Grouping (module / app) the method belongs to.
     */
    grouping: string;

    /**
     * Dotted import path of the method, e.g.
     * `billing.billing.doctype.invoice.invoice.submit_invoice`.
     */
    path: string;

    description?: string;
}

export interface SchemaSourceConfig {
    /**
     * Directory holding record-type schema files, relative to the config root.
     *
     * Default: "."
     */
    root?: string;

    /**
     * Glob patterns (relative to `root`) selecting schema files.
     *
     * Default: ["**\/doctype/*\/*.json"]
     */
    include?: string[];

    /**
     * Glob patterns (relative to `root`) to skip.
     */
    ignore?: string[];
}

export interface DiscoveryConfig {
    /**
     * Declared remotely callable method paths, keyed by grouping.
     */
    manifest?: Record<string, string[]>;

    /**
     * Declared methods with descriptions. Equivalent to calling
     * `MethodRegistry.register` for each entry.
     */
    methods?: RemoteMethodDeclaration[];

    /**
     * Package root scanned by the source-scan fallback, relative to the
     * config root.
     *
     * A grouping only sees methods defined under its own module
     * directory (`<sourceRoot>/<snake_grouping>/`), or the whole package
     * when the grouping names the package itself.
     */
    sourceRoot?: string;

    /**
     * Package roots scanned for specific groupings, relative to the config
     * root. A grouping listed here gets everything under its root and
     * ignores `sourceRoot`.
     */
    sourceRoots?: Record<string, string>;

    /**
     * Import name of the package under `sourceRoot`. Defaults to its
     * basename. Packages under `sourceRoots` always use their basename.
     */
    packageName?: string;

    /**
     * When source scanning runs:
     * - 'off': never.
     * - 'fallback' (default): only when manifest + registry found nothing.
     * - 'always': every time, appended after the declared methods.
     */
    scan?: ScanMode;

    /**
     * Glob patterns (relative to `sourceRoot`) of files to scan.
     *
     * Default: ["**\/*.py"]
     */
    include?: string[];

    /**
     * Marker lines that flag the next function definition as remotely
     * callable.
     *
     * Default: ["@frappe.whitelist", "@whitelist"]
     */
    markers?: string[];

    /**
     * How long discovered methods stay cached per grouping, in ms.
     *
     * Default: 3_600_000 (one hour).
     */
    cacheTtlMs?: number;
}

/**
 * Root configuration object.
 *
 * This is what you export from `.postman-sync/config.ts` in a consuming
 * project, or pass programmatically.
 */
export interface SyncConfig {
    /**
     * Directory every other relative path is resolved from.
     *
     * If omitted, the engine uses the directory containing `.postman-sync/`.
     */
    root?: string;

    /**
     * Postman API key. Falls back to the POSTMAN_API_KEY environment variable.
     */
    apiKey?: string;

    workspaceId: string;

    collectionId: string;

    /**
     * Base URL of the application whose endpoints are described,
     * e.g. "http://localhost:8000".
     */
    baseUrl: string;

    /**
     * Base URL of the Postman API.
     *
     * Default: "https://api.getpostman.com"
     */
    apiBaseUrl?: string;

    /**
     * Push to Postman after every generation.
     *
     * Default: false
     */
    autoSync?: boolean;

    /**
     * Site name written into generated environments.
     *
     * Default: host of `baseUrl`.
     */
    siteName?: string;

    /**
     * Remote request timeout in ms.
     *
     * Default: 10_000
     */
    timeoutMs?: number;

    schema?: SchemaSourceConfig;

    discovery?: DiscoveryConfig;

    /**
     * Path of the state file, relative to `root`.
     *
     * Default: ".postman-sync/state.json"
     */
    stateFile?: string;

    /**
     * Hooks keyed by lifecycle stage, each with its own include/exclude filter.
     */
    hooks?: {
        [K in SyncHookKind]?: SyncHookConfig[];
    };
}
