// src/core/config-loader.ts

import fs from 'fs';
import path from 'path';
import os from 'os';
import crypto from 'crypto';
import { createRequire } from 'module';
import { transform } from 'esbuild';

import {
   SYNC_ROOT_DIR,
   type DiscoveryConfig,
   type RemoteMethodDeclaration,
   type ScanMode,
   type SchemaSourceConfig,
   type SyncConfig,
   type SyncHookConfig,
   type SyncHookKind,
} from '../schema';
import { defaultLogger } from '../util/logger';
import { ensureDirSync } from '../util/fs-utils';
import { ConfigError, errorMessage } from './errors';

const logger = defaultLogger.child('[config]');

export const CONFIG_CANDIDATES = ['config.ts', 'config.js', 'config.cjs', 'config.json'];

export const DEFAULT_STATE_FILE = `${SYNC_ROOT_DIR}/state.json`;

export interface LoadSyncConfigOptions {
   /**
    * Sync directory (absolute or relative to cwd). Default: ".postman-sync".
    */
   dir?: string;

   /**
    * Explicit config file path (absolute or relative to cwd). If not
    * provided, config.* is looked up inside the sync directory.
    */
   configPath?: string;

   /**
    * Environment consulted for POSTMAN_API_KEY. Default: process.env.
    */
   env?: NodeJS.ProcessEnv;
}

export interface LoadSyncConfigResult {
   config: SyncConfig;

   /**
    * From the config file, or POSTMAN_API_KEY. Only commands that talk to
    * the remote service need it.
    */
   apiKey: string | undefined;

   configPath: string;

   /**
    * Absolute path of the sync directory.
    */
   syncDir: string;

   /**
    * Absolute directory every relative path in the config is resolved from.
    */
   projectRoot: string;

   schemaRoot: string;

   sourceRoot: string | undefined;

   /**
    * `discovery.sourceRoots`, resolved to absolute paths.
    */
   sourceRoots: Record<string, string>;

   stateFile: string;
}

/**
 * Resolution rules:
 * - syncDir: options.dir resolved from cwd, else <cwd>/.postman-sync.
 * - configPath: options.configPath, else the first config.* in syncDir.
 * - projectRoot: config.root resolved from the parent of syncDir, else
 *   that parent.
 * - schema.root, discovery.sourceRoot(s) and stateFile are relative to
 *   projectRoot.
 */
export async function loadSyncConfig(
   cwd: string,
   options: LoadSyncConfigOptions = {},
): Promise<LoadSyncConfigResult> {
   const absCwd = path.resolve(cwd);
   const env = options.env ?? process.env;

   const syncDir = options.dir
      ? path.resolve(absCwd, options.dir)
      : path.join(absCwd, SYNC_ROOT_DIR);

   const configPath = options.configPath
      ? path.resolve(absCwd, options.configPath)
      : resolveConfigPath(syncDir);

   const config = parseSyncConfig(await importConfig(configPath), configPath);

   const baseDir = path.dirname(syncDir);
   const projectRoot = config.root ? path.resolve(baseDir, config.root) : baseDir;

   const schemaRoot = path.resolve(projectRoot, config.schema?.root ?? '.');
   const sourceRoot = config.discovery?.sourceRoot
      ? path.resolve(projectRoot, config.discovery.sourceRoot)
      : undefined;
   const sourceRoots: Record<string, string> = {};
   for (const [grouping, rel] of Object.entries(config.discovery?.sourceRoots ?? {})) {
      sourceRoots[grouping] = path.resolve(projectRoot, rel);
   }
   const stateFile = path.resolve(projectRoot, config.stateFile ?? DEFAULT_STATE_FILE);

   const apiKey = config.apiKey || env.POSTMAN_API_KEY || undefined;

   logger.debug(
      `Loaded config: configPath=${configPath}, projectRoot=${projectRoot}, schemaRoot=${schemaRoot}`,
   );

   return { config, apiKey, configPath, syncDir, projectRoot, schemaRoot, sourceRoot, sourceRoots, stateFile };
}

function resolveConfigPath(syncDir: string): string {
   for (const file of CONFIG_CANDIDATES) {
      const full = path.join(syncDir, file);
      if (fs.existsSync(full)) {
         return full;
      }
   }

   throw new ConfigError(
      `Could not find config in ${syncDir}. Looked for: ${CONFIG_CANDIDATES.join(', ')}`,
   );
}

function isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function defaultExport(mod: unknown): unknown {
   return isRecord(mod) && 'default' in mod ? mod.default : mod;
}

/**
 * Load the raw config value.
 * - .json is parsed.
 * - .ts is transpiled to CommonJS with esbuild and required from a temp file.
 * - .js/.cjs are required directly.
 */
async function importConfig(configPath: string): Promise<unknown> {
   const ext = path.extname(configPath).toLowerCase();

   if (ext === '.json') {
      try {
         return JSON.parse(fs.readFileSync(configPath, 'utf8'));
      } catch (err) {
         throw new ConfigError(`Cannot parse ${configPath}: ${errorMessage(err)}`);
      }
   }

   const file = ext === '.ts' ? await transpileTsConfig(configPath) : configPath;
   return defaultExport(requireFresh(file));
}

function requireFresh(file: string): unknown {
   const req = createRequire(file);
   const resolved = req.resolve(file);
   delete req.cache[resolved];
   return req(resolved);
}

/**
 * Transpile a TS config file to CommonJS and return the compiled file's
 * path. The temp name hashes path + mtime so edits invalidate it.
 */
async function transpileTsConfig(configPath: string): Promise<string> {
   const source = fs.readFileSync(configPath, 'utf8');
   const stat = fs.statSync(configPath);

   const hash = crypto
      .createHash('sha1')
      .update(configPath)
      .update(String(stat.mtimeMs))
      .digest('hex');

   const tmpDir = path.join(os.tmpdir(), 'postman-schema-sync-config');
   ensureDirSync(tmpDir);

   const tmpFile = path.join(tmpDir, `${hash}.cjs`);

   if (!fs.existsSync(tmpFile)) {
      const result = await transform(source, {
         loader: 'ts',
         format: 'cjs',
         sourcemap: 'inline',
         target: 'node20',
         sourcefile: configPath,
      });

      fs.writeFileSync(tmpFile, result.code, 'utf8');
   }

   return tmpFile;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const SCAN_MODES: readonly ScanMode[] = ['off', 'fallback', 'always'];
const HOOK_KINDS: readonly SyncHookKind[] = ['preGenerate', 'postGenerate', 'preSync', 'postSync'];

class Checker {
   readonly issues: string[] = [];

   string(obj: Record<string, unknown>, key: string, where: string): string | undefined {
      const v = obj[key];
      if (v === undefined) return undefined;
      if (typeof v !== 'string') {
         this.issues.push(`${where}${key} must be a string`);
         return undefined;
      }
      return v;
   }

   requiredString(obj: Record<string, unknown>, key: string): string {
      if (obj[key] === undefined || obj[key] === '') {
         this.issues.push(`${key} is required`);
         return '';
      }
      return this.string(obj, key, '') ?? '';
   }

   boolean(obj: Record<string, unknown>, key: string, where: string): boolean | undefined {
      const v = obj[key];
      if (v === undefined) return undefined;
      if (typeof v !== 'boolean') {
         this.issues.push(`${where}${key} must be true or false`);
         return undefined;
      }
      return v;
   }

   positiveNumber(obj: Record<string, unknown>, key: string, where: string): number | undefined {
      const v = obj[key];
      if (v === undefined) return undefined;
      if (typeof v !== 'number' || !Number.isFinite(v) || v <= 0) {
         this.issues.push(`${where}${key} must be a positive number`);
         return undefined;
      }
      return v;
   }

   stringList(value: unknown, label: string): string[] | undefined {
      if (value === undefined) return undefined;
      if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
         this.issues.push(`${label} must be a list of strings`);
         return undefined;
      }
      return value;
   }

   section(obj: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
      const v = obj[key];
      if (v === undefined) return undefined;
      if (!isRecord(v)) {
         this.issues.push(`${key} must be an object`);
         return undefined;
      }
      return v;
   }
}

function parseSchemaSection(c: Checker, raw: Record<string, unknown>): SchemaSourceConfig {
   return {
      root: c.string(raw, 'root', 'schema.'),
      include: c.stringList(raw.include, 'schema.include'),
      ignore: c.stringList(raw.ignore, 'schema.ignore'),
   };
}

function parseMethods(c: Checker, value: unknown): RemoteMethodDeclaration[] | undefined {
   if (value === undefined) return undefined;
   if (!Array.isArray(value)) {
      c.issues.push('discovery.methods must be a list');
      return undefined;
   }

   const out: RemoteMethodDeclaration[] = [];
   value.forEach((entry: unknown, i) => {
      const where = `discovery.methods[${i}].`;
      if (!isRecord(entry)) {
         c.issues.push(`discovery.methods[${i}] must be an object`);
         return;
      }
      const grouping = c.string(entry, 'grouping', where);
      const methodPath = c.string(entry, 'path', where);
      if (grouping === undefined || methodPath === undefined) {
         c.issues.push(`${where}grouping and ${where}path are required`);
         return;
      }
      out.push({ grouping, path: methodPath, description: c.string(entry, 'description', where) });
   });
   return out;
}

function parseManifest(c: Checker, value: unknown): Record<string, string[]> | undefined {
   if (value === undefined) return undefined;
   if (!isRecord(value)) {
      c.issues.push('discovery.manifest must be an object');
      return undefined;
   }
   const out: Record<string, string[]> = {};
   for (const [grouping, paths] of Object.entries(value)) {
      const list = c.stringList(paths, `discovery.manifest.${grouping}`);
      if (list) out[grouping] = list;
   }
   return out;
}

function parseSourceRoots(c: Checker, value: unknown): Record<string, string> | undefined {
   if (value === undefined) return undefined;
   if (!isRecord(value)) {
      c.issues.push('discovery.sourceRoots must be an object');
      return undefined;
   }
   const out: Record<string, string> = {};
   for (const grouping of Object.keys(value)) {
      const root = c.string(value, grouping, 'discovery.sourceRoots.');
      if (root !== undefined) out[grouping] = root;
   }
   return out;
}

function parseDiscoverySection(c: Checker, raw: Record<string, unknown>): DiscoveryConfig {
   const where = 'discovery.';
   let scan: ScanMode | undefined;
   const scanRaw = raw.scan;
   if (scanRaw !== undefined) {
      const found = SCAN_MODES.find((m) => m === scanRaw);
      if (found) scan = found;
      else c.issues.push(`discovery.scan must be one of ${SCAN_MODES.join(', ')}`);
   }

   return {
      manifest: parseManifest(c, raw.manifest),
      methods: parseMethods(c, raw.methods),
      sourceRoot: c.string(raw, 'sourceRoot', where),
      sourceRoots: parseSourceRoots(c, raw.sourceRoots),
      packageName: c.string(raw, 'packageName', where),
      scan,
      include: c.stringList(raw.include, 'discovery.include'),
      markers: c.stringList(raw.markers, 'discovery.markers'),
      cacheTtlMs: c.positiveNumber(raw, 'cacheTtlMs', where),
   };
}

function parseHooks(c: Checker, raw: Record<string, unknown>): SyncConfig['hooks'] {
   const hooks: NonNullable<SyncConfig['hooks']> = {};

   for (const [kindRaw, list] of Object.entries(raw)) {
      const kind = HOOK_KINDS.find((k) => k === kindRaw);
      if (!kind) {
         c.issues.push(`hooks.${kindRaw} is not a known hook (${HOOK_KINDS.join(', ')})`);
         continue;
      }
      if (!Array.isArray(list)) {
         c.issues.push(`hooks.${kind} must be a list`);
         continue;
      }

      const configs: SyncHookConfig[] = [];
      list.forEach((entry: unknown, i) => {
         const label = `hooks.${kind}[${i}]`;
         if (!isRecord(entry)) {
            c.issues.push(`${label} must be an object`);
            return;
         }
         const fn = entry.fn;
         if (typeof fn !== 'function') {
            c.issues.push(`${label}.fn must be a function`);
            return;
         }
         configs.push({
            include: c.stringList(entry.include, `${label}.include`),
            exclude: c.stringList(entry.exclude, `${label}.exclude`),
            fn: async (ctx) => {
               await Reflect.apply(fn, undefined, [ctx]);
            },
         });
      });
      hooks[kind] = configs;
   }

   return hooks;
}

/**
 * Check a loaded config value and build a {@link SyncConfig} from it.
 * Every problem found is reported together in one {@link ConfigError}.
 */
export function parseSyncConfig(raw: unknown, source: string): SyncConfig {
   if (!isRecord(raw)) {
      throw new ConfigError(`${source} must export a config object.`);
   }

   const c = new Checker();
   const schema = c.section(raw, 'schema');
   const discovery = c.section(raw, 'discovery');
   const hooks = c.section(raw, 'hooks');

   const config: SyncConfig = {
      root: c.string(raw, 'root', ''),
      apiKey: c.string(raw, 'apiKey', ''),
      workspaceId: c.requiredString(raw, 'workspaceId'),
      collectionId: c.requiredString(raw, 'collectionId'),
      baseUrl: c.requiredString(raw, 'baseUrl'),
      apiBaseUrl: c.string(raw, 'apiBaseUrl', ''),
      autoSync: c.boolean(raw, 'autoSync', ''),
      siteName: c.string(raw, 'siteName', ''),
      timeoutMs: c.positiveNumber(raw, 'timeoutMs', ''),
      schema: schema ? parseSchemaSection(c, schema) : undefined,
      discovery: discovery ? parseDiscoverySection(c, discovery) : undefined,
      stateFile: c.string(raw, 'stateFile', ''),
      hooks: hooks ? parseHooks(c, hooks) : undefined,
   };

   if (c.issues.length > 0) {
      throw new ConfigError(`Invalid config in ${source}:\n  - ${c.issues.join('\n  - ')}`);
   }
   return config;
}
