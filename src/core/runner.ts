// src/core/runner.ts

import type { AxiosAdapter } from 'axios';

import { loadSyncConfig, type LoadSyncConfigResult } from './config-loader';
import { CollectionClient } from './collection-client';
import { EndpointBuilder } from './endpoint-builder';
import { ConfigError } from './errors';
import { GenerationService } from './generator';
import { HookRunner } from './hook-runner';
import { MethodDiscovery } from './method-discovery';
import { FileSchemaSource } from './schema-source';
import { StateStore } from './state-store';
import { CollectionSyncer, type SyncNowResult } from './sync';
import type { Logger } from '../util/logger';
import { defaultLogger } from '../util/logger';

export interface RunOptions {
    /**
     * Optional overrides (e.g. allow CLI to point at a different sync dir).
     */
    dir?: string;
    configPath?: string;

    /**
     * Optional logger override.
     */
    logger?: Logger;

    env?: NodeJS.ProcessEnv;

    /**
     * Network layer for the collection client; tests pass an in-process one.
     */
    adapter?: AxiosAdapter;
}

/**
 * Everything a command needs, wired from one loaded config.
 */
export interface SyncContext {
    loaded: LoadSyncConfigResult;
    schema: FileSchemaSource;
    discovery: MethodDiscovery;
    builder: EndpointBuilder;
    store: StateStore;
    hooks: HookRunner;
    generator: GenerationService;
    /**
     * Absent when no API key is configured.
     */
    syncer: CollectionSyncer | undefined;
    logger: Logger;
}

export async function createContext(cwd: string, options: RunOptions = {}): Promise<SyncContext> {
    const logger = options.logger ?? defaultLogger.child('[runner]');
    const loaded = await loadSyncConfig(cwd, {
        dir: options.dir,
        configPath: options.configPath,
        env: options.env,
    });
    const {config} = loaded;

    const schema = new FileSchemaSource({
        root: loaded.schemaRoot,
        include: config.schema?.include,
        ignore: config.schema?.ignore,
        logger: logger.child('[schema]'),
    });

    const discovery = new MethodDiscovery({
        config: config.discovery,
        sourceRoot: loaded.sourceRoot,
        sourceRoots: loaded.sourceRoots,
        logger: logger.child('[discovery]'),
    });

    const builder = new EndpointBuilder({schema, discovery, logger: logger.child('[endpoints]')});

    const store = new StateStore(loaded.projectRoot, loaded.stateFile);
    store.load();

    const hooks = new HookRunner(config.hooks);

    const syncer = loaded.apiKey
        ? new CollectionSyncer({
            client: new CollectionClient({
                apiKey: loaded.apiKey,
                apiBaseUrl: config.apiBaseUrl,
                timeoutMs: config.timeoutMs,
                adapter: options.adapter,
                logger: logger.child('[remote]'),
            }),
            store,
            schema,
            target: {
                workspaceId: config.workspaceId,
                collectionId: config.collectionId,
                baseUrl: config.baseUrl,
                autoSync: config.autoSync ?? false,
                siteName: config.siteName,
            },
            hooks,
            logger: logger.child('[sync]'),
        })
        : undefined;

    const generator = new GenerationService({
        schema,
        builder,
        store,
        baseUrl: config.baseUrl,
        syncer,
        hooks,
        logger: logger.child('[generate]'),
    });

    return {loaded, schema, discovery, builder, store, hooks, generator, syncer, logger};
}

export function requireSyncer(ctx: SyncContext): CollectionSyncer {
    if (!ctx.syncer) {
        throw new ConfigError('No Postman API key configured: set apiKey in the config or POSTMAN_API_KEY.');
    }
    return ctx.syncer;
}

/**
 * Push every Active generation record once. `force` ignores the
 * auto-sync switch.
 */
export async function runOnce(
    cwd: string,
    options: RunOptions & { force?: boolean } = {},
): Promise<SyncNowResult> {
    const ctx = await createContext(cwd, options);
    return requireSyncer(ctx).syncNow({force: options.force});
}
