// src/core/watcher.ts

import path from 'path';
import chokidar, { type FSWatcher } from 'chokidar';

import { defaultLogger, type Logger } from '../util/logger';
import { errorMessage } from './errors';
import type { GenerationService } from './generator';
import type { FileSchemaSource } from './schema-source';

export interface WatchOptions {
    /**
     * Debounce delay in milliseconds between detected changes
     * and a regeneration.
     *
     * Default: 150 ms
     */
    debounceMs?: number;

    /**
     * Optional logger; falls back to defaultLogger.child('[watch]').
     */
    logger?: Logger;
}

export type ChangeKind = 'created' | 'updated';

export type ChangeBatch = Array<[file: string, kind: ChangeKind]>;

/**
 * Collects file changes and hands them to `onBatch` once no new change
 * arrived for `debounceMs`. A later `updated` never downgrades a pending
 * `created`. Batches never overlap: a flush that fires while one is
 * still running is pushed back by another debounce period.
 */
export class ChangeBatcher {
    private readonly pending = new Map<string, ChangeKind>();
    private timer: NodeJS.Timeout | undefined;
    private running = false;

    constructor(
        private readonly onBatch: (batch: ChangeBatch) => Promise<void>,
        private readonly debounceMs: number,
        private readonly logger: Logger,
    ) {}

    record(file: string, kind: ChangeKind): void {
        if (this.pending.get(file) !== 'created') this.pending.set(file, kind);
        this.schedule();
    }

    async flush(): Promise<void> {
        if (this.running) {
            this.schedule();
            return;
        }
        if (this.pending.size === 0) return;

        this.running = true;
        const batch: ChangeBatch = [...this.pending.entries()];
        this.pending.clear();

        try {
            await this.onBatch(batch);
        } catch (err) {
            this.logger.error(`Regeneration failed: ${errorMessage(err)}`);
        } finally {
            this.running = false;
        }
    }

    private schedule(): void {
        if (this.timer) clearTimeout(this.timer);
        this.timer = setTimeout(() => {
            this.timer = undefined;
            void this.flush();
        }, this.debounceMs);
    }
}

/**
 * Re-read the schema index and regenerate each changed record type:
 * created files through `onRecordTypeCreated`, edited ones through
 * `onRecordTypeUpdated`. Unparsable files are logged and skipped.
 */
export async function applySchemaChanges(
    schema: FileSchemaSource,
    generator: GenerationService,
    batch: ChangeBatch,
    logger: Logger,
): Promise<void> {
    schema.reload();
    for (const [file, kind] of batch) {
        const parsed = schema.readFile(file);
        if (!parsed.ok) {
            logger.warn(`Ignoring ${path.basename(file)}: ${parsed.reason}`);
            continue;
        }
        const name = parsed.value.name;
        logger.info(`Record type ${name} ${kind}, regenerating...`);
        const outcome = kind === 'created'
            ? await generator.onRecordTypeCreated(name)
            : await generator.onRecordTypeUpdated(name);
        if (!outcome.ok) logger.debug(`No regeneration for ${name}: ${outcome.reason}`);
    }
}

/**
 * Watch the schema directory and regenerate record types as their files
 * change.
 *
 * Returns the underlying watcher so callers can close it.
 */
export function watchSchemas(
    schema: FileSchemaSource,
    generator: GenerationService,
    options: WatchOptions = {},
): FSWatcher {
    const logger = options.logger ?? defaultLogger.child('[watch]');
    const batcher = new ChangeBatcher(
        (batch) => applySchemaChanges(schema, generator, batch, logger),
        options.debounceMs ?? 150,
        logger,
    );

    logger.info(`Watching schema directory: ${schema.rootDir}`);

    const record = (file: string, kind: ChangeKind) => {
        if (schema.matches(file)) batcher.record(file, kind);
    };

    const watcher = chokidar.watch(schema.rootDir, {
        ignoreInitial: true,
        persistent: true,
        ignored: ['**/node_modules/**', '**/.git/**'],
    });

    watcher
        .on('add', (filePath) => record(filePath, 'created'))
        .on('change', (filePath) => record(filePath, 'updated'))
        .on('error', (error) => {
            logger.error('Watcher error:', error);
        });

    return watcher;
}
