// src/core/init-config.ts

import fs from 'fs';
import path from 'path';
import {ensureDirSync} from '../util/fs-utils';
import {defaultLogger} from '../util/logger';
import {SYNC_ROOT_DIR} from '../schema';

const logger = defaultLogger.child('[init]');

export interface InitConfigOptions {
    /**
     * Path to the sync directory (relative to cwd).
     * Default: ".postman-sync"
     */
    dir?: string;

    /**
     * Overwrite an existing config file.
     */
    force?: boolean;

    /**
     * Name of the config file inside the sync directory.
     * Default: "config.ts"
     */
    configFileName?: string;
}

const DEFAULT_CONFIG_TS = `import type { SyncConfig } from 'postman-schema-sync';

const config: SyncConfig = {
  // Postman API key. Leave unset to read POSTMAN_API_KEY from the environment.
  // apiKey: '',

  workspaceId: '<workspace-id>',
  collectionId: '<collection-id>',

  // Base URL of the application the generated requests point at.
  baseUrl: 'http://localhost:8000',

  // Push to Postman after every generation (requires a validated connection,
  // see \`postman-schema-sync validate\`).
  autoSync: false,

  // Where record-type schema files live, relative to the project root.
  // schema: {
  //   root: 'apps/billing',
  //   include: ['**/doctype/*/*.json'],
  // },

  // Custom remote methods. Declared entries win; scanning the package
  // sources is the fallback.
  // discovery: {
  //   manifest: {
  //     Billing: ['billing.billing.doctype.invoice.invoice.submit_invoice'],
  //   },
  //   sourceRoot: 'apps/billing/billing',
  //   scan: 'fallback',
  // },

  hooks: {
    // preGenerate: [],
    // postGenerate: [],
    // preSync: [],
    // postSync: [{ fn: (ctx) => console.log('synced', ctx.folders) }],
  },
};

export default config;
`;

/**
 * Create the sync directory and a starter config.ts.
 * An existing config is kept unless `force` is set.
 */
export async function initConfig(
    cwd: string,
    options: InitConfigOptions = {},
): Promise<{
    dir: string;
    configPath: string;
    created: boolean;
}> {
    const dirAbs = path.resolve(cwd, options.dir ?? SYNC_ROOT_DIR);
    const configPath = path.join(dirAbs, options.configFileName ?? 'config.ts');

    ensureDirSync(dirAbs);

    const existed = fs.existsSync(configPath);
    if (existed && !options.force) {
        logger.info(`Config already exists at ${configPath} (use --force to overwrite).`);
        return {dir: dirAbs, configPath, created: false};
    }

    fs.writeFileSync(configPath, DEFAULT_CONFIG_TS, 'utf8');
    logger.info(`${existed ? 'Overwrote' : 'Created'} config at ${configPath}`);

    return {dir: dirAbs, configPath, created: true};
}
