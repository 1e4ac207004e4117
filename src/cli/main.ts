#!/usr/bin/env node

import path from "path";
import { Command } from "commander";
import pluralize from "pluralize";
import { createContext, requireSyncer, type RunOptions, type SyncContext } from "../core/runner";
import { watchSchemas } from "../core/watcher";
import { initConfig } from "../core/init-config";
import { SyncError } from "../core/errors";
import { defaultLogger, type Logger } from "../util/logger";
import { SYNC_ROOT_DIR } from "../schema";

interface BaseCliOptions {
  config?: string;
  dir?: string;
  watch?: boolean;
  quiet?: boolean;
  debug?: boolean;
}

interface SyncCliOptions {
  force?: boolean;
}

interface GenerateCliOptions {
  module?: string;
}

interface InitCliOptions {
  force?: boolean;
}

/**
 * Create a logger with the appropriate level from CLI flags.
 */
function createCliLogger(opts: { quiet?: boolean; debug?: boolean }): Logger {
  if (opts.quiet) {
    defaultLogger.setLevel("silent");
  } else if (opts.debug) {
    defaultLogger.setLevel("debug");
  }
  return defaultLogger.child("[cli]");
}

function runOptionsFrom(cwd: string, baseOpts: BaseCliOptions, logger: Logger): RunOptions {
  return {
    configPath: baseOpts.config ? path.resolve(cwd, baseOpts.config) : undefined,
    dir: baseOpts.dir ? path.resolve(cwd, baseOpts.dir) : undefined,
    logger,
  };
}

async function withContext(
  cwd: string,
  baseOpts: BaseCliOptions,
  fn: (ctx: SyncContext, logger: Logger) => Promise<void>,
): Promise<void> {
  const logger = createCliLogger(baseOpts);
  const ctx = await createContext(cwd, runOptionsFrom(cwd, baseOpts, logger));
  await fn(ctx, logger);
}

function printJson(value: unknown) {
  process.stdout.write(JSON.stringify(value, null, 2) + "\n");
}

async function handleSyncCommand(cwd: string, syncOpts: SyncCliOptions, baseOpts: BaseCliOptions) {
  await withContext(cwd, baseOpts, async (ctx, logger) => {
    logger.debug(
      `Starting sync (cwd=${cwd}, config=${ctx.loaded.configPath}, watch=${baseOpts.watch ? "yes" : "no"})`,
    );

    if (baseOpts.watch) {
      // Watch mode – this will not return
      watchSchemas(ctx.schema, ctx.generator, { logger: logger.child("[watch]") });
      return;
    }

    const result = await requireSyncer(ctx).syncNow({ force: syncOpts.force });
    if (result.status === "skipped") {
      logger.info(`Sync skipped: ${result.reason}.`);
    } else if (result.status === "synced") {
      logger.info(`Collection now has ${pluralize("top-level item", result.itemCount, true)}.`);
    }
  });
}

async function handleGenerateCommand(
  cwd: string,
  types: string[],
  genOpts: GenerateCliOptions,
  baseOpts: BaseCliOptions,
) {
  await withContext(cwd, baseOpts, async (ctx, logger) => {
    if (genOpts.module) {
      const outcome = await ctx.generator.generateForModule(genOpts.module);
      if (!outcome.ok) throw new SyncError(`Module generation skipped: ${outcome.reason}`);
      logger.info(outcome.value.description ?? `Generated ${outcome.value.name}`);
      return;
    }

    if (types.length === 0) {
      throw new SyncError("Name at least one record type, or pass --module <name>.");
    }

    const results = await ctx.generator.bulkGenerate(types);
    for (const r of results) {
      if (r.status === "success") logger.info(`${r.name}: generated`);
      else logger.error(`${r.name}: ${r.message ?? "failed"}`);
    }
    if (results.some((r) => r.status === "error")) process.exitCode = 1;
  });
}

async function handleInitCommand(cwd: string, initOpts: InitCliOptions, baseOpts: BaseCliOptions) {
  const logger = createCliLogger(baseOpts);
  const dirRel = baseOpts.dir ?? SYNC_ROOT_DIR;

  logger.info(`Initializing sync directory at "${dirRel}"...`);

  const result = await initConfig(cwd, { dir: dirRel, force: initOpts.force });

  logger.info(`Done. Config: ${result.configPath}`);
}

async function main() {
  const cwd = process.cwd();

  const program = new Command();

  program
    .name("postman-schema-sync")
    .description("Generate CRUD and custom-method requests from record-type schemas and sync them to a Postman collection")
    .option("-c, --config <path>", "Path to config file")
    .option("-d, --dir <path>", `Path to sync directory (default: ./${SYNC_ROOT_DIR})`)
    .option("-w, --watch", "Watch schema files and regenerate on change")
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging");

  const baseOf = (cmd: Command): BaseCliOptions => cmd.parent?.opts<BaseCliOptions>() ?? {};

  program
    .command("sync")
    .description("Push every active generation record to the collection")
    .option("--force", "Sync even when autoSync is disabled")
    .action(async (syncOpts: SyncCliOptions, cmd: Command) => {
      await handleSyncCommand(cwd, syncOpts, baseOf(cmd));
    });

  program
    .command("generate")
    .description("Generate endpoint records for record types, or for a whole module")
    .argument("[types...]", "Record type names")
    .option("-m, --module <name>", "Generate one record covering every record type in a module")
    .action(async (types: string[], genOpts: GenerateCliOptions, cmd: Command) => {
      await handleGenerateCommand(cwd, types, genOpts, baseOf(cmd));
    });

  program
    .command("backfill")
    .description("Generate records for every record type that has none yet")
    .action(async (_opts: object, cmd: Command) => {
      await withContext(cwd, baseOf(cmd), async (ctx) => {
        await ctx.generator.backfill();
      });
    });

  program
    .command("validate")
    .description("Check the API key, workspace and collection, and record the result")
    .action(async (_opts: object, cmd: Command) => {
      await withContext(cwd, baseOf(cmd), async (ctx, logger) => {
        const result = await requireSyncer(ctx).validateConnection();
        if (result.status === "success") {
          logger.info(result.message);
        } else {
          logger.error(result.message);
          process.exitCode = 1;
        }
      });
    });

  program
    .command("info")
    .description("Show collection name, id, item count and last update")
    .action(async (_opts: object, cmd: Command) => {
      await withContext(cwd, baseOf(cmd), async (ctx) => {
        printJson(await requireSyncer(ctx).collectionInfo());
      });
    });

  program
    .command("inspect")
    .description("List top-level collection items and their first children")
    .action(async (_opts: object, cmd: Command) => {
      await withContext(cwd, baseOf(cmd), async (ctx) => {
        const items = await requireSyncer(ctx).inspect();
        if (items.length === 0) {
          process.stdout.write("Collection is empty\n");
          return;
        }
        items.forEach((item, i) => {
          process.stdout.write(`${i + 1}. ${item.name}\n`);
          if (item.subItemCount !== undefined) {
            process.stdout.write(`   └── ${pluralize("sub-item", item.subItemCount, true)}\n`);
            item.subItems.forEach((sub, j) => process.stdout.write(`      ${j + 1}. ${sub}\n`));
          }
        });
      });
    });

  program
    .command("clear")
    .description("Remove every item from the collection")
    .action(async (_opts: object, cmd: Command) => {
      await withContext(cwd, baseOf(cmd), async (ctx) => {
        await requireSyncer(ctx).clear();
      });
    });

  program
    .command("env")
    .description("Create a Postman environment with base_url, api_key and site_name")
    .action(async (_opts: object, cmd: Command) => {
      await withContext(cwd, baseOf(cmd), async (ctx, logger) => {
        const { id } = await requireSyncer(ctx).createEnvironment();
        logger.info(`Created environment${id ? ` ${id}` : ""}.`);
      });
    });

  program
    .command("methods")
    .description("List remote methods discovered for a grouping")
    .argument("<grouping>", "Module / app name")
    .action(async (grouping: string, _opts: object, cmd: Command) => {
      await withContext(cwd, baseOf(cmd), async (ctx) => {
        printJson(ctx.discovery.discoverMethods(grouping));
      });
    });

  program
    .command("docs")
    .description("Print API documentation for a generated record type")
    .argument("<type>", "Record type name")
    .action(async (type: string, _opts: object, cmd: Command) => {
      await withContext(cwd, baseOf(cmd), async (ctx) => {
        const doc = ctx.generator.getApiDocumentation(type);
        if (!doc.ok) throw new SyncError(`No documentation for ${type}: ${doc.reason}`);
        printJson(doc.value);
      });
    });

  program
    .command("init")
    .description(`Initialize ${SYNC_ROOT_DIR} folder and config file`)
    .option("--force", "Overwrite an existing config file")
    .action(async (initOpts: InitCliOptions, cmd: Command) => {
      await handleInitCommand(cwd, initOpts, baseOf(cmd));
    });

  // Base command: sync once or watch
  program.action(async (opts: BaseCliOptions) => {
    await handleSyncCommand(cwd, {}, opts);
  });

  await program.parseAsync(process.argv);
}

// Run and handle errors
main().catch((err) => {
  defaultLogger.error(err);
  process.exit(1);
});
