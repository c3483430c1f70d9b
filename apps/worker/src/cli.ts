import { once } from "node:events";
import { Command } from "commander";
import pg from "pg";
import { newCorrelationId, type FolderSummary } from "@list-archive/shared";
import { readListsFile } from "./archive/folder-file.js";
import { loadWorkerConfig, requireSetting, type WorkerConfig } from "./config.js";
import { ingestFolder } from "./ingest.js";
import { createLogger, toLogError, type LogDestination, type Logger } from "./logging.js";
import { createFolderQueue, createRedisConnection, enqueueFolderIngest } from "./queue.js";
import { writeDumpFile } from "./store/dump.js";
import { MemoryArchiveStore } from "./store/memory-store.js";
import { runMigrations } from "./store/migrate.js";
import { PgArchiveStore, poolSource } from "./store/pg-store.js";
import type { ArchiveStore } from "./store/types.js";
import { startFolderWorker } from "./worker.js";

export type ProgramOptions = {
  env?: NodeJS.ProcessEnv;
  logDestination?: LogDestination;
};

type Runtime = {
  config: WorkerConfig;
  logger: Logger;
};

function createPool(config: WorkerConfig): pg.Pool {
  return new pg.Pool({ connectionString: requireSetting(config.databaseUrl, "DATABASE_URL") });
}

async function resolveFolders(folders: string[], config: WorkerConfig): Promise<string[]> {
  return folders.length > 0 ? folders : readListsFile(config.listsFile);
}

async function ingestAll(runtime: Runtime, folders: string[], store: ArchiveStore): Promise<FolderSummary[]> {
  const { config, logger } = runtime;
  const summaries: FolderSummary[] = [];
  for (const mailingList of await resolveFolders(folders, config)) {
    try {
      summaries.push(
        await ingestFolder({
          archiveDir: config.archiveDir,
          mailingList,
          store,
          logger,
          correlationId: newCorrelationId()
        })
      );
    } catch (error) {
      process.exitCode = 1;
      logger.error({ event: "folder.error", mailingList, ...toLogError(error) }, "folder.error");
    }
  }
  return summaries;
}

export function createProgram(options: ProgramOptions = {}): Command {
  let runtime: Runtime | null = null;
  const getRuntime = (): Runtime => {
    if (!runtime) {
      const config = loadWorkerConfig(options.env ?? process.env);
      runtime = {
        config,
        logger: createLogger({ level: config.logLevel, name: config.workerName }, options.logDestination)
      };
    }
    return runtime;
  };

  const program = new Command()
    .name("list-archive")
    .description("Ingest mailing-list folder exports into the archive database");

  program
    .command("migrate")
    .description("create or update the archive schema")
    .action(async () => {
      const { config, logger } = getRuntime();
      const pool = createPool(config);
      try {
        const applied = await runMigrations(poolSource(pool));
        logger.info({ event: "migrate.done", applied }, "migrate.done");
      } finally {
        await pool.end();
      }
    });

  program
    .command("ingest")
    .description("ingest folders in this process (all folders of the lists file by default)")
    .argument("[folders...]", "folder names")
    .option("--dry-run", "parse and aggregate without writing to the database")
    .action(async (folders: string[], flags: { dryRun?: boolean }) => {
      const current = getRuntime();
      if (flags.dryRun) {
        const summaries = await ingestAll(current, folders, new MemoryArchiveStore());
        current.logger.info({ event: "ingest.done", dryRun: true, summaries }, "ingest.done");
        return;
      }
      const pool = createPool(current.config);
      try {
        const summaries = await ingestAll(current, folders, new PgArchiveStore(poolSource(pool)));
        current.logger.info({ event: "ingest.done", dryRun: false, summaries }, "ingest.done");
      } finally {
        await pool.end();
      }
    });

  program
    .command("enqueue")
    .description("queue folder ingest jobs for the workers")
    .argument("[folders...]", "folder names")
    .action(async (folders: string[]) => {
      const { config, logger } = getRuntime();
      const connection = createRedisConnection(requireSetting(config.redisUrl, "REDIS_URL"));
      const queue = createFolderQueue(connection);
      try {
        for (const mailingList of await resolveFolders(folders, config)) {
          const result = await enqueueFolderIngest(queue, mailingList);
          logger.info({ event: "folder.enqueued", ...result }, "folder.enqueued");
        }
      } finally {
        await queue.close();
        await connection.quit();
      }
    });

  program
    .command("work")
    .description("run a folder ingest worker until interrupted")
    .action(async () => {
      const { config, logger } = getRuntime();
      const connection = createRedisConnection(requireSetting(config.redisUrl, "REDIS_URL"));
      const pool = createPool(config);
      const worker = startFolderWorker({
        connection,
        concurrency: config.concurrency,
        workerName: config.workerName,
        deps: { archiveDir: config.archiveDir, store: new PgArchiveStore(poolSource(pool)), logger }
      });

      const signal = await Promise.race([once(process, "SIGINT"), once(process, "SIGTERM")]);
      logger.info({ event: "worker.stopping", signal }, "worker.stopping");
      await worker.close();
      await pool.end();
      await connection.quit();
    });

  program
    .command("dump")
    .description("write the archive tables, without raw messages, as JSON lines")
    .argument("<outfile>", "output path")
    .action(async (outfile: string) => {
      const { config, logger } = getRuntime();
      const pool = createPool(config);
      const client = await poolSource(pool).connect();
      try {
        const counts = await writeDumpFile(client, outfile);
        logger.info({ event: "dump.done", outfile, counts }, "dump.done");
      } finally {
        client.release();
        await pool.end();
      }
    });

  return program;
}
