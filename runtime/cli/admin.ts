import fs from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { createSQLiteStorageLayer, type SQLiteStorageLayer } from "../../src/adapter/storage/sqlite";
import {
  BEAUTY_STANDARD_EMBEDDING_KEY,
  ConfigResolver,
  parseDelimitedVector,
  specForKey,
} from "../../src/config";
import { describeError, STORAGE_ERROR_CODES, StorageError } from "../../src/core/errors/errors";
import { resolveBaseDir, resolveRuntimeConfig } from "../config/runtime.config";
import { createUsageError, toRuntimeError } from "../error";
import { ADMIN_USAGE, parseAdminArgs, type AdminCommand } from "./admin.args";

export interface AdminCliIo {
  readonly log: (message: string) => void;
  readonly error: (message: string) => void;
}

export interface AdminCliOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
}

const DEFAULT_IO: AdminCliIo = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

function vectorNorm(vector: readonly number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

function withStateStore<T>(
  dbPath: string,
  busyTimeoutMs: number,
  work: (layer: SQLiteStorageLayer) => Promise<T>
): Promise<T> {
  const layer = createSQLiteStorageLayer({ dbPath, busyTimeoutMs });
  layer.storage.connect();
  return work(layer).finally(() => {
    layer.storage.close();
  });
}

async function execute(
  command: AdminCommand,
  io: AdminCliIo,
  env: NodeJS.ProcessEnv,
  cwd: string | undefined
): Promise<void> {
  const baseDir = resolveBaseDir({ baseDir: cwd }, env);

  switch (command.kind) {
    case "embedding-show": {
      const resolver = new ConfigResolver({
        env,
        baseDir,
        onDiagnostic: (diagnostic) =>
          io.error(`[config] source=${diagnostic.source} ${diagnostic.reason}`),
      });
      const value = resolver.resolve(command.key ?? BEAUTY_STANDARD_EMBEDDING_KEY);
      io.log(
        `key=${value.key} source=${value.source} dimension=${value.vector.length} norm=${vectorNorm(value.vector).toFixed(6)}`
      );
      return;
    }
    case "embedding-persist": {
      const spec = specForKey(command.key ?? BEAUTY_STANDARD_EMBEDDING_KEY);
      const inputPath = path.resolve(baseDir, command.inputFile);
      let raw: string;
      try {
        raw = await fs.readFile(inputPath, "utf8");
      } catch (error) {
        throw createUsageError(`cannot read ${inputPath}: ${describeError(error)}`, ADMIN_USAGE);
      }
      const parsed = parseDelimitedVector(raw, spec.dimension);
      if (!parsed.ok) {
        throw new StorageError(
          STORAGE_ERROR_CODES.STORAGE_INVALID_INPUT,
          `${inputPath}: ${parsed.reason}`
        );
      }
      const resolver = new ConfigResolver({ env, baseDir });
      const written = await resolver.persistFor(spec.key, parsed.vector, command.out);
      io.log(`embedding persisted key=${spec.key} dimension=${spec.dimension} path=${written}`);
      return;
    }
    case "state-show": {
      const config = resolveRuntimeConfig({ dbPath: command.dbPath, baseDir: cwd }, env);
      await withStateStore(config.agentStateDbPath, config.busyTimeoutMs, async (layer) => {
        const lookup = await layer.agentState.get(command.sessionId);
        if (lookup.status === "not_found") {
          io.log(`session=${lookup.sessionId} status=not_found`);
          return;
        }
        const { record } = lookup;
        const bytes =
          typeof record.stateBlob === "string"
            ? Buffer.byteLength(record.stateBlob, "utf8")
            : record.stateBlob.length;
        io.log(
          `session=${record.sessionId} status=found updatedAt=${record.updatedAt} bytes=${bytes}`
        );
      });
      return;
    }
    case "state-migrate-legacy": {
      if (!command.confirmed) {
        throw createUsageError(
          "state migrate-legacy discards all legacy checkpoint rows; rerun with --yes",
          ADMIN_USAGE
        );
      }
      const config = resolveRuntimeConfig({ dbPath: command.dbPath, baseDir: cwd }, env);
      await withStateStore(config.agentStateDbPath, config.busyTimeoutMs, async (layer) => {
        const result = await layer.agentState.migrateFromLegacyCheckpoints(
          command.table === undefined ? undefined : [command.table]
        );
        for (const outcome of result.tables) {
          io.log(
            outcome.tableExisted
              ? `legacy table '${outcome.table}' dropped rowsDiscarded=${outcome.rowsDiscarded}`
              : `legacy table '${outcome.table}' not present; nothing to drop`
          );
        }
        io.log(`rowsDiscarded total=${result.rowsDiscarded}`);
        if (!result.agentStateExists) {
          io.error("[state] agent_state table is missing after migration");
        }
        io.log(`remaining tables: ${result.remainingTables.join(", ")}`);
      });
      return;
    }
  }
}

export async function runAdminCli(
  argv: readonly string[],
  io: AdminCliIo = DEFAULT_IO,
  options: AdminCliOptions = {}
): Promise<number> {
  const env = options.env ?? process.env;
  try {
    await execute(parseAdminArgs(argv), io, env, options.cwd);
    return 0;
  } catch (error) {
    const runtimeError = toRuntimeError(error);
    io.error(`admin ${runtimeError.errorCode}: ${runtimeError.message}`);
    io.error(runtimeError.guideMessage);
    return 1;
  }
}

function isEntrypoint(): boolean {
  const scriptPath = process.argv[1];
  if (typeof scriptPath !== "string" || scriptPath.trim() === "") {
    return false;
  }
  return import.meta.url === pathToFileURL(scriptPath).href;
}

if (isEntrypoint()) {
  process.exitCode = await runAdminCli(process.argv.slice(2));
}
