import path from "node:path";
import {
  DEFAULT_BUSY_TIMEOUT_MS,
  DEFAULT_SQLITE_DB_REL_PATH,
} from "../../src/adapter/storage/sqlite";
import { ConfigurationError } from "../../src/core/errors/errors";

export interface RuntimeConfigArgs {
  readonly dbPath?: string;
  readonly baseDir?: string;
}

export interface RuntimeConfigEnv {
  readonly AGENT_STATE_DB_PATH?: string;
  readonly AGENT_STATE_BUSY_TIMEOUT_MS?: string;
  readonly EMBEDDING_BASE_DIR?: string;
}

export interface RuntimeConfig {
  readonly agentStateDbPath: string;
  readonly busyTimeoutMs: number;
  readonly embeddingBaseDir: string;
}

function toTrimmedString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function parsePositiveInteger(value: string | undefined, field: string): number | undefined {
  if (typeof value === "undefined") {
    return undefined;
  }
  const num = Number(value);
  if (!Number.isInteger(num)) {
    throw new ConfigurationError(`CONFIGURATION_ERROR ${field} must be an integer`);
  }
  if (num <= 0) {
    throw new ConfigurationError(`CONFIGURATION_ERROR ${field} must be > 0`);
  }
  return num;
}

/** Directory relative embedding and database paths resolve against. */
export function resolveBaseDir(args: RuntimeConfigArgs, env: RuntimeConfigEnv): string {
  return path.resolve(
    toTrimmedString(args.baseDir) ?? toTrimmedString(env.EMBEDDING_BASE_DIR) ?? process.cwd()
  );
}

export function resolveRuntimeConfig(
  args: RuntimeConfigArgs,
  env: RuntimeConfigEnv
): RuntimeConfig {
  const baseDir = resolveBaseDir(args, env);
  const dbPathRaw =
    toTrimmedString(args.dbPath) ??
    toTrimmedString(env.AGENT_STATE_DB_PATH) ??
    DEFAULT_SQLITE_DB_REL_PATH;

  const busyTimeoutMs =
    parsePositiveInteger(
      toTrimmedString(env.AGENT_STATE_BUSY_TIMEOUT_MS),
      "AGENT_STATE_BUSY_TIMEOUT_MS"
    ) ?? DEFAULT_BUSY_TIMEOUT_MS;

  return {
    agentStateDbPath: path.resolve(baseDir, dbPathRaw),
    busyTimeoutMs,
    embeddingBaseDir: baseDir,
  };
}
