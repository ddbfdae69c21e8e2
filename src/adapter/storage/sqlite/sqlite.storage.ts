import fs from "node:fs";
import path from "node:path";
import BetterSqlite3, { type Database as BetterSqliteDatabase } from "better-sqlite3";
import { describeError, STORAGE_ERROR_CODES, StorageError } from "../../../core/errors/errors";

export type SQLiteParam = string | number | bigint | Buffer | null;

export interface SQLiteRunResult {
  readonly changes: number;
}

export interface Storage {
  connect(): void;
  close(): void;
  exec(sql: string, params?: readonly SQLiteParam[]): SQLiteRunResult;
  query<T extends Record<string, unknown>>(
    sql: string,
    params?: readonly SQLiteParam[]
  ): readonly T[];
  transaction<T>(work: () => T): T;
}

export interface SQLiteStorageOptions {
  readonly dbPath?: string;
  readonly expectedSchemaVersion?: string;
  readonly busyTimeoutMs?: number;
  readonly ["readonly"]?: boolean;
}

export const DEFAULT_SQLITE_DB_REL_PATH = path.join("ops", "runtime", "agent_state.db");
export const SQLITE_STORAGE_SCHEMA_VERSION = "1";
export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

const CREATE_SCHEMA_VERSION_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS schema_version (
  version TEXT PRIMARY KEY,
  applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);
`;

// session_id is the only key: one row per session, replaced in place on every checkpoint.
const CREATE_AGENT_STATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS agent_state (
  session_id TEXT PRIMARY KEY NOT NULL,
  state_blob BLOB NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_agent_state_updated_at
  ON agent_state(updated_at);
`;

function resolveDbPath(explicitPath?: string): string {
  if (explicitPath && explicitPath.trim() !== "") {
    return path.resolve(explicitPath);
  }
  return path.resolve(process.cwd(), DEFAULT_SQLITE_DB_REL_PATH);
}

function unavailable(action: string, error: unknown): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  return new StorageError(
    STORAGE_ERROR_CODES.STORAGE_UNAVAILABLE,
    `${action} failed: ${describeError(error)}`,
    { cause: error }
  );
}

export class SQLiteStorage implements Storage {
  private readonly dbPath: string;
  private readonly expectedSchemaVersion: string;
  private readonly busyTimeoutMs: number;
  private readonly readOnlyMode: boolean;
  private db: BetterSqliteDatabase | null = null;
  private closed = false;

  constructor(options: SQLiteStorageOptions = {}) {
    this.dbPath = resolveDbPath(options.dbPath);
    this.expectedSchemaVersion = options.expectedSchemaVersion ?? SQLITE_STORAGE_SCHEMA_VERSION;
    this.busyTimeoutMs = options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS;
    this.readOnlyMode = options["readonly"] === true;
  }

  connect(): void {
    if (this.closed) {
      throw new StorageError(STORAGE_ERROR_CODES.STORAGE_UNAVAILABLE, "storage has been closed");
    }
    if (this.db !== null) {
      throw new StorageError(
        STORAGE_ERROR_CODES.STORAGE_UNAVAILABLE,
        "single connection already opened"
      );
    }

    let db: BetterSqliteDatabase;
    try {
      if (!this.readOnlyMode) {
        fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }
      db = this.readOnlyMode
        ? new BetterSqlite3(this.dbPath, {
            readonly: true,
            fileMustExist: true,
            timeout: this.busyTimeoutMs,
          })
        : new BetterSqlite3(this.dbPath, { timeout: this.busyTimeoutMs });
    } catch (error) {
      throw unavailable(`open ${this.dbPath}`, error);
    }

    try {
      if (!this.readOnlyMode) {
        db.pragma("journal_mode = WAL");
        db.pragma("synchronous = FULL");
      }
      this.db = db;
      this.initializeSchema();
    } catch (error) {
      db.close();
      this.db = null;
      throw unavailable(`initialize ${this.dbPath}`, error);
    }
  }

  close(): void {
    if (this.db === null) {
      this.closed = true;
      return;
    }
    this.db.close();
    this.db = null;
    this.closed = true;
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  exec(sql: string, params: readonly SQLiteParam[] = []): SQLiteRunResult {
    this.assertWritable();
    const db = this.requireDb();
    try {
      const info = db.prepare(sql).run(...params);
      return { changes: info.changes };
    } catch (error) {
      throw unavailable("write", error);
    }
  }

  query<T extends Record<string, unknown>>(
    sql: string,
    params: readonly SQLiteParam[] = []
  ): readonly T[] {
    const db = this.requireDb();
    try {
      return db.prepare(sql).all(...params) as T[];
    } catch (error) {
      throw unavailable("read", error);
    }
  }

  /** Runs `work` inside BEGIN IMMEDIATE so concurrent writers queue on the busy timeout. */
  transaction<T>(work: () => T): T {
    this.assertWritable();
    const db = this.requireDb();
    try {
      return db.transaction(work).immediate();
    } catch (error) {
      throw unavailable("transaction", error);
    }
  }

  getResolvedDbPath(): string {
    return this.dbPath;
  }

  private initializeSchema(): void {
    const db = this.requireDb();
    if (!this.readOnlyMode) {
      db.exec(CREATE_SCHEMA_VERSION_TABLE_SQL);
    }

    this.validateSchemaVersionTableShape();

    const versions = this.query<{ version: unknown }>(
      "SELECT version FROM schema_version ORDER BY version ASC"
    );

    if (this.readOnlyMode) {
      this.assertSchemaVersionMatch(versions);
      return;
    }

    if (versions.length === 0) {
      db.transaction(() => {
        db.exec(CREATE_AGENT_STATE_SCHEMA_SQL);
        db.prepare("INSERT OR IGNORE INTO schema_version(version) VALUES (?)").run(
          this.expectedSchemaVersion
        );
      }).immediate();
      this.assertSchemaVersionMatch(
        this.query<{ version: unknown }>("SELECT version FROM schema_version ORDER BY version ASC")
      );
      return;
    }

    this.assertSchemaVersionMatch(versions);
    db.exec(CREATE_AGENT_STATE_SCHEMA_SQL);
  }

  private assertSchemaVersionMatch(versions: readonly { version: unknown }[]): void {
    const storedVersions = versions
      .map((row) => row.version)
      .filter((value): value is string => typeof value === "string");
    const schemaMatches =
      storedVersions.length === 1 && storedVersions[0] === this.expectedSchemaVersion;

    if (!schemaMatches) {
      throw new StorageError(
        STORAGE_ERROR_CODES.STORAGE_VERSION_MISMATCH,
        `expected=${this.expectedSchemaVersion} actual=${storedVersions.join(",")}`
      );
    }
  }

  private validateSchemaVersionTableShape(): void {
    const columns = this.query<{
      name?: unknown;
      type?: unknown;
      pk?: unknown;
    }>("PRAGMA table_info(schema_version)");

    const normalized = columns.map((column) => ({
      name: typeof column.name === "string" ? column.name : "",
      type: typeof column.type === "string" ? column.type.toUpperCase() : "",
      pk: Number(column.pk ?? 0),
    }));

    const isExactShape =
      normalized.length === 2 &&
      normalized[0]?.name === "version" &&
      normalized[0]?.type === "TEXT" &&
      normalized[0]?.pk === 1 &&
      normalized[1]?.name === "applied_at" &&
      normalized[1]?.type === "TIMESTAMP" &&
      normalized[1]?.pk === 0;

    if (!isExactShape) {
      throw new StorageError(
        STORAGE_ERROR_CODES.STORAGE_SCHEMA_CORRUPTED,
        "schema_version shape mismatch"
      );
    }
  }

  private assertWritable(): void {
    if (this.readOnlyMode) {
      throw new StorageError(
        STORAGE_ERROR_CODES.STORAGE_READONLY_WRITE_BLOCKED,
        `${this.dbPath} is opened read-only`
      );
    }
  }

  private requireDb(): BetterSqliteDatabase {
    if (this.db === null) {
      throw new StorageError(
        STORAGE_ERROR_CODES.STORAGE_UNAVAILABLE,
        this.closed ? "connection is closed" : "connection is not open"
      );
    }
    return this.db;
  }
}
