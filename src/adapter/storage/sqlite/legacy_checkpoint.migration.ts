import { STORAGE_ERROR_CODES, StorageError } from "../../../core/errors/errors";
import type { LegacyTableOutcome, MigrationResult } from "../../../session/agent_state.types";
import type { Storage } from "./sqlite.storage";

/** Tables of the previous multi-row checkpointer; `checkpoints` had no usable uniqueness constraint. */
export const LEGACY_CHECKPOINT_TABLES = Object.freeze([
  "checkpoints",
  "checkpoint_blobs",
  "checkpoint_migrations",
  "checkpoint_writes",
] as const);

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function quoteIdentifier(name: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new StorageError(
      STORAGE_ERROR_CODES.STORAGE_INVALID_INPUT,
      `invalid table name '${name}'`
    );
  }
  return `"${name}"`;
}

function listTables(storage: Storage): readonly string[] {
  return storage
    .query<{ name: unknown }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name ASC"
    )
    .map((row) => String(row.name));
}

function dropTable(storage: Storage, table: string, quoted: string): LegacyTableOutcome {
  const existing = storage.query<{ name: unknown }>(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?",
    [table]
  );
  if (existing.length === 0) {
    return { table, tableExisted: false, rowsDiscarded: 0 };
  }
  const counted = storage.query<{ total: unknown }>(`SELECT COUNT(*) AS total FROM ${quoted}`);
  storage.exec(`DROP TABLE IF EXISTS ${quoted}`);
  return { table, tableExisted: true, rowsDiscarded: Number(counted[0]?.total ?? 0) };
}

/**
 * Drops the legacy checkpoint tables outright. Duplicate rows in them cannot
 * be reconciled automatically (nothing says which one is authoritative), so
 * row counts are reported for audit and the data is discarded. Safe to run
 * repeatedly; all drops share one transaction.
 */
export function dropLegacyCheckpointTables(
  storage: Storage,
  tables: readonly string[] = LEGACY_CHECKPOINT_TABLES
): MigrationResult {
  const quotedTables = tables.map((table) => ({ table, quoted: quoteIdentifier(table) }));

  return storage.transaction(() => {
    const outcomes = quotedTables.map(({ table, quoted }) => dropTable(storage, table, quoted));
    const remainingTables = listTables(storage);
    return {
      tables: outcomes,
      rowsDiscarded: outcomes.reduce((sum, outcome) => sum + outcome.rowsDiscarded, 0),
      agentStateExists: remainingTables.includes("agent_state"),
      remainingTables,
    };
  });
}
