import { STORAGE_ERROR_CODES, StorageError } from "../../../core/errors/errors";
import type {
  AgentStateLookup,
  AgentStateRecord,
  AgentStateStore,
  MigrationResult,
  StateBlob,
} from "../../../session/agent_state.types";
import { dropLegacyCheckpointTables, LEGACY_CHECKPOINT_TABLES } from "./legacy_checkpoint.migration";
import { SQLiteStorage, type SQLiteStorageOptions, type Storage } from "./sqlite.storage";

// A single conflict-resolving statement: concurrent writers for one session
// serialize inside SQLite instead of racing a read-then-insert.
const UPSERT_AGENT_STATE_SQL = `
INSERT INTO agent_state (session_id, state_blob, updated_at)
VALUES (?, ?, ?)
ON CONFLICT(session_id) DO UPDATE SET
  state_blob = excluded.state_blob,
  updated_at = excluded.updated_at
`;

const SELECT_AGENT_STATE_SQL = `
SELECT session_id, state_blob, updated_at
FROM agent_state
WHERE session_id = ?
`;

interface AgentStateRow extends Record<string, unknown> {
  session_id: unknown;
  state_blob: unknown;
  updated_at: unknown;
}

export interface SqliteAgentStateStoreOptions {
  readonly now?: () => Date;
}

function requireSessionId(sessionId: string): string {
  if (typeof sessionId !== "string" || sessionId.trim() === "") {
    throw new StorageError(
      STORAGE_ERROR_CODES.STORAGE_INVALID_INPUT,
      "sessionId must be a non-empty string"
    );
  }
  return sessionId;
}

function fromRow(row: AgentStateRow): AgentStateRecord {
  const blob = row.state_blob;
  let stateBlob: StateBlob;
  if (Buffer.isBuffer(blob)) {
    stateBlob = blob;
  } else if (typeof blob === "string") {
    stateBlob = blob;
  } else {
    throw new StorageError(
      STORAGE_ERROR_CODES.STORAGE_SCHEMA_CORRUPTED,
      `agent_state.state_blob has unexpected type ${typeof blob}`
    );
  }
  return {
    sessionId: String(row.session_id),
    stateBlob,
    updatedAt: String(row.updated_at),
  };
}

export class SqliteAgentStateStore implements AgentStateStore {
  private readonly now: () => Date;

  constructor(
    private readonly storage: Storage,
    options: SqliteAgentStateStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async upsert(sessionId: string, stateBlob: StateBlob): Promise<void> {
    const key = requireSessionId(sessionId);
    if (typeof stateBlob !== "string" && !Buffer.isBuffer(stateBlob)) {
      throw new StorageError(
        STORAGE_ERROR_CODES.STORAGE_INVALID_INPUT,
        "stateBlob must be a string or Buffer"
      );
    }
    this.storage.exec(UPSERT_AGENT_STATE_SQL, [key, stateBlob, this.now().toISOString()]);
  }

  async get(sessionId: string): Promise<AgentStateLookup> {
    const key = requireSessionId(sessionId);
    const rows = this.storage.query<AgentStateRow>(SELECT_AGENT_STATE_SQL, [key]);
    const row = rows[0];
    if (!row) {
      return { status: "not_found", sessionId: key };
    }
    return { status: "found", record: fromRow(row) };
  }

  async migrateFromLegacyCheckpoints(
    tables: readonly string[] = LEGACY_CHECKPOINT_TABLES
  ): Promise<MigrationResult> {
    return dropLegacyCheckpointTables(this.storage, tables);
  }
}

export interface SQLiteStorageLayer {
  readonly storage: SQLiteStorage;
  readonly agentState: SqliteAgentStateStore;
}

export function createSQLiteStorageLayer(
  options: SQLiteStorageOptions & SqliteAgentStateStoreOptions = {}
): SQLiteStorageLayer {
  const storage = new SQLiteStorage(options);
  return {
    storage,
    agentState: new SqliteAgentStateStore(storage, { now: options.now }),
  };
}
