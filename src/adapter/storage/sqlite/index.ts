export {
  DEFAULT_BUSY_TIMEOUT_MS,
  DEFAULT_SQLITE_DB_REL_PATH,
  SQLITE_STORAGE_SCHEMA_VERSION,
  SQLiteStorage,
  type SQLiteParam,
  type SQLiteRunResult,
  type SQLiteStorageOptions,
  type Storage,
} from "./sqlite.storage";

export {
  SqliteAgentStateStore,
  createSQLiteStorageLayer,
  type SQLiteStorageLayer,
  type SqliteAgentStateStoreOptions,
} from "./agent_state.store";

export {
  LEGACY_CHECKPOINT_TABLES,
  dropLegacyCheckpointTables,
} from "./legacy_checkpoint.migration";
