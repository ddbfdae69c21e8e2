export type StateBlob = string | Buffer;

export interface AgentStateRecord {
  readonly sessionId: string;
  readonly stateBlob: StateBlob;
  readonly updatedAt: string;
}

export type AgentStateLookup =
  | { readonly status: "found"; readonly record: AgentStateRecord }
  | { readonly status: "not_found"; readonly sessionId: string };

export interface LegacyTableOutcome {
  readonly table: string;
  readonly tableExisted: boolean;
  readonly rowsDiscarded: number;
}

export interface MigrationResult {
  readonly tables: readonly LegacyTableOutcome[];
  /** Sum over `tables`. */
  readonly rowsDiscarded: number;
  readonly agentStateExists: boolean;
  readonly remainingTables: readonly string[];
}

export interface AgentStateStore {
  upsert(sessionId: string, stateBlob: StateBlob): Promise<void>;
  get(sessionId: string): Promise<AgentStateLookup>;
}
