import { describeError, StateSyncError } from "../../src/core/errors/errors";
import type { AgentStateStore } from "../../src/session/agent_state.types";

export type GraphStateRecord = Record<string, unknown>;

export interface StateSyncOptions {
  readonly onError?: (message: string) => void;
}

export interface NodeSyncOptions<S extends GraphStateRecord> extends StateSyncOptions {
  readonly store: AgentStateStore;
  readonly sessionIdOf: (state: S) => string;
}

export type GraphNode<S extends GraphStateRecord> = (
  state: S
) => Partial<S> | Promise<Partial<S>>;

function warn(message: string): void {
  console.warn(`[state-sync] ${message}`);
}

/**
 * JSON text of a graph state. Undefined fields drop out and objects with
 * `toJSON` (LangChain messages among them) serialize through it; values JSON
 * cannot carry are rejected rather than silently lost.
 */
export function serializeGraphState(state: GraphStateRecord): string {
  const serialized = JSON.stringify(state, (key, value: unknown) => {
    if (typeof value === "bigint" || typeof value === "function" || typeof value === "symbol") {
      throw new StateSyncError(
        `STATE_SYNC_SERIALIZE_ERROR unsupported ${typeof value} at '${key}'`
      );
    }
    return value;
  });
  if (typeof serialized !== "string") {
    throw new StateSyncError("STATE_SYNC_SERIALIZE_ERROR state is not serializable");
  }
  return serialized;
}

/**
 * Persists the latest state for a session. A failed sync is reported and
 * swallowed: checkpointing must not fail the agent run it observes.
 */
export async function syncGraphState(
  store: AgentStateStore,
  sessionId: string,
  state: GraphStateRecord,
  options: StateSyncOptions = {}
): Promise<boolean> {
  const onError = options.onError ?? warn;
  try {
    await store.upsert(sessionId, serializeGraphState(state));
    return true;
  } catch (error) {
    onError(`failed to sync agent state (sessionId=${sessionId}): ${describeError(error)}`);
    return false;
  }
}

// Channels are merged last-value-wins; channels with reducers are synced as
// the node saw them plus its raw update.
export function withStateSync<S extends GraphStateRecord>(
  node: GraphNode<S>,
  options: NodeSyncOptions<S>
): (state: S) => Promise<Partial<S>> {
  const onError = options.onError ?? warn;
  return async (state: S): Promise<Partial<S>> => {
    const update = await node(state);
    const merged: S = { ...state, ...update };
    let sessionId: string;
    try {
      sessionId = options.sessionIdOf(merged);
    } catch (error) {
      onError(`failed to sync agent state (sessionId=unknown): ${describeError(error)}`);
      return update;
    }
    await syncGraphState(options.store, sessionId, merged, { onError });
    return update;
  };
}

export async function loadGraphState(
  store: AgentStateStore,
  sessionId: string
): Promise<GraphStateRecord | null> {
  const lookup = await store.get(sessionId);
  if (lookup.status === "not_found") {
    return null;
  }

  const raw = lookup.record.stateBlob;
  const text = typeof raw === "string" ? raw : raw.toString("utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new StateSyncError(
      `STATE_SYNC_PARSE_ERROR session=${sessionId}: ${describeError(error)}`,
      { cause: error }
    );
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new StateSyncError(`STATE_SYNC_PARSE_ERROR session=${sessionId}: state must be an object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}
