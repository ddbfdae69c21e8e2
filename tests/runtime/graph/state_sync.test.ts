/**
 * Intent: graph nodes wrapped with withStateSync checkpoint the merged state after every step, and a failing store never fails the run.
 * Scope: serializeGraphState / syncGraphState / withStateSync / loadGraphState with a compiled StateGraph.
 * Non-Goals: LangGraph's own checkpointer API.
 */
import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Annotation, END, StateGraph } from "@langchain/langgraph";
import { createSQLiteStorageLayer } from "../../../src/adapter/storage/sqlite";
import type {
  AgentStateLookup,
  AgentStateStore,
  StateBlob,
} from "../../../src/session/agent_state.types";
import {
  loadGraphState,
  serializeGraphState,
  syncGraphState,
  withStateSync,
} from "../../../runtime/graph/state_sync";

const ShoppingStateAnnotation = Annotation.Root({
  sessionId: Annotation<string>,
  question: Annotation<string>,
  draft: Annotation<string | undefined>,
  answer: Annotation<string | undefined>,
});

type ShoppingState = typeof ShoppingStateAnnotation.State;

class RecordingStore implements AgentStateStore {
  readonly upserts: { sessionId: string; blob: string }[] = [];

  async upsert(sessionId: string, stateBlob: StateBlob): Promise<void> {
    this.upserts.push({ sessionId, blob: String(stateBlob) });
  }

  async get(sessionId: string): Promise<AgentStateLookup> {
    const latest = this.upserts.filter((entry) => entry.sessionId === sessionId).pop();
    if (!latest) {
      return { status: "not_found", sessionId };
    }
    return {
      status: "found",
      record: { sessionId, stateBlob: latest.blob, updatedAt: "2026-01-01T00:00:00.000Z" },
    };
  }
}

class FailingStore implements AgentStateStore {
  async upsert(): Promise<void> {
    throw new Error("STORAGE_UNAVAILABLE disk full");
  }

  async get(sessionId: string): Promise<AgentStateLookup> {
    return { status: "not_found", sessionId };
  }
}

function buildGraph(store: AgentStateStore, onError?: (message: string) => void) {
  const sync = { store, sessionIdOf: (state: ShoppingState) => state.sessionId, onError };
  const graph = new StateGraph(ShoppingStateAnnotation)
    .addNode(
      "write_draft",
      withStateSync<ShoppingState>((state) => ({ draft: `draft:${state.question}` }), sync)
    )
    .addNode(
      "finalize_answer",
      withStateSync<ShoppingState>(
        async (state) => ({ answer: (state.draft ?? "").toUpperCase() }),
        sync
      )
    );

  graph.setEntryPoint("write_draft");
  graph.addEdge("write_draft", "finalize_answer");
  graph.addEdge("finalize_answer", END);
  return graph.compile();
}

test("every wrapped node syncs the state it produced", async () => {
  const store = new RecordingStore();
  const app = buildGraph(store);

  const result = await app.invoke({ sessionId: "s1", question: "red scarf" });

  assert.equal(result.answer, "DRAFT:RED SCARF");
  assert.deepEqual(
    store.upserts.map((entry) => ({ sessionId: entry.sessionId, state: JSON.parse(entry.blob) })),
    [
      {
        sessionId: "s1",
        state: { sessionId: "s1", question: "red scarf", draft: "draft:red scarf" },
      },
      {
        sessionId: "s1",
        state: {
          sessionId: "s1",
          question: "red scarf",
          draft: "draft:red scarf",
          answer: "DRAFT:RED SCARF",
        },
      },
    ]
  );
});

test("graph state round-trips through the SQLite store", async (t) => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "state-sync-"));
  const layer = createSQLiteStorageLayer({ dbPath: path.join(dir, "agent_state.db") });
  layer.storage.connect();
  t.after(() => {
    layer.storage.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  await buildGraph(layer.agentState).invoke({ sessionId: "s-sql", question: "boots" });

  assert.deepEqual(await loadGraphState(layer.agentState, "s-sql"), {
    sessionId: "s-sql",
    question: "boots",
    draft: "draft:boots",
    answer: "DRAFT:BOOTS",
  });
  assert.equal(
    Number(
      layer.storage.query<{ total: number }>("SELECT COUNT(*) AS total FROM agent_state")[0]?.total
    ),
    1
  );
});

test("a failing store is reported and the run still completes", async () => {
  const errors: string[] = [];
  const app = buildGraph(new FailingStore(), (message) => errors.push(message));

  const result = await app.invoke({ sessionId: "s2", question: "hat" });

  assert.equal(result.answer, "DRAFT:HAT");
  assert.deepEqual(errors, [
    "failed to sync agent state (sessionId=s2): STORAGE_UNAVAILABLE disk full",
    "failed to sync agent state (sessionId=s2): STORAGE_UNAVAILABLE disk full",
  ]);
});

test("a session id that cannot be derived is reported and the node update still returns", async () => {
  const store = new RecordingStore();
  const errors: string[] = [];
  const node = withStateSync<{ x: number }>((state) => ({ x: state.x + 1 }), {
    store,
    sessionIdOf: () => {
      throw new Error("no session");
    },
    onError: (message) => errors.push(message),
  });

  assert.deepEqual(await node({ x: 1 }), { x: 2 });
  assert.deepEqual(errors, ["failed to sync agent state (sessionId=unknown): no session"]);
  assert.deepEqual(store.upserts, []);
});

test("syncGraphState reports success and failure as a boolean", async () => {
  const errors: string[] = [];
  const onError = (message: string) => errors.push(message);

  assert.equal(await syncGraphState(new RecordingStore(), "ok", { step: 1 }, { onError }), true);
  assert.equal(await syncGraphState(new FailingStore(), "bad", { step: 1 }, { onError }), false);
  assert.equal(
    await syncGraphState(new RecordingStore(), "big", { count: 1n }, { onError }),
    false
  );
  assert.deepEqual(errors, [
    "failed to sync agent state (sessionId=bad): STORAGE_UNAVAILABLE disk full",
    "failed to sync agent state (sessionId=big): STATE_SYNC_SERIALIZE_ERROR unsupported bigint at 'count'",
  ]);
});

test("serializeGraphState drops undefined fields and uses toJSON", () => {
  const text = serializeGraphState({
    sessionId: "s1",
    missing: undefined,
    seenAt: new Date("2026-02-03T04:05:06.000Z"),
    items: [{ sku: "A1", qty: 2 }],
  });
  assert.equal(
    text,
    '{"sessionId":"s1","seenAt":"2026-02-03T04:05:06.000Z","items":[{"sku":"A1","qty":2}]}'
  );
});

test("serializeGraphState rejects values JSON cannot carry", () => {
  assert.throws(() => serializeGraphState({ nested: { callback: () => 1 } }), {
    name: "StateSyncError",
    message: "STATE_SYNC_SERIALIZE_ERROR unsupported function at 'callback'",
  });
});

test("loadGraphState distinguishes missing, corrupt and valid states", async () => {
  const store = new RecordingStore();
  assert.equal(await loadGraphState(store, "none"), null);

  await store.upsert("corrupt", "{not json");
  await assert.rejects(loadGraphState(store, "corrupt"), /^StateSyncError: STATE_SYNC_PARSE_ERROR session=corrupt: /);

  await store.upsert("array", "[1,2]");
  await assert.rejects(loadGraphState(store, "array"), {
    message: "STATE_SYNC_PARSE_ERROR session=array: state must be an object",
  });

  await store.upsert("good", Buffer.from('{"sessionId":"good","draft":"x"}', "utf8"));
  assert.deepEqual(await loadGraphState(store, "good"), { sessionId: "good", draft: "x" });
});
