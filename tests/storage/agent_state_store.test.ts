/**
 * Intent: agent_state keeps exactly one row per session; upsert replaces in place, get reports absence as a value, and writers on separate connections never collide on the key.
 * Scope: SqliteAgentStateStore via createSQLiteStorageLayer over a temp database.
 * Non-Goals: legacy table migration (legacy_checkpoint_migration.test.ts).
 */
import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { spawn } from "node:child_process";
import { fileURLToPath } from "node:url";
import {
  createSQLiteStorageLayer,
  type SQLiteStorageLayer,
} from "../../src/adapter/storage/sqlite";
import { STORAGE_ERROR_CODES, StorageError } from "../../src/core/errors/errors";

function createTempDb(t: test.TestContext): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "agent-state-store-"));
  t.after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });
  return path.join(dir, "agent_state.db");
}

function openLayer(
  t: test.TestContext,
  dbPath: string,
  now?: () => Date
): SQLiteStorageLayer {
  const layer = createSQLiteStorageLayer({ dbPath, now });
  layer.storage.connect();
  t.after(() => layer.storage.close());
  return layer;
}

const UPSERT_WORKER = fileURLToPath(new URL("./fixtures/upsert_worker.ts", import.meta.url));

interface WorkerReport {
  readonly worker: string;
  readonly written: number;
  readonly errors: number;
  readonly firstError: string | null;
}

function runUpsertWorker(
  dbPath: string,
  sessionId: string,
  workerId: number,
  count: number
): Promise<{ readonly exitCode: number | null; readonly stdout: string; readonly stderr: string }> {
  return new Promise((resolve, reject) => {
    const child = spawn(
      process.execPath,
      ["--import", "tsx", UPSERT_WORKER, dbPath, sessionId, String(workerId), String(count)],
      { cwd: process.cwd(), stdio: ["ignore", "pipe", "pipe"] }
    );
    let stdout = "";
    let stderr = "";
    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString("utf8");
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString("utf8");
    });
    child.on("error", reject);
    child.on("close", (exitCode) => resolve({ exitCode, stdout, stderr }));
  });
}

function parseReport(stdout: string): WorkerReport {
  const line = stdout.trim().split("\n").pop() ?? "";
  const parsed: unknown = JSON.parse(line);
  if (
    typeof parsed !== "object" ||
    parsed === null ||
    !("worker" in parsed) ||
    !("written" in parsed) ||
    !("errors" in parsed) ||
    !("firstError" in parsed)
  ) {
    throw new Error(`unexpected worker output: ${line}`);
  }
  return {
    worker: String(parsed.worker),
    written: Number(parsed.written),
    errors: Number(parsed.errors),
    firstError: typeof parsed.firstError === "string" ? parsed.firstError : null,
  };
}

function countRows(layer: SQLiteStorageLayer, sessionId: string): number {
  const rows = layer.storage.query<{ total: number }>(
    "SELECT COUNT(*) AS total FROM agent_state WHERE session_id = ?",
    [sessionId]
  );
  return Number(rows[0]?.total ?? 0);
}

test("second upsert replaces the first and keeps one row", async (t) => {
  const dbPath = createTempDb(t);
  const stamps = ["2026-03-01T10:00:00.000Z", "2026-03-01T10:05:00.000Z"];
  let tick = 0;
  const layer = openLayer(t, dbPath, () => new Date(stamps[Math.min(tick++, 1)] ?? ""));

  await layer.agentState.upsert("s1", "stateA");
  await layer.agentState.upsert("s1", "stateB");

  assert.deepEqual(await layer.agentState.get("s1"), {
    status: "found",
    record: { sessionId: "s1", stateBlob: "stateB", updatedAt: "2026-03-01T10:05:00.000Z" },
  });
  assert.equal(countRows(layer, "s1"), 1);
});

test("get on a missing session returns not_found", async (t) => {
  const layer = openLayer(t, createTempDb(t));
  await layer.agentState.upsert("other", "{}");

  assert.deepEqual(await layer.agentState.get("missing"), {
    status: "not_found",
    sessionId: "missing",
  });
});

test("binary blobs round-trip byte for byte", async (t) => {
  const layer = openLayer(t, createTempDb(t));
  const blob = Buffer.from([0x00, 0xff, 0x10, 0x80, 0x7f]);

  await layer.agentState.upsert("bin", blob);
  const lookup = await layer.agentState.get("bin");

  assert.equal(lookup.status, "found");
  if (lookup.status === "found") {
    assert.ok(Buffer.isBuffer(lookup.record.stateBlob));
    assert.deepEqual([...lookup.record.stateBlob], [0x00, 0xff, 0x10, 0x80, 0x7f]);
  }
});

test("sessions are independent rows", async (t) => {
  const layer = openLayer(t, createTempDb(t));
  await layer.agentState.upsert("s1", "one");
  await layer.agentState.upsert("s2", "two");
  await layer.agentState.upsert("s1", "uno");

  const rows = layer.storage.query<{ session_id: string; state_blob: string }>(
    "SELECT session_id, state_blob FROM agent_state ORDER BY session_id ASC"
  );
  assert.deepEqual(rows, [
    { session_id: "s1", state_blob: "uno" },
    { session_id: "s2", state_blob: "two" },
  ]);
});

test("upsert over a row written by another connection does not conflict", async (t) => {
  const dbPath = createTempDb(t);
  const writerA = openLayer(t, dbPath);
  const writerB = openLayer(t, dbPath);

  await writerB.agentState.upsert("shared", "from-b");
  await writerA.agentState.upsert("shared", "from-a");

  const lookup = await writerB.agentState.get("shared");
  assert.equal(lookup.status === "found" ? lookup.record.stateBlob : null, "from-a");
  assert.equal(countRows(writerA, "shared"), 1);
});

test("interleaved upserts from two connections in one process leave one row", async (t) => {
  const dbPath = createTempDb(t);
  const writerA = openLayer(t, dbPath);
  const writerB = openLayer(t, dbPath);
  const written = Array.from({ length: 40 }, (_, index) => `state-${index}`);

  await Promise.all(
    written.map((value, index) =>
      (index % 2 === 0 ? writerA : writerB).agentState.upsert("race", value)
    )
  );

  const lookup = await writerA.agentState.get("race");
  assert.equal(lookup.status, "found");
  if (lookup.status === "found") {
    assert.equal(written.includes(String(lookup.record.stateBlob)), true);
  }
  assert.equal(countRows(writerB, "race"), 1);
});

test(
  "writers in separate processes racing on one session never conflict",
  { timeout: 120000 },
  async (t) => {
    const dbPath = createTempDb(t);
    const workers = 4;
    const perWorker = 150;

    const results = await Promise.all(
      Array.from({ length: workers }, (_, workerId) =>
        runUpsertWorker(dbPath, "race", workerId, perWorker)
      )
    );

    for (const result of results) {
      assert.equal(result.exitCode, 0, result.stderr);
      const report = parseReport(result.stdout);
      assert.equal(report.errors, 0, report.firstError ?? "");
      assert.equal(report.written, perWorker);
    }

    const layer = openLayer(t, dbPath);
    assert.equal(countRows(layer, "race"), 1);
    const lookup = await layer.agentState.get("race");
    assert.match(
      lookup.status === "found" ? String(lookup.record.stateBlob) : "",
      new RegExp(`^worker-\\d+-${perWorker - 1}$`)
    );
  }
);

test("blank session ids are rejected before touching the table", async (t) => {
  const layer = openLayer(t, createTempDb(t));

  for (const sessionId of ["", "   "]) {
    await assert.rejects(
      layer.agentState.upsert(sessionId, "{}"),
      (error: unknown) =>
        error instanceof StorageError && error.code === STORAGE_ERROR_CODES.STORAGE_INVALID_INPUT
    );
    await assert.rejects(layer.agentState.get(sessionId), /sessionId must be a non-empty string/);
  }
  assert.equal(
    Number(layer.storage.query<{ total: number }>("SELECT COUNT(*) AS total FROM agent_state")[0]?.total),
    0
  );
});

test("writes through a closed store surface STORAGE_UNAVAILABLE", async (t) => {
  const dbPath = createTempDb(t);
  const layer = createSQLiteStorageLayer({ dbPath });
  layer.storage.connect();
  layer.storage.close();

  await assert.rejects(layer.agentState.upsert("s1", "{}"), {
    message: "STORAGE_UNAVAILABLE connection is closed",
  });
});
