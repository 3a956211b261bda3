import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ApplyJournal } from "../src/audit/journal.js";
import { computeEventHash } from "../src/audit/hashing.js";
import type { ExecutionReport } from "../src/engine/update-executor.js";

const REPORT: ExecutionReport = {
  subjectLabel: "LD4001_v1",
  sessionId: "XNAT_E00001",
  planHash: "a".repeat(64),
  outcomes: [
    {
      bucket: "unusable",
      scanId: "1",
      field: "quality",
      previousValue: "",
      newValue: "unusable",
      overwrite: false,
      status: "success",
      reason: 'quality set to "unusable" (marker)',
    },
    {
      bucket: "rename",
      scanId: "2",
      field: "type",
      previousValue: "MPRAGE",
      newValue: "T1w",
      overwrite: false,
      status: "skipped",
      reason: 'type already holds "MPRAGE" and overwrite is off',
    },
  ],
  summary: { succeeded: 1, skipped: 1, failed: 0 },
};

let dir: string;
let dbPath: string;
let journal: ApplyJournal;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "scan-curator-journal-"));
  dbPath = join(dir, "journal.sqlite");
  journal = new ApplyJournal(dbPath);
});

afterEach(() => {
  journal.close();
  rmSync(dir, { recursive: true, force: true });
});

describe("ApplyJournal", () => {
  it("records a run with start, item and finish events", () => {
    const run = journal.recordExecution(REPORT, { actor: "tester" });

    expect(journal.getRun(run.runId)).toEqual({
      runId: run.runId,
      createdAt: run.createdAt,
      subjectLabel: "LD4001_v1",
      planHash: "a".repeat(64),
      metadata: { actor: "tester" },
    });

    const events = journal.listEvents(run.runId);
    expect(events.map((e) => [e.seq, e.type])).toEqual([
      [1, "ApplyStarted"],
      [2, "ItemApplied"],
      [3, "ItemApplied"],
      [4, "ApplyFinished"],
    ]);
    expect(events[0]?.payload).toEqual({
      subjectLabel: "LD4001_v1",
      sessionId: "XNAT_E00001",
      planHash: "a".repeat(64),
      items: 2,
    });
    expect(events[2]?.payload).toEqual({ ...REPORT.outcomes[1] });
    expect(events[3]?.payload).toEqual({ succeeded: 1, skipped: 1, failed: 0 });
  });

  it("links events into a hash chain", () => {
    const { runId } = journal.recordExecution(REPORT);
    const events = journal.listEvents(runId);

    expect(events[0]?.prevHash).toBeNull();
    for (let i = 1; i < events.length; i++) {
      expect(events[i]?.prevHash).toBe(events[i - 1]?.hash);
    }
    for (const e of events) {
      expect(e.hash).toBe(computeEventHash({ ...e }));
    }
    expect(journal.verifyRun(runId)).toEqual({ valid: true, eventCount: 4, failures: [] });
  });

  it("detects an edited payload", () => {
    const { runId } = journal.recordExecution(REPORT);
    const editor = new Database(dbPath);
    try {
      editor
        .prepare("UPDATE events SET payload_json = ? WHERE run_id = ? AND seq = 2")
        .run('{"status":"failed"}', runId);
    } finally {
      editor.close();
    }

    const result = journal.verifyRun(runId);
    expect(result.valid).toBe(false);
    expect(result.failures.map((f) => [f.seq, f.reason])).toEqual([[2, "hash_mismatch"]]);
  });

  it("detects a deleted event", () => {
    const { runId } = journal.recordExecution(REPORT);
    const editor = new Database(dbPath);
    try {
      editor.prepare("DELETE FROM events WHERE run_id = ? AND seq = 3").run(runId);
    } finally {
      editor.close();
    }

    const result = journal.verifyRun(runId);
    expect(result.eventCount).toBe(3);
    expect(result.failures.map((f) => [f.seq, f.reason])).toEqual([
      [4, "prevHash_mismatch"],
      [4, "seq_gap"],
    ]);
  });

  it("keeps runs apart", () => {
    const first = journal.recordExecution(REPORT);
    const second = journal.recordExecution({ ...REPORT, subjectLabel: "LD4002_v1" });
    expect(journal.listRuns().map((r) => r.runId).sort()).toEqual(
      [first.runId, second.runId].sort(),
    );
    expect(journal.listEvents(second.runId)[0]?.prevHash).toBeNull();
    expect(journal.verifyRun(first.runId).valid).toBe(true);
  });

  it("returns undefined for an unknown run", () => {
    expect(journal.getRun("missing")).toBeUndefined();
  });
});
