/**
 * SQLite-backed apply journal.
 *
 * One run per executed plan:
 *   - `runs` table   (run_id, created_at, subject_label, plan_hash, metadata)
 *   - `events` table (run_id, seq, event_id, ts, type, payload_json,
 *                     prev_hash, hash)
 *
 * Events of a run: ApplyStarted, one ItemApplied per outcome, ApplyFinished.
 * They are hash-chained (canonical JSON + SHA-256) and written in a single
 * transaction. Rows are never updated or deleted.
 */

import Database from "better-sqlite3";
import { v4 as uuidv4 } from "uuid";
import type { ExecutionReport } from "../engine/update-executor.js";
import { canonicalJson } from "./canonical.js";
import {
  computeEventHash,
  type ChainFailure,
  type ChainVerificationResult,
} from "./hashing.js";

interface Stmt {
  run(...params: unknown[]): { changes: number; lastInsertRowid: number | bigint };
  get(...params: unknown[]): unknown;
  all(...params: unknown[]): unknown[];
  iterate(...params: unknown[]): IterableIterator<unknown>;
}

export type JournalEventType = "ApplyStarted" | "ItemApplied" | "ApplyFinished";

export interface JournalEvent {
  eventId: string;
  runId: string;
  seq: number;
  ts: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  prevHash: string | null;
  hash: string;
}

export interface JournalRun {
  runId: string;
  createdAt: string;
  subjectLabel: string;
  planHash: string;
  metadata: Record<string, string>;
}

interface EventRow {
  run_id: string;
  seq: number;
  event_id: string;
  ts: string;
  type: JournalEventType;
  payload_json: string;
  prev_hash: string | null;
  hash: string;
}

interface RunRow {
  run_id: string;
  created_at: string;
  subject_label: string;
  plan_hash: string;
  metadata: string;
}

function rowToRun(row: RunRow): JournalRun {
  return {
    runId: row.run_id,
    createdAt: row.created_at,
    subjectLabel: row.subject_label,
    planHash: row.plan_hash,
    metadata: JSON.parse(row.metadata) as Record<string, string>,
  };
}

function rowToEvent(row: EventRow): JournalEvent {
  return {
    eventId: row.event_id,
    runId: row.run_id,
    seq: row.seq,
    ts: row.ts,
    type: row.type,
    payload: JSON.parse(row.payload_json) as Record<string, unknown>,
    prevHash: row.prev_hash,
    hash: row.hash,
  };
}

/** The hashed shape of an event: everything except hash and prevHash. */
function hashableRecord(row: EventRow): Record<string, unknown> {
  return {
    eventId: row.event_id,
    runId: row.run_id,
    seq: row.seq,
    ts: row.ts,
    type: row.type,
    payload: JSON.parse(row.payload_json),
  };
}

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS runs (
  run_id        TEXT PRIMARY KEY,
  created_at    TEXT NOT NULL,
  subject_label TEXT NOT NULL,
  plan_hash     TEXT NOT NULL,
  metadata      TEXT NOT NULL DEFAULT '{}'
);

CREATE TABLE IF NOT EXISTS events (
  run_id       TEXT    NOT NULL REFERENCES runs(run_id),
  seq          INTEGER NOT NULL,
  event_id     TEXT    NOT NULL UNIQUE,
  ts           TEXT    NOT NULL,
  type         TEXT    NOT NULL,
  payload_json TEXT    NOT NULL,
  prev_hash    TEXT,
  hash         TEXT    NOT NULL,
  PRIMARY KEY (run_id, seq)
);

CREATE INDEX IF NOT EXISTS idx_runs_subject ON runs(subject_label);
`;

export class ApplyJournal {
  private readonly db: InstanceType<typeof Database>;

  private readonly stmtInsertRun: Stmt;
  private readonly stmtGetRun: Stmt;
  private readonly stmtListRuns: Stmt;
  private readonly stmtInsertEvent: Stmt;
  private readonly stmtEventsByRun: Stmt;

  private readonly txnRecord: (
    report: ExecutionReport,
    metadata: Record<string, string>,
    ts: string,
  ) => JournalRun;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);

    this.stmtInsertRun = this.db.prepare(
      `INSERT INTO runs (run_id, created_at, subject_label, plan_hash, metadata)
       VALUES (?, ?, ?, ?, ?)`,
    ) as Stmt;

    this.stmtGetRun = this.db.prepare(
      "SELECT * FROM runs WHERE run_id = ?",
    ) as Stmt;

    this.stmtListRuns = this.db.prepare(
      "SELECT * FROM runs ORDER BY created_at ASC, run_id ASC",
    ) as Stmt;

    this.stmtInsertEvent = this.db.prepare(
      `INSERT INTO events
         (run_id, seq, event_id, ts, type, payload_json, prev_hash, hash)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    ) as Stmt;

    this.stmtEventsByRun = this.db.prepare(
      "SELECT * FROM events WHERE run_id = ? ORDER BY seq ASC",
    ) as Stmt;

    this.txnRecord = this.db.transaction(
      (
        report: ExecutionReport,
        metadata: Record<string, string>,
        ts: string,
      ): JournalRun => {
        const runId = uuidv4();
        this.stmtInsertRun.run(
          runId,
          ts,
          report.subjectLabel,
          report.planHash,
          canonicalJson(metadata),
        );

        const payloads: Array<[JournalEventType, Record<string, unknown>]> = [
          [
            "ApplyStarted",
            {
              subjectLabel: report.subjectLabel,
              sessionId: report.sessionId,
              planHash: report.planHash,
              items: report.outcomes.length,
            },
          ],
          ...report.outcomes.map(
            (o): [JournalEventType, Record<string, unknown>] => [
              "ItemApplied",
              { ...o },
            ],
          ),
          ["ApplyFinished", { ...report.summary }],
        ];

        let prevHash: string | null = null;
        payloads.forEach(([type, payload], index) => {
          const seq = index + 1;
          const eventId = uuidv4();
          const hash = computeEventHash({ eventId, runId, seq, ts, type, payload });
          this.stmtInsertEvent.run(
            runId,
            seq,
            eventId,
            ts,
            type,
            canonicalJson(payload),
            prevHash,
            hash,
          );
          prevHash = hash;
        });

        return {
          runId,
          createdAt: ts,
          subjectLabel: report.subjectLabel,
          planHash: report.planHash,
          metadata,
        };
      },
    );
  }

  /** Journal one execution report as a new run. */
  recordExecution(
    report: ExecutionReport,
    metadata: Record<string, string> = {},
  ): JournalRun {
    return this.txnRecord(report, metadata, new Date().toISOString());
  }

  getRun(runId: string): JournalRun | undefined {
    const row = this.stmtGetRun.get(runId) as RunRow | undefined;
    return row ? rowToRun(row) : undefined;
  }

  listRuns(): JournalRun[] {
    return (this.stmtListRuns.all() as RunRow[]).map(rowToRun);
  }

  listEvents(runId: string): JournalEvent[] {
    return (this.stmtEventsByRun.all(runId) as EventRow[]).map(rowToEvent);
  }

  /** Recompute every hash of a run and check links and sequence. */
  verifyRun(runId: string): ChainVerificationResult {
    const failures: ChainFailure[] = [];
    let prevStoredHash: string | null = null;
    let count = 0;

    for (const raw of this.stmtEventsByRun.iterate(runId)) {
      count++;
      const row = raw as EventRow;

      const expectedHash = computeEventHash(hashableRecord(row));
      if (row.hash !== expectedHash) {
        failures.push({
          seq: row.seq,
          eventId: row.event_id,
          reason: "hash_mismatch",
          expected: expectedHash,
          actual: row.hash,
        });
      }

      if (count === 1) {
        if (row.prev_hash !== null) {
          failures.push({
            seq: row.seq,
            eventId: row.event_id,
            reason: "first_event_prevHash_not_null",
            expected: "null",
            actual: String(row.prev_hash),
          });
        }
      } else if (row.prev_hash !== prevStoredHash) {
        failures.push({
          seq: row.seq,
          eventId: row.event_id,
          reason: "prevHash_mismatch",
          expected: prevStoredHash ?? "null",
          actual: row.prev_hash ?? "null",
        });
      }

      if (row.seq !== count) {
        failures.push({
          seq: row.seq,
          eventId: row.event_id,
          reason: "seq_gap",
          expected: String(count),
          actual: String(row.seq),
        });
      }

      prevStoredHash = row.hash;
    }

    return { valid: failures.length === 0, eventCount: count, failures };
  }

  close(): void {
    this.db.close();
  }
}
