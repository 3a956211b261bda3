/**
 * In-process repository client serving session records from memory.
 *
 * Backs `--snapshot` reviews (records exported to a JSON file) and tests.
 * Writes are recorded, not applied, so a snapshot stays a snapshot.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { EngineError } from "../engine/errors.js";
import type { PlanField } from "../engine/types.js";
import {
  RemoteOperationError,
  type RepositoryClient,
  type ScanRef,
} from "./client.js";

export interface RecordedWrite {
  ref: ScanRef;
  field: PlanField;
  value: string;
}

export interface InMemoryClientOptions {
  /** Return an error to make the matching write fail. */
  failWrite?: (write: RecordedWrite) => RemoteOperationError | undefined;
}

const SnapshotFileSchema = z.object({
  sessions: z.array(z.object({ subjectLabel: z.string().min(1) }).passthrough()),
});

export class InMemoryRepositoryClient implements RepositoryClient {
  private readonly records = new Map<string, unknown>();
  private readonly failWrite?: InMemoryClientOptions["failWrite"];
  readonly writes: RecordedWrite[] = [];

  constructor(
    records: ReadonlyArray<{ subjectLabel: string }> = [],
    options: InMemoryClientOptions = {},
  ) {
    for (const record of records) {
      this.records.set(record.subjectLabel, record);
    }
    this.failWrite = options.failWrite;
  }

  async fetchSession(subjectLabel: string): Promise<unknown> {
    const record = this.records.get(subjectLabel);
    if (record === undefined) {
      throw new RemoteOperationError(
        `No sessions found for subject ${subjectLabel}`,
        "NOT_FOUND",
        { subjectLabel },
      );
    }
    return structuredClone(record);
  }

  async writeScanField(ref: ScanRef, field: PlanField, value: string): Promise<void> {
    const write = { ref: { ...ref }, field, value };
    const failure = this.failWrite?.(write);
    if (failure) throw failure;
    this.writes.push(write);
  }
}

/**
 * Load `{ "sessions": [ ...session records ] }` from a JSON file.
 *
 * @throws EngineError MISSING_METADATA when the file is unreadable or the
 *   shape is wrong
 */
export function loadSnapshotFile(path: string): InMemoryRepositoryClient {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (e: unknown) {
    throw new EngineError(
      `Snapshot ${path} could not be read: ${e instanceof Error ? e.message : String(e)}`,
      "MISSING_METADATA",
      { path },
    );
  }
  const parsed = SnapshotFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EngineError(
      `Snapshot ${path} must contain { "sessions": [...] } with a subjectLabel on each`,
      "MISSING_METADATA",
      { path },
    );
  }
  return new InMemoryRepositoryClient(parsed.data.sessions);
}
