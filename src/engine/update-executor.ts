/**
 * Update executor — applies an UpdatePlan through a repository client.
 *
 * Items run one at a time in plan order (unusable bucket, then rename).
 * A failed item is recorded and the next one still runs: the repository
 * has no cross-record transaction, so the result is a per-item report.
 */

import { createLogger } from "../logging/logger.js";
import {
  RemoteOperationError,
  type RemoteErrorCode,
  type RepositoryClient,
} from "../repository/client.js";
import type { PlanBucket, PlanField, PlanItem, UpdatePlan } from "./types.js";

const log = createLogger("update-executor");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Field values treated as "never set by a human". */
export type DefaultFieldValues = Readonly<Record<PlanField, readonly string[]>>;

export const DEFAULT_FIELD_VALUES: DefaultFieldValues = {
  type: [""],
  quality: ["", "usable"],
};

/** One choice for the whole plan, or a decision per item. */
export type OverwriteDecision = boolean | ((item: PlanItem) => boolean);

export interface ExecuteOptions {
  overwrite: OverwriteDecision;
  defaults?: DefaultFieldValues;
  /** When set, items for other scans are skipped. */
  onlyScans?: ReadonlySet<string>;
  timeoutMs?: number;
}

export type ItemStatus = "success" | "skipped" | "failed";

export interface ItemOutcome {
  bucket: PlanBucket;
  scanId: string;
  field: PlanField;
  previousValue: string;
  newValue: string;
  overwrite: boolean;
  status: ItemStatus;
  reason: string;
  errorCode?: RemoteErrorCode;
}

export interface ExecutionReport {
  subjectLabel: string;
  sessionId: string;
  planHash: string;
  outcomes: ItemOutcome[];
  summary: { succeeded: number; skipped: number; failed: number };
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

function decideOverwrite(decision: OverwriteDecision, item: PlanItem): boolean {
  return typeof decision === "function" ? decision(item) : decision;
}

/** True when `value` is one of the configured defaults for `field`. */
export function isDefaultValue(
  field: PlanField,
  value: string,
  defaults: DefaultFieldValues = DEFAULT_FIELD_VALUES,
): boolean {
  return defaults[field].includes(value);
}

async function applyItem(
  plan: UpdatePlan,
  item: PlanItem,
  client: RepositoryClient,
  options: ExecuteOptions,
): Promise<ItemOutcome> {
  const overwrite = decideOverwrite(options.overwrite, item);
  const base = {
    bucket: item.bucket,
    scanId: item.scanId,
    field: item.field,
    previousValue: item.currentValue,
    newValue: item.newValue,
    overwrite,
  };

  if (options.onlyScans && !options.onlyScans.has(item.scanId)) {
    return { ...base, status: "skipped", reason: "scan not selected" };
  }

  if (!overwrite && !isDefaultValue(item.field, item.currentValue, options.defaults)) {
    return {
      ...base,
      status: "skipped",
      reason: `${item.field} already holds "${item.currentValue}" and overwrite is off`,
    };
  }

  try {
    await client.writeScanField(
      { sessionId: plan.sessionId, scanId: item.scanId },
      item.field,
      item.newValue,
      { timeoutMs: options.timeoutMs },
    );
  } catch (err: unknown) {
    if (err instanceof RemoteOperationError) {
      log.warn(
        { scanId: item.scanId, field: item.field, code: err.code },
        "scan field write failed",
      );
      return {
        ...base,
        status: "failed",
        reason: `${err.code}: ${err.message}`,
        errorCode: err.code,
      };
    }
    const message = err instanceof Error ? err.message : String(err);
    log.warn({ scanId: item.scanId, field: item.field, err }, "scan field write failed");
    return { ...base, status: "failed", reason: message };
  }

  log.info(
    { scanId: item.scanId, field: item.field, value: item.newValue },
    "scan field written",
  );
  return {
    ...base,
    status: "success",
    reason: `${item.field} set to "${item.newValue}" (${item.reason})`,
  };
}

/**
 * Apply every item of `plan`. Never throws for a failed write; the error is
 * reported on the item that hit it. Only remote failures carry an
 * `errorCode`.
 */
export async function executePlan(
  plan: UpdatePlan,
  client: RepositoryClient,
  options: ExecuteOptions,
): Promise<ExecutionReport> {
  const outcomes: ItemOutcome[] = [];
  for (const item of [...plan.unusable, ...plan.rename]) {
    outcomes.push(await applyItem(plan, item, client, options));
  }

  const count = (s: ItemStatus) => outcomes.filter((o) => o.status === s).length;
  const summary = {
    succeeded: count("success"),
    skipped: count("skipped"),
    failed: count("failed"),
  };
  log.info({ subjectLabel: plan.subjectLabel, ...summary }, "plan executed");

  return {
    subjectLabel: plan.subjectLabel,
    sessionId: plan.sessionId,
    planHash: plan.planHash,
    outcomes,
    summary,
  };
}
