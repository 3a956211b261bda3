/**
 * Update planner — pure fold from findings to an UpdatePlan.
 *
 * Every scan ends up in exactly one of: unusable, rename, noAction.
 * Same snapshot and same findings always give the same plan (and hash).
 */

import { contentHash } from "../audit/hashing.js";
import type { SessionModel } from "./session-model.js";
import type {
  Finding,
  FindingKind,
  NoActionEntry,
  PlanItem,
  ScanFinding,
  UpdatePlan,
} from "./types.js";

/** Quality value written for scans in the unusable bucket. */
export const UNUSABLE_QUALITY = "unusable";

/** A ResolvedRename is only applied when none of these is present. */
const RENAME_BLOCKERS: ReadonlySet<FindingKind> = new Set([
  "DuplicateType",
  "UnusableMarker",
  "IncompleteAcquisition",
]);

function uniqueKinds(findings: readonly Finding[]): FindingKind[] {
  const kinds: FindingKind[] = [];
  for (const f of findings) {
    if (!kinds.includes(f.kind)) kinds.push(f.kind);
  }
  return kinds;
}

export function computeUpdatePlanHash(plan: Omit<UpdatePlan, "planHash">): string {
  return contentHash({
    subjectLabel: plan.subjectLabel,
    sessionId: plan.sessionId,
    unusable: plan.unusable,
    rename: plan.rename,
    noAction: plan.noAction,
  });
}

export function buildUpdatePlan(
  session: SessionModel,
  findings: readonly Finding[],
): UpdatePlan {
  const labelFailure = findings.some((f) => f.kind === "ValidLabelFailure");

  const byScan = new Map<string, ScanFinding[]>();
  for (const f of findings) {
    if (f.kind === "ValidLabelFailure") continue;
    const list = byScan.get(f.scanId);
    if (list) {
      list.push(f);
    } else {
      byScan.set(f.scanId, [f]);
    }
  }

  const unusable: PlanItem[] = [];
  const rename: PlanItem[] = [];
  const noAction: NoActionEntry[] = [];

  for (const scan of session.scans) {
    const scanFindings = byScan.get(scan.id) ?? [];
    const kinds = uniqueKinds(scanFindings);

    if (labelFailure) {
      noAction.push({ scanId: scan.id, findings: ["ValidLabelFailure", ...kinds] });
      continue;
    }

    const marker = scanFindings.find((f) => f.kind === "UnusableMarker");
    if (marker) {
      if (scan.quality === UNUSABLE_QUALITY) {
        noAction.push({ scanId: scan.id, findings: kinds });
        continue;
      }
      unusable.push({
        bucket: "unusable",
        scanId: scan.id,
        field: "quality",
        currentValue: scan.quality ?? "",
        newValue: UNUSABLE_QUALITY,
        reason: marker.reason,
      });
      continue;
    }

    const resolved = scanFindings.find((f) => f.kind === "ResolvedRename");
    if (
      resolved?.kind === "ResolvedRename" &&
      !kinds.some((k) => RENAME_BLOCKERS.has(k))
    ) {
      rename.push({
        bucket: "rename",
        scanId: scan.id,
        field: "type",
        currentValue: scan.type,
        newValue: resolved.candidate,
        reason: resolved.reason,
      });
      continue;
    }

    noAction.push({ scanId: scan.id, findings: kinds });
  }

  const content = {
    subjectLabel: session.subjectLabel,
    sessionId: session.sessionId,
    unusable,
    rename,
    noAction,
  };
  return { ...content, planHash: computeUpdatePlanHash(content) };
}
