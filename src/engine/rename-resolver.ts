/**
 * Rename resolver.
 *
 * Asks the rule table for a canonical type for every scan that is a
 * singleton of its current type and carries no unusable marker.
 * One distinct candidate resolves; several are reported as ambiguous and
 * never picked from.
 */

import { createLogger } from "../logging/logger.js";
import type { SessionModel } from "./session-model.js";
import { studyCodeOf } from "./subject-label.js";
import type {
  RuleCandidate,
  RuleTable,
  ScanFinding,
} from "./types.js";

const log = createLogger("rename-resolver");

/** Scans with any of these findings are never looked up. */
const BLOCKING_KINDS: ReadonlySet<ScanFinding["kind"]> = new Set([
  "DuplicateType",
  "UnusableMarker",
]);

/**
 * Collapse candidates to one entry per canonical name (the rule id that
 * sorts first wins), ordered by name.
 */
export function distinctCandidates(
  candidates: readonly RuleCandidate[],
): RuleCandidate[] {
  const byName = new Map<string, RuleCandidate>();
  for (const c of candidates) {
    const existing = byName.get(c.canonicalName);
    if (!existing || c.ruleId < existing.ruleId) {
      byName.set(c.canonicalName, c);
    }
  }
  return [...byName.values()].sort((a, b) =>
    a.canonicalName < b.canonicalName ? -1 : a.canonicalName > b.canonicalName ? 1 : 0,
  );
}

export function resolveRenames(
  session: SessionModel,
  findings: readonly ScanFinding[],
  ruleTable: RuleTable,
): ScanFinding[] {
  const blocked = new Set(
    findings.filter((f) => BLOCKING_KINDS.has(f.kind)).map((f) => f.scanId),
  );
  const studyCode = studyCodeOf(session.subjectLabel);
  const resolved: ScanFinding[] = [];

  for (const scan of session.scans) {
    if (blocked.has(scan.id)) continue;

    const candidates = distinctCandidates(
      ruleTable.lookup(scan.seriesDescription, {
        studyCode,
        projectId: session.projectId,
        scanType: scan.type,
        modality: scan.modality,
      }),
    );

    if (candidates.length > 1) {
      const names = candidates.map((c) => c.canonicalName);
      resolved.push({
        kind: "AmbiguousRename",
        scanId: scan.id,
        candidates: names,
        reason: `series description "${scan.seriesDescription}" matches ${names.length} canonical types: ${names.join(", ")}`,
      });
      continue;
    }

    const only = candidates[0];
    // Already canonical: nothing to propose.
    if (!only || only.canonicalName === scan.type) continue;

    resolved.push({
      kind: "ResolvedRename",
      scanId: scan.id,
      candidate: only.canonicalName,
      rule: only.ruleId,
      reason: `rule ${only.ruleId}: "${scan.type}" -> "${only.canonicalName}"`,
    });
  }

  log.debug(
    { sessionId: session.sessionId, resolved: resolved.length },
    "resolved renames",
  );
  return resolved;
}
