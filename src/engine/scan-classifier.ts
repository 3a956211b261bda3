/**
 * Scan classifier — per-scan checks over a session snapshot.
 *
 * Four independent checks; a scan may collect several findings. Only the
 * duplicate check looks at sibling scans, and its grouping is computed
 * once, up front, over the whole session.
 */

import { createLogger } from "../logging/logger.js";
import { groupScansByType, type Scan, type SessionModel } from "./session-model.js";
import type {
  DuplicateTypeFinding,
  QualityExpectation,
  QualityExpectationSource,
  ScanFinding,
} from "./types.js";

const log = createLogger("scan-classifier");

// ---------------------------------------------------------------------------
// Individual checks
// ---------------------------------------------------------------------------

function checkUnusableMarker(scan: Scan): ScanFinding[] {
  const hit = scan.markers[0];
  if (!hit) return [];
  const field = hit.source === "type" ? "type" : "series description";
  const value = hit.source === "type" ? scan.type : scan.seriesDescription;
  return [
    {
      kind: "UnusableMarker",
      scanId: scan.id,
      marker: hit.marker,
      source: hit.source,
      reason: `${field} "${value}" contains unusable marker ${hit.marker}`,
    },
  ];
}

function duplicateFindings(session: SessionModel): Map<string, DuplicateTypeFinding> {
  const byScan = new Map<string, DuplicateTypeFinding>();
  for (const [scanType, group] of groupScansByType(session)) {
    if (group.length < 2) continue;
    const siblings = group.map((s) => s.id);
    for (const scan of group) {
      byScan.set(scan.id, {
        kind: "DuplicateType",
        scanId: scan.id,
        scanType,
        siblings,
        reason: `${group.length} scans share type "${scanType}": ${siblings.join(", ")}`,
      });
    }
  }
  return byScan;
}

function checkFrames(
  scan: Scan,
  expectation: QualityExpectation | undefined,
): ScanFinding[] {
  const expected = expectation?.frames;
  if (expected === undefined || scan.frames === undefined) return [];
  if (scan.frames < expected) {
    return [
      {
        kind: "IncompleteAcquisition",
        scanId: scan.id,
        expectedFrames: expected,
        observedFrames: scan.frames,
        reason: `${scan.frames} of ${expected} expected frames for modality ${scan.modality}`,
      },
    ];
  }
  if (scan.frames > expected) {
    return [
      {
        kind: "QualityMismatch",
        scanId: scan.id,
        signal: "frames",
        expected: String(expected),
        observed: String(scan.frames),
        reason: `${scan.frames} frames exceed the ${expected} expected for modality ${scan.modality}`,
      },
    ];
  }
  return [];
}

function checkQualityRating(
  scan: Scan,
  expectation: QualityExpectation | undefined,
): ScanFinding[] {
  const accepted = expectation?.acceptedQuality;
  if (!accepted || scan.quality === undefined) return [];
  const observed = scan.quality.toLowerCase();
  if (accepted.some((q) => q.toLowerCase() === observed)) return [];
  return [
    {
      kind: "QualityMismatch",
      scanId: scan.id,
      signal: "quality",
      expected: accepted.join("|"),
      observed: scan.quality,
      reason: `quality rating "${scan.quality}" is not one of ${accepted.join(", ")}`,
    },
  ];
}

// ---------------------------------------------------------------------------
// Session classification
// ---------------------------------------------------------------------------

/**
 * Classify every scan of a session.
 *
 * Findings come out grouped by scan in snapshot order, and per scan in check
 * order (marker, duplicate, frames, quality rating).
 */
export function classifySession(
  session: SessionModel,
  expectations: QualityExpectationSource,
): ScanFinding[] {
  const duplicates = duplicateFindings(session);
  const findings: ScanFinding[] = [];

  for (const scan of session.scans) {
    const expectation = expectations.expectedFor(scan.modality);
    findings.push(...checkUnusableMarker(scan));
    const duplicate = duplicates.get(scan.id);
    if (duplicate) findings.push(duplicate);
    findings.push(...checkFrames(scan, expectation));
    findings.push(...checkQualityRating(scan, expectation));
  }

  log.debug(
    {
      sessionId: session.sessionId,
      scans: session.scans.length,
      findings: findings.length,
    },
    "classified session",
  );
  return findings;
}
