/**
 * Engine data types: findings, update plans and the capabilities the
 * engine consumes (rule table, quality expectations).
 *
 * Every value here is plain data so reports serialize with canonicalJson.
 */

// ---------------------------------------------------------------------------
// Unusable markers
// ---------------------------------------------------------------------------

/** Substrings (case-insensitive) marking a scan as known-bad data. */
export const UNUSABLE_MARKERS = ["INC", "BAD"] as const;

export type UnusableMarkerText = (typeof UNUSABLE_MARKERS)[number];

// ---------------------------------------------------------------------------
// Findings
// ---------------------------------------------------------------------------

export interface ValidLabelFailureFinding {
  kind: "ValidLabelFailure";
  subjectLabel: string;
  reason: string;
}

export interface UnusableMarkerFinding {
  kind: "UnusableMarker";
  scanId: string;
  marker: UnusableMarkerText;
  /** Which scan field carried the marker. */
  source: "type" | "seriesDescription";
  reason: string;
}

export interface DuplicateTypeFinding {
  kind: "DuplicateType";
  scanId: string;
  scanType: string;
  /** Ids of every scan sharing the type, this one included. */
  siblings: string[];
  reason: string;
}

export interface IncompleteAcquisitionFinding {
  kind: "IncompleteAcquisition";
  scanId: string;
  expectedFrames: number;
  observedFrames: number;
  reason: string;
}

export interface QualityMismatchFinding {
  kind: "QualityMismatch";
  scanId: string;
  signal: "frames" | "quality";
  expected: string;
  observed: string;
  reason: string;
}

export interface ResolvedRenameFinding {
  kind: "ResolvedRename";
  scanId: string;
  candidate: string;
  rule: string;
  reason: string;
}

export interface AmbiguousRenameFinding {
  kind: "AmbiguousRename";
  scanId: string;
  candidates: string[];
  reason: string;
}

export type ScanFinding =
  | UnusableMarkerFinding
  | DuplicateTypeFinding
  | IncompleteAcquisitionFinding
  | QualityMismatchFinding
  | ResolvedRenameFinding
  | AmbiguousRenameFinding;

export type Finding = ValidLabelFailureFinding | ScanFinding;

export type FindingKind = Finding["kind"];

// ---------------------------------------------------------------------------
// Update plan
// ---------------------------------------------------------------------------

/** Scan fields the engine ever proposes to write. */
export type PlanField = "type" | "quality";

export type PlanBucket = "unusable" | "rename";

export interface PlanItem {
  bucket: PlanBucket;
  scanId: string;
  field: PlanField;
  /** Field value in the snapshot the plan was built from. */
  currentValue: string;
  newValue: string;
  reason: string;
}

export interface NoActionEntry {
  scanId: string;
  /** Finding kinds that kept the scan out of both buckets (empty = clean). */
  findings: FindingKind[];
}

export interface UpdatePlan {
  subjectLabel: string;
  sessionId: string;
  unusable: PlanItem[];
  rename: PlanItem[];
  noAction: NoActionEntry[];
  /** SHA-256 of the canonical plan content (everything except this field). */
  planHash: string;
}

// ---------------------------------------------------------------------------
// Rule table capability
// ---------------------------------------------------------------------------

export interface RuleContext {
  /** Three-character study prefix of the subject label (e.g. "LD4"). */
  studyCode: string;
  projectId: string;
  scanType: string;
  modality: string;
}

export interface RuleCandidate {
  canonicalName: string;
  /** Human-readable identity of the rule that produced the candidate. */
  ruleId: string;
}

export interface RuleTable {
  /** Zero, one or many candidates. Never throws for "no match". */
  lookup(description: string, context: RuleContext): readonly RuleCandidate[];
}

// ---------------------------------------------------------------------------
// Quality expectation capability
// ---------------------------------------------------------------------------

export interface QualityExpectation {
  frames?: number;
  /** Repository quality ratings considered consistent. */
  acceptedQuality?: string[];
}

export interface QualityExpectationSource {
  expectedFor(modality: string): QualityExpectation | undefined;
}
