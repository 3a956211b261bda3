export { EngineError, type EngineErrorCode } from "./errors.js";

export { validateSubjectLabel, studyCodeOf } from "./subject-label.js";

export {
  buildSessionModel,
  findScan,
  groupScansByType,
  detectMarkers,
  compareScanIds,
  SessionRecordSchema,
  type SessionModel,
  type SessionRecord,
  type Scan,
  type MarkerHit,
} from "./session-model.js";

export { classifySession } from "./scan-classifier.js";

export { resolveRenames, distinctCandidates } from "./rename-resolver.js";

export {
  buildUpdatePlan,
  computeUpdatePlanHash,
  UNUSABLE_QUALITY,
} from "./update-planner.js";

export {
  executePlan,
  isDefaultValue,
  DEFAULT_FIELD_VALUES,
  type DefaultFieldValues,
  type ExecuteOptions,
  type ExecutionReport,
  type ItemOutcome,
  type ItemStatus,
  type OverwriteDecision,
} from "./update-executor.js";

export {
  collectFindings,
  evaluateSession,
  reviewSubject,
  reviewSubjects,
  type EngineDeps,
  type EngineReport,
  type ReviewOptions,
  type ScanSummary,
  type SubjectReview,
} from "./engine.js";

export * from "./types.js";
