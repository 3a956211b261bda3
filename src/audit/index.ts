export { canonicalJson } from "./canonical.js";

export {
  sha256,
  contentHash,
  computeEventHash,
  type ChainFailure,
  type ChainVerificationResult,
} from "./hashing.js";

export {
  ApplyJournal,
  type JournalEvent,
  type JournalEventType,
  type JournalRun,
} from "./journal.js";
