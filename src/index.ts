export * from "./engine/index.js";
export * from "./audit/index.js";

export {
  RemoteOperationError,
  type RemoteErrorCode,
  type RepositoryClient,
  type RequestOptions,
  type ScanRef,
} from "./repository/client.js";
export {
  InMemoryRepositoryClient,
  loadSnapshotFile,
  type InMemoryClientOptions,
  type RecordedWrite,
} from "./repository/memory-client.js";
export {
  XnatClient,
  modalityFromXsiType,
  type XnatClientOptions,
} from "./repository/xnat-client.js";

export {
  RenameRuleSchema,
  matchRules,
  ruleSpecificity,
  descriptionMatches,
  isPattern,
  type RenameRule,
} from "./rules/rule.js";
export { parseRuleCsv } from "./rules/csv.js";
export { StaticRuleTable } from "./rules/static-table.js";
export { SqliteRuleTable } from "./rules/sqlite-table.js";

export {
  StaticExpectationSource,
  parseExpectationsYaml,
  loadExpectationsFile,
} from "./expectations/expectations.js";

export { logger, createLogger, type Logger } from "./logging/logger.js";
