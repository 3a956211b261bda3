/**
 * CLI command implementations.
 *
 * Every function:
 *   - accepts parsed arguments
 *   - calls library functions (no business logic here)
 *   - writes to stdout / stderr
 *   - returns an exit code (0 = success, 1 = error)
 */

import { existsSync, readFileSync } from "node:fs";
import { hostname, userInfo } from "node:os";
import { resolve } from "node:path";
import { canonicalJson } from "../audit/canonical.js";
import { ApplyJournal } from "../audit/journal.js";
import { reviewSubject, reviewSubjects, type EngineDeps } from "../engine/engine.js";
import { EngineError } from "../engine/errors.js";
import { validateSubjectLabel } from "../engine/subject-label.js";
import type { RuleTable } from "../engine/types.js";
import { executePlan } from "../engine/update-executor.js";
import {
  loadExpectationsFile,
  StaticExpectationSource,
} from "../expectations/expectations.js";
import { RemoteOperationError, type RepositoryClient } from "../repository/client.js";
import { loadSnapshotFile } from "../repository/memory-client.js";
import { XnatClient } from "../repository/xnat-client.js";
import { parseRuleCsv } from "../rules/csv.js";
import type { RenameRule } from "../rules/rule.js";
import { SqliteRuleTable } from "../rules/sqlite-table.js";
import { StaticRuleTable } from "../rules/static-table.js";
import { type CuratorConfig, ensureDataDirs, redactConfig } from "./config.js";
import { renderExecution, renderReport } from "./render.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function err(msg: string): void {
  process.stderr.write(`error: ${msg}\n`);
}

function out(msg: string): void {
  process.stdout.write(msg + "\n");
}

function requireFlag(
  flags: Map<string, string>,
  name: string,
): string | undefined {
  const v = flags.get(name);
  if (!v) {
    err(`missing required flag: --${name}`);
    return undefined;
  }
  return v;
}

function readTextFile(path: string): string {
  const abs = resolve(path);
  if (!existsSync(abs)) {
    throw new Error(`File not found: ${abs}`);
  }
  return readFileSync(abs, "utf8");
}

/** Known failures print as one line; anything else is a bug and propagates. */
function reportFailure(e: unknown): number {
  if (e instanceof EngineError || e instanceof RemoteOperationError) {
    err(`${e.code}: ${e.message}`);
    return 1;
  }
  throw e;
}

interface OpenDeps extends EngineDeps {
  close(): void;
}

function openDeps(config: CuratorConfig): OpenDeps {
  const expectations = config.expectationsPath
    ? loadExpectationsFile(config.expectationsPath)
    : new StaticExpectationSource();

  if (config.rulesCsvPath) {
    const ruleTable: RuleTable = new StaticRuleTable(
      parseRuleCsv(readTextFile(config.rulesCsvPath)),
    );
    return { ruleTable, expectations, close: () => undefined };
  }

  ensureDataDirs(config);
  const sqlite = new SqliteRuleTable(config.rulesDbPath);
  return { ruleTable: sqlite, expectations, close: () => sqlite.close() };
}

function openClient(
  flags: Map<string, string>,
  config: CuratorConfig,
): RepositoryClient | undefined {
  const snapshot = flags.get("snapshot");
  if (snapshot) {
    return loadSnapshotFile(resolve(snapshot));
  }
  if (!config.xnat.host) {
    err("XNAT host not configured (set XNAT_HOST or xnat.host, or pass --snapshot)");
    return undefined;
  }
  return new XnatClient({
    baseUrl: config.xnat.host,
    project: config.xnat.project,
    user: config.xnat.user,
    password: config.xnat.password,
    timeoutMs: config.xnat.timeoutMs,
  });
}

// ---------------------------------------------------------------------------
// init
// ---------------------------------------------------------------------------

export function cmdInit(config: CuratorConfig): number {
  ensureDataDirs(config);
  // Opening the stores creates the DB files + tables if not present
  new SqliteRuleTable(config.rulesDbPath).close();
  new ApplyJournal(config.journalDbPath).close();
  out(`Initialized scan-curator at ${config.baseDir}`);
  out(`  Rules DB:   ${config.rulesDbPath}`);
  out(`  Journal DB: ${config.journalDbPath}`);
  return 0;
}

// ---------------------------------------------------------------------------
// config show
// ---------------------------------------------------------------------------

export function cmdConfigShow(config: CuratorConfig, json: boolean): number {
  const shown = redactConfig(config);
  if (json) {
    out(canonicalJson(shown, 2));
  } else {
    out(`baseDir:       ${shown.baseDir}`);
    out(`configPath:    ${shown.configPath}`);
    out(`rulesDbPath:   ${shown.rulesDbPath}`);
    out(`rulesCsvPath:  ${shown.rulesCsvPath ?? "(none)"}`);
    out(`expectations:  ${shown.expectationsPath ?? "(none)"}`);
    out(`journalDbPath: ${shown.journalDbPath}`);
    out(`xnat.host:     ${shown.xnat.host ?? "(unset)"}`);
    out(`xnat.project:  ${shown.xnat.project}`);
    out(`xnat.user:     ${shown.xnat.user ?? "(unset)"}`);
    out(`xnat.password: ${shown.xnat.password ?? "(unset)"}`);
  }
  return 0;
}

// ---------------------------------------------------------------------------
// check-label
// ---------------------------------------------------------------------------

export function cmdCheckLabel(labels: string[], json: boolean): number {
  const results = labels.map((label) => ({ label, valid: validateSubjectLabel(label) }));
  if (json) {
    out(canonicalJson(results, 2));
  } else {
    for (const r of results) {
      out(`${r.valid ? "valid  " : "INVALID"} ${r.label}`);
    }
  }
  return results.every((r) => r.valid) ? 0 : 1;
}

// ---------------------------------------------------------------------------
// review
// ---------------------------------------------------------------------------

export async function cmdReview(
  subjects: string[],
  flags: Map<string, string>,
  config: CuratorConfig,
  json: boolean,
): Promise<number> {
  let client: RepositoryClient | undefined;
  try {
    client = openClient(flags, config);
  } catch (e: unknown) {
    return reportFailure(e);
  }
  if (!client) return 1;

  let deps: OpenDeps;
  try {
    deps = openDeps(config);
  } catch (e: unknown) {
    return reportFailure(e);
  }

  try {
    const reviews = await reviewSubjects(subjects, client, deps, {
      timeoutMs: config.xnat.timeoutMs,
    });
    if (json) {
      out(canonicalJson(reviews, 2));
    } else {
      for (const r of reviews) {
        if (r.ok) {
          for (const line of renderReport(r.report)) out(line);
        } else {
          err(`${r.subjectLabel}: ${r.error.code}: ${r.error.message}`);
        }
      }
    }
    return reviews.every((r) => r.ok) ? 0 : 1;
  } finally {
    deps.close();
  }
}

// ---------------------------------------------------------------------------
// apply
// ---------------------------------------------------------------------------

export async function cmdApply(
  subject: string,
  flags: Map<string, string>,
  overwrite: boolean,
  config: CuratorConfig,
  json: boolean,
): Promise<number> {
  let client: RepositoryClient | undefined;
  try {
    client = openClient(flags, config);
  } catch (e: unknown) {
    return reportFailure(e);
  }
  if (!client) return 1;

  const scansFlag = flags.get("scans");
  const onlyScans = scansFlag
    ? new Set(scansFlag.split(",").map((s) => s.trim()).filter((s) => s.length > 0))
    : undefined;

  let deps: OpenDeps;
  try {
    deps = openDeps(config);
  } catch (e: unknown) {
    return reportFailure(e);
  }

  try {
    const { report } = await reviewSubject(subject, client, deps, {
      timeoutMs: config.xnat.timeoutMs,
    });
    const execution = await executePlan(report.plan, client, {
      overwrite,
      defaults: config.defaults,
      timeoutMs: config.xnat.timeoutMs,
      ...(onlyScans ? { onlyScans } : {}),
    });

    ensureDataDirs(config);
    const journal = new ApplyJournal(config.journalDbPath);
    let runId: string;
    try {
      runId = journal.recordExecution(execution, {
        actor: userInfo().username,
        host: hostname(),
        overwrite: String(overwrite),
      }).runId;
    } finally {
      journal.close();
    }

    if (json) {
      out(canonicalJson({ runId, execution }, 2));
    } else {
      for (const line of renderExecution(execution)) out(line);
      out(`Journal run: ${runId}`);
    }
    return execution.summary.failed === 0 ? 0 : 1;
  } catch (e: unknown) {
    return reportFailure(e);
  } finally {
    deps.close();
  }
}

// ---------------------------------------------------------------------------
// rules import / list
// ---------------------------------------------------------------------------

export function cmdRulesImport(
  file: string,
  config: CuratorConfig,
  json: boolean,
): number {
  let rules: RenameRule[];
  try {
    rules = parseRuleCsv(readTextFile(file));
  } catch (e: unknown) {
    if (e instanceof EngineError) return reportFailure(e);
    err(e instanceof Error ? e.message : String(e));
    return 1;
  }

  ensureDataDirs(config);
  const table = new SqliteRuleTable(config.rulesDbPath);
  try {
    const count = table.replaceAll(rules);
    if (json) {
      out(canonicalJson({ imported: count, rulesDbPath: config.rulesDbPath }, 2));
    } else {
      out(`Imported ${count} rule(s) into ${config.rulesDbPath}`);
    }
    return 0;
  } finally {
    table.close();
  }
}

export function cmdRulesList(config: CuratorConfig, json: boolean): number {
  ensureDataDirs(config);
  const table = new SqliteRuleTable(config.rulesDbPath);
  try {
    const rules = table.list();
    if (json) {
      out(canonicalJson(rules, 2));
      return 0;
    }
    for (const r of rules) {
      out(
        `  ${r.id.padEnd(8)} ${(r.studyCode || "*").padEnd(4)} ` +
          `"${r.seriesDescription}" [${r.scanType || "*"}/${r.modality || "*"}] -> ${r.canonicalName}`,
      );
    }
    out(`${rules.length} rule(s)`);
    return 0;
  } finally {
    table.close();
  }
}

// ---------------------------------------------------------------------------
// journal show / verify
// ---------------------------------------------------------------------------

export function cmdJournalShow(
  flags: Map<string, string>,
  config: CuratorConfig,
  json: boolean,
): number {
  const runId = requireFlag(flags, "run");
  if (!runId) return 1;

  ensureDataDirs(config);
  const journal = new ApplyJournal(config.journalDbPath);
  try {
    const run = journal.getRun(runId);
    if (!run) {
      err(`Run not found: ${runId}`);
      return 1;
    }
    const events = journal.listEvents(runId);
    if (json) {
      out(canonicalJson({ run, events }, 2));
    } else {
      out(`Run ${run.runId} for ${run.subjectLabel} at ${run.createdAt}`);
      for (const e of events) {
        out(
          `  seq=${String(e.seq).padStart(3)} type=${e.type.padEnd(14)} hash=${e.hash.slice(0, 12)}…`,
        );
      }
      out(`${events.length} event(s)`);
    }
    return 0;
  } finally {
    journal.close();
  }
}

export function cmdJournalVerify(
  flags: Map<string, string>,
  config: CuratorConfig,
  json: boolean,
): number {
  const runId = requireFlag(flags, "run");
  if (!runId) return 1;

  ensureDataDirs(config);
  const journal = new ApplyJournal(config.journalDbPath);
  try {
    if (!journal.getRun(runId)) {
      err(`Run not found: ${runId}`);
      return 1;
    }
    const result = journal.verifyRun(runId);
    if (json) {
      out(canonicalJson(result, 2));
    } else if (result.valid) {
      out(`Chain valid: ${result.eventCount} event(s)`);
    } else {
      for (const f of result.failures) {
        err(`seq ${f.seq}: ${f.reason} (expected ${f.expected}, got ${f.actual})`);
      }
    }
    return result.valid ? 0 : 1;
  } finally {
    journal.close();
  }
}
