/**
 * SQLite-backed rule table.
 *
 * Holds the same rules as the CSV, so lookups stay local and fast:
 *   - `rename_rules` table (rule_id, study_code, series_description,
 *                           scan_type, modality, canonical_name)
 * An import replaces the whole table in one transaction.
 */

import Database from "better-sqlite3";
import type { RuleCandidate, RuleContext, RuleTable } from "../engine/types.js";
import { matchRules, RenameRuleSchema, type RenameRule } from "./rule.js";

interface Stmt {
  run(...params: unknown[]): { changes: number; lastInsertRowid: number | bigint };
  get(...params: unknown[]): unknown;
  all(...params: unknown[]): unknown[];
}

interface RuleRow {
  rule_id: string;
  study_code: string;
  series_description: string;
  scan_type: string;
  modality: string;
  canonical_name: string;
}

function rowToRule(row: RuleRow): RenameRule {
  return {
    id: row.rule_id,
    studyCode: row.study_code,
    seriesDescription: row.series_description,
    scanType: row.scan_type,
    modality: row.modality,
    canonicalName: row.canonical_name,
  };
}

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS rename_rules (
  rule_id            TEXT PRIMARY KEY,
  study_code         TEXT NOT NULL DEFAULT '',
  series_description TEXT NOT NULL,
  scan_type          TEXT NOT NULL DEFAULT '',
  modality           TEXT NOT NULL DEFAULT '',
  canonical_name     TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_rename_rules_study ON rename_rules(study_code);
`;

export class SqliteRuleTable implements RuleTable {
  private readonly db: InstanceType<typeof Database>;

  private readonly stmtInsert: Stmt;
  private readonly stmtDeleteAll: Stmt;
  private readonly stmtForStudy: Stmt;
  private readonly stmtAll: Stmt;

  private readonly txnReplace: (rules: readonly RenameRule[]) => number;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);

    this.stmtInsert = this.db.prepare(
      `INSERT INTO rename_rules
         (rule_id, study_code, series_description, scan_type, modality, canonical_name)
       VALUES (?, ?, ?, ?, ?, ?)`,
    ) as Stmt;

    this.stmtDeleteAll = this.db.prepare("DELETE FROM rename_rules") as Stmt;

    this.stmtForStudy = this.db.prepare(
      "SELECT * FROM rename_rules WHERE study_code IN ('', ?) ORDER BY rule_id",
    ) as Stmt;

    this.stmtAll = this.db.prepare(
      "SELECT * FROM rename_rules ORDER BY rule_id",
    ) as Stmt;

    this.txnReplace = this.db.transaction(
      (rules: readonly RenameRule[]): number => {
        this.stmtDeleteAll.run();
        for (const raw of rules) {
          const rule = RenameRuleSchema.parse(raw);
          this.stmtInsert.run(
            rule.id,
            rule.studyCode,
            rule.seriesDescription,
            rule.scanType,
            rule.modality,
            rule.canonicalName,
          );
        }
        return rules.length;
      },
    );
  }

  /** Replace every stored rule. Returns the number imported. */
  replaceAll(rules: readonly RenameRule[]): number {
    return this.txnReplace(rules);
  }

  list(): RenameRule[] {
    return (this.stmtAll.all() as RuleRow[]).map(rowToRule);
  }

  lookup(description: string, context: RuleContext): readonly RuleCandidate[] {
    const rows = this.stmtForStudy.all(context.studyCode) as RuleRow[];
    return matchRules(rows.map(rowToRule), description, context);
  }

  close(): void {
    this.db.close();
  }
}
