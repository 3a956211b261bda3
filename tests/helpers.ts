/**
 * Shared builders for session records, rules and expectations.
 */

import type { SessionRecord } from "../src/engine/session-model.js";
import { StaticExpectationSource } from "../src/expectations/expectations.js";
import type { RenameRule } from "../src/rules/rule.js";
import { StaticRuleTable } from "../src/rules/static-table.js";

type ScanInput = SessionRecord["scans"][number];

export const SESSION_ID = "XNAT_E00001";

export function sessionRecord(
  scans: ScanInput[],
  subjectLabel = "LD4001_v1",
): SessionRecord {
  return {
    subjectLabel,
    projectId: "CUTTING",
    sessionId: SESSION_ID,
    sessionLabel: `${subjectLabel}_MR`,
    scans,
  };
}

export function rule(
  id: string,
  seriesDescription: string,
  canonicalName: string,
  extra: Partial<Pick<RenameRule, "studyCode" | "scanType" | "modality">> = {},
): RenameRule {
  return {
    id,
    studyCode: extra.studyCode ?? "",
    seriesDescription,
    scanType: extra.scanType ?? "",
    modality: extra.modality ?? "",
    canonicalName,
  };
}

export function ruleTable(...rules: RenameRule[]): StaticRuleTable {
  return new StaticRuleTable(rules);
}

export const MR_EXPECTATIONS = new StaticExpectationSource({
  MR: { frames: 176, acceptedQuality: ["usable", "questionable"] },
});

export const NO_EXPECTATIONS = new StaticExpectationSource();

/** Run `fn` and return what it threw. Fails when nothing was thrown. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e: unknown) {
    return e;
  }
  throw new Error("expected function to throw");
}
