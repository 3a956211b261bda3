/**
 * Decision engine pipeline.
 *
 *   session snapshot → findings → update plan → (later) execution report
 *
 * Each stage returns a fresh value; nothing is shared between subjects,
 * so several subjects can be reviewed concurrently.
 */

import { createLogger } from "../logging/logger.js";
import {
  RemoteOperationError,
  type RepositoryClient,
} from "../repository/client.js";
import { EngineError } from "./errors.js";
import { resolveRenames } from "./rename-resolver.js";
import { classifySession } from "./scan-classifier.js";
import { buildSessionModel, type SessionModel } from "./session-model.js";
import { studyCodeOf, validateSubjectLabel } from "./subject-label.js";
import type {
  Finding,
  QualityExpectationSource,
  RuleTable,
  UpdatePlan,
} from "./types.js";
import { buildUpdatePlan } from "./update-planner.js";

const log = createLogger("engine");

export interface EngineDeps {
  ruleTable: RuleTable;
  expectations: QualityExpectationSource;
}

export interface ScanSummary {
  id: string;
  type: string;
  seriesDescription: string;
  modality: string;
  frames?: number;
  quality?: string;
}

/** Serializable review surface: session, findings and plan. */
export interface EngineReport {
  subject: { label: string; labelValid: boolean; studyCode: string };
  session: {
    projectId: string;
    sessionId: string;
    sessionLabel: string;
    date?: string;
    scanCount: number;
  };
  scans: ScanSummary[];
  findings: Finding[];
  plan: UpdatePlan;
}

/**
 * Collect every finding for a session. Subjects with an invalid label get
 * the label failure only; their scans are not classified.
 */
export function collectFindings(session: SessionModel, deps: EngineDeps): Finding[] {
  if (!validateSubjectLabel(session.subjectLabel)) {
    return [
      {
        kind: "ValidLabelFailure",
        subjectLabel: session.subjectLabel,
        reason: `subject label "${session.subjectLabel}" does not match XX0000_vN`,
      },
    ];
  }
  const classified = classifySession(session, deps.expectations);
  const renames = resolveRenames(session, classified, deps.ruleTable);
  return [...classified, ...renames];
}

export function evaluateSession(session: SessionModel, deps: EngineDeps): EngineReport {
  const findings = collectFindings(session, deps);
  const plan = buildUpdatePlan(session, findings);
  const labelValid = !findings.some((f) => f.kind === "ValidLabelFailure");

  log.debug(
    {
      subjectLabel: session.subjectLabel,
      planHash: plan.planHash,
      unusable: plan.unusable.length,
      rename: plan.rename.length,
    },
    "session evaluated",
  );

  return {
    subject: {
      label: session.subjectLabel,
      labelValid,
      studyCode: labelValid ? studyCodeOf(session.subjectLabel) : "",
    },
    session: {
      projectId: session.projectId,
      sessionId: session.sessionId,
      sessionLabel: session.sessionLabel,
      ...(session.date !== undefined ? { date: session.date } : {}),
      scanCount: session.scans.length,
    },
    scans: session.scans.map((s) => ({
      id: s.id,
      type: s.type,
      seriesDescription: s.seriesDescription,
      modality: s.modality,
      ...(s.frames !== undefined ? { frames: s.frames } : {}),
      ...(s.quality !== undefined ? { quality: s.quality } : {}),
    })),
    findings,
    plan,
  };
}

export interface ReviewOptions {
  timeoutMs?: number;
}

/** Fetch one subject's session and evaluate it. Errors propagate. */
export async function reviewSubject(
  subjectLabel: string,
  client: RepositoryClient,
  deps: EngineDeps,
  options: ReviewOptions = {},
): Promise<{ session: SessionModel; report: EngineReport }> {
  const record = await client.fetchSession(subjectLabel, {
    timeoutMs: options.timeoutMs,
  });
  const session = buildSessionModel(record);
  return { session, report: evaluateSession(session, deps) };
}

export type SubjectReview =
  | { subjectLabel: string; ok: true; report: EngineReport }
  | {
      subjectLabel: string;
      ok: false;
      error: { name: string; code: string; message: string };
    };

/**
 * Review several subjects concurrently. A failure (remote or data
 * integrity) is reported against its subject; other subjects still finish.
 */
export async function reviewSubjects(
  subjectLabels: readonly string[],
  client: RepositoryClient,
  deps: EngineDeps,
  options: ReviewOptions = {},
): Promise<SubjectReview[]> {
  return Promise.all(
    subjectLabels.map(async (subjectLabel): Promise<SubjectReview> => {
      try {
        const { report } = await reviewSubject(subjectLabel, client, deps, options);
        return { subjectLabel, ok: true, report };
      } catch (err: unknown) {
        if (err instanceof RemoteOperationError || err instanceof EngineError) {
          log.warn({ subjectLabel, code: err.code }, "subject review failed");
          return {
            subjectLabel,
            ok: false,
            error: { name: err.name, code: err.code, message: err.message },
          };
        }
        throw err;
      }
    }),
  );
}
