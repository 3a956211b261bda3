/**
 * Session snapshot built from a repository client record.
 *
 * The record is validated once, scans are ordered by id and the whole
 * model is frozen. Every later stage reads this snapshot and nothing else.
 */

import { z } from "zod";
import { EngineError } from "./errors.js";
import {
  UNUSABLE_MARKERS,
  type UnusableMarkerText,
} from "./types.js";

// ---------------------------------------------------------------------------
// Raw record schema (what repository clients hand over)
// ---------------------------------------------------------------------------

const scanId = z
  .union([z.string(), z.number().int(), z.null(), z.undefined()])
  .transform((v) => (v === null || v === undefined ? "" : String(v).trim()))
  .pipe(z.string().min(1, "scan is missing its identifier"));

const ScanRecordSchema = z.object({
  id: scanId,
  type: z.string().default(""),
  seriesDescription: z.string().default(""),
  modality: z.string().default(""),
  frames: z.number().int().nonnegative().optional(),
  quality: z.string().optional(),
});

export const SessionRecordSchema = z
  .object({
    subjectLabel: z.string().min(1),
    projectId: z.string().min(1),
    sessionId: z.string().min(1),
    sessionLabel: z.string().default(""),
    date: z.string().optional(),
    scans: z.array(ScanRecordSchema).min(1, "session has no scans"),
  })
  .superRefine((record, ctx) => {
    const seen = new Set<string>();
    record.scans.forEach((scan, index) => {
      if (seen.has(scan.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["scans", index, "id"],
          message: `duplicate scan identifier "${scan.id}"`,
        });
      }
      seen.add(scan.id);
    });
  });

export type SessionRecord = z.input<typeof SessionRecordSchema>;

// ---------------------------------------------------------------------------
// Model
// ---------------------------------------------------------------------------

export interface MarkerHit {
  marker: UnusableMarkerText;
  source: "type" | "seriesDescription";
}

export interface Scan {
  readonly id: string;
  readonly type: string;
  readonly seriesDescription: string;
  readonly modality: string;
  readonly frames?: number;
  readonly quality?: string;
  /** Unusable markers found in the type, then in the description. */
  readonly markers: readonly MarkerHit[];
}

export interface SessionModel {
  readonly subjectLabel: string;
  readonly projectId: string;
  readonly sessionId: string;
  readonly sessionLabel: string;
  readonly date?: string;
  readonly scans: readonly Scan[];
}

/** Markers present in `text`, in UNUSABLE_MARKERS order. */
export function detectMarkers(text: string): UnusableMarkerText[] {
  const upper = text.toUpperCase();
  return UNUSABLE_MARKERS.filter((m) => upper.includes(m));
}

const INTEGER_ID_RE = /^(0|[1-9][0-9]*)$/;

/**
 * Total order on scan ids: integer ids first, numerically; every other id
 * after them, by code unit.
 */
export function compareScanIds(a: string, b: string): number {
  const aInt = INTEGER_ID_RE.test(a);
  const bInt = INTEGER_ID_RE.test(b);
  if (aInt && bInt) {
    const diff = Number(a) - Number(b);
    if (diff !== 0) return diff;
  } else if (aInt !== bInt) {
    return aInt ? -1 : 1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Validate a raw session record and freeze it into a SessionModel.
 *
 * @throws EngineError MISSING_METADATA when the record has no scans, a scan
 *   without an id, a repeated scan id, or any other malformed field.
 */
export function buildSessionModel(record: unknown): SessionModel {
  const parsed = SessionRecordSchema.safeParse(record);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({
      path: i.path.join("."),
      message: i.message,
    }));
    throw new EngineError(
      `Session record is incomplete: ${issues
        .map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))
        .join("; ")}`,
      "MISSING_METADATA",
      { issues },
    );
  }

  const data = parsed.data;
  const scans = data.scans
    .map((s): Scan => {
      const markers: MarkerHit[] = [
        ...detectMarkers(s.type).map((marker) => ({
          marker,
          source: "type" as const,
        })),
        ...detectMarkers(s.seriesDescription).map((marker) => ({
          marker,
          source: "seriesDescription" as const,
        })),
      ];
      return Object.freeze({
        id: s.id,
        type: s.type,
        seriesDescription: s.seriesDescription,
        modality: s.modality,
        ...(s.frames !== undefined ? { frames: s.frames } : {}),
        ...(s.quality !== undefined ? { quality: s.quality } : {}),
        markers: Object.freeze(markers.map((m) => Object.freeze(m))),
      });
    })
    .sort((a, b) => compareScanIds(a.id, b.id));

  return Object.freeze({
    subjectLabel: data.subjectLabel,
    projectId: data.projectId,
    sessionId: data.sessionId,
    sessionLabel: data.sessionLabel,
    ...(data.date !== undefined ? { date: data.date } : {}),
    scans: Object.freeze(scans),
  });
}

export function findScan(
  session: SessionModel,
  scanId: string,
): Scan | undefined {
  return session.scans.find((s) => s.id === scanId);
}

/** Current type -> scans of that type, in snapshot order. */
export function groupScansByType(
  session: SessionModel,
): ReadonlyMap<string, readonly Scan[]> {
  const groups = new Map<string, Scan[]>();
  for (const scan of session.scans) {
    const group = groups.get(scan.type);
    if (group) {
      group.push(scan);
    } else {
      groups.set(scan.type, [scan]);
    }
  }
  return groups;
}
