/**
 * Rename rules from the lab's `scan_type_renames.csv` layout:
 *
 *   project,series_description,scan_type,updated_scan_type[,modality]
 *
 * `project` is the study code (first three characters of the subject
 * label). Blank project, scan_type or modality means "any".
 */

import { parse } from "csv-parse/sync";
import { z } from "zod";
import { EngineError } from "../engine/errors.js";
import type { RenameRule } from "./rule.js";

const RuleCsvRowSchema = z.object({
  project: z.string().default(""),
  series_description: z.string().min(1, "series_description is required"),
  scan_type: z.string().default(""),
  updated_scan_type: z.string().min(1, "updated_scan_type is required"),
  modality: z.string().default(""),
});

/**
 * Parse rule CSV text. Rule ids are `row-N`, N being the CSV line number.
 *
 * @throws EngineError INVALID_RULE on malformed CSV or rows
 */
export function parseRuleCsv(text: string): RenameRule[] {
  let rows: unknown;
  try {
    rows = parse(text, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
  } catch (e: unknown) {
    throw new EngineError(
      `Rule CSV could not be parsed: ${e instanceof Error ? e.message : String(e)}`,
      "INVALID_RULE",
    );
  }

  const parsed = z.array(z.unknown()).parse(rows);
  return parsed.map((row, index) => {
    const line = index + 2;
    const result = RuleCsvRowSchema.safeParse(row);
    if (!result.success) {
      throw new EngineError(
        `Invalid rule on line ${line}: ${result.error.issues
          .map((i) => i.message)
          .join("; ")}`,
        "INVALID_RULE",
        { line },
      );
    }
    const r = result.data;
    return {
      id: `row-${line}`,
      studyCode: r.project,
      seriesDescription: r.series_description,
      scanType: r.scan_type,
      modality: r.modality,
      canonicalName: r.updated_scan_type,
    };
  });
}
