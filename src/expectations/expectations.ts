/**
 * Quality expectations per modality, loaded from YAML:
 *
 *   modalities:
 *     MR:
 *       frames: 176
 *       acceptedQuality: [usable, questionable]
 *
 * Modality keys are matched case-insensitively.
 */

import { readFileSync } from "node:fs";
import yaml from "yaml";
import { z } from "zod";
import { EngineError } from "../engine/errors.js";
import type {
  QualityExpectation,
  QualityExpectationSource,
} from "../engine/types.js";

const QualityExpectationSchema = z
  .object({
    frames: z.number().int().positive().optional(),
    acceptedQuality: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict();

const ExpectationFileSchema = z.object({
  modalities: z.record(z.string().min(1), QualityExpectationSchema).default({}),
});

export class StaticExpectationSource implements QualityExpectationSource {
  private readonly byModality: ReadonlyMap<string, QualityExpectation>;

  constructor(expectations: Record<string, QualityExpectation> = {}) {
    this.byModality = new Map(
      Object.entries(expectations).map(([modality, e]) => [
        modality.toLowerCase(),
        e,
      ]),
    );
  }

  expectedFor(modality: string): QualityExpectation | undefined {
    return this.byModality.get(modality.toLowerCase());
  }
}

/**
 * @throws EngineError INVALID_EXPECTATION on malformed YAML or values
 */
export function parseExpectationsYaml(text: string): StaticExpectationSource {
  let doc: unknown;
  try {
    doc = yaml.parse(text);
  } catch (e: unknown) {
    throw new EngineError(
      `Expectations file is not valid YAML: ${e instanceof Error ? e.message : String(e)}`,
      "INVALID_EXPECTATION",
    );
  }
  const result = ExpectationFileSchema.safeParse(doc ?? {});
  if (!result.success) {
    throw new EngineError(
      `Invalid expectations: ${result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")}`,
      "INVALID_EXPECTATION",
    );
  }
  return new StaticExpectationSource(result.data.modalities);
}

export function loadExpectationsFile(path: string): StaticExpectationSource {
  return parseExpectationsYaml(readFileSync(path, "utf8"));
}
