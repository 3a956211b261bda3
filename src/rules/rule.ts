/**
 * Rename rules and the matching logic every rule table shares.
 *
 * A rule maps a series description (exact, or a glob with `*`) to a
 * canonical scan type, optionally constrained by study code, current scan
 * type and modality. Among matching rules only the most specific tier
 * contributes candidates; a tie between different targets stays ambiguous.
 */

import { z } from "zod";
import type { RuleCandidate, RuleContext } from "../engine/types.js";

export const RenameRuleSchema = z.object({
  id: z.string().min(1),
  /** Empty string = any study. */
  studyCode: z.string().default(""),
  seriesDescription: z.string().trim().min(1),
  /** Empty string = any current type. */
  scanType: z.string().default(""),
  /** Empty string = any modality. */
  modality: z.string().default(""),
  canonicalName: z.string().trim().min(1),
});

export type RenameRule = z.infer<typeof RenameRuleSchema>;

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function isPattern(description: string): boolean {
  return description.includes("*");
}

/** Does a rule's description (exact or glob) match an observed one? */
export function descriptionMatches(ruleDescription: string, observed: string): boolean {
  const target = observed.trim();
  if (!isPattern(ruleDescription)) {
    return ruleDescription === target;
  }
  const source = ruleDescription.split("*").map(escapeRegex).join(".*");
  return new RegExp(`^${source}$`).test(target);
}

/**
 * Specificity score of a matching rule, or -1 when it does not match.
 * One point per constrained context field, one for an exact description.
 */
export function ruleSpecificity(
  rule: RenameRule,
  description: string,
  context: RuleContext,
): number {
  if (rule.studyCode && rule.studyCode !== context.studyCode) return -1;
  if (rule.scanType && rule.scanType !== context.scanType) return -1;
  if (
    rule.modality &&
    rule.modality.toLowerCase() !== context.modality.toLowerCase()
  ) {
    return -1;
  }
  if (!descriptionMatches(rule.seriesDescription, description)) return -1;

  return (
    (rule.studyCode ? 1 : 0) +
    (rule.scanType ? 1 : 0) +
    (rule.modality ? 1 : 0) +
    (isPattern(rule.seriesDescription) ? 0 : 1)
  );
}

/** Candidates from the highest-specificity matching rules. */
export function matchRules(
  rules: Iterable<RenameRule>,
  description: string,
  context: RuleContext,
): RuleCandidate[] {
  let best = -1;
  let candidates: RuleCandidate[] = [];
  for (const rule of rules) {
    const score = ruleSpecificity(rule, description, context);
    if (score < 0 || score < best) continue;
    if (score > best) {
      best = score;
      candidates = [];
    }
    candidates.push({ canonicalName: rule.canonicalName, ruleId: rule.id });
  }
  return candidates;
}
