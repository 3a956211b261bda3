/**
 * In-memory rule table.
 */

import type { RuleCandidate, RuleContext, RuleTable } from "../engine/types.js";
import { matchRules, type RenameRule } from "./rule.js";

export class StaticRuleTable implements RuleTable {
  private readonly rules: readonly RenameRule[];

  constructor(rules: readonly RenameRule[]) {
    this.rules = [...rules];
  }

  lookup(description: string, context: RuleContext): readonly RuleCandidate[] {
    return matchRules(this.rules, description, context);
  }

  list(): readonly RenameRule[] {
    return this.rules;
  }
}
