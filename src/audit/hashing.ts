/**
 * SHA-256 hashing for update plans and journal events.
 *
 * Journal event hashing:
 *   - Strip `hash` and `prevHash` from the event.
 *   - Serialize the remainder to canonical JSON.
 *   - SHA-256 of the UTF-8 bytes.
 */

import { createHash } from "node:crypto";
import { canonicalJson } from "./canonical.js";

/** SHA-256 hex digest of a UTF-8 string. */
export function sha256(data: string): string {
  return createHash("sha256").update(data, "utf8").digest("hex");
}

/** SHA-256 of the canonical JSON form of `value`. */
export function contentHash(value: unknown): string {
  return sha256(canonicalJson(value));
}

const HASH_EXCLUDED_FIELDS: ReadonlySet<string> = new Set([
  "hash",
  "prevHash",
]);

/** Content hash of a journal event, excluding its own chain fields. */
export function computeEventHash(event: Record<string, unknown>): string {
  const stripped: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(event)) {
    if (!HASH_EXCLUDED_FIELDS.has(key)) {
      stripped[key] = value;
    }
  }
  return contentHash(stripped);
}

export interface ChainFailure {
  seq: number;
  eventId: string;
  reason:
    | "hash_mismatch"
    | "prevHash_mismatch"
    | "first_event_prevHash_not_null"
    | "seq_gap";
  expected: string;
  actual: string;
}

export interface ChainVerificationResult {
  valid: boolean;
  eventCount: number;
  failures: ChainFailure[];
}
