/**
 * Canonical JSON for plans, journal events and `--json` output.
 *
 * Object keys are ordered by code unit at every depth, undefined members
 * are dropped, Dates become ISO 8601 strings, arrays keep their order.
 * Equal data always serializes to the same bytes, which is what makes plan
 * and journal hashes reproducible.
 */

type Canonical =
  | null
  | string
  | number
  | boolean
  | Canonical[]
  | { [key: string]: Canonical };

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Plain-data copy of `value` with keys in canonical order. */
export function canonicalize(value: unknown): Canonical | undefined {
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : null;
    case "undefined":
    case "function":
    case "symbol":
      return undefined;
    case "bigint":
      return value.toString();
    default:
      break;
  }
  if (value === null || typeof value !== "object") return null;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) {
    return value.map((item: unknown) => canonicalize(item) ?? null);
  }

  const out: { [key: string]: Canonical } = {};
  for (const key of Object.keys(value).sort(byCodeUnit)) {
    const member = canonicalize(Reflect.get(value, key));
    if (member !== undefined) out[key] = member;
  }
  return out;
}

/**
 * Serialize `value` canonically. Hashes always use the compact form;
 * `indent` is for output meant to be read.
 */
export function canonicalJson(value: unknown, indent?: number): string {
  return JSON.stringify(canonicalize(value) ?? null, null, indent);
}
