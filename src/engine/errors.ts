/**
 * Engine error types.
 *
 * Data-integrity problems only. Ambiguities (duplicate types, competing
 * rename candidates) are findings, never errors.
 */

export type EngineErrorCode =
  | "MISSING_METADATA"
  | "MULTIPLE_SESSIONS"
  | "INVALID_RULE"
  | "INVALID_EXPECTATION"
  | "CONFIG_INVALID";

export class EngineError extends Error {
  public readonly code: EngineErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: EngineErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    this.details = details ?? {};
  }
}
