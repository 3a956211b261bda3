/**
 * Repository client contract.
 *
 * The engine never talks to the imaging repository directly; it consumes
 * this interface. Clients hand back raw session records (validated later
 * by buildSessionModel) and write single scan fields.
 */

import type { PlanField } from "../engine/types.js";

export type RemoteErrorCode =
  | "NOT_FOUND"
  | "AUTH_ERROR"
  | "NETWORK_ERROR"
  | "TIMEOUT"
  | "WRITE_ERROR";

export class RemoteOperationError extends Error {
  public readonly code: RemoteErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: RemoteErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "RemoteOperationError";
    this.code = code;
    this.details = details ?? {};
  }
}

export interface ScanRef {
  sessionId: string;
  scanId: string;
}

export interface RequestOptions {
  /** Per-call timeout. No retries are ever made. */
  timeoutMs?: number;
}

export interface RepositoryClient {
  /**
   * Raw record for the subject's single session.
   * Rejects with RemoteOperationError (NOT_FOUND, AUTH_ERROR,
   * NETWORK_ERROR, TIMEOUT).
   */
  fetchSession(subjectLabel: string, options?: RequestOptions): Promise<unknown>;

  /** Rejects with RemoteOperationError (WRITE_ERROR and the above). */
  writeScanField(
    ref: ScanRef,
    field: PlanField,
    value: string,
    options?: RequestOptions,
  ): Promise<void>;
}
