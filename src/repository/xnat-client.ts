/**
 * XNAT REST client.
 *
 * Thin wrapper around undici `request`. Reads one subject's single
 * session with its scans and writes single scan fields back. Every call
 * carries a timeout; nothing is retried.
 */

import { request, type Dispatcher } from "undici";
import { z } from "zod";
import { EngineError } from "../engine/errors.js";
import type { SessionRecord } from "../engine/session-model.js";
import type { PlanField } from "../engine/types.js";
import { createLogger } from "../logging/logger.js";
import {
  RemoteOperationError,
  type RepositoryClient,
  type RequestOptions,
  type ScanRef,
} from "./client.js";

const log = createLogger("xnat-client");

export interface XnatClientOptions {
  baseUrl: string;
  project: string;
  user?: string;
  password?: string;
  timeoutMs?: number;
  /** Alternate undici dispatcher (connection pool, proxy, mock agent). */
  dispatcher?: Dispatcher;
}

// ---------------------------------------------------------------------------
// Response shapes (XNAT returns every column as a string)
// ---------------------------------------------------------------------------

function resultSet<T extends z.ZodTypeAny>(row: T) {
  return z.object({ ResultSet: z.object({ Result: z.array(row) }) });
}

const ExperimentRowSchema = z
  .object({
    ID: z.string().min(1),
    label: z.string().default(""),
    date: z.string().optional(),
  })
  .passthrough();

const ScanRowSchema = z
  .object({
    ID: z.string().optional(),
    type: z.string().optional(),
    series_description: z.string().optional(),
    quality: z.string().optional(),
    frames: z.string().optional(),
    xsiType: z.string().optional(),
  })
  .passthrough();

const ExperimentListSchema = resultSet(ExperimentRowSchema);
const ScanListSchema = resultSet(ScanRowSchema);

// ---------------------------------------------------------------------------
// Column mapping
// ---------------------------------------------------------------------------

const SCAN_XSI_RE = /^xnat:([a-z]+)ScanData$/i;

/** "xnat:mrScanData" -> "MR"; unknown data types map to "". */
export function modalityFromXsiType(xsiType: string | undefined): string {
  const match = xsiType ? SCAN_XSI_RE.exec(xsiType) : null;
  return match?.[1] ? match[1].toUpperCase() : "";
}

function parseFrames(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 0 ? n : undefined;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class XnatClient implements RepositoryClient {
  private readonly baseUrl: string;
  private readonly project: string;
  private readonly authHeader?: string;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;

  constructor(options: XnatClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.project = options.project;
    if (options.user !== undefined) {
      const token = Buffer.from(
        `${options.user}:${options.password ?? ""}`,
        "utf8",
      ).toString("base64");
      this.authHeader = `Basic ${token}`;
    }
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.dispatcher = options.dispatcher;
  }

  async fetchSession(
    subjectLabel: string,
    options: RequestOptions = {},
  ): Promise<SessionRecord> {
    const experimentsPath =
      `/data/projects/${encodeURIComponent(this.project)}` +
      `/subjects/${encodeURIComponent(subjectLabel)}/experiments?format=json`;
    const experiments = ExperimentListSchema.safeParse(
      await this.getJson(experimentsPath, options),
    );
    if (!experiments.success) {
      throw new EngineError(
        `Unexpected experiment listing for ${subjectLabel}`,
        "MISSING_METADATA",
        { subjectLabel },
      );
    }

    const rows = experiments.data.ResultSet.Result;
    if (rows.length === 0) {
      throw new RemoteOperationError(
        `No sessions found for subject ${subjectLabel}`,
        "NOT_FOUND",
        { subjectLabel, project: this.project },
      );
    }
    const [session, ...extra] = rows;
    if (!session || extra.length > 0) {
      throw new EngineError(
        `Subject ${subjectLabel} has ${rows.length} sessions; combine them into one`,
        "MULTIPLE_SESSIONS",
        { subjectLabel, sessions: rows.map((r) => r.ID) },
      );
    }

    const scansPath = `/data/experiments/${encodeURIComponent(session.ID)}/scans?format=json`;
    const scans = ScanListSchema.safeParse(await this.getJson(scansPath, options));
    if (!scans.success) {
      throw new EngineError(
        `Unexpected scan listing for session ${session.ID}`,
        "MISSING_METADATA",
        { sessionId: session.ID },
      );
    }

    log.debug(
      { subjectLabel, sessionId: session.ID, scans: scans.data.ResultSet.Result.length },
      "fetched session",
    );

    return {
      subjectLabel,
      projectId: this.project,
      sessionId: session.ID,
      sessionLabel: session.label,
      ...(session.date ? { date: session.date } : {}),
      scans: scans.data.ResultSet.Result.map((row) => {
        const frames = parseFrames(row.frames);
        return {
          id: row.ID,
          type: row.type ?? "",
          seriesDescription: row.series_description ?? "",
          modality: modalityFromXsiType(row.xsiType),
          ...(frames !== undefined ? { frames } : {}),
          ...(row.quality ? { quality: row.quality } : {}),
        };
      }),
    };
  }

  async writeScanField(
    ref: ScanRef,
    field: PlanField,
    value: string,
    options: RequestOptions = {},
  ): Promise<void> {
    const path =
      `/data/experiments/${encodeURIComponent(ref.sessionId)}` +
      `/scans/${encodeURIComponent(ref.scanId)}` +
      `?${field}=${encodeURIComponent(value)}`;
    const signal = this.signalFor(options);
    const res = await this.send("PUT", path, signal);
    const body = await this.readBody("PUT", path, res, signal);
    if (res.statusCode >= 300) {
      throw this.statusError(res.statusCode, path, body, "WRITE_ERROR");
    }
  }

  // -----------------------------------------------------------------------
  // HTTP plumbing
  // -----------------------------------------------------------------------

  private signalFor(options: RequestOptions): AbortSignal {
    return AbortSignal.timeout(options.timeoutMs ?? this.timeoutMs);
  }

  private async getJson(path: string, options: RequestOptions): Promise<unknown> {
    const signal = this.signalFor(options);
    const res = await this.send("GET", path, signal);
    const body = await this.readBody("GET", path, res, signal);
    if (res.statusCode >= 300) {
      throw this.statusError(res.statusCode, path, body, "NETWORK_ERROR");
    }
    try {
      return JSON.parse(body);
    } catch {
      throw new RemoteOperationError(
        `Invalid JSON from ${path}`,
        "NETWORK_ERROR",
        { path, statusCode: res.statusCode, body: body.substring(0, 500) },
      );
    }
  }

  private async send(
    method: "GET" | "PUT",
    path: string,
    signal: AbortSignal,
  ): Promise<Dispatcher.ResponseData> {
    const headers: Record<string, string> = { accept: "application/json" };
    if (this.authHeader) headers["authorization"] = this.authHeader;

    try {
      return await request(`${this.baseUrl}${path}`, {
        method,
        headers,
        signal,
        ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
      });
    } catch (e: unknown) {
      throw this.transportError(method, path, e, signal);
    }
  }

  /** The whole response body as text; read failures map like request failures. */
  private async readBody(
    method: "GET" | "PUT",
    path: string,
    res: Dispatcher.ResponseData,
    signal: AbortSignal,
  ): Promise<string> {
    try {
      return await res.body.text();
    } catch (e: unknown) {
      throw this.transportError(method, path, e, signal);
    }
  }

  private transportError(
    method: "GET" | "PUT",
    path: string,
    e: unknown,
    signal: AbortSignal,
  ): RemoteOperationError {
    if (signal.aborted) {
      return new RemoteOperationError(`${method} ${path} timed out`, "TIMEOUT", { path });
    }
    const message = e instanceof Error ? e.message : String(e);
    return new RemoteOperationError(
      `${method} ${path} failed: ${message}`,
      "NETWORK_ERROR",
      { path },
    );
  }

  private statusError(
    statusCode: number,
    path: string,
    body: string,
    fallback: "WRITE_ERROR" | "NETWORK_ERROR",
  ): RemoteOperationError {
    const details = { path, statusCode, body: body.substring(0, 500) };
    if (statusCode === 401 || statusCode === 403) {
      return new RemoteOperationError(
        `Not authorized for ${path} (HTTP ${statusCode})`,
        "AUTH_ERROR",
        details,
      );
    }
    if (statusCode === 404) {
      return new RemoteOperationError(`Not found: ${path}`, "NOT_FOUND", details);
    }
    return new RemoteOperationError(
      `HTTP ${statusCode} from ${path}`,
      fallback,
      details,
    );
  }
}
