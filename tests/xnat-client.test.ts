import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { MockAgent } from "undici";
import { reviewSubjects } from "../src/engine/engine.js";
import { EngineError } from "../src/engine/errors.js";
import { RemoteOperationError } from "../src/repository/client.js";
import { modalityFromXsiType, XnatClient } from "../src/repository/xnat-client.js";
import { NO_EXPECTATIONS, ruleTable } from "./helpers.js";

const ORIGIN = "http://xnat.test";
const EXPERIMENTS = "/data/projects/CUTTING/subjects/LD4001_v1/experiments?format=json";
const SCANS = "/data/experiments/XNAT_E00001/scans?format=json";
const AUTH = `Basic ${Buffer.from("curator:test-secret").toString("base64")}`;

let agent: MockAgent;
let client: XnatClient;

beforeEach(() => {
  agent = new MockAgent();
  agent.disableNetConnect();
  client = new XnatClient({
    baseUrl: `${ORIGIN}/`,
    project: "CUTTING",
    user: "curator",
    password: "test-secret",
    timeoutMs: 5_000,
    dispatcher: agent,
  });
});

afterEach(async () => {
  await agent.close();
});

function resultSet(rows: unknown[]) {
  return { ResultSet: { Result: rows } };
}

async function remoteError(promise: Promise<unknown>): Promise<RemoteOperationError> {
  const e = await promise.then(
    () => undefined,
    (err: unknown) => err,
  );
  expect(e).toBeInstanceOf(RemoteOperationError);
  if (!(e instanceof RemoteOperationError)) throw new Error("expected a RemoteOperationError");
  return e;
}

describe("XnatClient.fetchSession", () => {
  it("maps the single session and its scans", async () => {
    const pool = agent.get(ORIGIN);
    pool
      .intercept({ path: EXPERIMENTS, method: "GET", headers: { authorization: AUTH } })
      .reply(200, resultSet([{ ID: "XNAT_E00001", label: "LD4001_v1_MR", date: "2024-03-02" }]));
    pool.intercept({ path: SCANS, method: "GET" }).reply(
      200,
      resultSet([
        {
          ID: "2",
          type: "MPRAGE",
          series_description: "t1_mprage_sag",
          quality: "usable",
          frames: "176",
          xsiType: "xnat:mrScanData",
        },
        {
          ID: "1",
          type: "localizer",
          series_description: "localizer",
          quality: "",
          frames: "",
          xsiType: "xnat:mrScanData",
        },
      ]),
    );

    await expect(client.fetchSession("LD4001_v1")).resolves.toEqual({
      subjectLabel: "LD4001_v1",
      projectId: "CUTTING",
      sessionId: "XNAT_E00001",
      sessionLabel: "LD4001_v1_MR",
      date: "2024-03-02",
      scans: [
        {
          id: "2",
          type: "MPRAGE",
          seriesDescription: "t1_mprage_sag",
          modality: "MR",
          frames: 176,
          quality: "usable",
        },
        { id: "1", type: "localizer", seriesDescription: "localizer", modality: "MR" },
      ],
    });
  });

  it("reports a subject without sessions as not found", async () => {
    agent.get(ORIGIN).intercept({ path: EXPERIMENTS, method: "GET" }).reply(200, resultSet([]));
    const e = await remoteError(client.fetchSession("LD4001_v1"));
    expect(e.code).toBe("NOT_FOUND");
    expect(e.message).toBe("No sessions found for subject LD4001_v1");
  });

  it("refuses a subject with several sessions", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: EXPERIMENTS, method: "GET" })
      .reply(200, resultSet([{ ID: "XNAT_E00001" }, { ID: "XNAT_E00002" }]));
    const e = await client.fetchSession("LD4001_v1").catch((err: unknown) => err);
    expect(e).toBeInstanceOf(EngineError);
    expect(e instanceof EngineError && e.code).toBe("MULTIPLE_SESSIONS");
  });

  it("maps rejected credentials to an auth error", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: EXPERIMENTS, method: "GET" })
      .reply(401, "Login required");
    const e = await remoteError(client.fetchSession("LD4001_v1"));
    expect(e.code).toBe("AUTH_ERROR");
    expect(e.details).toEqual({ path: EXPERIMENTS, statusCode: 401, body: "Login required" });
  });

  it("maps server errors on reads to network errors", async () => {
    agent.get(ORIGIN).intercept({ path: EXPERIMENTS, method: "GET" }).reply(502, "bad gateway");
    const e = await remoteError(client.fetchSession("LD4001_v1"));
    expect(e.code).toBe("NETWORK_ERROR");
  });

  it("maps transport failures to network errors", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: EXPERIMENTS, method: "GET" })
      .replyWithError(new Error("socket hang up"));
    const e = await remoteError(client.fetchSession("LD4001_v1"));
    expect(e.code).toBe("NETWORK_ERROR");
  });

  it("maps a page that is not JSON to a network error", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: EXPERIMENTS, method: "GET" })
      .reply(200, "<html>Login</html>", { headers: { "content-type": "text/html" } });
    const e = await remoteError(client.fetchSession("LD4001_v1"));
    expect(e.code).toBe("NETWORK_ERROR");
    expect(e.message).toBe(`Invalid JSON from ${EXPERIMENTS}`);
    expect(e.details).toEqual({ path: EXPERIMENTS, statusCode: 200, body: "<html>Login</html>" });
  });

  it("lets a batch review finish when one subject gets a login page", async () => {
    const pool = agent.get(ORIGIN);
    pool
      .intercept({ path: EXPERIMENTS, method: "GET" })
      .reply(200, "<html>Login</html>", { headers: { "content-type": "text/html" } });
    pool
      .intercept({
        path: "/data/projects/CUTTING/subjects/LD4002_v1/experiments?format=json",
        method: "GET",
      })
      .reply(200, resultSet([{ ID: "XNAT_E00002", label: "LD4002_v1_MR" }]));
    pool
      .intercept({ path: "/data/experiments/XNAT_E00002/scans?format=json", method: "GET" })
      .reply(
        200,
        resultSet([{ ID: "1", type: "T1", series_description: "t1", xsiType: "xnat:mrScanData" }]),
      );

    const reviews = await reviewSubjects(["LD4001_v1", "LD4002_v1"], client, {
      ruleTable: ruleTable(),
      expectations: NO_EXPECTATIONS,
    });
    expect(reviews.map((r) => [r.subjectLabel, r.ok])).toEqual([
      ["LD4001_v1", false],
      ["LD4002_v1", true],
    ]);
    const [login] = reviews;
    expect(login?.ok === false && login.error.code).toBe("NETWORK_ERROR");
  });

  it("rejects an unexpected listing shape", async () => {
    agent.get(ORIGIN).intercept({ path: EXPERIMENTS, method: "GET" }).reply(200, { items: [] });
    const e = await client.fetchSession("LD4001_v1").catch((err: unknown) => err);
    expect(e instanceof EngineError && e.code).toBe("MISSING_METADATA");
  });
});

describe("XnatClient.writeScanField", () => {
  const ref = { sessionId: "XNAT_E00001", scanId: "2" };

  it("puts a single field on the scan", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/data/experiments/XNAT_E00001/scans/2?type=T1w", method: "PUT" })
      .reply(200, "");
    await expect(client.writeScanField(ref, "type", "T1w")).resolves.toBeUndefined();
  });

  it("encodes field values", async () => {
    agent
      .get(ORIGIN)
      .intercept({
        path: "/data/experiments/XNAT_E00001/scans/2?type=T1w%20sag",
        method: "PUT",
      })
      .reply(200, "");
    await expect(client.writeScanField(ref, "type", "T1w sag")).resolves.toBeUndefined();
  });

  it("maps a rejected write to a write error", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/data/experiments/XNAT_E00001/scans/2?quality=unusable", method: "PUT" })
      .reply(500, "boom");
    const e = await remoteError(client.writeScanField(ref, "quality", "unusable"));
    expect(e.code).toBe("WRITE_ERROR");
    expect(e.message).toBe(
      "HTTP 500 from /data/experiments/XNAT_E00001/scans/2?quality=unusable",
    );
  });

  it("maps a missing scan to not found", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/data/experiments/XNAT_E00001/scans/2?type=T1w", method: "PUT" })
      .reply(404, "");
    const e = await remoteError(client.writeScanField(ref, "type", "T1w"));
    expect(e.code).toBe("NOT_FOUND");
  });
});

describe("modalityFromXsiType", () => {
  it("extracts the modality from scan data types", () => {
    expect(modalityFromXsiType("xnat:mrScanData")).toBe("MR");
    expect(modalityFromXsiType("xnat:petScanData")).toBe("PET");
    expect(modalityFromXsiType("xnat:subjectData")).toBe("");
    expect(modalityFromXsiType(undefined)).toBe("");
  });
});
