import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../../src/config";
import { DestinationError, SessionExpiredError } from "../../src/core/errors";
import { DownloadEngineDeps, downloadAll, NodeFileStore, tariffFileName } from "../../src/download";
import { MetricsRegistry } from "../../src/observability";
import { createSessionContext } from "../../src/session";
import { DownloadResult } from "../../src/types";
import { GRID_URL, SESSION_COOKIE } from "../helpers/fakeGridBrowser";
import { FakeTransport, statusResponse, xmlBody, xmlResponse } from "../helpers/fakeTransport";
import { makeTempDir, quietLogger, removeDir } from "../helpers/testEnv";

const session = createSessionContext({
  pageUrl: GRID_URL,
  userAgent: "fake-agent/1.0",
  cookies: [SESSION_COOKIE],
  formFields: { __VIEWSTATE: "abc" },
});

describe("downloadAll", () => {
  let dir: string;
  let delays: number[];

  beforeEach(async () => {
    dir = await makeTempDir();
    delays = [];
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function engine(transport: FakeTransport, overrides: Partial<DownloadEngineDeps> = {}): DownloadEngineDeps {
    return {
      transport,
      files: new NodeFileStore(),
      logger: quietLogger(),
      metrics: new MetricsRegistry(),
      exportUrl: GRID_URL,
      exportForm: { ...DEFAULT_CONFIG.exportForm, statuses: ["Accepted", "Pending"] },
      destFolder: dir,
      maxRetries: 3,
      retryBaseDelayMs: 1_000,
      retryMaxDelayMs: 10_000,
      requestTimeoutMs: 1_000,
      minResponseBytes: 16,
      sleepFn: async (ms) => {
        delays.push(ms);
      },
      ...overrides,
    };
  }

  function fileFor(tariffId: string): string {
    return path.resolve(dir, tariffFileName(tariffId));
  }

  function summarize(results: DownloadResult[]) {
    return results.map((result) => [result.tariffId, result.status, result.attemptCount]);
  }

  it("retries a flaky item and still saves every export", async () => {
    const transport = new FakeTransport((tariffId, attempt) =>
      tariffId === "C" && attempt < 3 ? statusResponse(500) : xmlResponse(tariffId),
    );

    const outcome = await downloadAll(["A", "B", "C", "D"], session, engine(transport));

    expect(summarize(outcome.results)).toEqual([
      ["A", "success", 1],
      ["B", "success", 1],
      ["C", "success", 3],
      ["D", "success", 1],
    ]);
    expect(outcome.pending).toEqual([]);
    expect(outcome.haltedBy).toBeUndefined();
    expect(delays).toEqual([1_000, 2_000]);
    for (const id of ["A", "B", "C", "D"]) {
      expect(await fs.promises.readFile(fileFor(id), "utf-8")).toBe(xmlBody(id));
    }
  });

  it("posts the export form with the borrowed session", async () => {
    const transport = new FakeTransport();

    await downloadAll(["A"], session, engine(transport));

    expect(transport.calls).toHaveLength(1);
    expect(transport.calls[0].url).toBe(GRID_URL);
    expect(transport.calls[0].body).toBe("__VIEWSTATE=abc&tariffId=A&status=Accepted&status=Pending&format=plaintext");
    expect(transport.calls[0].headers.cookie).toBe("ASP.NET_SessionId=test-session");
    expect(transport.calls[0].headers["user-agent"]).toBe("fake-agent/1.0");
  });

  it("records an item as failed after its retries and moves on", async () => {
    const metrics = new MetricsRegistry();
    const transport = new FakeTransport((tariffId) => (tariffId === "B" ? statusResponse(503) : xmlResponse(tariffId)));

    const outcome = await downloadAll(["A", "B", "C"], session, engine(transport, { maxRetries: 2, metrics }));

    expect(summarize(outcome.results)).toEqual([
      ["A", "success", 1],
      ["B", "failed", 3],
      ["C", "success", 1],
    ]);
    expect(outcome.results[1]).toMatchObject({ error: "HTTP 503", errorKind: "http_status" });
    expect(transport.callsFor("B")).toBe(3);
    expect(fs.existsSync(fileFor("B"))).toBe(false);
    expect(metrics.getCounters()).toMatchObject({ downloads_ok: 2, downloads_failed: 1, download_retries: 2 });
  });

  it("retries network errors and bodies that are not XML", async () => {
    const transport = new FakeTransport((tariffId, attempt) => {
      if (attempt === 1) {
        return new Error("socket hang up");
      }
      if (attempt === 2) {
        return statusResponse(200, { "content-type": "text/html" }, "<html><body>Server busy, try later</body></html>");
      }
      return xmlResponse(tariffId);
    });

    const outcome = await downloadAll(["A"], session, engine(transport));

    expect(summarize(outcome.results)).toEqual([["A", "success", 3]]);
  });

  it("skips ids whose file already exists without any request", async () => {
    const first = new FakeTransport();
    await downloadAll(["A", "B", "C"], session, engine(first));

    const second = new FakeTransport();
    const outcome = await downloadAll(["A", "B", "C"], session, engine(second));

    expect(second.calls).toHaveLength(0);
    expect(summarize(outcome.results)).toEqual([
      ["A", "skipped", 0],
      ["B", "skipped", 0],
      ["C", "skipped", 0],
    ]);
    expect(outcome.results[0].savedPath).toBe(fileFor("A"));
  });

  it("downloads each id once when the list repeats it", async () => {
    const transport = new FakeTransport();

    const outcome = await downloadAll(["A", "B", "A"], session, engine(transport));

    expect(outcome.results.map((result) => result.tariffId)).toEqual(["A", "B"]);
    expect(transport.calls).toHaveLength(2);
  });

  it("halts the run when the server redirects to a login page", async () => {
    const transport = new FakeTransport((tariffId) =>
      tariffId === "B" ? statusResponse(302, { location: "/Account/Login.aspx" }) : xmlResponse(tariffId),
    );

    const outcome = await downloadAll(["A", "B", "C", "D"], session, engine(transport));

    expect(summarize(outcome.results)).toEqual([
      ["A", "success", 1],
      ["B", "failed", 1],
      ["C", "failed", 0],
      ["D", "failed", 0],
    ]);
    expect(outcome.results[1]).toMatchObject({ errorKind: "session_expired" });
    expect(outcome.results[2]).toMatchObject({
      errorKind: "not_attempted",
      error: "not attempted: run halted (session rejected: redirected to /Account/Login.aspx)",
    });
    expect(outcome.haltedBy).toBeInstanceOf(SessionExpiredError);
    expect(outcome.haltedBy?.message).toBe("session rejected: redirected to /Account/Login.aspx");
    expect(outcome.pending).toEqual(["C", "D"]);
    expect(transport.callsFor("C")).toBe(0);
  });

  it("treats a login form in place of the export as an expired session", async () => {
    const transport = new FakeTransport(() =>
      statusResponse(200, { "content-type": "text/html" }, `<form><input type="password" name="pw"></form>`),
    );

    const outcome = await downloadAll(["A", "B"], session, engine(transport));

    expect(outcome.haltedBy?.message).toBe("session rejected: login form returned instead of export");
    expect(outcome.pending).toEqual(["B"]);
    expect(outcome.results).toHaveLength(2);
  });

  it("leaves nothing behind when the final rename fails, and a rerun recovers", async () => {
    class FailingCommit extends NodeFileStore {
      protected async commit(): Promise<void> {
        throw new Error("disk full");
      }
    }

    const failed = await downloadAll(["A"], session, engine(new FakeTransport(), { files: new FailingCommit() }));

    expect(failed.haltedBy).toBeInstanceOf(DestinationError);
    expect(failed.results[0]).toMatchObject({ status: "failed", errorKind: "filesystem", attemptCount: 1 });
    expect(await fs.promises.readdir(dir)).toEqual([]);

    const rerun = await downloadAll(["A"], session, engine(new FakeTransport()));
    expect(summarize(rerun.results)).toEqual([["A", "success", 1]]);
    expect(await fs.promises.readFile(fileFor("A"), "utf-8")).toBe(xmlBody("A"));
  });

  it("ignores a stale temp file from an interrupted run", async () => {
    await fs.promises.writeFile(`${fileFor("A")}.0badc0de.part`, "<tariff");
    const transport = new FakeTransport();

    const outcome = await downloadAll(["A"], session, engine(transport));

    expect(summarize(outcome.results)).toEqual([["A", "success", 1]]);
    expect(await fs.promises.readFile(fileFor("A"), "utf-8")).toBe(xmlBody("A"));
  });

  it("refuses to start when the destination cannot be created", async () => {
    const blocker = path.join(dir, "blocker");
    await fs.promises.writeFile(blocker, "");
    const transport = new FakeTransport();

    await expect(
      downloadAll(["A"], session, engine(transport, { destFolder: path.join(blocker, "xml") })),
    ).rejects.toBeInstanceOf(DestinationError);
    expect(transport.calls).toHaveLength(0);
  });

  it("stops scheduling new items once a stop is requested", async () => {
    const transport = new FakeTransport();

    const outcome = await downloadAll(
      ["A", "B", "C"],
      session,
      engine(transport, { shouldStop: () => transport.calls.length >= 1 }),
    );

    expect(summarize(outcome.results)).toEqual([
      ["A", "success", 1],
      ["B", "failed", 0],
      ["C", "failed", 0],
    ]);
    expect(outcome.results[1].error).toBe("not attempted: stop requested");
    expect(outcome.pending).toEqual(["B", "C"]);
    expect(outcome.stopped).toBe(true);
  });

  it("keeps every worker going when the result hook throws", async () => {
    const metrics = new MetricsRegistry();
    const transport = new FakeTransport();

    const outcome = await downloadAll(
      ["A", "B", "C", "D"],
      session,
      engine(transport, {
        concurrency: 2,
        metrics,
        onResult: (result) => {
          if (result.tariffId === "A") {
            throw new Error("ledger locked");
          }
        },
      }),
    );

    expect(summarize(outcome.results)).toEqual([
      ["A", "success", 1],
      ["B", "success", 1],
      ["C", "success", 1],
      ["D", "success", 1],
    ]);
    expect(transport.calls).toHaveLength(4);
    expect(metrics.getCounter("download_result_hook_failures")).toBe(1);
  });

  it("keeps input order with several workers", async () => {
    const ids = ["A", "B", "C", "D", "E", "F"];
    const transport = new FakeTransport();
    const seen: string[] = [];

    const outcome = await downloadAll(
      ids,
      session,
      engine(transport, {
        concurrency: 3,
        onResult: (result) => {
          seen.push(result.tariffId);
        },
      }),
    );

    expect(outcome.results.map((result) => result.tariffId)).toEqual(ids);
    expect([...seen].sort()).toEqual(ids);
    expect(transport.calls).toHaveLength(6);
  });
});
