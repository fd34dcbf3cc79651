import fs from "node:fs";
import path from "node:path";
import { DownloadAllResult } from "../download";
import { RunSummary } from "../types";

export interface SummaryInput {
  runId: string;
  discovered: number;
  download?: DownloadAllResult;
  walkOutcome?: string;
  stopped?: boolean;
}

export function buildRunSummary(input: SummaryInput): RunSummary {
  const results = input.download?.results ?? [];
  const failures = results
    .filter((result) => result.status === "failed" && result.errorKind !== "not_attempted")
    .map((result) => ({
      tariffId: result.tariffId,
      attemptCount: result.attemptCount,
      error: result.error ?? "unknown error",
    }));

  return {
    runId: input.runId,
    discovered: input.discovered,
    downloaded: results.filter((result) => result.status === "success").length,
    skipped: results.filter((result) => result.status === "skipped").length,
    failed: failures.length,
    pending: input.download?.pending.length ?? 0,
    failures,
    walkOutcome: input.walkOutcome,
    haltedBy: input.download?.haltedBy?.message,
    stopped: Boolean(input.stopped || input.download?.stopped),
  };
}

export async function writeRunSummary(manifestsDir: string, summary: RunSummary): Promise<string> {
  const absoluteDir = path.resolve(manifestsDir);
  await fs.promises.mkdir(absoluteDir, { recursive: true });
  const filePath = path.join(absoluteDir, `summary-${summary.runId}.json`);
  await fs.promises.writeFile(filePath, `${JSON.stringify(summary, null, 2)}\n`, "utf-8");
  return filePath;
}
