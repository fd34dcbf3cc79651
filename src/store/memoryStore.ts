import { DiscoveredTariff, DownloadResult, FailedItem, TariffId } from "../types";
import { HarvestStore, RunStatus, StoreStats } from "./types";

interface TariffRecord {
  order: number;
  lastResult?: DownloadResult;
}

export class InMemoryStore implements HarvestStore {
  private readonly tariffs = new Map<TariffId, TariffRecord>();
  private readonly runs = new Map<string, RunStatus | "running">();

  async startRun(runId: string, _command: string, _startedAt: string): Promise<void> {
    this.runs.set(runId, "running");
  }

  async finishRun(runId: string, status: RunStatus, _finishedAt: string): Promise<void> {
    this.runs.set(runId, status);
  }

  async upsertDiscovered(items: DiscoveredTariff[], _runId: string): Promise<void> {
    for (const item of items) {
      if (!this.tariffs.has(item.tariffId)) {
        this.tariffs.set(item.tariffId, { order: this.tariffs.size });
      }
    }
  }

  async listDiscovered(): Promise<TariffId[]> {
    return [...this.tariffs.entries()].sort((a, b) => a[1].order - b[1].order).map(([tariffId]) => tariffId);
  }

  async markDownloadResult(result: DownloadResult, _runId: string): Promise<void> {
    const record = this.tariffs.get(result.tariffId) ?? { order: this.tariffs.size };
    this.tariffs.set(result.tariffId, { ...record, lastResult: result });
  }

  async listFailed(): Promise<FailedItem[]> {
    const failed: FailedItem[] = [];
    for (const [tariffId, record] of this.tariffs) {
      if (record.lastResult?.status === "failed") {
        failed.push({
          tariffId,
          attemptCount: record.lastResult.attemptCount,
          error: record.lastResult.error ?? "unknown error",
        });
      }
    }
    return failed;
  }

  async getStats(): Promise<StoreStats> {
    const records = [...this.tariffs.values()];
    return {
      totalTariffs: records.length,
      discovered: records.filter((record) => record.lastResult === undefined).length,
      downloaded: records.filter((record) => record.lastResult?.status === "success").length,
      skipped: records.filter((record) => record.lastResult?.status === "skipped").length,
      failed: records.filter((record) => record.lastResult?.status === "failed").length,
      runs: this.runs.size,
    };
  }

  async close(): Promise<void> {
    return;
  }
}
