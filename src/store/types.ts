import { DiscoveredTariff, DownloadResult, FailedItem, TariffId } from "../types";

export type RunStatus = "completed" | "halted" | "stopped" | "failed";

export interface StoreStats {
  totalTariffs: number;
  discovered: number;
  downloaded: number;
  skipped: number;
  failed: number;
  runs: number;
}

export interface HarvestStore {
  startRun(runId: string, command: string, startedAt: string): Promise<void>;
  finishRun(runId: string, status: RunStatus, finishedAt: string): Promise<void>;
  upsertDiscovered(items: DiscoveredTariff[], runId: string): Promise<void>;
  /** Every known id in first-discovery order. */
  listDiscovered(): Promise<TariffId[]>;
  markDownloadResult(result: DownloadResult, runId: string): Promise<void>;
  listFailed(): Promise<FailedItem[]>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}
