import { DiscoveredTariff, DownloadResult } from "../types";

export interface Sink {
  publishDiscovered(items: DiscoveredTariff[]): Promise<void>;
  publishDownloadResult(results: DownloadResult[]): Promise<void>;
}
