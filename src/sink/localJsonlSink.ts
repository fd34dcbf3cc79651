import fs from "node:fs";
import path from "node:path";
import { DiscoveredTariff, DownloadResult } from "../types";
import { Sink } from "./types";

export class LocalJsonlSink implements Sink {
  private readonly discoveredPath: string;
  private readonly downloadsPath: string;
  private readonly runId: string;

  constructor(manifestsDir: string, runId: string) {
    const absoluteDir = path.resolve(manifestsDir);
    fs.mkdirSync(absoluteDir, { recursive: true });
    this.discoveredPath = path.join(absoluteDir, "discovered.jsonl");
    this.downloadsPath = path.join(absoluteDir, "downloads.jsonl");
    this.runId = runId;
  }

  async publishDiscovered(items: DiscoveredTariff[]): Promise<void> {
    await this.appendLines(
      this.discoveredPath,
      items.map((item) => ({
        runId: this.runId,
        ...item,
      })),
    );
  }

  async publishDownloadResult(results: DownloadResult[]): Promise<void> {
    await this.appendLines(
      this.downloadsPath,
      results.map((result) => ({
        runId: this.runId,
        ...result,
      })),
    );
  }

  private async appendLines(filePath: string, records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(filePath, content, "utf-8");
  }
}
