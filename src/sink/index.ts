import { AppConfig } from "../config";
import { LocalJsonlSink } from "./localJsonlSink";
import { Sink } from "./types";

export function createSink(config: AppConfig, runId: string): Sink {
  const sinkType = (process.env.SINK_TYPE ?? "local_jsonl").toLowerCase();

  switch (sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config.manifestsDir, runId);
    default:
      throw new Error(`Unsupported sink type: ${sinkType}`);
  }
}

export * from "./localJsonlSink";
export * from "./types";
