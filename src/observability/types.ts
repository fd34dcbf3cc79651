export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  tariffId?: string;
  page?: number;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_walked"
  | "pages_skipped"
  | "ids_discovered"
  | "ids_duplicate"
  | "downloads_ok"
  | "downloads_failed"
  | "downloads_skipped"
  | "download_retries"
  | "download_result_hook_failures"
  | "sink_publish_failures";

export type MetricTimerName = "page_read_ms" | "download_ms";
