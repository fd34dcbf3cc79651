export type TariffId = string;

export interface GridRow {
  exportId: TariffId;
  displayFields: Record<string, string>;
}

export interface SessionCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  /** Unix seconds; -1 for a session cookie. */
  expires: number;
  httpOnly: boolean;
  secure: boolean;
}

export interface SessionContext {
  readonly capturedAt: string;
  readonly pageUrl: string;
  readonly userAgent: string;
  readonly cookies: ReadonlyArray<Readonly<SessionCookie>>;
  readonly formFields: Readonly<Record<string, string>>;
}

export type DownloadStatus = "success" | "failed" | "skipped";

export type DownloadErrorKind =
  | "network"
  | "http_status"
  | "invalid_body"
  | "session_expired"
  | "filesystem"
  /** Never requested because the run halted or was stopped first. */
  | "not_attempted";

export interface DownloadResult {
  tariffId: TariffId;
  status: DownloadStatus;
  attemptCount: number;
  savedPath?: string;
  bytes?: number;
  error?: string;
  errorKind?: DownloadErrorKind;
  finishedAt: string;
}

export interface DiscoveredTariff {
  tariffId: TariffId;
  page: number;
  displayFields: Record<string, string>;
  discoveredAt: string;
}

export interface FailedItem {
  tariffId: TariffId;
  attemptCount: number;
  error: string;
}

export interface RunSummary {
  runId: string;
  discovered: number;
  downloaded: number;
  skipped: number;
  failed: number;
  /** Ids left unattempted by a halt or a stop request. */
  pending: number;
  failures: FailedItem[];
  walkOutcome?: string;
  haltedBy?: string;
  stopped: boolean;
}
