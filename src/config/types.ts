export interface GridSelectors {
  rowSelector: string;
  exportIdAttribute: string;
  exportLinkSelector: string;
  nextSelector: string;
  pagerSelector: string;
  formFieldSelector: string;
}

export interface ExportFormLayout {
  idField: string;
  statusField: string;
  statuses: string[];
  formatField: string;
  formatValue: string;
  extraFields: Record<string, string>;
}

export interface WindowSize {
  width: number;
  height: number;
}

export interface AppConfig {
  baseUrl: string;
  exportUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  headless: boolean;
  maxPages: number;
  maxRetries: number;
  destFolder: string;
  pageLoadTimeoutMs: number;
  requestTimeoutMs: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  downloadConcurrency: number;
  requestsPerSecond: number;
  minResponseBytes: number;
  storePath: string;
  manifestsDir: string;
  grid: GridSelectors;
  exportForm: ExportFormLayout;
  window: WindowSize;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "grid" | "exportForm" | "window">> & {
  grid?: Partial<GridSelectors>;
  exportForm?: Partial<ExportFormLayout>;
  window?: Partial<WindowSize>;
};
