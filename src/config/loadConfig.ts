import fs from "node:fs";
import path from "node:path";
import { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://etariff.ferc.gov/TariffList.aspx",
  exportUrl: "https://etariff.ferc.gov/TariffList.aspx",
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ignoreHttpsErrors: false,
  headless: true,
  maxPages: 350,
  maxRetries: 3,
  destFolder: "TariffXML",
  pageLoadTimeoutMs: 15_000,
  requestTimeoutMs: 60_000,
  retryBaseDelayMs: 1_000,
  retryMaxDelayMs: 10_000,
  downloadConcurrency: 1,
  requestsPerSecond: 2,
  minResponseBytes: 64,
  storePath: "data/harvest.sqlite",
  manifestsDir: "data/manifests",
  grid: {
    rowSelector: "table.rgMasterTable > tbody > tr",
    exportIdAttribute: "data-tariff-id",
    exportLinkSelector: "a[onclick*='XML'], a[href*='xml'], a[title*='XML']",
    nextSelector: "a[title='Next'], a[aria-label='Next'], input[type='submit'][value*='Next'], .rgPageNext",
    pagerSelector: ".rgNumPart a, .pagination a, .pager a",
    formFieldSelector: "input[type='hidden'][name^='__']",
  },
  exportForm: {
    idField: "tariffId",
    statusField: "status",
    statuses: ["Accepted", "Pending", "Rejected", "Suspended", "Withdrawn", "Effective", "Superseded"],
    formatField: "format",
    formatValue: "plaintext",
    extraFields: {},
  },
  window: {
    width: 1920,
    height: 1080,
  },
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

// File values arrive untyped, so a type check comes before the range check.
function checkInteger(name: string, value: unknown, min: number, max?: number): void {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got ${JSON.stringify(value)}`);
  }
  if (max !== undefined && (value < min || value > max)) {
    throw new Error(`${name} must be between ${min} and ${max}, got ${value}`);
  }
  if (value < min) {
    throw new Error(min === 0 ? `${name} must not be negative, got ${value}` : `${name} must be at least ${min}, got ${value}`);
  }
}

export function validateConfig(config: AppConfig): AppConfig {
  checkInteger("maxPages", config.maxPages, 1);
  checkInteger("maxRetries", config.maxRetries, 0);
  checkInteger("downloadConcurrency", config.downloadConcurrency, 1, 8);
  checkInteger("pageLoadTimeoutMs", config.pageLoadTimeoutMs, 1);
  checkInteger("requestTimeoutMs", config.requestTimeoutMs, 1);
  checkInteger("retryBaseDelayMs", config.retryBaseDelayMs, 0);
  checkInteger("retryMaxDelayMs", config.retryMaxDelayMs, 0);
  checkInteger("minResponseBytes", config.minResponseBytes, 0);
  checkInteger("window.width", config.window.width, 1);
  checkInteger("window.height", config.window.height, 1);
  const rate: unknown = config.requestsPerSecond;
  if (typeof rate !== "number" || !Number.isFinite(rate) || rate <= 0) {
    throw new Error(`requestsPerSecond must be a positive number, got ${JSON.stringify(rate)}`);
  }
  return config;
}

export function loadConfig(configPath?: string): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    grid: {
      ...DEFAULT_CONFIG.grid,
      ...(fileConfig.grid ?? {}),
    },
    exportForm: {
      ...DEFAULT_CONFIG.exportForm,
      ...(fileConfig.exportForm ?? {}),
    },
    window: {
      ...DEFAULT_CONFIG.window,
      ...(fileConfig.window ?? {}),
    },
  };

  return validateConfig({
    ...merged,
    baseUrl: process.env.BASE_URL ?? merged.baseUrl,
    exportUrl: process.env.EXPORT_URL ?? merged.exportUrl,
    userAgent: process.env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(process.env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    headless: toBool(process.env.HEADLESS, merged.headless),
    maxPages: toInt(process.env.MAX_PAGES, merged.maxPages),
    maxRetries: toInt(process.env.MAX_RETRIES, merged.maxRetries),
    destFolder: process.env.DEST_FOLDER ?? merged.destFolder,
    pageLoadTimeoutMs: toInt(process.env.PAGE_LOAD_TIMEOUT_MS, merged.pageLoadTimeoutMs),
    requestTimeoutMs: toInt(process.env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    retryBaseDelayMs: toInt(process.env.RETRY_BASE_DELAY_MS, merged.retryBaseDelayMs),
    retryMaxDelayMs: toInt(process.env.RETRY_MAX_DELAY_MS, merged.retryMaxDelayMs),
    downloadConcurrency: toInt(process.env.DOWNLOAD_CONCURRENCY, merged.downloadConcurrency),
    requestsPerSecond: toNumber(process.env.REQUESTS_PER_SECOND, merged.requestsPerSecond),
    minResponseBytes: toInt(process.env.MIN_RESPONSE_BYTES, merged.minResponseBytes),
    storePath: process.env.STORE_PATH ?? merged.storePath,
    manifestsDir: process.env.MANIFESTS_DIR ?? merged.manifestsDir,
    exportForm: {
      ...merged.exportForm,
      statuses: toList(process.env.EXPORT_STATUSES, merged.exportForm.statuses),
    },
  });
}

export { DEFAULT_CONFIG };
