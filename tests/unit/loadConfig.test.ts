import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, loadConfig } from "../../src/config";
import { makeTempDir, removeDir } from "../helpers/testEnv";

const ENV_KEYS = [
  "BASE_URL",
  "EXPORT_URL",
  "USER_AGENT",
  "IGNORE_HTTPS_ERRORS",
  "HEADLESS",
  "MAX_PAGES",
  "MAX_RETRIES",
  "DEST_FOLDER",
  "PAGE_LOAD_TIMEOUT_MS",
  "REQUEST_TIMEOUT_MS",
  "RETRY_BASE_DELAY_MS",
  "RETRY_MAX_DELAY_MS",
  "DOWNLOAD_CONCURRENCY",
  "REQUESTS_PER_SECOND",
  "MIN_RESPONSE_BYTES",
  "STORE_PATH",
  "MANIFESTS_DIR",
  "EXPORT_STATUSES",
];

describe("loadConfig", () => {
  const saved: Record<string, string | undefined> = {};
  let dir: string;

  beforeEach(async () => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    dir = await makeTempDir();
  });

  afterEach(async () => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    await removeDir(dir);
  });

  it("uses the built-in defaults without a file or environment", () => {
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
  });

  it("merges a config file over the defaults, nested sections included", async () => {
    const configPath = path.join(dir, "harvester.json");
    await fs.promises.writeFile(
      configPath,
      JSON.stringify({ maxPages: 20, grid: { rowSelector: "#grid tr.item" }, exportForm: { formatValue: "xml" } }),
    );

    const config = loadConfig(configPath);

    expect(config.maxPages).toBe(20);
    expect(config.grid.rowSelector).toBe("#grid tr.item");
    expect(config.grid.nextSelector).toBe(DEFAULT_CONFIG.grid.nextSelector);
    expect(config.exportForm.formatValue).toBe("xml");
    expect(config.exportForm.statuses).toEqual(DEFAULT_CONFIG.exportForm.statuses);
  });

  it("lets the environment override the file", async () => {
    const configPath = path.join(dir, "harvester.json");
    await fs.promises.writeFile(configPath, JSON.stringify({ maxPages: 20, destFolder: "from-file" }));
    process.env.MAX_PAGES = "5";
    process.env.DEST_FOLDER = "from-env";
    process.env.HEADLESS = "false";
    process.env.EXPORT_STATUSES = "Accepted, Pending,";

    const config = loadConfig(configPath);

    expect(config.maxPages).toBe(5);
    expect(config.destFolder).toBe("from-env");
    expect(config.headless).toBe(false);
    expect(config.exportForm.statuses).toEqual(["Accepted", "Pending"]);
  });

  it("ignores environment values that do not parse", () => {
    process.env.MAX_RETRIES = "lots";
    process.env.HEADLESS = "maybe";

    const config = loadConfig();

    expect(config.maxRetries).toBe(DEFAULT_CONFIG.maxRetries);
    expect(config.headless).toBe(true);
  });

  it("rejects values outside their range", () => {
    process.env.MAX_PAGES = "0";
    expect(() => loadConfig()).toThrow("maxPages must be at least 1, got 0");

    process.env.MAX_PAGES = "10";
    process.env.DOWNLOAD_CONCURRENCY = "9";
    expect(() => loadConfig()).toThrow("downloadConcurrency must be between 1 and 8, got 9");
  });

  it("rejects file values of the wrong type", async () => {
    const configPath = path.join(dir, "harvester.json");
    await fs.promises.writeFile(configPath, JSON.stringify({ maxPages: "350x" }));
    expect(() => loadConfig(configPath)).toThrow('maxPages must be an integer, got "350x"');

    await fs.promises.writeFile(configPath, JSON.stringify({ maxRetries: 2.5 }));
    expect(() => loadConfig(configPath)).toThrow("maxRetries must be an integer, got 2.5");

    await fs.promises.writeFile(configPath, JSON.stringify({ requestsPerSecond: "fast" }));
    expect(() => loadConfig(configPath)).toThrow('requestsPerSecond must be a positive number, got "fast"');
  });

  it("fails on a missing or malformed config file", async () => {
    expect(() => loadConfig(path.join(dir, "missing.json"))).toThrow("Config file not found");

    const listPath = path.join(dir, "list.json");
    await fs.promises.writeFile(listPath, "[1, 2]");
    expect(() => loadConfig(listPath)).toThrow("Config file must contain a JSON object");
  });
});
