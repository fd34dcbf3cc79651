import { AppConfig } from "../config";
import { captureSession, discoverIds, GridBrowser, WalkResult } from "../crawl";
import { downloadAll, DownloadAllResult, FileStore, notAttemptedResult, RateLimiter } from "../download";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { HarvestStore, RunStatus } from "../store";
import { DiscoveredTariff, DownloadResult, RunSummary, SessionContext, TariffId } from "../types";
import { DestinationError, errorMessage } from "./errors";
import { HttpTransport } from "./fetch";
import { buildRunSummary, writeRunSummary } from "./summary";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: HarvestStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  transport: HttpTransport;
  files: FileStore;
  openBrowser: () => Promise<GridBrowser>;
  shouldStop: () => boolean;
}

async function withBrowser<T>(ctx: CommandContext, work: (browser: GridBrowser) => Promise<T>): Promise<T> {
  const browser = await ctx.openBrowser();
  try {
    return await work(browser);
  } finally {
    await browser.close();
    ctx.logger.info("browser_closed");
  }
}

// The ledger is the record of the run; a manifest that cannot be written is only logged.
async function publishToSink(ctx: CommandContext, manifest: string, publish: () => Promise<void>): Promise<void> {
  try {
    await publish();
  } catch (error) {
    ctx.metrics.incrementCounter("sink_publish_failures", 1);
    ctx.logger.warn("sink_publish_failed", { manifest, error: errorMessage(error) });
  }
}

async function walkGrid(ctx: CommandContext, browser: GridBrowser): Promise<WalkResult> {
  return discoverIds(
    { browser, logger: ctx.logger.child("walker"), metrics: ctx.metrics },
    {
      startUrl: ctx.config.baseUrl,
      maxPages: ctx.config.maxPages,
      pageLoadTimeoutMs: ctx.config.pageLoadTimeoutMs,
      rowSelector: ctx.config.grid.rowSelector,
      shouldStop: ctx.shouldStop,
      onPage: async (page, rows) => {
        const discoveredAt = new Date().toISOString();
        const items: DiscoveredTariff[] = rows.map((row) => ({
          tariffId: row.exportId,
          page,
          displayFields: row.displayFields,
          discoveredAt,
        }));
        await ctx.store.upsertDiscovered(items, ctx.runId);
        await publishToSink(ctx, "discovered", () => ctx.sink.publishDiscovered(items));
      },
    },
  );
}

async function recordResult(ctx: CommandContext, result: DownloadResult): Promise<void> {
  await ctx.store.markDownloadResult(result, ctx.runId);
  await publishToSink(ctx, "downloads", () => ctx.sink.publishDownloadResult([result]));
}

async function downloadIds(ctx: CommandContext, ids: TariffId[], session: SessionContext): Promise<DownloadAllResult> {
  const { config } = ctx;
  try {
    return await downloadAll(ids, session, {
      transport: ctx.transport,
      files: ctx.files,
      logger: ctx.logger.child("downloader"),
      metrics: ctx.metrics,
      exportUrl: config.exportUrl,
      exportForm: config.exportForm,
      destFolder: config.destFolder,
      maxRetries: config.maxRetries,
      retryBaseDelayMs: config.retryBaseDelayMs,
      retryMaxDelayMs: config.retryMaxDelayMs,
      requestTimeoutMs: config.requestTimeoutMs,
      minResponseBytes: config.minResponseBytes,
      concurrency: config.downloadConcurrency,
      rateLimiter: RateLimiter.perSecond(config.requestsPerSecond),
      shouldStop: ctx.shouldStop,
      onResult: (result) => recordResult(ctx, result),
    });
  } catch (error) {
    if (error instanceof DestinationError) {
      const pending = [...new Set(ids)];
      const results = pending.map((id) => notAttemptedResult(id, `run halted (${error.message})`));
      for (const result of results) {
        await recordResult(ctx, result);
      }
      return { results, pending, haltedBy: error, stopped: false };
    }
    throw error;
  }
}

function runStatusOf(summary: RunSummary): RunStatus {
  if (summary.haltedBy) {
    return "halted";
  }
  return summary.stopped ? "stopped" : "completed";
}

async function tracked(ctx: CommandContext, command: string, work: () => Promise<RunSummary>): Promise<RunSummary> {
  await ctx.store.startRun(ctx.runId, command, new Date().toISOString());
  let summary: RunSummary;
  try {
    summary = await work();
  } catch (error) {
    await ctx.store.finishRun(ctx.runId, "failed", new Date().toISOString());
    throw error;
  }

  await ctx.store.finishRun(ctx.runId, runStatusOf(summary), new Date().toISOString());
  const summaryPath = await writeRunSummary(ctx.config.manifestsDir, summary);
  const level = summary.haltedBy ? "error" : summary.failed > 0 ? "warn" : "info";
  ctx.logger[level]("run_summary", { command, summaryPath, ...summary });
  return summary;
}

export async function runHarvest(ctx: CommandContext): Promise<RunSummary> {
  return tracked(ctx, "harvest", async () => {
    // The browser is only needed until the session has been captured.
    const walk = await withBrowser(ctx, (browser) => walkGrid(ctx, browser));

    if (ctx.shouldStop()) {
      return buildRunSummary({
        runId: ctx.runId,
        discovered: walk.ids.length,
        walkOutcome: walk.state.phase,
        stopped: true,
      });
    }

    return buildRunSummary({
      runId: ctx.runId,
      discovered: walk.ids.length,
      download: await downloadIds(ctx, walk.ids, walk.session),
      walkOutcome: walk.state.phase,
    });
  });
}

export async function runDiscover(ctx: CommandContext): Promise<RunSummary> {
  return tracked(ctx, "discover", async () => {
    const walk = await withBrowser(ctx, (browser) => walkGrid(ctx, browser));
    return buildRunSummary({
      runId: ctx.runId,
      discovered: walk.ids.length,
      walkOutcome: walk.state.phase,
      stopped: walk.state.phase === "stalled" && walk.state.reason === "stop_requested",
    });
  });
}

async function downloadKnown(ctx: CommandContext, command: string, ids: TariffId[]): Promise<RunSummary> {
  return tracked(ctx, command, async () => {
    if (ids.length === 0) {
      ctx.logger.info("download_nothing_to_do", { command });
      return buildRunSummary({ runId: ctx.runId, discovered: 0 });
    }

    const session = await withBrowser(ctx, (browser) =>
      captureSession(
        { browser, logger: ctx.logger.child("session"), metrics: ctx.metrics },
        {
          startUrl: ctx.config.baseUrl,
          pageLoadTimeoutMs: ctx.config.pageLoadTimeoutMs,
          rowSelector: ctx.config.grid.rowSelector,
        },
      ),
    );

    return buildRunSummary({
      runId: ctx.runId,
      discovered: ids.length,
      download: await downloadIds(ctx, ids, session),
    });
  });
}

export async function runDownload(ctx: CommandContext): Promise<RunSummary> {
  return downloadKnown(ctx, "download", await ctx.store.listDiscovered());
}

export async function runRetryFailed(ctx: CommandContext): Promise<RunSummary> {
  const failed = await ctx.store.listFailed();
  ctx.logger.info("retry_failed_start", { failed: failed.length });
  return downloadKnown(
    ctx,
    "retry-failed",
    failed.map((item) => item.tariffId),
  );
}

export async function runStatus(ctx: CommandContext): Promise<void> {
  ctx.logger.info("status_start");
  const stats = await ctx.store.getStats();
  ctx.logger.info("status_complete", { stats });
}
