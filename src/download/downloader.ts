import path from "node:path";
import { ExportFormLayout } from "../config";
import {
  errorMessage,
  HarvestError,
  SessionExpiredError,
  TransientDownloadError,
} from "../core/errors";
import { HttpResponse, HttpTransport } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import { detectSessionRejection } from "../session";
import { DownloadErrorKind, DownloadResult, SessionContext, TariffId } from "../types";
import { buildExportForm, buildExportHeaders, validateExportBody } from "./exportRequest";
import { FileStore, tariffFileName } from "./fileStore";
import { RateLimiter, sleep, SleepFn } from "./rateLimiter";
import { ItemState, recordAttempt, RetryPolicy, startItem, Transition } from "./retryPolicy";

export interface DownloadEngineDeps {
  transport: HttpTransport;
  files: FileStore;
  logger: Logger;
  metrics: MetricsRegistry;
  exportUrl: string;
  exportForm: ExportFormLayout;
  destFolder: string;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  requestTimeoutMs: number;
  minResponseBytes: number;
  concurrency?: number;
  rateLimiter?: RateLimiter;
  sleepFn?: SleepFn;
  shouldStop?: () => boolean;
  onResult?: (result: DownloadResult) => Promise<void> | void;
}

export interface DownloadAllResult {
  /** One per distinct id, in input order. */
  results: DownloadResult[];
  /** Ids never attempted because the run halted or was stopped; their results are `not_attempted`. */
  pending: TariffId[];
  haltedBy?: HarvestError;
  stopped: boolean;
}

interface ItemOutcome {
  result: DownloadResult;
  fatalError?: HarvestError;
}

interface ItemContext {
  session: SessionContext;
  headers: Record<string, string>;
  policy: RetryPolicy;
}

async function processWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  let index = 0;
  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current]);
    }
  });
  await Promise.all(slots);
}

async function reportResult(deps: DownloadEngineDeps, result: DownloadResult): Promise<void> {
  try {
    await deps.onResult?.(result);
  } catch (error) {
    deps.metrics.incrementCounter("download_result_hook_failures", 1);
    deps.logger.error("download_result_hook_failed", { tariffId: result.tariffId, error: errorMessage(error) });
  }
}

export function notAttemptedResult(tariffId: TariffId, reason: string): DownloadResult {
  return {
    tariffId,
    status: "failed",
    attemptCount: 0,
    error: `not attempted: ${reason}`,
    errorKind: "not_attempted",
    finishedAt: new Date().toISOString(),
  };
}

function errorKindOf(error: unknown): DownloadErrorKind {
  if (error instanceof HarvestError) {
    return error.kind;
  }
  return "network";
}

async function requestExport(tariffId: TariffId, deps: DownloadEngineDeps, ctx: ItemContext): Promise<Buffer> {
  const form = buildExportForm(tariffId, ctx.session, deps.exportForm);

  let response: HttpResponse;
  try {
    response = await deps.transport.post(deps.exportUrl, form, ctx.headers, deps.requestTimeoutMs);
  } catch (error) {
    throw new TransientDownloadError("network", errorMessage(error));
  }

  const rejection = detectSessionRejection({
    status: response.status,
    headers: response.headers,
    body: response.body.toString("utf-8"),
  });
  if (rejection) {
    throw new SessionExpiredError(`session rejected: ${rejection}`, response.status);
  }

  if (response.status < 200 || response.status >= 300) {
    throw new TransientDownloadError("http_status", `HTTP ${response.status}`, response.status);
  }

  const invalid = validateExportBody(response.body, deps.minResponseBytes);
  if (invalid) {
    throw new TransientDownloadError("invalid_body", invalid, response.status);
  }
  return response.body;
}

async function downloadOne(tariffId: TariffId, deps: DownloadEngineDeps, ctx: ItemContext): Promise<ItemOutcome> {
  const { files, logger, metrics } = deps;
  const finalPath = path.resolve(deps.destFolder, tariffFileName(tariffId));

  if (await files.exists(finalPath)) {
    logger.debug("download_item_skipped", { tariffId, savedPath: finalPath });
    return {
      result: {
        tariffId,
        status: "skipped",
        attemptCount: 0,
        savedPath: finalPath,
        finishedAt: new Date().toISOString(),
      },
    };
  }

  const sleepFn = deps.sleepFn ?? sleep;
  let state: ItemState = startItem();
  let bytes = 0;

  while (state.phase === "attempting") {
    const attempt = state.attempt;
    await deps.rateLimiter?.acquire();
    const stopTimer = metrics.startTimer("download_ms");

    let transition: Transition;
    try {
      const body = await requestExport(tariffId, deps, ctx);
      await files.writeAtomic(finalPath, body);
      bytes = body.length;
      transition = recordAttempt(state, { ok: true }, ctx.policy);
      stopTimer();
    } catch (error) {
      transition = recordAttempt(state, { ok: false, error }, ctx.policy);
      logger.warn("download_item_attempt_failed", {
        tariffId,
        attempt,
        durationMs: stopTimer(),
        errorKind: errorKindOf(error),
        error: errorMessage(error),
        retryInMs: transition.state.phase === "attempting" ? transition.delayMs : undefined,
      });
    }

    if (transition.state.phase === "attempting") {
      metrics.incrementCounter("download_retries", 1);
      await sleepFn(transition.delayMs);
    }
    state = transition.state;
  }

  if (state.phase === "success") {
    logger.info("download_item_ok", { tariffId, attempt: state.attemptCount, bytes, savedPath: finalPath });
    return {
      result: {
        tariffId,
        status: "success",
        attemptCount: state.attemptCount,
        savedPath: finalPath,
        bytes,
        finishedAt: new Date().toISOString(),
      },
    };
  }

  logger.error("download_item_failed", {
    tariffId,
    attempt: state.attemptCount,
    fatal: state.fatal,
    error: errorMessage(state.error),
  });
  return {
    result: {
      tariffId,
      status: "failed",
      attemptCount: state.attemptCount,
      error: errorMessage(state.error),
      errorKind: errorKindOf(state.error),
      finishedAt: new Date().toISOString(),
    },
    fatalError: state.fatal && state.error instanceof HarvestError ? state.error : undefined,
  };
}

/**
 * Downloads every id's XML export into `destFolder`. Per-item failures are
 * recorded and the run moves on; a rejected session or an unwritable
 * destination halts scheduling and is returned as `haltedBy`.
 */
export async function downloadAll(
  ids: readonly TariffId[],
  session: SessionContext,
  deps: DownloadEngineDeps,
): Promise<DownloadAllResult> {
  const { logger, metrics } = deps;
  await deps.files.ensureWritable(deps.destFolder);

  const ctx: ItemContext = {
    session,
    headers: await buildExportHeaders(session, deps.exportUrl),
    policy: {
      maxRetries: deps.maxRetries,
      baseDelayMs: deps.retryBaseDelayMs,
      maxDelayMs: deps.retryMaxDelayMs,
    },
  };

  const uniqueIds = [...new Set(ids)];
  const results = new Map<TariffId, DownloadResult>();
  const pending = new Set<TariffId>();
  // Written by the workers below.
  const run: { haltedBy?: HarvestError; stopped: boolean } = { stopped: false };

  logger.info("download_all_start", {
    ids: uniqueIds.length,
    destFolder: deps.destFolder,
    concurrency: deps.concurrency ?? 1,
    maxRetries: deps.maxRetries,
  });

  await processWithConcurrency(uniqueIds, deps.concurrency ?? 1, async (tariffId) => {
    if (run.haltedBy) {
      pending.add(tariffId);
      return;
    }
    if (deps.shouldStop?.()) {
      run.stopped = true;
      pending.add(tariffId);
      return;
    }

    const { result, fatalError } = await downloadOne(tariffId, deps, ctx);
    results.set(tariffId, result);

    if (result.status === "success") {
      metrics.incrementCounter("downloads_ok", 1);
    } else if (result.status === "skipped") {
      metrics.incrementCounter("downloads_skipped", 1);
    } else {
      metrics.incrementCounter("downloads_failed", 1);
    }

    if (fatalError && !run.haltedBy) {
      run.haltedBy = fatalError;
      logger.error("download_all_halted", { tariffId, errorKind: fatalError.kind, error: fatalError.message });
    }

    await reportResult(deps, result);
  });

  const { haltedBy, stopped } = run;
  const pendingReason = haltedBy ? `run halted (${haltedBy.message})` : "stop requested";
  const orderedPending = uniqueIds.filter((id) => pending.has(id));
  for (const tariffId of orderedPending) {
    const result = notAttemptedResult(tariffId, pendingReason);
    results.set(tariffId, result);
    await reportResult(deps, result);
  }

  logger.info("download_all_complete", {
    processed: results.size - orderedPending.length,
    pending: orderedPending.length,
    halted: Boolean(haltedBy),
    stopped,
  });
  return {
    results: uniqueIds
      .map((id) => results.get(id))
      .filter((result): result is DownloadResult => result !== undefined),
    pending: orderedPending,
    haltedBy,
    stopped,
  };
}
