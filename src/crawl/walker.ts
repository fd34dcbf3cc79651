import { Logger, MetricsRegistry } from "../observability";
import { createSessionContext } from "../session";
import { GridRow, SessionContext, TariffId } from "../types";
import { errorMessage } from "../core/errors";
import { GridBrowser } from "./browser";
import {
  fingerprintRows,
  isTerminal,
  moveCursor,
  nextWalkState,
  PageCursor,
  PageObservation,
  stallAt,
  startCursor,
  TerminalWalkState,
  WalkState,
} from "./walkState";

export interface WalkOptions {
  startUrl: string;
  maxPages: number;
  pageLoadTimeoutMs: number;
  rowSelector: string;
  maxAdvanceAttempts?: number;
  /** Checked between pages; a true result ends the walk as stalled. */
  shouldStop?: () => boolean;
  /** Called with the rows first seen on each page, in row order. */
  onPage?: (page: number, newRows: GridRow[]) => Promise<void> | void;
}

export interface WalkDependencies {
  browser: GridBrowser;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface WalkResult {
  ids: TariffId[];
  session: SessionContext;
  pagesVisited: number;
  state: TerminalWalkState;
}

async function readPage(deps: WalkDependencies, options: WalkOptions, page: number): Promise<GridRow[] | undefined> {
  for (let attempt = 1; attempt <= 2; attempt += 1) {
    try {
      await deps.browser.waitForElement(options.rowSelector, options.pageLoadTimeoutMs);
      return await deps.browser.readRows();
    } catch (error) {
      deps.logger.warn("walk_page_read_failed", { page, attempt, error: errorMessage(error) });
    }
  }
  return undefined;
}

async function isNextEnabled(deps: WalkDependencies, page: number): Promise<boolean> {
  try {
    return await deps.browser.isNextEnabled();
  } catch (error) {
    deps.logger.warn("walk_next_check_failed", { page, error: errorMessage(error) });
    return false;
  }
}

async function clickNext(deps: WalkDependencies, page: number, maxAttempts: number): Promise<boolean> {
  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      await deps.browser.clickNext();
      return true;
    } catch (error) {
      deps.logger.warn("walk_advance_failed", { page, attempt, error: errorMessage(error) });
    }
  }
  return false;
}

async function readTotalPages(deps: WalkDependencies, cursor: PageCursor): Promise<number | undefined> {
  try {
    const total = await deps.browser.readTotalPages();
    if (total !== undefined && cursor.totalPagesEstimate !== undefined && total !== cursor.totalPagesEstimate) {
      // Not reconciled: a grid that grows mid-walk ends through the stall path.
      deps.logger.warn("walk_total_pages_changed", {
        page: cursor.page,
        previous: cursor.totalPagesEstimate,
        current: total,
      });
    }
    return total ?? cursor.totalPagesEstimate;
  } catch (error) {
    deps.logger.debug("walk_total_pages_unreadable", { page: cursor.page, error: errorMessage(error) });
    return cursor.totalPagesEstimate;
  }
}

async function sessionFromBrowser(browser: GridBrowser): Promise<SessionContext> {
  return createSessionContext({
    pageUrl: browser.currentUrl(),
    userAgent: browser.userAgent(),
    cookies: await browser.getSessionCookies(),
    formFields: await browser.readFormFields(),
  });
}

/**
 * Opens the grid's first page only to establish a session, for downloads of
 * ids that an earlier walk already found.
 */
export async function captureSession(
  deps: WalkDependencies,
  options: Pick<WalkOptions, "startUrl" | "pageLoadTimeoutMs" | "rowSelector">,
): Promise<SessionContext> {
  await deps.browser.navigate(options.startUrl);
  try {
    await deps.browser.waitForElement(options.rowSelector, options.pageLoadTimeoutMs);
  } catch (error) {
    deps.logger.warn("session_grid_not_ready", { error: errorMessage(error) });
  }
  const session = await sessionFromBrowser(deps.browser);
  deps.logger.info("session_captured", { cookies: session.cookies.length, formFields: Object.keys(session.formFields).length });
  return session;
}

/**
 * Walks the grid page by page and returns every export id in discovery order,
 * together with the browser session as it stood when the walk ended.
 */
export async function discoverIds(deps: WalkDependencies, options: WalkOptions): Promise<WalkResult> {
  const { browser, logger, metrics } = deps;
  const maxAdvanceAttempts = Math.max(1, options.maxAdvanceAttempts ?? 2);
  const seen = new Set<TariffId>();
  const ids: TariffId[] = [];
  let cursor = startCursor(options.maxPages);
  let state: WalkState = { phase: "paging", page: cursor.page };
  let pagesVisited = 0;

  logger.info("walk_start", { url: options.startUrl, maxPages: options.maxPages });
  await browser.navigate(options.startUrl);

  while (!isTerminal(state)) {
    pagesVisited += 1;
    const stopTimer = metrics.startTimer("page_read_ms");
    cursor = { ...cursor, totalPagesEstimate: await readTotalPages(deps, cursor) };

    const rows = await readPage(deps, options, cursor.page);
    const newRows: GridRow[] = [];
    if (rows === undefined) {
      metrics.incrementCounter("pages_skipped", 1);
      logger.warn("walk_page_skipped", { page: cursor.page });
    } else {
      for (const row of rows) {
        if (seen.has(row.exportId)) {
          metrics.incrementCounter("ids_duplicate", 1);
          continue;
        }
        seen.add(row.exportId);
        ids.push(row.exportId);
        newRows.push(row);
      }
      metrics.incrementCounter("pages_walked", 1);
      metrics.incrementCounter("ids_discovered", newRows.length);
    }

    if (options.onPage && newRows.length > 0) {
      await options.onPage(cursor.page, newRows);
    }

    const observation: PageObservation = {
      fingerprint: rows === undefined ? undefined : fingerprintRows(rows.map((row) => row.exportId)),
      nextEnabled: await isNextEnabled(deps, cursor.page),
    };
    const durationMs = stopTimer();
    logger.info("walk_page_complete", {
      page: cursor.page,
      totalPages: cursor.totalPagesEstimate,
      rows: rows?.length ?? 0,
      newIds: newRows.length,
      collected: ids.length,
      durationMs,
    });

    state = nextWalkState(cursor, observation);
    if (isTerminal(state)) {
      break;
    }

    if (options.shouldStop?.()) {
      logger.warn("walk_stop_requested", { page: cursor.page });
      state = stallAt(cursor, "stop_requested");
      break;
    }

    if (!(await clickNext(deps, cursor.page, maxAdvanceAttempts))) {
      state = stallAt(cursor, "advance_failed");
      break;
    }
    cursor = moveCursor(cursor, state, observation);
  }

  if (state.phase === "safety_bound_hit") {
    logger.warn("walk_safety_bound_hit", { maxPages: options.maxPages, collected: ids.length });
  }

  const session = await sessionFromBrowser(browser);

  logger.info("walk_finished", {
    outcome: state.phase,
    reason: state.phase === "stalled" ? state.reason : undefined,
    pagesVisited,
    collected: ids.length,
  });
  return { ids, session, pagesVisited, state };
}
