export type StallReason = "repeated_content" | "advance_failed" | "stop_requested";

export type WalkState =
  | { phase: "paging"; page: number }
  | { phase: "stalled"; page: number; reason: StallReason }
  | { phase: "exhausted"; page: number }
  | { phase: "safety_bound_hit"; page: number };

export type TerminalWalkState = Exclude<WalkState, { phase: "paging" }>;

export interface PageCursor {
  page: number;
  maxPages: number;
  totalPagesEstimate?: number;
  /** Fingerprint of the last page that was read successfully. */
  lastFingerprint?: string;
}

export interface PageObservation {
  /** Undefined when the page could not be read. */
  fingerprint?: string;
  nextEnabled: boolean;
}

export function startCursor(maxPages: number): PageCursor {
  return { page: 1, maxPages };
}

export function fingerprintRows(ids: readonly string[]): string {
  return ids.join("\u001f");
}

/**
 * Decides what follows the page the cursor points at. Repeated content wins
 * over everything else, then a missing next control, then the safety bound.
 */
export function nextWalkState(cursor: PageCursor, observation: PageObservation): WalkState {
  if (
    observation.fingerprint !== undefined &&
    cursor.lastFingerprint !== undefined &&
    observation.fingerprint === cursor.lastFingerprint
  ) {
    return { phase: "stalled", page: cursor.page, reason: "repeated_content" };
  }
  if (!observation.nextEnabled) {
    return { phase: "exhausted", page: cursor.page };
  }
  if (cursor.page >= cursor.maxPages) {
    return { phase: "safety_bound_hit", page: cursor.page };
  }
  return { phase: "paging", page: cursor.page + 1 };
}

export function stallAt(cursor: PageCursor, reason: Exclude<StallReason, "repeated_content">): TerminalWalkState {
  return { phase: "stalled", page: cursor.page, reason };
}

/** Moves the cursor onto the page `state` points at; the page number only grows. */
export function moveCursor(cursor: PageCursor, state: WalkState, observation: PageObservation): PageCursor {
  if (state.phase !== "paging" || state.page <= cursor.page) {
    throw new Error(`cursor cannot move from page ${cursor.page} to ${state.phase} page ${state.page}`);
  }
  return {
    ...cursor,
    page: state.page,
    lastFingerprint: observation.fingerprint ?? cursor.lastFingerprint,
  };
}

export function isTerminal(state: WalkState): state is TerminalWalkState {
  return state.phase !== "paging";
}
