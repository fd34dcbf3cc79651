import { DownloadErrorKind } from "../types";

export abstract class HarvestError extends Error {
  abstract readonly kind: DownloadErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type TransientErrorKind = "network" | "http_status" | "invalid_body";

/** Worth another attempt with the same session. */
export class TransientDownloadError extends HarvestError {
  readonly kind: TransientErrorKind;
  readonly statusCode?: number;

  constructor(kind: TransientErrorKind, message: string, statusCode?: number) {
    super(message);
    this.kind = kind;
    this.statusCode = statusCode;
  }
}

export class SessionExpiredError extends HarvestError {
  readonly kind = "session_expired" as const;
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.statusCode = statusCode;
  }
}

export class DestinationError extends HarvestError {
  readonly kind = "filesystem" as const;
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.path = path;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Errors that no retry with the same session and destination can fix. */
export function isFatalHarvestError(error: unknown): error is SessionExpiredError | DestinationError {
  return error instanceof SessionExpiredError || error instanceof DestinationError;
}
