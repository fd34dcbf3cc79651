import { GridRow, SessionCookie } from "../types";

/** The slice of browser automation the walker needs. */
export interface GridBrowser {
  navigate(url: string): Promise<void>;
  waitForElement(selector: string, timeoutMs: number): Promise<void>;
  readRows(): Promise<GridRow[]>;
  isNextEnabled(): Promise<boolean>;
  clickNext(): Promise<void>;
  readTotalPages(): Promise<number | undefined>;
  readFormFields(): Promise<Record<string, string>>;
  getSessionCookies(): Promise<SessionCookie[]>;
  currentUrl(): string;
  userAgent(): string;
  close(): Promise<void>;
}
