import { Cookie, CookieJar } from "tough-cookie";
import { SessionContext, SessionCookie } from "../types";

export interface SessionContextInput {
  pageUrl: string;
  userAgent: string;
  cookies: SessionCookie[];
  formFields?: Record<string, string>;
  capturedAt?: Date;
}

/**
 * Freezes the browser's authenticated state so the download phase can
 * borrow it without being able to change it.
 */
export function createSessionContext(input: SessionContextInput): SessionContext {
  return Object.freeze({
    capturedAt: (input.capturedAt ?? new Date()).toISOString(),
    pageUrl: input.pageUrl,
    userAgent: input.userAgent,
    cookies: Object.freeze(input.cookies.map((cookie) => Object.freeze({ ...cookie }))),
    formFields: Object.freeze({ ...(input.formFields ?? {}) }),
  });
}

function toToughCookie(cookie: Readonly<SessionCookie>): Cookie {
  return new Cookie({
    key: cookie.name,
    value: cookie.value,
    domain: cookie.domain.replace(/^\./, ""),
    path: cookie.path || "/",
    expires: cookie.expires > 0 ? new Date(cookie.expires * 1000) : "Infinity",
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    hostOnly: !cookie.domain.startsWith("."),
  });
}

/** Cookie header the browser would have sent to `url`. */
export async function buildCookieHeader(session: SessionContext, url: string): Promise<string> {
  const jar = new CookieJar();
  for (const cookie of session.cookies) {
    // Cookies for other hosts or paths are dropped by the jar.
    await jar.setCookie(toToughCookie(cookie), url, { ignoreError: true });
  }
  return jar.getCookieString(url);
}

export interface ResponseSnapshot {
  status: number;
  headers: Record<string, string>;
  body: string;
}

const LOGIN_LOCATION = /(log[-_]?in|sign[-_]?in|logon|auth)/i;
const PASSWORD_INPUT = /<input[^>]+type\s*=\s*["']?password/i;

/** Returns why the server refused the session, or undefined when it did not. */
export function detectSessionRejection(response: ResponseSnapshot): string | undefined {
  if (response.status === 401 || response.status === 403) {
    return `HTTP ${response.status}`;
  }

  const location = response.headers["location"];
  if (response.status >= 300 && response.status < 400 && location && LOGIN_LOCATION.test(location)) {
    return `redirected to ${location}`;
  }

  const contentType = response.headers["content-type"] ?? "";
  if (contentType.includes("html") && PASSWORD_INPUT.test(response.body)) {
    return "login form returned instead of export";
  }

  return undefined;
}
