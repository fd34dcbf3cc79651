import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, ExportFormLayout } from "../../src/config";
import { buildExportForm, buildExportHeaders, validateExportBody } from "../../src/download";
import { createSessionContext } from "../../src/session";
import { SESSION_COOKIE } from "../helpers/fakeGridBrowser";

const EXPORT_URL = "https://tariffs.example.com/TariffList.aspx";

const layout: ExportFormLayout = {
  ...DEFAULT_CONFIG.exportForm,
  statuses: ["Accepted", "Pending"],
};

const session = createSessionContext({
  pageUrl: `${EXPORT_URL}?page=3`,
  userAgent: "fake-agent/1.0",
  cookies: [SESSION_COOKIE],
  formFields: { __VIEWSTATE: "abc" },
});

describe("buildExportForm", () => {
  it("echoes the page state and ticks every status", () => {
    expect(buildExportForm("T-1", session, layout)).toBe(
      "__VIEWSTATE=abc&tariffId=T-1&status=Accepted&status=Pending&format=plaintext",
    );
  });

  it("url-encodes ids and lets the id field win over page state", () => {
    const withStaleId = createSessionContext({
      pageUrl: EXPORT_URL,
      userAgent: "ua",
      cookies: [],
      formFields: { tariffId: "stale" },
    });
    expect(buildExportForm("A B/1", withStaleId, { ...layout, statuses: ["Accepted"] })).toBe(
      "tariffId=A%20B%2F1&status=Accepted&format=plaintext",
    );
  });

  it("adds configured extra fields before the export fields", () => {
    expect(buildExportForm("T-2", session, { ...layout, statuses: [], extraFields: { __EVENTTARGET: "btnExport" } })).toBe(
      "__VIEWSTATE=abc&__EVENTTARGET=btnExport&tariffId=T-2&format=plaintext",
    );
  });
});

describe("buildExportHeaders", () => {
  it("replays the browser identity and cookies", async () => {
    expect(await buildExportHeaders(session, EXPORT_URL)).toEqual({
      "content-type": "application/x-www-form-urlencoded; charset=UTF-8",
      accept: "application/xml,text/xml;q=0.9,*/*;q=0.8",
      "user-agent": "fake-agent/1.0",
      referer: `${EXPORT_URL}?page=3`,
      origin: "https://tariffs.example.com",
      cookie: "ASP.NET_SessionId=test-session",
    });
  });

  it("omits the cookie header when no cookie applies", async () => {
    const bare = createSessionContext({ pageUrl: EXPORT_URL, userAgent: "ua", cookies: [] });
    expect(await buildExportHeaders(bare, EXPORT_URL)).not.toHaveProperty("cookie");
  });
});

describe("validateExportBody", () => {
  it("accepts an XML document, with or without a byte order mark", () => {
    expect(validateExportBody(Buffer.from(`<?xml version="1.0"?><tariff/>`), 8)).toBeUndefined();
    expect(validateExportBody(Buffer.from(`\uFEFF  <tariff id="1"/>`), 8)).toBeUndefined();
  });

  it.each([
    ["", 8, "empty body"],
    ["<t/>", 8, "body too small (4 bytes)"],
    ["<!DOCTYPE html><html><body>Error</body></html>", 8, "body is an HTML page"],
    ["<html><body>Server busy</body></html>", 8, "body is an HTML page"],
    ['{"error":"not found"}', 8, "body does not start with an XML document marker"],
  ])("rejects %j", (body, minBytes, reason) => {
    expect(validateExportBody(Buffer.from(body), minBytes)).toBe(reason);
  });
});
