import { load } from "cheerio";
import type { CheerioAPI } from "cheerio";
import { GridSelectors } from "../config";
import { GridRow } from "../types";

export type RowSelectors = Pick<GridSelectors, "rowSelector" | "exportIdAttribute" | "exportLinkSelector">;

const ID_IN_SCRIPT = /(?:tariff_?id|tid)\s*[=:]\s*['"]?([A-Za-z0-9_.-]+)/i;
const FIRST_CALL_ARG = /\(\s*['"]?([A-Za-z0-9_.-]+)['"]?\s*[,)]/;

function sanitizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function idFromScript(script: string | undefined): string | undefined {
  if (!script) {
    return undefined;
  }
  const named = script.match(ID_IN_SCRIPT);
  if (named) {
    return named[1];
  }
  const positional = script.match(FIRST_CALL_ARG);
  return positional ? positional[1] : undefined;
}

function readHeaders($: CheerioAPI, selectors: RowSelectors): string[] {
  const firstRow = $(selectors.rowSelector).first();
  return firstRow
    .closest("table")
    .find("thead th")
    .toArray()
    .map((cell, index) => sanitizeText($(cell).text()) || `col${index}`);
}

/** Reads every grid row that exposes an export id, in document order. */
export function extractGridRows(html: string, selectors: RowSelectors): GridRow[] {
  const $ = load(html);
  const headers = readHeaders($, selectors);
  const rows: GridRow[] = [];

  $(selectors.rowSelector).each((_, element) => {
    const row = $(element);
    const link = row.find(selectors.exportLinkSelector).first();
    const exportId =
      row.attr(selectors.exportIdAttribute) ??
      link.attr(selectors.exportIdAttribute) ??
      idFromScript(link.attr("onclick")) ??
      idFromScript(link.attr("href"));

    if (!exportId || exportId.trim().length === 0) {
      return;
    }

    const displayFields: Record<string, string> = {};
    row.children("td").each((index, cell) => {
      const key = headers[index] ?? `col${index}`;
      displayFields[key] = sanitizeText($(cell).text());
    });

    rows.push({ exportId: exportId.trim(), displayFields });
  });

  return rows;
}

/** Highest numbered pager link, or undefined when the pager shows no numbers. */
export function extractTotalPages(html: string, pagerSelector: string): number | undefined {
  const $ = load(html);
  let highest: number | undefined;

  $(pagerSelector).each((_, element) => {
    const text = sanitizeText($(element).text());
    if (!/^\d+$/.test(text)) {
      return;
    }
    const value = Number.parseInt(text, 10);
    highest = highest === undefined ? value : Math.max(highest, value);
  });

  return highest;
}

export function isNextControlEnabled(html: string, nextSelector: string): boolean {
  const $ = load(html);
  const control = $(nextSelector).first();
  if (control.length === 0) {
    return false;
  }

  const classes = (control.attr("class") ?? "").split(/\s+/);
  if (classes.includes("disabled") || classes.includes("aspNetDisabled")) {
    return false;
  }
  if (control.attr("disabled") !== undefined || control.attr("aria-disabled") === "true") {
    return false;
  }
  return !/^\s*return\s+false;?\s*$/i.test(control.attr("onclick") ?? "");
}

/** Hidden form state (ASP.NET view state and friends) that export postbacks must echo. */
export function extractFormFields(html: string, formFieldSelector: string): Record<string, string> {
  const $ = load(html);
  const fields: Record<string, string> = {};

  $(formFieldSelector).each((_, element) => {
    const name = $(element).attr("name");
    if (!name) {
      return;
    }
    fields[name] = $(element).attr("value") ?? "";
  });

  return fields;
}
