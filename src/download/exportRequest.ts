import qs from "qs";
import { ExportFormLayout } from "../config";
import { buildCookieHeader } from "../session";
import { SessionContext, TariffId } from "../types";

/**
 * Form body of the grid's "Export XML" postback: the page's hidden state,
 * every status filter ticked, plain-text XML, and the target id.
 */
export function buildExportForm(tariffId: TariffId, session: SessionContext, layout: ExportFormLayout): string {
  return qs.stringify(
    {
      ...session.formFields,
      ...layout.extraFields,
      [layout.idField]: tariffId,
      [layout.statusField]: layout.statuses,
      [layout.formatField]: layout.formatValue,
    },
    { arrayFormat: "repeat" },
  );
}

export async function buildExportHeaders(session: SessionContext, exportUrl: string): Promise<Record<string, string>> {
  const headers: Record<string, string> = {
    "content-type": "application/x-www-form-urlencoded; charset=UTF-8",
    accept: "application/xml,text/xml;q=0.9,*/*;q=0.8",
    "user-agent": session.userAgent,
    referer: session.pageUrl,
    origin: new URL(exportUrl).origin,
  };

  const cookie = await buildCookieHeader(session, exportUrl);
  if (cookie) {
    headers.cookie = cookie;
  }
  return headers;
}

const HTML_START = /^<(!doctype\s+html|html)\b/i;
const XML_START = /^<(\?xml|[A-Za-z_])/;

/** Returns why the body cannot be an export, or undefined when it looks like XML. */
export function validateExportBody(body: Buffer, minBytes: number): string | undefined {
  if (body.length === 0) {
    return "empty body";
  }
  if (body.length < minBytes) {
    return `body too small (${body.length} bytes)`;
  }

  const head = body.subarray(0, 512).toString("utf-8").replace(/^\uFEFF/, "").trimStart();
  if (HTML_START.test(head)) {
    return "body is an HTML page";
  }
  if (!XML_START.test(head)) {
    return "body does not start with an XML document marker";
  }
  return undefined;
}
