/**
 * Human-readable rendering of a request/response pair for debug mode
 */

import { HttpRequestConfig } from "../core/interfaces/IHttpClient.js";
import { decodeUtf8, parseJson } from "./responseDecoder.js";

export type DiagnosticSink = (dump: string) => void;

const NON_PRINTABLE = "(non-printable binary)";

/**
 * Pretty-printed JSON when the bytes hold JSON, otherwise the text itself.
 * `raw` reports whether the text was left as-is.
 */
export function renderPayload(
  bytes: Buffer
): { text: string; raw: boolean } | undefined {
  const text = decodeUtf8(bytes);
  if (!text.ok) {
    return undefined;
  }
  const parsed = parseJson(text.value);
  if (parsed.ok) {
    return { text: JSON.stringify(parsed.value, null, 2), raw: false };
  }
  return { text: text.value, raw: true };
}

function renderRequestBody(body: Buffer | undefined): string {
  if (!body || body.length === 0) {
    return "📝 Body: (none)";
  }
  const payload = renderPayload(body);
  if (!payload) {
    return `📝 Body: ${NON_PRINTABLE}`;
  }
  return payload.raw
    ? `📝 Body (raw):\n${payload.text}`
    : `📝 Body:\n${payload.text}`;
}

function renderResponseBody(body: Buffer): string {
  if (body.length === 0) {
    return "(empty)";
  }
  return renderPayload(body)?.text ?? NON_PRINTABLE;
}

export function renderExchange(
  request: HttpRequestConfig,
  status: number,
  responseBody: Buffer
): string {
  const lines = [
    "📤 REQUEST ↓",
    `🔸 Method: ${request.method}`,
    `🌐 URL: ${request.url}`,
    "📦 Headers:",
    ...Object.entries(request.headers).map(
      ([name, value]) => `   → ${name}: ${value}`
    ),
    renderRequestBody(request.body),
    `✅ Response (${status}):`,
    renderResponseBody(responseBody),
    "📤 END REQUEST ↑",
  ];
  return lines.join("\n");
}
