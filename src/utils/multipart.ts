/**
 * multipart/form-data body construction
 */

import { randomUUID } from "crypto";
import { MediaData, MediaPart } from "../types/api.types.js";

const CRLF = "\r\n";

export function createBoundary(): string {
  return `Boundary-${randomUUID()}`;
}

export function multipartContentType(boundary: string): string {
  return `multipart/form-data; boundary=${boundary}`;
}

/**
 * Text form of a scalar field. Strings go out verbatim, objects and arrays
 * as JSON.
 */
export function formatFieldValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value !== null && typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Percent-encode the characters that would end a quoted
 * Content-Disposition parameter: `"`, CR and LF (RFC 7578 §4.2)
 */
export function escapeDispositionValue(value: string): string {
  return value
    .replace(/"/g, "%22")
    .replace(/\r/g, "%0D")
    .replace(/\n/g, "%0A");
}

function mediaBytes(data: MediaData): Buffer {
  if (typeof data === "string") {
    return Buffer.from(data, "utf8");
  }
  if (Buffer.isBuffer(data)) {
    return data;
  }
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Build a multipart body: one part per parameter, then one part per file,
 * closed by the terminating boundary line.
 */
export function createMultipartBody(
  boundary: string,
  parts: MediaPart[],
  parameters?: Record<string, unknown>
): Buffer {
  const chunks: Buffer[] = [];
  const text = (value: string) => chunks.push(Buffer.from(value, "utf8"));

  for (const [name, value] of Object.entries(parameters ?? {})) {
    text(`--${boundary}${CRLF}`);
    const field = escapeDispositionValue(name);
    text(`Content-Disposition: form-data; name="${field}"${CRLF}${CRLF}`);
    text(`${formatFieldValue(value)}${CRLF}`);
  }

  for (const part of parts) {
    text(`--${boundary}${CRLF}`);
    const field = escapeDispositionValue(part.fieldName);
    const file = escapeDispositionValue(part.fileName);
    text(
      `Content-Disposition: form-data; name="${field}"; filename="${file}"${CRLF}`
    );
    text(`Content-Type: ${part.mimeType}${CRLF}${CRLF}`);
    chunks.push(mediaBytes(part.data));
    text(CRLF);
  }

  text(`--${boundary}--${CRLF}`);
  return Buffer.concat(chunks);
}
