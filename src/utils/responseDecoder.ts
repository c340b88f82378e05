/**
 * Body decoding with fallback from the caller's schema to a raw mapping
 */

import { z } from "zod";
import { APIError } from "../core/errors/APIError.js";
import { RawMapping, ResponseOutcome } from "../types/api.types.js";

/**
 * Target shape for typed decoding. Input is left open so that schemas with
 * transforms or coercion are accepted.
 */
export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export function isRawMapping(value: unknown): value is RawMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export type Decoded<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Strict UTF-8 decoding; malformed byte sequences are a failure, not U+FFFD
 */
export function decodeUtf8(bytes: Buffer): Decoded<string> {
  try {
    return {
      ok: true,
      value: new TextDecoder("utf-8", { fatal: true }).decode(bytes),
    };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Parse JSON text, or return the parse failure
 */
export function parseJson(text: string): Decoded<unknown> {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Decode a successful response body.
 *
 * Tries the caller's schema first, then falls back to a generic JSON object.
 * Anything else (invalid JSON, or valid JSON that is neither the target shape
 * nor an object) is a decodingFailed error.
 */
export function decodeBody<T>(
  body: Buffer,
  schema: ResponseSchema<T>
): ResponseOutcome<T> {
  if (body.length === 0) {
    return { kind: "error", error: APIError.noData() };
  }

  const text = decodeUtf8(body);
  if (!text.ok) {
    return { kind: "error", error: APIError.decodingFailed(text.error) };
  }

  const parsed = parseJson(text.value);
  if (!parsed.ok) {
    return { kind: "error", error: APIError.decodingFailed(parsed.error) };
  }

  const typed = schema.safeParse(parsed.value);
  if (typed.success) {
    return { kind: "typed", value: typed.data };
  }

  if (isRawMapping(parsed.value)) {
    return { kind: "raw", value: parsed.value };
  }

  return { kind: "error", error: APIError.decodingFailed(typed.error) };
}
