/**
 * Maps HTTP statuses and transport exceptions onto APIError
 */

import axios from "axios";
import { APIError } from "./APIError.js";

/**
 * Error for a non-success status, or undefined when the status is 2xx
 * and the body should be decoded.
 */
export function errorForStatus(statusCode: number): APIError | undefined {
  if (statusCode >= 200 && statusCode <= 299) {
    return undefined;
  }

  switch (statusCode) {
    case 401:
      return APIError.unauthorized();
    case 403:
      return APIError.forbidden();
    case 404:
      return APIError.notFound();
  }

  if (statusCode >= 500 && statusCode <= 599) {
    return APIError.serverError(statusCode);
  }
  return APIError.unknownStatusCode(statusCode);
}

function errorName(error: unknown): string | undefined {
  if (error && typeof error === "object" && "name" in error) {
    const { name } = error;
    return typeof name === "string" ? name : undefined;
  }
  return undefined;
}

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

function isTimeout(error: unknown): boolean {
  const code = errorCode(error);
  if (code === "ETIMEDOUT") {
    return true;
  }
  // axios reports both timeouts and aborted sockets as ECONNABORTED
  if (code === "ECONNABORTED" && error instanceof Error) {
    return /timeout/i.test(error.message);
  }
  return errorName(error) === "TimeoutError";
}

/**
 * Classify an exception thrown while waiting for a response
 */
export function normalizeError(error: unknown): APIError {
  if (error instanceof APIError) {
    return error;
  }

  if (axios.isCancel(error) || errorName(error) === "AbortError") {
    return APIError.cancelled();
  }

  if (isTimeout(error)) {
    return APIError.timeout();
  }

  return APIError.requestFailed(error);
}
