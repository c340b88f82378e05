/**
 * Closed taxonomy of failures surfaced by the API client
 */

export type APIErrorKind =
  | "invalidURL"
  | "requestFailed"
  | "noData"
  | "decodingFailed"
  | "unauthorized"
  | "forbidden"
  | "notFound"
  | "serverError"
  | "unknownStatusCode"
  | "timeout"
  | "noInternet"
  | "cancelled";

interface APIErrorDetails {
  statusCode?: number;
  cause?: unknown;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

export class APIError extends Error {
  readonly kind: APIErrorKind;
  /** Only set for serverError and unknownStatusCode */
  readonly statusCode?: number;

  private constructor(
    kind: APIErrorKind,
    message: string,
    details: APIErrorDetails = {}
  ) {
    super(
      message,
      details.cause === undefined ? undefined : { cause: details.cause }
    );
    this.name = "APIError";
    this.kind = kind;
    this.statusCode = details.statusCode;
  }

  static invalidURL(): APIError {
    return new APIError("invalidURL", "The URL provided was invalid.");
  }

  static requestFailed(cause: unknown): APIError {
    return new APIError(
      "requestFailed",
      `The request failed with error: ${describeCause(cause)}`,
      { cause }
    );
  }

  static noData(): APIError {
    return new APIError("noData", "No data was received from the server.");
  }

  static decodingFailed(cause: unknown): APIError {
    return new APIError(
      "decodingFailed",
      `Failed to decode response: ${describeCause(cause)}`,
      { cause }
    );
  }

  static unauthorized(): APIError {
    return new APIError(
      "unauthorized",
      "Unauthorized access. Please log in again."
    );
  }

  static forbidden(): APIError {
    return new APIError(
      "forbidden",
      "You do not have permission to access this resource."
    );
  }

  static notFound(): APIError {
    return new APIError("notFound", "The requested resource was not found.");
  }

  static serverError(statusCode: number): APIError {
    return new APIError(
      "serverError",
      `Server error with status code ${statusCode}.`,
      { statusCode }
    );
  }

  static unknownStatusCode(statusCode: number): APIError {
    return new APIError(
      "unknownStatusCode",
      `Received unknown HTTP status code: ${statusCode}.`,
      { statusCode }
    );
  }

  static timeout(): APIError {
    return new APIError("timeout", "The request timed out.");
  }

  static noInternet(): APIError {
    return new APIError("noInternet", "No internet connection.");
  }

  static cancelled(): APIError {
    return new APIError("cancelled", "The request was cancelled.");
  }
}
