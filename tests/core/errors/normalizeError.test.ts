import { describe, it, expect } from "vitest";
import { AxiosError, CanceledError } from "axios";
import { APIError } from "../../../src/core/errors/APIError.js";
import {
  errorForStatus,
  normalizeError,
} from "../../../src/core/errors/normalizeError.js";

describe("errorForStatus", () => {
  it.each([200, 201, 204, 299])("returns nothing for %i", (status) => {
    expect(errorForStatus(status)).toBeUndefined();
  });

  it("maps 401, 403 and 404 to their dedicated errors", () => {
    expect(errorForStatus(401)?.kind).toBe("unauthorized");
    expect(errorForStatus(403)?.kind).toBe("forbidden");
    expect(errorForStatus(404)?.kind).toBe("notFound");
  });

  it.each([500, 502, 599])("maps %i to serverError", (status) => {
    const error = errorForStatus(status);
    expect(error?.kind).toBe("serverError");
    expect(error?.statusCode).toBe(status);
  });

  it.each([100, 302, 400, 418, 600])(
    "maps %i to unknownStatusCode",
    (status) => {
      const error = errorForStatus(status);
      expect(error?.kind).toBe("unknownStatusCode");
      expect(error?.statusCode).toBe(status);
    }
  );
});

describe("normalizeError", () => {
  it("passes APIError through unchanged", () => {
    const original = APIError.noInternet();
    expect(normalizeError(original)).toBe(original);
  });

  it("treats axios cancellation as cancelled", () => {
    expect(normalizeError(new CanceledError()).kind).toBe("cancelled");
  });

  it("treats AbortError as cancelled", () => {
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";
    expect(normalizeError(abort).kind).toBe("cancelled");
  });

  it("recognizes axios timeouts", () => {
    expect(
      normalizeError(new AxiosError("timeout of 50ms exceeded", "ECONNABORTED"))
        .kind
    ).toBe("timeout");
    expect(
      normalizeError(new AxiosError("timeout exceeded", "ETIMEDOUT")).kind
    ).toBe("timeout");
  });

  it("does not mistake an aborted socket for a timeout", () => {
    const error = normalizeError(
      new AxiosError("Request aborted", "ECONNABORTED")
    );
    expect(error.kind).toBe("requestFailed");
  });

  it("wraps anything else in requestFailed", () => {
    const cause = new Error("getaddrinfo ENOTFOUND api.example.com");
    const error = normalizeError(cause);

    expect(error.kind).toBe("requestFailed");
    expect(error.cause).toBe(cause);
    expect(error.message).toBe(
      "The request failed with error: getaddrinfo ENOTFOUND api.example.com"
    );
  });
});
