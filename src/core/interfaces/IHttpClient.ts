/**
 * HTTP Client Interface
 * Abstraction over the transport performing a single network round trip
 */

import { HTTPMethod } from "../../types/api.types.js";

export interface HttpRequestConfig {
  url: string;
  method: HTTPMethod;
  headers: Record<string, string>;
  /** Serialized request body, sent as-is */
  body?: Buffer;
  timeout?: number;
}

export interface HttpResponse {
  /** Raw response bytes; empty when the server sent no body */
  data: Buffer;
  status: number;
  statusText: string;
  headers: Record<string, string>;
}

export interface IHttpClient {
  /**
   * Execute one HTTP round trip.
   *
   * Resolves for every status code the server answers with. Rejects only
   * when no response was received (network failure, timeout, cancellation).
   */
  request(config: HttpRequestConfig): Promise<HttpResponse>;
}
