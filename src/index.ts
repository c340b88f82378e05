/**
 * Connectivity-aware HTTP client.
 *
 * @example
 * ```ts
 * import { z } from "zod";
 * import { createNetworkClient, HTTPMethod } from "reachable-api-client";
 *
 * const { client } = createNetworkClient();
 * const User = z.object({ id: z.number(), name: z.string() });
 *
 * const outcome = await client.sendRequest(
 *   { url: "https://api.example.com/users/1", method: HTTPMethod.GET },
 *   User
 * );
 *
 * switch (outcome.kind) {
 *   case "typed":
 *     console.log(outcome.value.name);
 *     break;
 *   case "raw":
 *     console.log(Object.keys(outcome.value));
 *     break;
 *   case "error":
 *     console.error(outcome.error.message);
 * }
 * ```
 */

export { APIClient, type APIClientOptions, type ConnectivityProbe } from "./services/APIClient.js";
export {
  NetworkReachability,
  DEFAULT_DEBOUNCE_MS,
  type NetworkReachabilityOptions,
} from "./services/NetworkReachability.js";
export {
  createNetworkClient,
  type NetworkClient,
  type NetworkClientOverrides,
} from "./createNetworkClient.js";
export { loadConfig, type NetworkConfig } from "./config/environment.js";

export { APIError, type APIErrorKind } from "./core/errors/APIError.js";
export { errorForStatus, normalizeError } from "./core/errors/normalizeError.js";
export type { IHttpClient, HttpRequestConfig, HttpResponse } from "./core/interfaces/IHttpClient.js";
export type { IPathObserver, PathUpdateHandler } from "./core/interfaces/IPathObserver.js";
export { LogLevel, type ILogger } from "./core/interfaces/ILogger.js";

export { AxiosHttpClient, type AxiosHttpClientOptions } from "./infrastructure/http/AxiosHttpClient.js";
export { InMemoryHttpClient } from "./infrastructure/http/InMemoryHttpClient.js";
export { ConsoleLogger } from "./infrastructure/logging/ConsoleLogger.js";
export { LoggerFactory } from "./infrastructure/logging/LoggerFactory.js";
export {
  InterfacePathObserver,
  classifyInterface,
  type InterfacePathObserverOptions,
} from "./infrastructure/network/InterfacePathObserver.js";

export {
  HTTPMethod,
  type MediaData,
  type MediaPart,
  type MediaUpload,
  type RawMapping,
  type RequestDescriptor,
  type ResponseOutcome,
  type SendRequestInput,
  type UploadMediaInput,
} from "./types/api.types.js";
export {
  NetworkStatus,
  NetworkType,
  type ConnectivityListener,
  type ConnectivityState,
  type NetworkPath,
  type PathStatus,
} from "./types/network.types.js";

export { mimeTypeFor } from "./utils/mimeType.js";
export { createMultipartBody } from "./utils/multipart.js";
export { renderExchange, type DiagnosticSink } from "./utils/requestPrinter.js";
export { decodeBody, type ResponseSchema } from "./utils/responseDecoder.js";
