/**
 * Request executor.
 * Sends JSON and multipart requests through an IHttpClient and turns the
 * single response into a ResponseOutcome. Nothing is thrown to callers.
 */

import { APIError } from "../core/errors/APIError.js";
import { errorForStatus, normalizeError } from "../core/errors/normalizeError.js";
import {
  HttpRequestConfig,
  HttpResponse,
  IHttpClient,
} from "../core/interfaces/IHttpClient.js";
import { ILogger } from "../core/interfaces/ILogger.js";
import { AxiosHttpClient } from "../infrastructure/http/AxiosHttpClient.js";
import { LoggerFactory } from "../infrastructure/logging/LoggerFactory.js";
import {
  HTTPMethod,
  RequestDescriptor,
  ResponseOutcome,
  SendRequestInput,
  UploadMediaInput,
} from "../types/api.types.js";
import { NetworkType } from "../types/network.types.js";
import { mimeTypeFor } from "../utils/mimeType.js";
import {
  createBoundary,
  createMultipartBody,
  multipartContentType,
} from "../utils/multipart.js";
import { DiagnosticSink, renderExchange } from "../utils/requestPrinter.js";
import { decodeBody, ResponseSchema } from "../utils/responseDecoder.js";
import { NetworkReachability } from "./NetworkReachability.js";

/**
 * Read side of the connectivity monitor that the client depends on
 */
export interface ConnectivityProbe {
  isConnected(): boolean;
  currentTransportType(): NetworkType;
}

export interface APIClientOptions {
  httpClient?: IHttpClient;
  reachability?: ConnectivityProbe;
  logger?: ILogger;
  debugMode?: boolean;
  /** Where debug-mode dumps go; defaults to the client's logger */
  debugSink?: DiagnosticSink;
  /** Supplies multipart boundaries; defaults to a random UUID-based one */
  boundaryFactory?: () => string;
}

function isValidURL(url: string): boolean {
  try {
    const { protocol } = new URL(url);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Set a header, replacing any existing entry whose name differs only in case
 */
function setHeader(
  headers: Record<string, string>,
  name: string,
  value: string
): void {
  for (const existing of Object.keys(headers)) {
    if (existing.toLowerCase() === name.toLowerCase()) {
      delete headers[existing];
    }
  }
  headers[name] = value;
}

function applyHeaders(
  headers: Record<string, string>,
  extra: Record<string, string> | undefined
): void {
  for (const [name, value] of Object.entries(extra ?? {})) {
    setHeader(headers, name, value);
  }
}

export class APIClient {
  private httpClient: IHttpClient;
  private reachability: ConnectivityProbe;
  private logger: ILogger;
  private debugMode: boolean;
  private debugSink: DiagnosticSink;
  private boundaryFactory: () => string;

  constructor(options: APIClientOptions = {}) {
    this.httpClient = options.httpClient || new AxiosHttpClient();
    this.reachability = options.reachability || new NetworkReachability();
    this.logger = options.logger || LoggerFactory.getLogger("APIClient");
    this.debugMode = options.debugMode ?? false;
    this.debugSink =
      options.debugSink || ((dump: string) => this.logger.info(dump));
    this.boundaryFactory = options.boundaryFactory || createBoundary;
  }

  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
  }

  isDebugMode(): boolean {
    return this.debugMode;
  }

  isConnected(): boolean {
    return this.reachability.isConnected();
  }

  transportType(): NetworkType {
    return this.reachability.currentTransportType();
  }

  /**
   * Guess the MIME type for an upload from its file name
   */
  mimeType(fileName: string): string {
    return mimeTypeFor(fileName);
  }

  /**
   * Send a JSON request (GET, POST, PUT, PATCH, DELETE)
   *
   * @param schema - Target shape for typed decoding of a 2xx body
   */
  async sendRequest<T>(
    input: SendRequestInput,
    schema: ResponseSchema<T>
  ): Promise<ResponseOutcome<T>> {
    return this.send(
      {
        url: input.url,
        method: input.method ?? HTTPMethod.GET,
        headers: input.headers,
        parameters: input.parameters,
      },
      schema
    );
  }

  /**
   * POST files as multipart/form-data. Every file shares the declared
   * file name and MIME type; parameters become plain form fields.
   */
  async uploadMedia<T>(
    input: UploadMediaInput,
    schema: ResponseSchema<T>
  ): Promise<ResponseOutcome<T>> {
    return this.send(
      {
        url: input.url,
        method: HTTPMethod.POST,
        headers: input.headers,
        parameters: input.parameters,
        media: input.files.map((file) => ({
          data: file.data,
          fieldName: file.fieldName,
          fileName: input.fileName,
          mimeType: input.mimeType,
        })),
      },
      schema
    );
  }

  /**
   * Perform exactly one round trip for the descriptor
   */
  async send<T>(
    descriptor: RequestDescriptor,
    schema: ResponseSchema<T>
  ): Promise<ResponseOutcome<T>> {
    if (!this.reachability.isConnected()) {
      this.logger.warning(
        `Skipping ${descriptor.method} ${descriptor.url}: offline`
      );
      return { kind: "error", error: APIError.noInternet() };
    }

    if (!isValidURL(descriptor.url)) {
      this.logger.warning(`Invalid URL: "${descriptor.url}"`);
      return { kind: "error", error: APIError.invalidURL() };
    }

    let request: HttpRequestConfig;
    try {
      request = this.buildRequest(descriptor);
    } catch (error) {
      // JSON.stringify rejects cycles and BigInt values
      this.logger.error(
        `Could not encode request body for ${descriptor.url}`,
        error
      );
      return { kind: "error", error: APIError.requestFailed(error) };
    }

    let response: HttpResponse;
    try {
      response = await this.httpClient.request(request);
    } catch (error) {
      const apiError = normalizeError(error);
      if (apiError.kind === "requestFailed") {
        this.logger.error(`${request.method} ${request.url} failed`, error);
      } else {
        this.logger.warning(`${request.method} ${request.url}: ${apiError.message}`);
      }
      return { kind: "error", error: apiError };
    }

    if (this.debugMode) {
      this.printExchange(request, response);
    }

    const statusError = errorForStatus(response.status);
    if (statusError) {
      this.logger.warning(
        `${request.method} ${request.url} returned ${response.status}`
      );
      return { kind: "error", error: statusError };
    }

    const outcome = decodeBody(response.data, schema);
    if (outcome.kind === "raw") {
      this.logger.debug(
        `Response from ${request.url} did not match the target shape; returning raw mapping`
      );
    }
    return outcome;
  }

  /**
   * Debug output never affects the outcome; sink failures are only logged
   */
  private printExchange(request: HttpRequestConfig, response: HttpResponse): void {
    try {
      this.debugSink(renderExchange(request, response.status, response.data));
    } catch (error) {
      this.logger.error(`Debug sink failed for ${request.url}`, error);
    }
  }

  private buildRequest(descriptor: RequestDescriptor): HttpRequestConfig {
    const headers: Record<string, string> = {};

    if (descriptor.media) {
      const boundary = this.boundaryFactory();
      applyHeaders(headers, descriptor.headers);
      setHeader(headers, "Content-Type", multipartContentType(boundary));
      return {
        url: descriptor.url,
        method: descriptor.method,
        headers,
        body: createMultipartBody(
          boundary,
          descriptor.media,
          descriptor.parameters
        ),
      };
    }

    let body: Buffer | undefined;
    if (descriptor.parameters) {
      headers["Content-Type"] = "application/json";
      headers["Accept"] = "application/json";
      body = Buffer.from(JSON.stringify(descriptor.parameters), "utf8");
    }
    applyHeaders(headers, descriptor.headers);

    return { url: descriptor.url, method: descriptor.method, headers, body };
  }
}
