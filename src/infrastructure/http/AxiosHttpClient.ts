/**
 * Axios HTTP Client Implementation
 * Concrete implementation of IHttpClient using Axios
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from "axios";
import {
  IHttpClient,
  HttpRequestConfig,
  HttpResponse,
} from "../../core/interfaces/IHttpClient.js";
import { ILogger } from "../../core/interfaces/ILogger.js";
import { LoggerFactory } from "../logging/LoggerFactory.js";

export interface AxiosHttpClientOptions {
  /** Milliseconds before the transport gives up; 0 disables the timeout */
  timeout?: number;
  logger?: ILogger;
  /** Replaces the network adapter, e.g. with an in-process responder */
  adapter?: AxiosAdapter;
}

function toBuffer(data: unknown): Buffer {
  if (data === undefined || data === null) {
    return Buffer.alloc(0);
  }
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  if (typeof data === "string") {
    return Buffer.from(data, "utf8");
  }
  return Buffer.from(JSON.stringify(data), "utf8");
}

export class AxiosHttpClient implements IHttpClient {
  private axiosInstance: AxiosInstance;
  private logger: ILogger;

  constructor(options: AxiosHttpClientOptions = {}) {
    this.logger = options.logger || LoggerFactory.getLogger("AxiosHttpClient");
    this.axiosInstance = axios.create({
      timeout: options.timeout ?? 0,
      responseType: "arraybuffer",
      validateStatus: () => true, // Status policy belongs to the caller
      adapter: options.adapter,
    });

    this.axiosInstance.interceptors.request.use(
      (config) => {
        this.logger.debug(
          `HTTP Request: ${config.method?.toUpperCase()} ${config.url}`,
          { hasData: config.data !== undefined }
        );
        return config;
      },
      (error: unknown) => {
        this.logger.error(`HTTP Request Error`, error);
        return Promise.reject(error);
      }
    );

    this.axiosInstance.interceptors.response.use(
      (response) => {
        this.logger.debug(
          `HTTP Response: ${response.status} from ${response.config.url}`
        );
        return response;
      },
      (error: unknown) => {
        if (axios.isCancel(error)) {
          this.logger.warning(`HTTP Request Cancelled`);
        } else if (
          axios.isAxiosError(error) &&
          (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT")
        ) {
          this.logger.warning(`HTTP Request Timeout: ${error.config?.url}`);
        } else {
          this.logger.error(`HTTP Response Error`, error);
        }
        return Promise.reject(error);
      }
    );
  }

  /**
   * Convert Axios response to our HttpResponse interface
   */
  private mapResponse(axiosResponse: AxiosResponse<unknown>): HttpResponse {
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(axiosResponse.headers)) {
      if (typeof value === "string") {
        headers[name.toLowerCase()] = value;
      } else if (Array.isArray(value)) {
        headers[name.toLowerCase()] = value.join(", ");
      } else if (typeof value === "number" || typeof value === "boolean") {
        headers[name.toLowerCase()] = String(value);
      }
    }

    return {
      data: toBuffer(axiosResponse.data),
      status: axiosResponse.status,
      statusText: axiosResponse.statusText,
      headers,
    };
  }

  async request(config: HttpRequestConfig): Promise<HttpResponse> {
    const response = await this.axiosInstance.request<unknown>({
      url: config.url,
      method: config.method,
      headers: config.headers,
      data: config.body,
      timeout: config.timeout,
    });
    return this.mapResponse(response);
  }
}
