/**
 * Request and response type definitions
 */

import type { APIError } from "../core/errors/APIError.js";

export enum HTTPMethod {
  GET = "GET",
  POST = "POST",
  PUT = "PUT",
  DELETE = "DELETE",
  PATCH = "PATCH",
}

export type MediaData = Buffer | Uint8Array | string;

/**
 * One file part of a multipart upload
 */
export interface MediaPart {
  data: MediaData;
  fieldName: string;
  fileName: string;
  mimeType: string;
}

export interface RequestDescriptor {
  url: string;
  method: HTTPMethod;
  headers?: Record<string, string>;
  parameters?: Record<string, unknown>;
  /** When present the request is sent as multipart/form-data */
  media?: MediaPart[];
}

/**
 * Input for sendRequest; method defaults to GET
 */
export interface SendRequestInput {
  url: string;
  method?: HTTPMethod;
  headers?: Record<string, string>;
  parameters?: Record<string, unknown>;
}

/**
 * A file handed to uploadMedia. The declared file name and MIME type are
 * shared by every file of the upload.
 */
export interface MediaUpload {
  data: MediaData;
  fieldName: string;
}

export interface UploadMediaInput {
  url: string;
  files: MediaUpload[];
  fileName: string;
  mimeType: string;
  headers?: Record<string, string>;
  parameters?: Record<string, unknown>;
}

export type RawMapping = Record<string, unknown>;

/**
 * Outcome of a single request: exactly one of typed, raw or error
 */
export type ResponseOutcome<T> =
  | { kind: "typed"; value: T }
  | { kind: "raw"; value: RawMapping }
  | { kind: "error"; error: APIError };
