import { CanceledError } from "axios";
import type {
  IHttpClient,
  HttpRequestConfig,
  HttpResponse,
} from "../../core/interfaces/IHttpClient.js";

type QueuedReply =
  | { type: "response"; status: number; body: Buffer; headers: Record<string, string> }
  | { type: "failure"; error: Error };

/**
 * In-memory IHttpClient for unit tests.
 * Enqueue replies in order; each request() call consumes one.
 */
export class InMemoryHttpClient implements IHttpClient {
  private readonly replies: QueuedReply[] = [];
  private readonly requests: HttpRequestConfig[] = [];

  enqueueJson(body: unknown, status = 200): void {
    this.enqueueText(JSON.stringify(body), status, {
      "content-type": "application/json",
    });
  }

  enqueueText(
    body: string,
    status = 200,
    headers: Record<string, string> = {}
  ): void {
    this.enqueueBytes(Buffer.from(body, "utf8"), status, headers);
  }

  enqueueBytes(
    body: Buffer,
    status = 200,
    headers: Record<string, string> = {}
  ): void {
    this.replies.push({ type: "response", status, body, headers });
  }

  enqueueStatus(status: number): void {
    this.enqueueBytes(Buffer.alloc(0), status);
  }

  enqueueNetworkError(message: string, code = "ECONNREFUSED"): void {
    const error: NodeJS.ErrnoException = new Error(message);
    error.code = code;
    this.replies.push({ type: "failure", error });
  }

  enqueueTimeout(): void {
    this.enqueueNetworkError("timeout of 1000ms exceeded", "ECONNABORTED");
  }

  enqueueCancellation(): void {
    this.replies.push({ type: "failure", error: new CanceledError() });
  }

  getRequests(): HttpRequestConfig[] {
    return [...this.requests];
  }

  get callCount(): number {
    return this.requests.length;
  }

  async request(config: HttpRequestConfig): Promise<HttpResponse> {
    this.requests.push(config);

    const reply = this.replies.shift();
    if (!reply) {
      throw new Error("InMemoryHttpClient: no more queued replies");
    }

    if (reply.type === "failure") {
      throw reply.error;
    }

    return {
      data: reply.body,
      status: reply.status,
      statusText: "",
      headers: reply.headers,
    };
  }
}
