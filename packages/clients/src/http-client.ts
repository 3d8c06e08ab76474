/**
 * @potkeeper/clients: HTTP Client.
 *
 * Wraps native fetch() with:
 * - Bearer token injection
 * - Request ID generation
 * - Timeout handling
 * - Retry logic (exponential backoff for 5xx and network errors)
 * - Error normalization
 *
 * Response bodies come back as `unknown`; each API client validates the
 * shape it expects.
 */

import { retryTransient, sleep } from "@potkeeper/mover";
import type { SleepFn } from "@potkeeper/mover";
import type { Logger } from "pino";
import { ApiError } from "./types.js";
import type { FetchFn, HttpClientConfig, HttpResponse, RequestOptions } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

function generateRequestId(): string {
  return `pk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Parse a response body as JSON, handling empty responses.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return { raw: text };
  }
}

function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  for (const name of ["content-type", "x-request-id", "retry-after"]) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }
  return result;
}

function classifyStatus(status: number): ApiError["code"] {
  if (status === 401 || status === 403) return "UNAUTHORIZED";
  if (status === 429) return "RATE_LIMITED";
  if (status >= 500) return "SERVER_ERROR";
  return "CLIENT_ERROR";
}

function isTransient(err: unknown): boolean {
  return (
    err instanceof ApiError &&
    (err.code === "SERVER_ERROR" || err.code === "TIMEOUT" || err.code === "NETWORK_ERROR")
  );
}

// =============================================================================
// HTTP Client
// =============================================================================

export class HttpClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly fetchFn: FetchFn;
  private readonly sleepFn: SleepFn;
  private readonly logger: Logger | undefined;

  constructor(config: HttpClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 0;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
    this.sleepFn = config.sleepFn ?? sleep;
    this.logger = config.logger;
  }

  get(path: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.request("GET", path, options);
  }

  post(path: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.request("POST", path, options);
  }

  put(path: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.request("PUT", path, options);
  }

  /**
   * Send a request, retrying transient failures up to the configured
   * number of retries.
   *
   * @throws ApiError for every non-2xx outcome
   */
  request(method: string, path: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const url = `${this.baseUrl}${path}`;
    const init = this.buildInit(method, options);

    return retryTransient(() => this.send(url, init), {
      config: {
        maxAttempts: this.maxRetries + 1,
        baseDelayMs: 1000,
        maxDelayMs: 10000,
        jitterMs: 0,
      },
      isTransient,
      sleepFn: this.sleepFn,
      onRetry: (err, retry) => {
        this.logger?.warn(
          { method, path, retry: retry + 1, error: err instanceof Error ? err.message : String(err) },
          "Transient HTTP failure",
        );
      },
    });
  }

  private buildInit(method: string, options: RequestOptions): RequestInit {
    const headers: Record<string, string> = {
      "Accept": "application/json",
      "X-Request-Id": generateRequestId(),
    };

    if (options.token !== undefined) {
      headers["Authorization"] = `Bearer ${options.token}`;
    }

    const init: RequestInit = { method, headers };

    if (options.form !== undefined) {
      headers["Content-Type"] = "application/x-www-form-urlencoded";
      init.body = new URLSearchParams(options.form).toString();
    } else if (options.json !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(options.json);
    }

    return init;
  }

  private async send(url: string, init: RequestInit): Promise<HttpResponse> {
    const { response, body } = await this.fetchWithTimeout(url, init);
    const headers = extractHeaders(response);

    if (response.ok) {
      return { body, status: response.status, headers };
    }

    throw new ApiError(
      classifyStatus(response.status),
      `HTTP ${response.status} from ${init.method ?? "GET"} ${url}`,
      response.status,
      body,
    );
  }

  /**
   * Fetch and read the body under one deadline. A body that stalls
   * after the headers arrive times out like a slow response.
   */
  private async fetchWithTimeout(
    url: string,
    init: RequestInit,
  ): Promise<{ response: Response; body: unknown }> {
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timeoutId = setTimeout(() => {
        controller.abort();
        reject(new ApiError("TIMEOUT", `Request timed out after ${this.timeout}ms`, 0));
      }, this.timeout);
    });

    const exchange = async (): Promise<{ response: Response; body: unknown }> => {
      const response = await this.fetchFn(url, { ...init, signal: controller.signal });
      return { response, body: await parseResponseBody(response) };
    };

    try {
      return await Promise.race([exchange(), deadline]);
    } catch (error) {
      if (error instanceof ApiError) {
        throw error;
      }
      if (error instanceof Error && error.name === "AbortError") {
        throw new ApiError("TIMEOUT", `Request timed out after ${this.timeout}ms`, 0);
      }
      throw new ApiError(
        "NETWORK_ERROR",
        error instanceof Error ? error.message : "Network error",
        0,
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
