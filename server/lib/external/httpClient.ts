import { type MetricName, recordMetric } from "./metrics";
import { type RetryOptions, withRetry } from "./retry";
import { type ExternalProvider, generateRequestId } from "./types";

type FetchLike = typeof fetch;

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Produces the headers that authenticate a single attempt. Called once per attempt so
 * nonces and timestamps are never reused across retries.
 */
export type RequestAuthorizer = (request: {
  method: HttpMethod;
  url: string;
}) => Promise<Record<string, string>>;

export type RequestOptions = {
  url: string;
  method?: HttpMethod;
  query?: QueryParams;
  headers?: Record<string, string>;
  body?: unknown;
  correlationId?: string;
};

export type RequestResult<T> = {
  data: T;
  status: number;
  headers: Headers;
  correlationId: string;
  attempts: number;
};

export type ExternalHttpClientOptions = {
  defaultHeaders?: Record<string, string>;
  authorize?: RequestAuthorizer;
  timeoutMs?: number;
  retry?: RetryOptions;
  fetchImpl?: FetchLike;
};

export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly body: unknown,
    readonly headers: Headers,
    readonly url: string,
  ) {
    super(`External request failed with status ${status}`);
    this.name = "HttpStatusError";
  }
}

export class RequestTimeoutError extends Error {
  constructor(
    readonly url: string,
    readonly timeoutMs: number,
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

export class NetworkError extends Error {
  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "NetworkError";
  }
}

export const isTransientError = (error: unknown): boolean =>
  error instanceof RequestTimeoutError || error instanceof NetworkError;

const REQUEST_METRIC = {
  bricklink: "external.bricklink.request",
} as const satisfies Record<ExternalProvider, MetricName>;

const DEFAULT_TIMEOUT_MS = 30_000;

const DEFAULT_RETRY: RetryOptions = {
  attempts: 3,
  initialDelayMs: 2_000,
  maxDelayMs: 10_000,
  backoffFactor: 2,
};

export function buildUrl(url: string, query?: QueryParams): URL {
  const target = new URL(url);
  Object.entries(query ?? {}).forEach(([key, value]) => {
    if (value === undefined) {
      return;
    }
    target.searchParams.append(key, String(value));
  });
  return target;
}

function serializeBody(body: unknown): string | undefined {
  if (body === undefined || body === null) {
    return undefined;
  }
  return typeof body === "string" ? body : JSON.stringify(body);
}

// AbortSignal.timeout rejects with a DOMException named "TimeoutError".
function isAbortTimeout(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export class ExternalHttpClient {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly retry: RetryOptions;
  private closed = false;

  constructor(
    private readonly provider: ExternalProvider,
    private readonly options: ExternalHttpClientOptions = {},
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = { ...DEFAULT_RETRY, ...(options.retry ?? {}) };
  }

  async request<T = unknown>(options: RequestOptions): Promise<RequestResult<T>> {
    const method = options.method ?? "GET";
    const correlationId = options.correlationId ?? generateRequestId();
    const url = buildUrl(options.url, options.query).toString();
    let attempts = 0;

    if (this.closed) {
      throw new NetworkError("Client has been closed", url);
    }

    const execute = async (): Promise<RequestResult<T>> => {
      attempts += 1;

      const headers = await this.buildHeaders(method, url, options, correlationId);
      const started = Date.now();
      let response: Response;
      let body: unknown;

      // The timeout signal also aborts a body that is still streaming.
      try {
        response = await this.fetchImpl(url, {
          method,
          headers,
          body: serializeBody(options.body),
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        body = await readBody(response);
      } catch (error) {
        const transportError = isAbortTimeout(error)
          ? new RequestTimeoutError(url, this.timeoutMs)
          : new NetworkError(
              error instanceof Error ? error.message : "Network request failed",
              url,
              { cause: error },
            );
        this.recordAttempt({ method, url, correlationId, attempts, started, error: transportError });
        throw transportError;
      }

      this.recordAttempt({ method, url, correlationId, attempts, started, status: response.status });

      if (!response.ok) {
        throw new HttpStatusError(response.status, body, response.headers, url);
      }

      return {
        data: body as T,
        status: response.status,
        headers: response.headers,
        correlationId,
        attempts,
      };
    };

    return withRetry(execute, {
      onRetry: ({ attempt, delayMs, error }) => {
        console.warn(`[${this.provider}] retrying request`, {
          method,
          operation: new URL(url).pathname,
          attempt,
          delayMs,
          error: error instanceof Error ? error.message : String(error),
        });
      },
      ...this.retry,
      shouldRetry: isTransientError,
    });
  }

  close(): void {
    this.closed = true;
  }

  private async buildHeaders(
    method: HttpMethod,
    url: string,
    options: RequestOptions,
    correlationId: string,
  ): Promise<Record<string, string>> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      ...(this.options.defaultHeaders ?? {}),
      ...(options.headers ?? {}),
      "X-Correlation-Id": correlationId,
    };

    if (options.body !== undefined && typeof options.body !== "string") {
      const hasContentType = Object.keys(headers).some((key) => key.toLowerCase() === "content-type");
      if (!hasContentType) {
        headers["Content-Type"] = "application/json";
      }
    }

    if (this.options.authorize) {
      Object.assign(headers, await this.options.authorize({ method, url }));
    }

    return headers;
  }

  private recordAttempt(attempt: {
    method: HttpMethod;
    url: string;
    correlationId: string;
    attempts: number;
    started: number;
    status?: number;
    error?: Error;
  }) {
    const { pathname } = new URL(attempt.url);
    recordMetric(REQUEST_METRIC[this.provider], {
      ok: attempt.status !== undefined && attempt.status < 400,
      status: attempt.status,
      method: attempt.method,
      operation: pathname,
      attempt: attempt.attempts,
      durationMs: Date.now() - attempt.started,
      correlationId: attempt.correlationId,
      errorType: attempt.error?.name,
    });
  }
}
