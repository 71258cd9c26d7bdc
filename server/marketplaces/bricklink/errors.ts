// BrickLink error normalization: transport failures → catalog error taxonomy.
import {
  CatalogApiError,
  CatalogAuthError,
  CatalogError,
  CatalogNotFoundError,
  CatalogRateLimitError,
  CatalogTimeoutError,
} from "../../catalog/errors";
import {
  HttpStatusError,
  NetworkError,
  RequestTimeoutError,
} from "../../lib/external/httpClient";

export function parseRetryAfter(header: string | null | undefined): number | undefined {
  if (!header) {
    return undefined;
  }

  const seconds = Number(header);
  if (!Number.isNaN(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(header);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - Date.now());
  }

  return undefined;
}

function describeBody(body: unknown): string | undefined {
  if (!body || typeof body !== "object" || !("meta" in body)) {
    return undefined;
  }
  const meta = body.meta;
  if (!meta || typeof meta !== "object") {
    return undefined;
  }
  const description = "description" in meta ? meta.description : undefined;
  const message = "message" in meta ? meta.message : undefined;
  const text = [message, description].filter((part) => typeof part === "string" && part);
  return text.length > 0 ? text.join(": ") : undefined;
}

/**
 * Buckets an HTTP status (or BrickLink's `meta.code`, which mirrors it) into the
 * catalog error classes.
 */
export function catalogErrorForStatus(
  status: number,
  reason: string,
  details: Record<string, unknown> = {},
  options?: { cause?: unknown; retryAfterMs?: number },
): CatalogError {
  const context = { ...details, httpStatus: status };

  if (status === 401 || status === 403) {
    return new CatalogAuthError(`BrickLink authentication failed: ${reason}`, context, options);
  }
  if (status === 404) {
    return new CatalogNotFoundError(`Not found in BrickLink catalog: ${reason}`, context, options);
  }
  if (status === 429) {
    return new CatalogRateLimitError(
      `BrickLink rate limit exceeded: ${reason}`,
      options?.retryAfterMs,
      context,
      options,
    );
  }
  return new CatalogApiError(`BrickLink API error (status ${status}): ${reason}`, context, options);
}

/**
 * Pure mapping from whatever the transport threw to a catalog error. The operation being
 * performed has no influence on the result.
 */
export function toCatalogError(error: unknown): CatalogError {
  if (error instanceof CatalogError) {
    return error;
  }

  if (error instanceof HttpStatusError) {
    const reason = describeBody(error.body) ?? error.message;
    return catalogErrorForStatus(
      error.status,
      reason,
      { url: error.url },
      { cause: error, retryAfterMs: parseRetryAfter(error.headers.get("Retry-After")) },
    );
  }

  if (error instanceof RequestTimeoutError) {
    return new CatalogTimeoutError(
      `BrickLink request timed out: ${error.message}`,
      { url: error.url, timeoutMs: error.timeoutMs },
      { cause: error },
    );
  }

  if (error instanceof NetworkError) {
    return new CatalogApiError(
      `Failed to connect to BrickLink: ${error.message}`,
      { url: error.url },
      { cause: error },
    );
  }

  const message =
    error instanceof Error ? error.message : typeof error === "string" ? error : "Unexpected error";
  return new CatalogApiError(`BrickLink API error: ${message}`, {}, { cause: error });
}
