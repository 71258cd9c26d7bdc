import {
  ExternalHttpClient,
  type ExternalHttpClientOptions,
  type QueryParams,
} from "../../lib/external/httpClient";
import type { RetryOptions } from "../../lib/external/retry";
import { OAuthSigner, type OAuthCredentials, type OAuthSignerOptions } from "../../lib/oauth";

const USER_AGENT = "brick-inventory/1.0";

export type SignedRequestClientOptions = OAuthSignerOptions & {
  timeoutMs?: number;
  retry?: RetryOptions;
  fetchImpl?: ExternalHttpClientOptions["fetchImpl"];
};

/**
 * OAuth 1.0a signed JSON client for the BrickLink API. Every attempt (retries included)
 * gets a fresh nonce and timestamp. Transient failures retry with backoff; HTTP error
 * statuses surface immediately as `HttpStatusError`.
 */
export class SignedRequestClient {
  private readonly signer: OAuthSigner;
  private readonly http: ExternalHttpClient;

  constructor(credentials: OAuthCredentials, options: SignedRequestClientOptions = {}) {
    // Throws MissingCredentialsError before any request can be made.
    this.signer = new OAuthSigner(credentials, {
      nonce: options.nonce,
      timestamp: options.timestamp,
    });
    this.http = new ExternalHttpClient("bricklink", {
      defaultHeaders: { "User-Agent": USER_AGENT },
      timeoutMs: options.timeoutMs,
      retry: options.retry,
      fetchImpl: options.fetchImpl,
      authorize: async ({ method, url }) => {
        const { header } = await this.signer.sign(method, url);
        return { Authorization: header };
      },
    });
  }

  async get(url: string, query?: QueryParams, headers?: Record<string, string>): Promise<unknown> {
    const result = await this.http.request({ url, method: "GET", query, headers });
    return result.data;
  }

  async post(url: string, body?: unknown, headers?: Record<string, string>): Promise<unknown> {
    const result = await this.http.request({ url, method: "POST", body, headers });
    return result.data;
  }

  async healthCheck(url: string): Promise<boolean> {
    try {
      await this.get(url);
      return true;
    } catch (error) {
      console.warn("[bricklink] health check failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  close(): void {
    this.http.close();
  }
}
