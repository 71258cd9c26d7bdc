// OAuth 1.0a (HMAC-SHA1) request signing.
import { hmacSha1Base64, randomHex } from "./webcrypto";

const DEFAULT_NONCE_BYTES = 16;

export type OAuthCredentials = {
  consumerKey: string;
  consumerSecret: string;
  accessToken: string;
  tokenSecret: string;
};

export type OAuthMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type OAuthParameterMap = {
  oauth_consumer_key: string;
  oauth_nonce: string;
  oauth_signature_method: "HMAC-SHA1";
  oauth_timestamp: string;
  oauth_token: string;
  oauth_version: "1.0";
};

export type OAuthHeaderResult = {
  header: string;
  params: OAuthParameterMap;
  signature: string;
  baseString: string;
};

export type OAuthSignerOptions = {
  nonce?: () => string;
  timestamp?: () => number;
};

export class MissingCredentialsError extends Error {
  constructor(readonly missing: Array<keyof OAuthCredentials>) {
    super(`All OAuth credentials must be provided (missing: ${missing.join(", ")})`);
    this.name = "MissingCredentialsError";
  }
}

export function pctEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/**
 * RFC 5849 §3.4.1: parameters are encoded first, then sorted by key and value.
 */
export function normalizeParameters(params: Array<[string, string]>): string {
  return params
    .map(([key, value]) => [pctEncode(key), pctEncode(value)] as const)
    .sort(([ak, av], [bk, bv]) => {
      if (ak === bk) {
        return av < bv ? -1 : av > bv ? 1 : 0;
      }
      return ak < bk ? -1 : 1;
    })
    .map(([key, value]) => `${key}=${value}`)
    .join("&");
}

export function createSignatureBaseString(
  method: OAuthMethod,
  url: string,
  params: Array<[string, string]>,
): string {
  const parsed = new URL(url);
  const baseUrl = `${parsed.origin}${parsed.pathname}`;
  return [method, pctEncode(baseUrl), pctEncode(normalizeParameters(params))].join("&");
}

export function validateCredentials(credentials: OAuthCredentials): void {
  const keys: Array<keyof OAuthCredentials> = [
    "consumerKey",
    "consumerSecret",
    "accessToken",
    "tokenSecret",
  ];
  const missing = keys.filter((key) => !credentials[key] || !credentials[key].trim());
  if (missing.length > 0) {
    throw new MissingCredentialsError(missing);
  }
}

export class OAuthSigner {
  private readonly nonce: () => string;
  private readonly timestamp: () => number;

  constructor(
    private readonly credentials: OAuthCredentials,
    options: OAuthSignerOptions = {},
  ) {
    validateCredentials(credentials);
    this.nonce = options.nonce ?? (() => randomHex(DEFAULT_NONCE_BYTES));
    this.timestamp = options.timestamp ?? (() => Math.floor(Date.now() / 1000));
  }

  /**
   * Signs a request. Query parameters already on `url` are part of the base string;
   * JSON bodies are not (only form-encoded bodies would be).
   */
  async sign(method: OAuthMethod, url: string): Promise<OAuthHeaderResult> {
    const params: OAuthParameterMap = {
      oauth_consumer_key: this.credentials.consumerKey,
      oauth_nonce: this.nonce(),
      oauth_signature_method: "HMAC-SHA1",
      oauth_timestamp: this.timestamp().toString(),
      oauth_token: this.credentials.accessToken,
      oauth_version: "1.0",
    };

    const queryParams = Array.from(new URL(url).searchParams.entries());
    const baseString = createSignatureBaseString(method, url, [
      ...queryParams,
      ...Object.entries(params),
    ]);
    const signingKey = `${pctEncode(this.credentials.consumerSecret)}&${pctEncode(
      this.credentials.tokenSecret,
    )}`;
    const signature = await hmacSha1Base64(signingKey, baseString);

    const headerParams: Array<[string, string]> = [
      ...Object.entries(params),
      ["oauth_signature", signature],
    ];
    const header =
      "OAuth " +
      headerParams
        .sort(([a], [b]) => (a < b ? -1 : 1))
        .map(([key, value]) => `${pctEncode(key)}="${pctEncode(value)}"`)
        .join(", ");

    return { header, params, signature, baseString };
  }
}
