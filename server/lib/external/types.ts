import { randomHex } from "../webcrypto";

export type ExternalProvider = "bricklink";

export function generateRequestId(): string {
  if (typeof crypto.randomUUID === "function") {
    return crypto.randomUUID();
  }
  return `req-${Date.now()}-${randomHex(8)}`;
}

export interface ApiError {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: string;
    requestId: string;
  };
}

export type HealthCheckResult = {
  provider: ExternalProvider;
  ok: boolean;
  durationMs?: number;
  errorCode?: string;
};

export const toApiError = (
  code: string,
  message: string,
  details?: Record<string, unknown>,
): ApiError => ({
  error: {
    code,
    message,
    details,
    timestamp: new Date().toISOString(),
    requestId: generateRequestId(),
  },
});
