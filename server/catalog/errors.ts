export type ServiceErrorCode =
  | "API_ERROR"
  | "AUTHENTICATION_ERROR"
  | "NOT_FOUND"
  | "RATE_LIMITED"
  | "TIMEOUT"
  | "SET_NOT_FOUND"
  | "ITEM_NOT_FOUND";

export class InventoryServiceError extends Error {
  constructor(
    readonly code: ServiceErrorCode,
    message: string,
    readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Catalog (provider-origin) errors

export class CatalogError extends InventoryServiceError {}

export class CatalogApiError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super("API_ERROR", message, details, options);
  }
}

export class CatalogAuthError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super("AUTHENTICATION_ERROR", message, details, options);
  }
}

export class CatalogNotFoundError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super("NOT_FOUND", message, details, options);
  }
}

export class CatalogRateLimitError extends CatalogError {
  constructor(
    message: string,
    readonly retryAfterMs?: number,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super("RATE_LIMITED", message, { ...details, retryAfterMs }, options);
  }
}

export class CatalogTimeoutError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super("TIMEOUT", message, details, options);
  }
}

// Local (persistence-origin) errors

export class SetNotFoundError extends InventoryServiceError {
  constructor(readonly setNo: string) {
    super("SET_NOT_FOUND", `Set '${setNo}' not found`, { setNo });
  }
}

export class InventoryItemNotFoundError extends InventoryServiceError {
  constructor(partNo: string, colorId: number) {
    super("ITEM_NOT_FOUND", `No inventory item for part '${partNo}' in color ${colorId}`, {
      partNo,
      colorId,
    });
  }
}
