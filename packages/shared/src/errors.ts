// =============================================================================
// @rss-courier/shared — Error taxonomy
// =============================================================================
// One subclass per pipeline stage. Per-feed and per-entry errors are caught
// by the runner and logged; ConfigError is fatal at startup.
// =============================================================================

export type CourierErrorCode =
  | "FETCH_FAILED"
  | "PARSE_FAILED"
  | "STORAGE_FAILED"
  | "SUMMARIZE_FAILED"
  | "DELIVERY_FAILED"
  | "CONFIG_INVALID";

export class CourierError extends Error {
  readonly code: CourierErrorCode;

  constructor(code: CourierErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Network failure, timeout, or non-2xx response while fetching a feed. */
export class FetchError extends CourierError {
  readonly url: string;
  readonly status?: number;

  constructor(
    url: string,
    message: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super("FETCH_FAILED", message, options);
    this.url = url;
    this.status = options?.status;
  }
}

/** Response body is not a well-formed RSS/Atom document. */
export class ParseError extends CourierError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super("PARSE_FAILED", message, options);
    this.url = url;
  }
}

export class StorageError extends CourierError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("STORAGE_FAILED", message, options);
    this.path = path;
  }
}

/**
 * Completion API failure. `transient` errors (5xx, timeouts, dropped
 * connections) are eligible for one retry; everything else is permanent.
 */
export class SummarizeError extends CourierError {
  readonly transient: boolean;
  readonly status?: number;

  constructor(
    message: string,
    options: { transient: boolean; status?: number; cause?: unknown },
  ) {
    super("SUMMARIZE_FAILED", message, options);
    this.transient = options.transient;
    this.status = options.status;
  }
}

export type DeliveryFailureReason = "unauthenticated" | "recipient" | "transport";

export class DeliveryError extends CourierError {
  readonly reason: DeliveryFailureReason;

  constructor(
    reason: DeliveryFailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("DELIVERY_FAILED", message, options);
    this.reason = reason;
  }
}

/** Lists every missing or invalid setting found during validation. */
export class ConfigError extends CourierError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(
      "CONFIG_INVALID",
      `Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`,
    );
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
