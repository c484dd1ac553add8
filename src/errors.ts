// ---------------------------------------------------------------------------
// Chapa SDK – Custom Error Classes
// ---------------------------------------------------------------------------
// Errors raised when a request could not produce a decoded envelope.
// A failure envelope from the API (`status: "failed"`, `data: null`) is a
// normal return value and never surfaces here.
// ---------------------------------------------------------------------------

import type { ZodIssue } from "zod";

/** Machine-readable error codes emitted by the SDK. */
export type ChapaErrorCode =
  | "missing_api_key" // key absent or still the placeholder
  | "invalid_header_name" // configured header name is not an HTTP token
  | "invalid_header_value" // configured header value has illegal characters
  | "invalid_http_method" // method tag outside GET / POST
  | "network_error" // fetch failed (DNS, TLS, reset, timeout)
  | "deserialization_error"; // body is not JSON or not the expected envelope

/** Extra context attached to a {@link ChapaError}. */
export interface ChapaErrorOptions {
  /** HTTP status of the response, 0 when none was received. */
  statusCode?: number;
  /** Raw response body or offending value, when available. */
  raw?: unknown;
  /** Underlying error. */
  cause?: unknown;
}

/**
 * Base error class for all Chapa SDK errors.
 *
 * @example
 * ```ts
 * try {
 *   await chapa.transactions.verify('tx-ref-1');
 * } catch (err) {
 *   if (err instanceof ChapaError) {
 *     switch (err.code) {
 *       case 'network_error':         // Transport failed, nothing decoded
 *       case 'deserialization_error': // Body did not match the envelope
 *     }
 *   }
 * }
 * ```
 */
export class ChapaError extends Error {
  /** HTTP status code returned by the API (0 when no response was received). */
  public readonly statusCode: number;
  /** Machine-readable error classification. */
  public readonly code: ChapaErrorCode;
  /** Raw payload related to the failure, when available. */
  public readonly raw?: unknown;

  constructor(
    message: string,
    code: ChapaErrorCode,
    options: ChapaErrorOptions = {},
  ) {
    super(
      message,
      options.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = new.target.name;
    this.statusCode = options.statusCode ?? 0;
    this.code = code;
    this.raw = options.raw;

    // Keep `instanceof` intact for every subclass across realm boundaries.
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /** Human-readable representation for logging/debugging. */
  override toString(): string {
    return `[${this.name}: ${this.code}] ${this.message} (HTTP ${this.statusCode})`;
  }

  /** Serialise to a plain object – useful for structured logging. */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      raw: this.raw,
    };
  }
}

/** Thrown by `ChapaConfigBuilder.build()` when no usable API key was given. */
export class ChapaMissingApiKeyError extends ChapaError {
  constructor() {
    super(
      "API Key is required but not set. Set CHAPA_API_PUBLIC_KEY or call apiKey() on the config builder.",
      "missing_api_key",
    );
  }
}

/** A configured header name or value cannot be sent over HTTP. */
export class ChapaInvalidHeaderError extends ChapaError {
  /** The header name involved. */
  public readonly header: string;

  constructor(
    code: "invalid_header_name" | "invalid_header_value",
    header: string,
  ) {
    super(
      code === "invalid_header_name"
        ? `Invalid header name: ${JSON.stringify(header)}`
        : `Invalid header value for ${JSON.stringify(header)}`,
      code,
    );
    this.header = header;
  }
}

export class ChapaInvalidHttpMethodError extends ChapaError {
  constructor(method: string) {
    super(`Invalid HTTP method: ${method}`, "invalid_http_method", {
      raw: method,
    });
  }
}

/** Transport-level failure: the request never produced a response body. */
export class ChapaConnectionError extends ChapaError {
  constructor(message: string, cause?: unknown) {
    super(message, "network_error", { cause });
  }
}

/**
 * The response body could not be decoded as the expected envelope, either
 * because it is not JSON or because a present field has an incompatible type.
 */
export class ChapaDeserializationError extends ChapaError {
  /** Schema violations reported by the decoder (empty for non-JSON bodies). */
  public readonly issues: readonly ZodIssue[];

  constructor(
    message: string,
    options: ChapaErrorOptions & { issues?: readonly ZodIssue[] } = {},
  ) {
    super(message, "deserialization_error", options);
    this.issues = options.issues ?? [];
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), issues: this.issues };
  }
}
