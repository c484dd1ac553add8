// ---------------------------------------------------------------------------
// Chapa SDK – Configuration
// ---------------------------------------------------------------------------
// Fluent builder for the immutable `ChapaConfig` value. Environment
// variables are read here (`fromEnv`) and nowhere else in the SDK.
// ---------------------------------------------------------------------------

import { ChapaMissingApiKeyError } from "./errors";
import type { ChapaConfig, LogLevel } from "./types";

/** Key used when neither the builder nor the environment supplied one. */
export const PLACEHOLDER_API_KEY = "placeholder_api_key";
export const DEFAULT_BASE_URL = "https://api.chapa.co";
export const DEFAULT_VERSION = "v1";
export const DEFAULT_TIMEOUT_MS = 30_000;

const LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

/**
 * Builds a {@link ChapaConfig}.
 *
 * @example
 * ```ts
 * const config = new ChapaConfigBuilder()
 *   .apiKey('CHASECK_TEST-...')
 *   .timeout(10_000)
 *   .addHeader('X-Client-ID', 'checkout-service')
 *   .build();
 * ```
 */
export class ChapaConfigBuilder {
  private key: string | undefined;
  private url = DEFAULT_BASE_URL;
  private apiVersion = DEFAULT_VERSION;
  private timeoutMs = DEFAULT_TIMEOUT_MS;
  private level: LogLevel = "silent";
  private readonly headers: Record<string, string> = {
    "Content-Type": "application/json",
  };

  /**
   * Builder seeded from `CHAPA_API_PUBLIC_KEY`, `CHAPA_BASE_URL`,
   * `CHAPA_VERSION` and `CHAPA_LOG_LEVEL`. A missing key leaves the
   * placeholder in place, so `build()` fails unless `apiKey()` is called.
   */
  static fromEnv(
    env: Readonly<Record<string, string | undefined>> = process.env,
  ): ChapaConfigBuilder {
    const builder = new ChapaConfigBuilder().apiKey(
      env["CHAPA_API_PUBLIC_KEY"] ?? PLACEHOLDER_API_KEY,
    );
    const baseUrl = env["CHAPA_BASE_URL"];
    if (baseUrl) builder.baseUrl(baseUrl);
    const version = env["CHAPA_VERSION"];
    if (version) builder.version(version);
    const level = env["CHAPA_LOG_LEVEL"];
    if (level && isLogLevel(level)) builder.logLevel(level);
    return builder;
  }

  /** API origin. Must not end with a slash: paths are appended verbatim. */
  baseUrl(url: string): this {
    this.url = url;
    return this;
  }

  version(version: string): this {
    this.apiVersion = version;
    return this;
  }

  apiKey(key: string): this {
    this.key = key;
    return this;
  }

  /**
   * Per-request timeout in milliseconds.
   *
   * @throws {RangeError} if `ms` is not a finite number above zero.
   */
  timeout(ms: number): this {
    if (!Number.isFinite(ms) || ms <= 0) {
      throw new RangeError(`timeout must be a positive number of milliseconds, got ${ms}`);
    }
    this.timeoutMs = ms;
    return this;
  }

  /** Adds or replaces a header sent with every request. */
  addHeader(key: string, value: string): this {
    this.headers[key] = value;
    return this;
  }

  logLevel(level: LogLevel): this {
    this.level = level;
    return this;
  }

  /**
   * Finalise the configuration.
   *
   * @throws {ChapaMissingApiKeyError} if no key was set, the key is blank,
   *         or it is still {@link PLACEHOLDER_API_KEY}.
   */
  build(): ChapaConfig {
    const key = this.key?.trim();
    if (!key || key === PLACEHOLDER_API_KEY) {
      throw new ChapaMissingApiKeyError();
    }

    return Object.freeze({
      apiKey: key,
      baseUrl: this.url,
      version: this.apiVersion,
      defaultHeaders: Object.freeze({ ...this.headers }),
      timeout: this.timeoutMs,
      logLevel: this.level,
    });
  }
}
