// ---------------------------------------------------------------------------
// Chapa SDK – HTTP Transport Layer
// ---------------------------------------------------------------------------
// A thin HTTP client built on the `fetch()` API.
// Handles:
//   - Bearer token authentication
//   - Header and method validation before anything is sent
//   - Timeouts via AbortController
//   - Envelope decoding of every response, whatever its status code
//
// This module is internal. Consumers interact via the `Chapa` client class.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import type { DecodeContext } from "./envelope";
import {
  ChapaConnectionError,
  ChapaDeserializationError,
  ChapaInvalidHeaderError,
  ChapaInvalidHttpMethodError,
} from "./errors";
import type { ChapaConfig } from "./types";
import { SDK_VERSION } from "./version";

/** Methods the Chapa API is called with. */
export type HttpMethod = "GET" | "POST";

const HTTP_METHODS: ReadonlySet<string> = new Set<HttpMethod>(["GET", "POST"]);

/** RFC 7230 `token`. */
const HEADER_NAME_REGEX = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/** Visible ASCII, space, horizontal tab and obs-text. */
const HEADER_VALUE_REGEX = /^[\t\x20-\x7e\x80-\xff]*$/;

/** Options forwarded to an individual request. */
export interface RequestOptions<R> {
  /** Query parameters; `undefined` values are skipped. */
  query?: Record<string, string | number | undefined>;
  /** JSON body, serialised with `JSON.stringify`. */
  body?: unknown;
  /** Turns the parsed JSON body into the endpoint's envelope. */
  decode: (body: unknown, context: DecodeContext) => R;
}

function isHttpMethod(method: string): method is HttpMethod {
  return HTTP_METHODS.has(method);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Internal HTTP client used by every resource module.
 *
 * One instance per `Chapa` client; it holds no per-call state.
 */
export class HttpClient {
  private readonly transport: typeof fetch;
  private readonly logger: Logger;

  constructor(
    private readonly config: ChapaConfig,
    deps: { fetch?: typeof fetch; logger: Logger },
  ) {
    this.transport = deps.fetch ?? globalThis.fetch.bind(globalThis);
    this.logger = deps.logger;
  }

  // ── Public request method ────────────────────────────────────────────────

  /**
   * Execute a request and decode the body with `opts.decode`.
   *
   * @param path - Endpoint path relative to the versioned base, e.g. `"banks"`.
   * @throws  {ChapaInvalidHeaderError} a configured header cannot be sent.
   * @throws  {ChapaInvalidHttpMethodError} `method` is not GET or POST.
   * @throws  {ChapaConnectionError} on transport failure or timeout.
   * @throws  {ChapaDeserializationError} if the body does not decode.
   */
  async request<R>(
    method: string,
    path: string,
    opts: RequestOptions<R>,
  ): Promise<R> {
    const url = this.buildUrl(path, opts.query);
    this.validateHeaders();

    if (!isHttpMethod(method)) {
      throw new ChapaInvalidHttpMethodError(method);
    }

    const init: RequestInit = {
      method,
      headers: this.buildHeaders(),
    };
    if (opts.body !== undefined) {
      init.body = JSON.stringify(opts.body);
    }

    this.logger.debug({ method, url }, "dispatching request");

    const { statusCode, text } = await this.send(url, init);

    this.logger.debug({ method, url, statusCode }, "response received");

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      this.logger.warn({ url, statusCode }, "response body is not JSON");
      throw new ChapaDeserializationError(
        `Response body is not valid JSON: ${errorMessage(error)}`,
        { statusCode, raw: text, cause: error },
      );
    }

    try {
      return opts.decode(parsed, { statusCode, raw: text });
    } catch (error) {
      if (error instanceof ChapaDeserializationError) {
        this.logger.warn(
          { url, statusCode, issues: error.issues },
          "response does not match the expected envelope",
        );
      }
      throw error;
    }
  }

  // ── Private helpers ──────────────────────────────────────────────────────

  private async send(
    url: string,
    init: RequestInit,
  ): Promise<{ statusCode: number; text: string }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      const response = await this.transport(url, {
        ...init,
        signal: controller.signal,
      });
      const text = await response.text();
      return { statusCode: response.status, text };
    } catch (error) {
      const message = controller.signal.aborted
        ? `Request timed out after ${this.config.timeout}ms`
        : `Network error: ${errorMessage(error)}`;
      this.logger.error({ url, err: error }, message);
      throw new ChapaConnectionError(message, error);
    } finally {
      clearTimeout(timer);
    }
  }

  /** `{baseUrl}/{version}/{path}`, appended verbatim. */
  private buildUrl(
    path: string,
    query?: Record<string, string | number | undefined>,
  ): string {
    const url = `${this.config.baseUrl}/${this.config.version}/${path}`;
    if (!query) return url;

    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        params.set(key, String(value));
      }
    }

    const search = params.toString();
    return search ? `${url}?${search}` : url;
  }

  /** The error names the offending header, never its value. */
  private validateHeaders(): void {
    if (!HEADER_VALUE_REGEX.test(`Bearer ${this.config.apiKey}`)) {
      throw new ChapaInvalidHeaderError("invalid_header_value", "Authorization");
    }
    for (const [name, value] of Object.entries(this.config.defaultHeaders)) {
      if (!HEADER_NAME_REGEX.test(name)) {
        throw new ChapaInvalidHeaderError("invalid_header_name", name);
      }
      if (!HEADER_VALUE_REGEX.test(value)) {
        throw new ChapaInvalidHeaderError("invalid_header_value", name);
      }
    }
  }

  /** Authentication first; configured headers may override any of it. */
  private buildHeaders(): Headers {
    const headers = new Headers({
      Authorization: `Bearer ${this.config.apiKey}`,
      Accept: "application/json",
      "User-Agent": `chapa-sdk-node/${SDK_VERSION}`,
    });

    for (const [name, value] of Object.entries(this.config.defaultHeaders)) {
      headers.set(name, value);
    }

    return headers;
  }
}
