// ---------------------------------------------------------------------------
// Chapa SDK – Main Client
// ---------------------------------------------------------------------------
// The primary entry point for SDK consumers: `chapa.transactions.verify(…)`.
// Resources are lazy properties sharing one transport and one logger.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import { ChapaConfigBuilder } from "./config";
import { HttpClient } from "./http";
import { createLogger } from "./logger";
import { BanksResource } from "./resources/banks";
import { ChargesResource } from "./resources/charges";
import { TransactionsResource } from "./resources/transactions";
import { TransfersResource } from "./resources/transfers";
import type { ChapaClientOptions, ChapaConfig } from "./types";

/**
 * The Chapa API client.
 *
 * @example
 * ```ts
 * import { Chapa, generateTxRef } from 'chapa-sdk';
 *
 * const chapa = new Chapa(process.env.CHAPA_SECRET_KEY ?? '');
 *
 * const init = await chapa.transactions.initialize({
 *   amount: '100',
 *   currency: 'ETB',
 *   email: 'buyer@example.com',
 *   txRef: generateTxRef(),
 * });
 *
 * console.log(init.data?.checkout_url);
 * ```
 *
 * @example
 * ```ts
 * // Configured from the environment, with a custom timeout
 * const chapa = new Chapa(
 *   ChapaConfigBuilder.fromEnv().timeout(10_000).build(),
 * );
 * ```
 */
export class Chapa {
  /** Internal HTTP transport – shared across all resources. */
  private readonly http: HttpClient;
  readonly config: ChapaConfig;
  readonly logger: Logger;

  // ── Resource instances (lazy-initialised) ────────────────────────────────
  private _banks?: BanksResource;
  private _transactions?: TransactionsResource;
  private _transfers?: TransfersResource;
  private _charges?: ChargesResource;

  /**
   * @param config - A built configuration, or a secret key to use with the
   *                 defaults.
   * @throws {ChapaMissingApiKeyError} when given a blank or placeholder key.
   */
  constructor(config: ChapaConfig | string, options: ChapaClientOptions = {}) {
    this.config =
      typeof config === "string"
        ? new ChapaConfigBuilder().apiKey(config).build()
        : config;
    this.logger = options.logger ?? createLogger(this.config.logLevel);
    this.http = new HttpClient(this.config, {
      fetch: options.fetch,
      logger: this.logger,
    });
    this.logger.debug({ config: { ...this.config } }, "client created");
  }

  // ── Resource accessors ───────────────────────────────────────────────────

  /** Banks, balances and currency swaps. */
  get banks(): BanksResource {
    if (!this._banks) {
      this._banks = new BanksResource(this.http);
    }
    return this._banks;
  }

  /** Checkout initialisation, verification and history. */
  get transactions(): TransactionsResource {
    if (!this._transactions) {
      this._transactions = new TransactionsResource(this.http);
    }
    return this._transactions;
  }

  /** Single and bulk payouts. */
  get transfers(): TransfersResource {
    if (!this._transfers) {
      this._transfers = new TransfersResource(this.http);
    }
    return this._transfers;
  }

  /** Direct mobile-money charges. */
  get charges(): ChargesResource {
    if (!this._charges) {
      this._charges = new ChargesResource(this.http);
    }
    return this._charges;
  }
}
