// ---------------------------------------------------------------------------
// Chapa SDK – Type Definitions
// ---------------------------------------------------------------------------
// Request option shapes and envelope containers. Response data shapes are
// inferred from their decoders in `schemas.ts`.
// ---------------------------------------------------------------------------

import type { LevelWithSilent, Logger } from "pino";

// ── JSON ───────────────────────────────────────────────────────────────────
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ── Envelopes ──────────────────────────────────────────────────────────────
/** Status substituted when the API omits the `status` field. */
export const UNSPECIFIED_STATUS = "Unspecified";

/**
 * The success/failure wrapper every Chapa endpoint answers with.
 *
 * `data` is `null` whenever the API omitted it or sent `null`. Branch on
 * `data`, not on `status`: the API is not consistent about the two.
 */
export interface ChapaResponse<T> {
  /** A string, an object of validation messages, or any other JSON value. */
  readonly message: JsonValue;
  /** `"success"`, `"failed"`, or `"Unspecified"` when absent. */
  readonly status: string;
  readonly data: T | null;
}

/** Envelope of the paginated listing endpoints. */
export interface ChapaResponseWithMeta<T, M> extends ChapaResponse<T> {
  readonly meta: M | null;
}

// ── Transactions ───────────────────────────────────────────────────────────
/** Checkout page branding. */
export interface Customization {
  title?: string;
  description?: string;
  logo?: string;
}

export type SplitType = "percentage" | "flat";

/** A subaccount receiving part of a payment. */
export interface Subaccount {
  id: string;
  splitType?: SplitType;
  splitValue?: number;
}

/** Parameters for `transactions.initialize()`. */
export interface InitializeOptions {
  /** Amount to charge, e.g. `"100"`. */
  amount: string | number;
  /** ISO 4217 code, `"ETB"` or `"USD"`. */
  currency: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  phoneNumber?: string;
  /** Unique reference used later to verify the transaction. */
  txRef: string;
  /** Called by Chapa once the payment completes. */
  callbackUrl?: string;
  /** Where the customer lands after paying. */
  returnUrl?: string;
  customization?: Customization;
  meta?: JsonObject;
  subaccounts?: Subaccount[];
}

/** Pagination for the listing endpoints. */
export interface ListParams {
  /** 1-based page number. */
  page?: number;
}

// ── Banks & balances ───────────────────────────────────────────────────────
/**
 * Parameters for `banks.swap()`.
 *
 * The API enforces a minimum and maximum amount and swaps cannot be reversed;
 * neither rule is checked locally.
 */
export interface SwapOptions {
  amount: number;
  /** Currency to swap from, e.g. `"USD"`. */
  from: string;
  /** Currency to swap to, e.g. `"ETB"`. */
  to: string;
}

// ── Transfers ──────────────────────────────────────────────────────────────
export interface TransferOptions {
  accountName?: string;
  accountNumber: string;
  amount: string | number;
  currency?: string;
  /** Unique reference used later to verify the transfer. */
  reference?: string;
  /** Recipient bank id, as returned by `banks.list()`. */
  bankCode: number;
}

/** One recipient inside a bulk transfer. */
export interface BulkTransferEntry {
  accountName?: string;
  accountNumber: string;
  amount: string | number;
  reference?: string;
  bankCode: number;
}

export interface BulkTransferOptions {
  title: string;
  currency: string;
  bulkData: BulkTransferEntry[];
}

// ── Direct charges ─────────────────────────────────────────────────────────
/** Payment channels known at the time of writing. */
export const DIRECT_CHARGE_TYPES = [
  "telebirr",
  "mpesa",
  "amole",
  "cbebirr",
  "ebirr",
  "awashbirr",
] as const;

export type KnownDirectChargeType = (typeof DIRECT_CHARGE_TYPES)[number];

/**
 * Channel sent as the `type` query parameter. Any other channel name the API
 * adds later can be passed as a plain string.
 */
export type DirectChargeType = KnownDirectChargeType | (string & {});

export interface DirectChargeOptions {
  firstName?: string;
  lastName?: string;
  email?: string;
  /** Wallet phone number, e.g. `"0900123456"`. */
  mobile: string;
  currency: string;
  amount: string | number;
  txRef: string;
}

export interface VerifyDirectChargeOptions {
  /** `ref_id` returned when the charge was created. */
  reference: string;
  /** Encrypted client payload required by the channel. */
  client: string;
}

// ── Client Config ──────────────────────────────────────────────────────────
/** Log levels accepted by the configuration, `silent` included. */
export type LogLevel = LevelWithSilent;

/** Immutable client configuration produced by `ChapaConfigBuilder.build()`. */
export interface ChapaConfig {
  /** Secret key (`CHASECK-...`). **Never expose in client-side code.** */
  readonly apiKey: string;
  /** API origin without a trailing slash. @default "https://api.chapa.co" */
  readonly baseUrl: string;
  /** @default "v1" */
  readonly version: string;
  /** Sent with every request. Always holds a `Content-Type` entry. */
  readonly defaultHeaders: Readonly<Record<string, string>>;
  /** Per-request timeout in milliseconds. @default 30_000 */
  readonly timeout: number;
  /** @default "silent" */
  readonly logLevel: LogLevel;
}

/** Collaborators injected into a client instead of the defaults. */
export interface ChapaClientOptions {
  /** Transport; defaults to the global `fetch`. */
  fetch?: typeof fetch;
  /** Defaults to a logger built from `config.logLevel`. */
  logger?: Logger;
}
