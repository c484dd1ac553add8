// ---------------------------------------------------------------------------
// Chapa SDK – Public API Surface
// ---------------------------------------------------------------------------
// Everything re-exported here is part of the public contract.
// The transport (http.ts) is not exported.
// ---------------------------------------------------------------------------

// ── Main client ────────────────────────────────────────────────────────────
export { Chapa } from "./client";

// ── Configuration ──────────────────────────────────────────────────────────
export {
  ChapaConfigBuilder,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_VERSION,
  PLACEHOLDER_API_KEY,
} from "./config";
export { createLogger } from "./logger";

// ── Envelopes ──────────────────────────────────────────────────────────────
export {
  decodeEnvelope,
  decodeEnvelopeWithMeta,
  hasData,
  messageText,
} from "./envelope";
export type { DecodeContext } from "./envelope";

// ── Error classes ──────────────────────────────────────────────────────────
export {
  ChapaError,
  ChapaMissingApiKeyError,
  ChapaInvalidHeaderError,
  ChapaInvalidHttpMethodError,
  ChapaConnectionError,
  ChapaDeserializationError,
} from "./errors";
export type { ChapaErrorCode, ChapaErrorOptions } from "./errors";

// ── Resources ──────────────────────────────────────────────────────────────
export type { BanksResource } from "./resources/banks";
export type { TransactionsResource } from "./resources/transactions";
export type {
  TransfersResource,
  TransferListResponse,
} from "./resources/transfers";
export type {
  ChargesResource,
  VerifyDirectChargeResponse,
} from "./resources/charges";

// ── Types ──────────────────────────────────────────────────────────────────
export { DIRECT_CHARGE_TYPES, UNSPECIFIED_STATUS } from "./types";
export type {
  // JSON
  JsonValue,
  JsonObject,
  // Envelopes
  ChapaResponse,
  ChapaResponseWithMeta,
  // Config
  ChapaConfig,
  ChapaClientOptions,
  LogLevel,
  // Requests
  InitializeOptions,
  Customization,
  Subaccount,
  SplitType,
  ListParams,
  SwapOptions,
  TransferOptions,
  BulkTransferEntry,
  BulkTransferOptions,
  DirectChargeType,
  KnownDirectChargeType,
  DirectChargeOptions,
  VerifyDirectChargeOptions,
} from "./types";
export type {
  Bank,
  Balance,
  SwapResult,
  CheckoutUrl,
  TransactionDetail,
  TransactionSummary,
  TransactionList,
  Pagination,
  TransactionEvent,
  TransferDetail,
  BulkTransferBatch,
  TransferRecord,
  TransferMeta,
  DirectChargeResult,
} from "./schemas";

// ── Utilities ──────────────────────────────────────────────────────────────
export { generateTxRef } from "./utils/tx-ref";
export type { TxRefOptions } from "./utils/tx-ref";

// ── Version ────────────────────────────────────────────────────────────────
export { SDK_VERSION } from "./version";
