// ---------------------------------------------------------------------------
// Chapa SDK – Response Schemas
// ---------------------------------------------------------------------------
// zod decoders for the `data` and `meta` blocks of each endpoint. Unknown
// keys are stripped; timestamps stay ISO-8601 strings.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { jsonValueSchema } from "./envelope";

// ── Banks & balances ───────────────────────────────────────────────────────
export const bankSchema = z.object({
  id: z.number(),
  swift: z.string(),
  name: z.string(),
  acct_length: z.number(),
  country_id: z.number(),
  created_at: z.string(),
  updated_at: z.string(),
  /** 1 when the bank settles through RTGS. */
  is_rtgs: z.number().nullish(),
  /** 1 for mobile-money wallets. */
  is_mobilemoney: z.number().nullish(),
  currency: z.string(),
});
export type Bank = z.infer<typeof bankSchema>;

export const balanceSchema = z.object({
  currency: z.string(),
  available_balance: z.number(),
  ledger_balance: z.number(),
});
export type Balance = z.infer<typeof balanceSchema>;

export const swapResultSchema = z.object({
  status: z.string(),
  ref_id: z.string(),
  from_currency: z.string(),
  to_currency: z.string(),
  amount: z.number(),
  exchanged_amount: z.number(),
  charge: z.number(),
  rate: z.number(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type SwapResult = z.infer<typeof swapResultSchema>;

// ── Transactions ───────────────────────────────────────────────────────────
export const checkoutUrlSchema = z.object({
  checkout_url: z.string(),
});
export type CheckoutUrl = z.infer<typeof checkoutUrlSchema>;

const customizationSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  logo: z.string().nullish(),
});

export const transactionDetailSchema = z.object({
  first_name: z.string().nullish(),
  last_name: z.string().nullish(),
  email: z.string().nullish(),
  currency: z.string().nullish(),
  amount: z.number(),
  charge: z.number().nullish(),
  mode: z.string().nullish(),
  method: z.string().nullish(),
  type: z.string().nullish(),
  status: z.string().nullish(),
  reference: z.string().nullish(),
  tx_ref: z.string().nullish(),
  customization: customizationSchema.nullish(),
  meta: jsonValueSchema.optional(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type TransactionDetail = z.infer<typeof transactionDetailSchema>;

const transactionCustomerSchema = z.object({
  id: z.number(),
  email: z.string().nullable(),
  first_name: z.string().nullable(),
  last_name: z.string().nullable(),
  mobile: z.string().nullable(),
});

export const transactionSummarySchema = z.object({
  status: z.string(),
  ref_id: z.string(),
  /** e.g. `"Payment Link"`, `"API"`. */
  type: z.string(),
  created_at: z.string(),
  currency: z.string(),
  /** Decimal string, e.g. `"12.000"`. */
  amount: z.string(),
  charge: z.string(),
  trans_id: z.string().nullable(),
  payment_method: z.string(),
  customer: transactionCustomerSchema,
});
export type TransactionSummary = z.infer<typeof transactionSummarySchema>;

export const paginationSchema = z.object({
  per_page: z.number(),
  current_page: z.number(),
  first_page_url: z.string(),
  next_page_url: z.string().nullable(),
  prev_page_url: z.string().nullable(),
});
export type Pagination = z.infer<typeof paginationSchema>;

export const transactionListSchema = z.object({
  transactions: z.array(transactionSummarySchema),
  pagination: paginationSchema,
});
export type TransactionList = z.infer<typeof transactionListSchema>;

export const transactionEventSchema = z.object({
  item: z.number(),
  message: z.string(),
  type: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type TransactionEvent = z.infer<typeof transactionEventSchema>;

// ── Transfers ──────────────────────────────────────────────────────────────
/** Reference of a queued transfer. */
export const transferReferenceSchema = z.string();

export const transferDetailSchema = z.object({
  account_name: z.string().nullable(),
  account_number: z.string().nullable(),
  mobile: z.string().nullable(),
  currency: z.string(),
  amount: z.number(),
  charge: z.number(),
  mode: z.string(),
  transfer_method: z.string(),
  narration: z.string().nullable(),
  chapa_transfer_id: z.string(),
  bank_code: z.number(),
  bank_name: z.string(),
  cross_party_reference: z.string().nullable(),
  ip_address: z.string().nullable(),
  status: z.string(),
  tx_ref: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type TransferDetail = z.infer<typeof transferDetailSchema>;

export const bulkTransferBatchSchema = z.object({
  id: z.number(),
  created_at: z.string(),
});
export type BulkTransferBatch = z.infer<typeof bulkTransferBatchSchema>;

export const transferRecordSchema = z.object({
  account_name: z.string().nullable(),
  account_number: z.string().nullable(),
  currency: z.string(),
  amount: z.number(),
  charge: z.number(),
  transfer_type: z.string(),
  chapa_reference: z.string(),
  bank_code: z.number(),
  bank_name: z.string(),
  bank_reference: z.string().nullable(),
  status: z.string(),
  reference: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type TransferRecord = z.infer<typeof transferRecordSchema>;

export const transferMetaSchema = z.object({
  current_page: z.number(),
  first_page_url: z.string(),
  last_page: z.number(),
  last_page_url: z.string(),
  next_page_url: z.string().nullable(),
  path: z.string(),
  per_page: z.number(),
  prev_page_url: z.string().nullable(),
  /** Index of the last item on this page. */
  to: z.number().nullable(),
  total: z.number(),
  error: jsonValueSchema.optional(),
});
export type TransferMeta = z.infer<typeof transferMetaSchema>;

// ── Direct charges ─────────────────────────────────────────────────────────
export const directChargeResultSchema = z.object({
  auth_type: z.string(),
  requestID: z.string(),
  meta: z.object({
    message: z.string(),
    status: z.string(),
    ref_id: z.string(),
    payment_status: z.string(),
  }),
  mode: z.string(),
});
export type DirectChargeResult = z.infer<typeof directChargeResultSchema>;
