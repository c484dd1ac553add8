// ---------------------------------------------------------------------------
// Chapa SDK – Transactions Resource
// ---------------------------------------------------------------------------
// Hosted checkout initialisation, verification and transaction history.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { decodeEnvelope } from "../envelope";
import type { HttpClient } from "../http";
import {
  checkoutUrlSchema,
  transactionDetailSchema,
  transactionEventSchema,
  transactionListSchema,
  type CheckoutUrl,
  type TransactionDetail,
  type TransactionEvent,
  type TransactionList,
} from "../schemas";
import type { ChapaResponse, InitializeOptions, ListParams } from "../types";

const transactionEventListSchema = z.array(transactionEventSchema);

/**
 * Resource class for Chapa transactions.
 *
 * @example
 * ```ts
 * const init = await chapa.transactions.initialize({
 *   amount: '100',
 *   currency: 'ETB',
 *   txRef: generateTxRef(),
 *   returnUrl: 'https://example.com/thank-you',
 * });
 *
 * if (init.data) redirect(init.data.checkout_url);
 * ```
 */
export class TransactionsResource {
  constructor(private readonly http: HttpClient) {}

  /**
   * Start a payment and obtain the hosted checkout URL.
   *
   * @returns Envelope whose `data.checkout_url` is set on success.
   */
  async initialize(
    params: InitializeOptions,
  ): Promise<ChapaResponse<CheckoutUrl>> {
    return this.http.request("POST", "transaction/initialize", {
      body: {
        amount: String(params.amount),
        currency: params.currency,
        email: params.email,
        first_name: params.firstName,
        last_name: params.lastName,
        phone_number: params.phoneNumber,
        tx_ref: params.txRef,
        callback_url: params.callbackUrl,
        return_url: params.returnUrl,
        customization: params.customization,
        meta: params.meta,
        subaccounts: params.subaccounts?.map((sub) => ({
          id: sub.id,
          split_type: sub.splitType,
          split_value: sub.splitValue,
        })),
      },
      decode: (body, ctx) => decodeEnvelope(body, checkoutUrlSchema, ctx),
    });
  }

  /**
   * Look up a payment by the `txRef` it was initialised with.
   */
  async verify(txRef: string): Promise<ChapaResponse<TransactionDetail>> {
    return this.http.request(
      "GET",
      `transaction/verify/${encodeURIComponent(txRef)}`,
      {
        decode: (body, ctx) =>
          decodeEnvelope(body, transactionDetailSchema, ctx),
      },
    );
  }

  /** Transactions on the account, newest first. */
  async list(
    params: ListParams = {},
  ): Promise<ChapaResponse<TransactionList>> {
    return this.http.request("GET", "transactions", {
      query: { page: params.page },
      decode: (body, ctx) => decodeEnvelope(body, transactionListSchema, ctx),
    });
  }

  /** Timeline of a single transaction. */
  async events(txRef: string): Promise<ChapaResponse<TransactionEvent[]>> {
    return this.http.request(
      "GET",
      `transaction/events/${encodeURIComponent(txRef)}`,
      {
        decode: (body, ctx) =>
          decodeEnvelope(body, transactionEventListSchema, ctx),
      },
    );
  }
}
