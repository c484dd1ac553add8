// ---------------------------------------------------------------------------
// Chapa SDK – Transfers Resource
// ---------------------------------------------------------------------------
// Payouts to bank accounts and wallets, single or batched.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { decodeEnvelope, decodeEnvelopeWithMeta } from "../envelope";
import type { HttpClient } from "../http";
import {
  bulkTransferBatchSchema,
  transferDetailSchema,
  transferMetaSchema,
  transferRecordSchema,
  transferReferenceSchema,
  type BulkTransferBatch,
  type TransferDetail,
  type TransferMeta,
  type TransferRecord,
} from "../schemas";
import type {
  BulkTransferOptions,
  ChapaResponse,
  ChapaResponseWithMeta,
  ListParams,
  TransferOptions,
} from "../types";

const transferRecordListSchema = z.array(transferRecordSchema);

/** Page of transfer records with its pagination block. */
export type TransferListResponse = ChapaResponseWithMeta<
  TransferRecord[],
  TransferMeta
>;

/**
 * Resource class for Chapa transfers.
 *
 * @example
 * ```ts
 * const queued = await chapa.transfers.create({
 *   accountName: 'Abebe Kebede',
 *   accountNumber: '1000123456789',
 *   amount: '250',
 *   currency: 'ETB',
 *   reference: 'payout-0001',
 *   bankCode: 946,
 * });
 *
 * const status = await chapa.transfers.verify('payout-0001');
 * ```
 */
export class TransfersResource {
  constructor(private readonly http: HttpClient) {}

  /**
   * Queue a transfer.
   *
   * @returns Envelope whose `data` is the transfer reference.
   */
  async create(params: TransferOptions): Promise<ChapaResponse<string>> {
    return this.http.request("POST", "transfers", {
      body: {
        account_name: params.accountName,
        account_number: params.accountNumber,
        amount: String(params.amount),
        currency: params.currency,
        reference: params.reference,
        bank_code: params.bankCode,
      },
      decode: (body, ctx) => decodeEnvelope(body, transferReferenceSchema, ctx),
    });
  }

  async verify(reference: string): Promise<ChapaResponse<TransferDetail>> {
    return this.http.request(
      "GET",
      `transfers/verify/${encodeURIComponent(reference)}`,
      {
        decode: (body, ctx) => decodeEnvelope(body, transferDetailSchema, ctx),
      },
    );
  }

  /**
   * Queue several transfers as one batch.
   *
   * Validation failures come back as a failure envelope whose `message` maps
   * field paths such as `bulk_data.1.amount` to error lists.
   */
  async bulk(
    params: BulkTransferOptions,
  ): Promise<ChapaResponse<BulkTransferBatch>> {
    return this.http.request("POST", "bulk-transfers", {
      body: {
        title: params.title,
        currency: params.currency,
        bulk_data: params.bulkData.map((entry) => ({
          account_name: entry.accountName,
          account_number: entry.accountNumber,
          amount: String(entry.amount),
          reference: entry.reference,
          bank_code: entry.bankCode,
        })),
      },
      decode: (body, ctx) => decodeEnvelope(body, bulkTransferBatchSchema, ctx),
    });
  }

  /** Transfers belonging to a batch created with {@link bulk}. */
  async verifyBulk(batchId: string | number): Promise<TransferListResponse> {
    return this.http.request("GET", "transfers", {
      query: { batch_id: batchId },
      decode: (body, ctx) =>
        decodeEnvelopeWithMeta(
          body,
          transferRecordListSchema,
          transferMetaSchema,
          ctx,
        ),
    });
  }

  /** Every transfer on the account, paginated. */
  async list(params: ListParams = {}): Promise<TransferListResponse> {
    return this.http.request("GET", "transfers", {
      query: { page: params.page },
      decode: (body, ctx) =>
        decodeEnvelopeWithMeta(
          body,
          transferRecordListSchema,
          transferMetaSchema,
          ctx,
        ),
    });
  }
}
