// ---------------------------------------------------------------------------
// Chapa SDK – Banks Resource
// ---------------------------------------------------------------------------
// Supported banks, merchant balances and currency swaps.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { decodeEnvelope } from "../envelope";
import type { HttpClient } from "../http";
import {
  balanceSchema,
  bankSchema,
  swapResultSchema,
  type Balance,
  type Bank,
  type SwapResult,
} from "../schemas";
import type { ChapaResponse, SwapOptions } from "../types";

const bankListSchema = z.array(bankSchema);
const balanceListSchema = z.array(balanceSchema);

/**
 * Resource class for banks and balances.
 *
 * @example
 * ```ts
 * const { data: banks } = await chapa.banks.list();
 * const { data: etb } = await chapa.banks.balancesByCurrency('etb');
 * ```
 */
export class BanksResource {
  constructor(private readonly http: HttpClient) {}

  /** Banks and wallets transfers can be sent to. */
  async list(): Promise<ChapaResponse<Bank[]>> {
    return this.http.request("GET", "banks", {
      decode: (body, ctx) => decodeEnvelope(body, bankListSchema, ctx),
    });
  }

  /** Balances of every currency wallet on the account. */
  async balances(): Promise<ChapaResponse<Balance[]>> {
    return this.http.request("GET", "balances", {
      decode: (body, ctx) => decodeEnvelope(body, balanceListSchema, ctx),
    });
  }

  /**
   * Balance of a single currency wallet.
   *
   * @param currency - Currency code, e.g. `"etb"`.
   */
  async balancesByCurrency(
    currency: string,
  ): Promise<ChapaResponse<Balance[]>> {
    return this.http.request(
      "GET",
      `balances/${encodeURIComponent(currency)}`,
      {
        decode: (body, ctx) => decodeEnvelope(body, balanceListSchema, ctx),
      },
    );
  }

  /**
   * Convert funds between currency wallets.
   *
   * Swaps are irreversible. The API rejects amounts outside its limits with a
   * failure envelope.
   */
  async swap(params: SwapOptions): Promise<ChapaResponse<SwapResult>> {
    return this.http.request("POST", "swap", {
      body: { amount: params.amount, from: params.from, to: params.to },
      decode: (body, ctx) => decodeEnvelope(body, swapResultSchema, ctx),
    });
  }
}
