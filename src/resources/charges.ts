// ---------------------------------------------------------------------------
// Chapa SDK – Direct Charges Resource
// ---------------------------------------------------------------------------
// Charges pushed straight to a customer's mobile-money wallet, and their
// authorisation.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { decodeEnvelope, jsonValueSchema, type DecodeContext } from "../envelope";
import { ChapaDeserializationError } from "../errors";
import type { HttpClient } from "../http";
import { directChargeResultSchema, type DirectChargeResult } from "../schemas";
import type {
  ChapaResponse,
  DirectChargeOptions,
  DirectChargeType,
  JsonValue,
  VerifyDirectChargeOptions,
} from "../types";

/**
 * Authorisation result. On success the API answers with `trx_ref` and
 * `processor_id` beside the message instead of a `data` block.
 */
export interface VerifyDirectChargeResponse extends ChapaResponse<JsonValue> {
  readonly trx_ref: string | null;
  readonly processor_id: JsonValue | null;
}

const verifyExtrasSchema = z.object({
  trx_ref: z.string().nullish(),
  processor_id: jsonValueSchema.optional(),
});

function decodeVerifyDirectCharge(
  body: unknown,
  ctx: DecodeContext,
): VerifyDirectChargeResponse {
  const envelope = decodeEnvelope(body, jsonValueSchema, ctx);
  const extras = verifyExtrasSchema.safeParse(body);
  if (!extras.success) {
    throw new ChapaDeserializationError(
      "Response does not match the expected shape of a charge authorisation",
      { statusCode: ctx.statusCode, raw: ctx.raw, issues: extras.error.issues },
    );
  }
  return {
    ...envelope,
    trx_ref: extras.data.trx_ref ?? null,
    processor_id: extras.data.processor_id ?? null,
  };
}

/**
 * Resource class for direct (wallet) charges.
 *
 * @example
 * ```ts
 * const charge = await chapa.charges.create('telebirr', {
 *   mobile: '0900123456',
 *   currency: 'ETB',
 *   amount: '10',
 *   txRef: generateTxRef(),
 * });
 * ```
 */
export class ChargesResource {
  constructor(private readonly http: HttpClient) {}

  /**
   * Push a charge request to the customer's wallet.
   *
   * @param type - Payment channel, e.g. `"telebirr"` or `"mpesa"`.
   */
  async create(
    type: DirectChargeType,
    params: DirectChargeOptions,
  ): Promise<ChapaResponse<DirectChargeResult>> {
    return this.http.request("POST", "charges", {
      query: { type },
      body: {
        first_name: params.firstName,
        last_name: params.lastName,
        email: params.email,
        mobile: params.mobile,
        currency: params.currency,
        amount: String(params.amount),
        tx_ref: params.txRef,
      },
      decode: (body, ctx) => decodeEnvelope(body, directChargeResultSchema, ctx),
    });
  }

  /** Authorise a pending charge created with {@link create}. */
  async verify(
    type: DirectChargeType,
    params: VerifyDirectChargeOptions,
  ): Promise<VerifyDirectChargeResponse> {
    return this.http.request("POST", "validate", {
      query: { type },
      body: { reference: params.reference, client: params.client },
      decode: decodeVerifyDirectCharge,
    });
  }
}
