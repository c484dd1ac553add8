// ---------------------------------------------------------------------------
// Chapa SDK – Response Envelope Decoding
// ---------------------------------------------------------------------------
// Every endpoint answers with `{ message, status, data }`, but success and
// failure bodies omit different subsets of those fields. The decoders below
// default each one independently:
//   - message: any JSON value, missing → null
//   - status:  missing/null → "Unspecified"
//   - data:    missing/null → null, otherwise validated by the endpoint schema
//   - meta:    same as data, listing endpoints only
// ---------------------------------------------------------------------------

import { z } from "zod";
import { ChapaDeserializationError } from "./errors";
import {
  UNSPECIFIED_STATUS,
  type ChapaResponse,
  type ChapaResponseWithMeta,
  type JsonValue,
} from "./types";

/** Any JSON value. */
export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const envelopeSchema = z.object({
  message: jsonValueSchema.optional(),
  status: z.string().nullish(),
  data: z.unknown(),
  meta: z.unknown(),
});

type RawEnvelope = z.infer<typeof envelopeSchema>;

/** Extra context for decode errors. */
export interface DecodeContext {
  statusCode?: number;
  raw?: unknown;
}

function fail(
  what: string,
  error: z.ZodError,
  context: DecodeContext,
): ChapaDeserializationError {
  const first = error.issues[0];
  const where = first && first.path.length > 0 ? ` at ${first.path.join(".")}` : "";
  return new ChapaDeserializationError(
    `Response ${what} does not match the expected shape${where}: ${first?.message ?? "invalid"}`,
    { statusCode: context.statusCode, raw: context.raw, issues: error.issues },
  );
}

function parseOuter(body: unknown, context: DecodeContext): RawEnvelope {
  const result = envelopeSchema.safeParse(body);
  if (!result.success) throw fail("envelope", result.error, context);
  return result.data;
}

function parseBlock<S extends z.ZodTypeAny>(
  name: "data" | "meta",
  value: unknown,
  schema: S,
  context: DecodeContext,
): z.output<S> | null {
  if (value === undefined || value === null) return null;
  const result = schema.safeParse(value);
  if (!result.success) {
    throw fail(name, prefixIssues(result.error, name), context);
  }
  return result.data;
}

function prefixIssues(error: z.ZodError, name: string): z.ZodError {
  return new z.ZodError(
    error.issues.map((issue) => ({ ...issue, path: [name, ...issue.path] })),
  );
}

/**
 * Decode a parsed JSON body into a {@link ChapaResponse}.
 *
 * @throws {ChapaDeserializationError} if a present field has the wrong type.
 */
export function decodeEnvelope<S extends z.ZodTypeAny>(
  body: unknown,
  dataSchema: S,
  context: DecodeContext = {},
): ChapaResponse<z.output<S>> {
  const outer = parseOuter(body, context);
  return {
    message: outer.message ?? null,
    status: outer.status ?? UNSPECIFIED_STATUS,
    data: parseBlock("data", outer.data, dataSchema, context),
  };
}

/** Like {@link decodeEnvelope}, with a `meta` block for listings. */
export function decodeEnvelopeWithMeta<
  S extends z.ZodTypeAny,
  M extends z.ZodTypeAny,
>(
  body: unknown,
  dataSchema: S,
  metaSchema: M,
  context: DecodeContext = {},
): ChapaResponseWithMeta<z.output<S>, z.output<M>> {
  const outer = parseOuter(body, context);
  return {
    message: outer.message ?? null,
    status: outer.status ?? UNSPECIFIED_STATUS,
    data: parseBlock("data", outer.data, dataSchema, context),
    meta: parseBlock("meta", outer.meta, metaSchema, context),
  };
}

/** Narrow an envelope to one that carries data. */
export function hasData<E extends ChapaResponse<unknown>>(
  envelope: E,
): envelope is E & { readonly data: NonNullable<E["data"]> } {
  return envelope.data !== null;
}

/**
 * The envelope message as display text: strings as-is, `null` as `""`,
 * anything else (validation maps, arrays) as compact JSON.
 */
export function messageText(envelope: Pick<ChapaResponse<unknown>, "message">): string {
  const { message } = envelope;
  if (typeof message === "string") return message;
  if (message === null) return "";
  return JSON.stringify(message);
}
