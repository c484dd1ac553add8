import { randomInt } from "node:crypto";

const ALPHABET =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

export interface TxRefOptions {
  /** @default "TX-" */
  prefix?: string;
  /** Number of random characters. @default 15 */
  size?: number;
  /** Return only the random part. @default false */
  removePrefix?: boolean;
}

/**
 * Random transaction reference such as `TX-4fQk9ZbX2mLp0aR`.
 *
 * @throws {RangeError} if `size` is not a non-negative integer.
 */
export function generateTxRef(options: TxRefOptions = {}): string {
  const { prefix = "TX-", size = 15, removePrefix = false } = options;
  if (!Number.isInteger(size) || size < 0) {
    throw new RangeError(`size must be a non-negative integer, got ${size}`);
  }

  let random = "";
  for (let i = 0; i < size; i++) {
    random += ALPHABET.charAt(randomInt(ALPHABET.length));
  }

  return removePrefix ? random : `${prefix}${random}`;
}
