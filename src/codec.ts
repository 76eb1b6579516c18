import { z } from "zod";
import { ConversionError } from "./errors.js";
import type { ValueCodec } from "./types.js";

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

const INTEGER_TEXT = /^[+-]?\d+$/;
const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Build a codec from a zod schema that parses a string into `T`.
 * Parse failures are rethrown as ConversionError.
 */
export function textCodec<T>(
  parser: z.ZodType<T, z.ZodTypeDef, string>,
  format: (value: T) => string
): ValueCodec<T> {
  return {
    toText: format,
    fromText(text) {
      const result = parser.safeParse(text);
      if (!result.success) {
        const reason = result.error.issues.map((issue) => issue.message).join("; ");
        throw new ConversionError(text, reason);
      }
      return result.data;
    },
  };
}

export const int: ValueCodec<number> = textCodec(
  z
    .string()
    .regex(INTEGER_TEXT, "expected an integer")
    .transform(Number)
    .pipe(z.number().int().min(INT32_MIN).max(INT32_MAX)),
  (value) => String(value)
);

export const number: ValueCodec<number> = textCodec(
  z
    .string()
    .regex(DECIMAL_TEXT, "expected a number")
    .transform(Number)
    .pipe(z.number().finite()),
  (value) => String(value)
);

export const bigint: ValueCodec<bigint> = textCodec(
  z.string().regex(INTEGER_TEXT, "expected an integer").transform((text) => BigInt(text)),
  (value) => value.toString()
);

export const boolean: ValueCodec<boolean> = textCodec(
  z.enum(["true", "false", "1", "0"]).transform((text) => text === "true" || text === "1"),
  (value) => (value ? "true" : "false")
);

export const string: ValueCodec<string> = textCodec(z.string(), (value) => value);

export function enumeration<V extends string>(values: readonly [V, ...V[]]): ValueCodec<V> {
  return textCodec(z.enum(values), (value) => value);
}

/**
 * Capability check: both conversions present and callable.
 */
export function isValueCodec(value: unknown): value is ValueCodec<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "toText" in value &&
    typeof value.toText === "function" &&
    "fromText" in value &&
    typeof value.fromText === "function"
  );
}
