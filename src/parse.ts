// Pure parsing of scraped ticket text — no I/O.

import { BigDecimal, Effect, Option } from "effect";
import { ParseError } from "./broker.ts";

const DECORATION = /[$,%()]/g;
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const INTEGER = /^[+-]?\d+$/;

/** Parse a price, change or balance as rendered on the page:
 *  `"$1,234.50"`, `"+0.75%"`, `"(-1.20)"`. */
export function parseDecimal(
  text: string,
): Effect.Effect<BigDecimal.BigDecimal, ParseError> {
  const cleaned = text.replace(DECORATION, "").trim();
  // BigDecimal.fromString reads "" as zero and takes ".-5".
  if (!DECIMAL.test(cleaned)) {
    return Effect.fail(new ParseError({ message: `Not a number: "${text}"` }));
  }
  return Option.match(BigDecimal.fromString(cleaned), {
    onNone: () =>
      Effect.fail(new ParseError({ message: `Not a number: "${text}"` })),
    onSome: (value) => Effect.succeed(value),
  });
}

export function parseInteger(text: string): Effect.Effect<number, ParseError> {
  const cleaned = text.replace(/,/g, "").trim();
  if (!INTEGER.test(cleaned)) {
    return Effect.fail(new ParseError({ message: `Not an integer: "${text}"` }));
  }
  const value = Number.parseInt(cleaned, 10);
  return Number.isSafeInteger(value)
    ? Effect.succeed(value)
    : Effect.fail(new ParseError({ message: `Integer out of range: "${text}"` }));
}

/** Truncate toward zero to whole cents. */
export function centsOf(value: BigDecimal.BigDecimal): bigint {
  return BigDecimal.scale(value, 2).value;
}

export function toCents(text: string): Effect.Effect<bigint, ParseError> {
  return parseDecimal(text).pipe(Effect.map(centsOf));
}

/** `15022n` → `"150.22"`, `-5n` → `"-0.05"`. */
export function formatDollars(cents: bigint): string {
  const sign = cents < 0n ? "-" : "";
  const abs = cents < 0n ? -cents : cents;
  const whole = abs / 100n;
  const fraction = (abs % 100n).toString().padStart(2, "0");
  return `${sign}${whole}.${fraction}`;
}

export function formatAmount(value: BigDecimal.BigDecimal): string {
  return formatDollars(centsOf(value));
}
