import { expect, test } from "vitest";
import { Effect, Either } from "effect";
import {
  formatAmount,
  formatDollars,
  parseDecimal,
  parseInteger,
  toCents,
} from "./parse.ts";
import type { ParseError } from "./broker.ts";

// --- Helpers ---

async function succeed<A>(effect: Effect.Effect<A, ParseError>): Promise<A> {
  const result = await Effect.runPromise(Effect.either(effect));
  if (Either.isLeft(result)) throw new Error(`Expected success, got: ${result.left.message}`);
  return result.right;
}

async function fail<A>(effect: Effect.Effect<A, ParseError>): Promise<ParseError> {
  const result = await Effect.runPromise(Effect.either(effect));
  if (Either.isRight(result)) throw new Error("Expected failure but got success");
  return result.left;
}

const decimal = async (text: string) => formatAmount(await succeed(parseDecimal(text)));

// --- parseDecimal ---

test("parseDecimal: strips dollar signs and thousands separators", async () => {
  expect(await decimal("$1,234.50")).toBe("1234.50");
});

test("parseDecimal: keeps the sign of a change", async () => {
  expect(await decimal("+$1.25")).toBe("1.25");
  expect(await decimal("-$0.50")).toBe("-0.50");
});

test("parseDecimal: strips percent signs and parentheses", async () => {
  expect(await decimal("(+1.25%)")).toBe("1.25");
  expect(await decimal("(-0.49%)")).toBe("-0.49");
});

test("parseDecimal: ignores surrounding whitespace", async () => {
  expect(await decimal("  $101.20 ")).toBe("101.20");
});

test("parseDecimal: keeps digits past the cent", async () => {
  const value = await succeed(parseDecimal("0.125"));
  expect(value.value).toBe(125n);
  expect(value.scale).toBe(3);
});

test("parseDecimal: empty text is a ParseError", async () => {
  expect((await fail(parseDecimal(""))).message).toBe('Not a number: ""');
  expect((await fail(parseDecimal("$"))).message).toBe('Not a number: "$"');
});

test("parseDecimal: a sign after the point is a ParseError", async () => {
  expect((await fail(parseDecimal(".-5"))).message).toBe('Not a number: ".-5"');
  expect((await fail(parseDecimal("1.2.3"))).message).toBe('Not a number: "1.2.3"');
});

test("parseDecimal: a bare fraction is accepted", async () => {
  expect(await decimal(".5")).toBe("0.50");
});

test("parseDecimal: words are a ParseError", async () => {
  const error = await fail(parseDecimal("n/a"));
  expect(error._tag).toBe("ParseError");
  expect(error.message).toBe('Not a number: "n/a"');
});

// --- parseInteger ---

test("parseInteger: strips thousands separators", async () => {
  expect(await succeed(parseInteger("4,567,890"))).toBe(4567890);
});

test("parseInteger: ignores surrounding whitespace", async () => {
  expect(await succeed(parseInteger(" 300 "))).toBe(300);
});

test("parseInteger: fractions are a ParseError", async () => {
  expect((await fail(parseInteger("12.5"))).message).toBe('Not an integer: "12.5"');
});

test("parseInteger: sizes past the safe integer range are a ParseError", async () => {
  expect((await fail(parseInteger("9007199254740993"))).message).toBe(
    'Integer out of range: "9007199254740993"',
  );
  expect(await succeed(parseInteger("9,007,199,254,740,991"))).toBe(9007199254740991);
});

test("parseInteger: empty text is a ParseError", async () => {
  expect((await fail(parseInteger(""))).message).toBe('Not an integer: ""');
});

// --- toCents ---

test("toCents: truncates to whole cents", async () => {
  expect(await succeed(toCents("$150.129"))).toBe(15012n);
});

test("toCents: whole dollars", async () => {
  expect(await succeed(toCents("150"))).toBe(15000n);
});

test("toCents: truncates negative amounts toward zero", async () => {
  expect(await succeed(toCents("-1.239"))).toBe(-123n);
});

test("toCents: unparseable text is a ParseError", async () => {
  expect((await fail(toCents("--"))).message).toBe('Not a number: "--"');
});

// --- formatDollars ---

test("formatDollars: always two decimals", () => {
  expect(formatDollars(15022n)).toBe("150.22");
  expect(formatDollars(100n)).toBe("1.00");
  expect(formatDollars(0n)).toBe("0.00");
});

test("formatDollars: negative amounts under a dollar", () => {
  expect(formatDollars(-5n)).toBe("-0.05");
});
