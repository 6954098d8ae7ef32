import { expect, test } from "vitest";
import { BigDecimal, ConfigError } from "effect";
import {
  formatCash,
  formatError,
  formatOrderResult,
  formatQuote,
} from "./format.ts";
import { InvalidArgument, PageError, ParseError } from "./broker.ts";
import type { Quote } from "./domain.ts";

// --- Test data ---

const sampleQuote: Quote = {
  symbol: "ABC",
  name: "SAMPLE HOLDINGS INC",
  lastPrice: BigDecimal.make(10125n, 2),
  dollarChange: BigDecimal.make(125n, 2),
  percentChange: BigDecimal.make(125n, 2),
  bid: BigDecimal.make(10120n, 2),
  bidSize: 300,
  ask: BigDecimal.make(1013n, 1),
  askSize: 1200,
  volume: 4567890,
};

const lines = (output: string) => output.split("\n");

// --- formatQuote ---

test("formatQuote: symbol, name and last price", () => {
  const output = lines(formatQuote(sampleQuote));
  expect(output[1]).toBe("\x1b[1m  ABC\x1b[0m  SAMPLE HOLDINGS INC");
  expect(output[2]).toBe("  \x1b[1m$101.25\x1b[0m");
});

test("formatQuote: positive change shows upward indicator", () => {
  const output = lines(formatQuote(sampleQuote));
  expect(output[3]).toBe("  \x1b[32m▲ +1.25 (+1.25%)\x1b[0m");
});

test("formatQuote: negative change shows downward indicator", () => {
  const output = lines(formatQuote({
    ...sampleQuote,
    dollarChange: BigDecimal.make(-50n, 2),
    percentChange: BigDecimal.make(-49n, 2),
  }));
  expect(output[3]).toBe("  \x1b[31m▼ -0.50 (-0.49%)\x1b[0m");
});

test("formatQuote: zero change shows upward indicator with +0.00", () => {
  const output = lines(formatQuote({
    ...sampleQuote,
    dollarChange: BigDecimal.make(0n, 0),
    percentChange: BigDecimal.make(0n, 0),
  }));
  expect(output[3]).toBe("  \x1b[32m▲ +0.00 (+0.00%)\x1b[0m");
});

test("formatQuote: bid, ask and volume", () => {
  const output = lines(formatQuote(sampleQuote));
  expect(output[4]).toBe("  \x1b[2mBid 101.20 x 300  Ask 101.30 x 1,200\x1b[0m");
  expect(output[5]).toBe("  \x1b[2mVolume 4,567,890\x1b[0m");
});

// --- formatCash / formatOrderResult ---

test("formatCash: account and amount", () => {
  expect(formatCash("X12345678", BigDecimal.make(1234567n, 2))).toBe(
    "\n  \x1b[2mX12345678\x1b[0m  \x1b[1m$12345.67\x1b[0m available to trade\n",
  );
});

test("formatOrderResult: placed and not placed", () => {
  expect(formatOrderResult("Market buy", true)).toBe(
    "\n  \x1b[32m\x1b[1m✓ Market buy placed\x1b[0m\n",
  );
  expect(formatOrderResult("Market buy", false)).toBe(
    "\n  \x1b[31m\x1b[1m✗ Market buy not placed\x1b[0m\n",
  );
});

// --- formatError ---

const title = (output: string) => lines(output)[1];
const hint = (output: string) => lines(output)[2];

test("formatError: browser launch failure points at the install command", () => {
  const output = formatError(
    new PageError({ operation: "launch", target: "firefox", message: "missing" }),
  );
  expect(title(output)).toBe("\x1b[31m\x1b[1m  ✗ Browser failed to start\x1b[0m");
  expect(hint(output)).toBe(
    '  \x1b[2mInstall it with "npx playwright install firefox".\x1b[0m',
  );
});

test("formatError: navigation failure names the URL", () => {
  const output = formatError(
    new PageError({ operation: "goto", target: "https://example.test", message: "net" }),
  );
  expect(title(output)).toBe("\x1b[31m\x1b[1m  ✗ Navigation failed\x1b[0m");
  expect(hint(output)).toBe(
    "  \x1b[2mCould not open https://example.test. Check your internet connection.\x1b[0m",
  );
});

test("formatError: missing element names the selector", () => {
  const output = formatError(
    new PageError({ operation: "click", target: "#placeOrderBtn", message: "timeout" }),
  );
  expect(title(output)).toBe("\x1b[31m\x1b[1m  ✗ Page element unavailable\x1b[0m");
  expect(hint(output)).toBe("  \x1b[2mclick #placeOrderBtn: timeout\x1b[0m");
});

test("formatError: ParseError shows unexpected page content", () => {
  const output = formatError(new ParseError({ message: "Missing ask" }));
  expect(title(output)).toBe("\x1b[31m\x1b[1m  ✗ Unexpected page content\x1b[0m");
  expect(hint(output)).toBe("  \x1b[2mMissing ask\x1b[0m");
});

test("formatError: InvalidArgument shows the message", () => {
  const output = formatError(
    new InvalidArgument({ message: "buffer must be nonnegative" }),
  );
  expect(title(output)).toBe("\x1b[31m\x1b[1m  ✗ Invalid argument\x1b[0m");
  expect(hint(output)).toBe("  \x1b[2mbuffer must be nonnegative\x1b[0m");
});

test("formatError: ConfigError shows configuration error", () => {
  const output = formatError(
    ConfigError.InvalidData(["BROKER_TIMEOUT"], "timeout must be positive"),
  );
  expect(title(output)).toBe("\x1b[31m\x1b[1m  ✗ Configuration error\x1b[0m");
});
