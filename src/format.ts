// Pure formatting functions — no I/O.

import { BigDecimal, type ConfigError } from "effect";
import type { Quote } from "./domain.ts";
import type { BrokerError, InvalidArgument, PageError } from "./broker.ts";
import { formatAmount } from "./parse.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Quote formatting ---

const withCommas = (n: number) => n.toLocaleString("en-US");

export function formatQuote(quote: Quote): string {
  const up = !BigDecimal.isNegative(quote.dollarChange);
  const direction = up ? "▲" : "▼";
  const color = up ? GREEN : RED;
  const sign = up ? "+" : "";

  const lines = [
    "",
    `${BOLD}  ${quote.symbol}${RESET}  ${quote.name}`,
    `  ${BOLD}$${formatAmount(quote.lastPrice)}${RESET}`,
    `  ${color}${direction} ${sign}${formatAmount(quote.dollarChange)} (${sign}${formatAmount(quote.percentChange)}%)${RESET}`,
    `  ${DIM}Bid ${formatAmount(quote.bid)} x ${withCommas(quote.bidSize)}  Ask ${formatAmount(quote.ask)} x ${withCommas(quote.askSize)}${RESET}`,
    `  ${DIM}Volume ${withCommas(quote.volume)}${RESET}`,
    "",
  ];

  return lines.join("\n");
}

// --- Account formatting ---

export function formatCash(
  account: string,
  cash: BigDecimal.BigDecimal,
): string {
  return `\n  ${DIM}${account}${RESET}  ${BOLD}$${formatAmount(cash)}${RESET} available to trade\n`;
}

export function formatOrderResult(description: string, placed: boolean): string {
  return placed
    ? `\n  ${GREEN}${BOLD}✓ ${description} placed${RESET}\n`
    : `\n  ${RED}${BOLD}✗ ${description} not placed${RESET}\n`;
}

// --- Error formatting ---

export type CliError = BrokerError | InvalidArgument | ConfigError.ConfigError;

export function formatError(error: CliError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(error: CliError): ClassifiedError {
  switch (error._tag) {
    case "PageError":
      return classifyPageError(error);
    case "ParseError":
      return {
        title: "Unexpected page content",
        hint: error.message,
      };
    case "InvalidArgument":
      return {
        title: "Invalid argument",
        hint: error.message,
      };
    default:
      return {
        title: "Configuration error",
        hint: error.toString(),
      };
  }
}

function classifyPageError(error: PageError): ClassifiedError {
  if (error.operation === "launch") {
    return {
      title: "Browser failed to start",
      hint: `Install it with "npx playwright install ${error.target}".`,
    };
  }
  if (error.operation === "goto") {
    return {
      title: "Navigation failed",
      hint: `Could not open ${error.target}. Check your internet connection.`,
    };
  }
  return {
    title: "Page element unavailable",
    hint: `${error.operation} ${error.target}: ${error.message}`,
  };
}
