// Pure domain types — no framework dependency, no I/O.

import type { BigDecimal } from "effect";

// --- Quote ---

export interface Quote {
  readonly symbol: string;
  readonly name: string;
  readonly lastPrice: BigDecimal.BigDecimal;
  readonly dollarChange: BigDecimal.BigDecimal;
  readonly percentChange: BigDecimal.BigDecimal;
  readonly bid: BigDecimal.BigDecimal;
  readonly bidSize: number;
  readonly ask: BigDecimal.BigDecimal;
  readonly askSize: number;
  readonly volume: number;
}

// --- Order enums ---

export type Action = "BUY" | "SELL";

export type Unit = "SHARES" | "DOLLARS";

// --- Order requests ---
// Account numbers, symbols and amounts are passed to the ticket as typed.

export interface MarketOrder {
  readonly account: string;
  readonly symbol: string;
  readonly action: Action;
  readonly unit: Unit;
  readonly quantity: string;
}

export interface LimitOrder extends MarketOrder {
  /** Limit price in dollars. */
  readonly limit: string;
}

export interface MarketableLimitOrder extends MarketOrder {
  /** Cents added to the ask when buying, taken off the bid when selling. */
  readonly buffer?: number;
}

export interface GtcOrder {
  readonly account: string;
  readonly symbol: string;
  readonly action: Action;
  readonly shares: string;
  readonly limit: string;
}

export interface MutualFundBuy {
  readonly account: string;
  readonly symbol: string;
  readonly dollars: string;
}

export interface MutualFundSell {
  readonly account: string;
  readonly symbol: string;
  readonly unit: Unit;
  readonly quantity: string;
}

export interface MutualFundExchange {
  readonly account: string;
  readonly sellSymbol: string;
  readonly unit: Unit;
  readonly quantity: string;
  readonly buySymbol: string;
}
