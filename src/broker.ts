// Broker — service definition and domain errors.

import { type BigDecimal, Context, Data, Effect } from "effect";
import type {
  GtcOrder,
  LimitOrder,
  MarketableLimitOrder,
  MarketOrder,
  MutualFundBuy,
  MutualFundExchange,
  MutualFundSell,
  Quote,
} from "./domain.ts";

// --- Errors ---

export class PageError extends Data.TaggedError("PageError")<{
  readonly operation: string;
  readonly target: string;
  readonly message: string;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class InvalidArgument extends Data.TaggedError("InvalidArgument")<{
  readonly message: string;
}> {}

export type BrokerError = PageError | ParseError;

// --- Service ---

/** Reads fail with the scraped page's error. Orders never fail on a page
 *  problem: they resolve to `false`, and `true` only once the user has
 *  confirmed both the preview and the placement. */
export class Broker extends Context.Tag("Broker")<
  Broker,
  {
    readonly cashAvailableToTrade: (
      account: string,
    ) => Effect.Effect<BigDecimal.BigDecimal, BrokerError>;
    readonly quote: (symbol: string) => Effect.Effect<Quote, BrokerError>;
    readonly downloadPositions: (
      saveTo?: string,
    ) => Effect.Effect<string, BrokerError>;
    readonly marketOrder: (order: MarketOrder) => Effect.Effect<boolean>;
    readonly limitOrder: (order: LimitOrder) => Effect.Effect<boolean>;
    readonly marketableLimitOrder: (
      order: MarketableLimitOrder,
    ) => Effect.Effect<boolean, InvalidArgument>;
    readonly gtcOrder: (order: GtcOrder) => Effect.Effect<boolean>;
    readonly buyMutualFund: (order: MutualFundBuy) => Effect.Effect<boolean>;
    readonly sellMutualFund: (order: MutualFundSell) => Effect.Effect<boolean>;
    readonly exchangeMutualFund: (
      order: MutualFundExchange,
    ) => Effect.Effect<boolean>;
  }
>() {}
