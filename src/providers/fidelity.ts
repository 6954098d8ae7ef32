// Fidelity — implementation of Broker over a BrokerPage.

import { type BigDecimal, Cause, Config, Console, Effect, Layer } from "effect";
import type { Action, MarketOrder, Quote, Unit } from "../domain.ts";
import { Broker, InvalidArgument, ParseError } from "../broker.ts";
import { Confirm } from "../confirm.ts";
import { BrokerPage } from "../page.ts";
import { formatDollars, parseDecimal, parseInteger, toCents } from "../parse.ts";

// --- Site ---

export const FidelityUrls = Config.all({
  login: Config.string("FIDELITY_LOGIN_URL").pipe(
    Config.withDefault("https://digital.fidelity.com/prgw/digital/login/full-page"),
  ),
  logout: Config.string("FIDELITY_LOGOUT_URL").pipe(
    Config.withDefault(
      "https://login.fidelity.com/ftgw/Fidelity/RtlCust/Logout/Init?AuthRedUrl=https://www.fidelity.com/customer-service/customer-logout",
    ),
  ),
  positions: Config.string("FIDELITY_POSITIONS_URL").pipe(
    Config.withDefault("https://oltx.fidelity.com/ftgw/fbc/oftop/portfolio#positions"),
  ),
  tradeStock: Config.string("FIDELITY_TRADE_STOCK_URL").pipe(
    Config.withDefault("https://digital.fidelity.com/ftgw/digital/trade-equity/index"),
  ),
  tradeMutualFund: Config.string("FIDELITY_TRADE_MUTUAL_FUND_URL").pipe(
    Config.withDefault("https://digital.fidelity.com/ftgw/digital/trade-mutualfund"),
  ),
});

export const Selectors = {
  symbol: "text=Symbol",
  fundToBuy: "text=Fund to Buy",
  fundDetail: ".detail-value",
  fundToBuyDetail: "#mf-ticket__second-quote-box .detail-value",
  buy: "text=Buy",
  sell: "text=Sell",
  fundAction: "text=Action",
  shares: "label:has-text('Shares')",
  dollars: "text=Dollars",
  stockQuantity: "#eqt-shared-quantity",
  fundQuantity: "#mf-shared-quantity",
  market: "label:has-text('Market')",
  limit: "text=Limit",
  limitPrice: "text=Limit Price",
  gtc: "text=GTC",
  bidAsk: ".number",
  previewOrder: "#previewOrderBtn",
  placeOrder: "#placeOrderBtn",
  cash: ".funds-cash",
  companyTitle: ".company-title",
  lastPrice: ".last-price",
  changes: ".eq-ticket__symbol__dollar_percent_chg_font",
  priceLayout: ".block-price-layout",
  volume: ".block-volume",
  download: "button[title='Download']",
} as const;

export const DEFAULT_BUFFER = 10;

type FundAction = "Buy" | "Sell" | "Exchange";

// --- Failure boundaries ---

const logCause = (message: string) => <E>(cause: Cause.Cause<E>) =>
  Console.error(`[fidelity] ${message}\n${Cause.pretty(cause)}`);

/** Reads: log, then let the error through. */
const readFailed = (message: string) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    effect.pipe(Effect.tapErrorCause(logCause(message)));

/** Orders: log, then report the order as not placed. */
const orderFailed = (message: string) =>
  <E, R>(effect: Effect.Effect<boolean, E, R>): Effect.Effect<boolean, never, R> =>
    effect.pipe(
      Effect.tapErrorCause(logCause(message)),
      Effect.catchAllCause(() => Effect.succeed(false)),
    );

// --- Quote text ---

/** `"$150.10 x 300"` → price and size. */
function parseSizedPrice(
  text: string,
): Effect.Effect<readonly [BigDecimal.BigDecimal, number], ParseError> {
  const parts = text.split("x");
  if (parts.length < 2) {
    return Effect.fail(
      new ParseError({ message: `Expected "<price> x <size>", got "${text}"` }),
    );
  }
  return Effect.all([parseDecimal(parts[0]), parseInteger(parts[1])]);
}

function nth(
  texts: ReadonlyArray<string>,
  index: number,
  what: string,
): Effect.Effect<string, ParseError> {
  const text = texts[index];
  return text === undefined
    ? Effect.fail(new ParseError({ message: `Missing ${what}` }))
    : Effect.succeed(text);
}

// --- Driver ---

export const makeFidelityBroker = Effect.gen(function* () {
  const page = yield* BrokerPage;
  const confirm = yield* Confirm;
  const urls = yield* FidelityUrls;

  const innerText = (selector: string) =>
    page.innerText(selector).pipe(Effect.map((text) => text.trim()));

  const innerTexts = (selector: string) =>
    page.allInnerTexts(selector).pipe(
      Effect.map((texts) => texts.map((text) => text.trim())),
    );

  const enterSymbol = (selector: string, symbol: string) =>
    page.fill(selector, symbol).pipe(
      Effect.zipRight(page.press(selector, "Enter")),
    );

  // --- Stock ticket ---

  const stock = {
    account: (account: string) =>
      page.goto(`${urls.tradeStock}?ACCOUNT=${account}`),
    symbol: (symbol: string) => enterSymbol(Selectors.symbol, symbol),
    action: (action: Action) =>
      page.click(action === "BUY" ? Selectors.buy : Selectors.sell),
    unit: (unit: Unit) =>
      page.click(unit === "SHARES" ? Selectors.shares : Selectors.dollars),
    quantity: (quantity: string) => page.fill(Selectors.stockQuantity, quantity),
    market: () => page.click(Selectors.market),
    limit: (limit: string) =>
      page.click(Selectors.limit).pipe(
        Effect.zipRight(page.fill(Selectors.limitPrice, limit)),
      ),
    gtc: () => page.click(Selectors.gtc),
    bidAsk: () =>
      Effect.gen(function* () {
        const texts = yield* innerTexts(Selectors.bidAsk);
        if (texts.length !== 2) {
          return yield* Effect.fail(
            new ParseError({ message: "failed to get bid ask" }),
          );
        }
        const [bid, ask] = yield* Effect.all(texts.map(toCents));
        return { bid, ask };
      }),
  };

  const fillStockTicket = (order: MarketOrder) =>
    Effect.all(
      [
        stock.account(order.account),
        stock.symbol(order.symbol),
        stock.action(order.action),
        stock.unit(order.unit),
        stock.quantity(order.quantity),
      ],
      { discard: true },
    );

  // --- Mutual fund ticket ---

  const fund = {
    account: (account: string) =>
      page.goto(`${urls.tradeMutualFund}?ACCOUNT=${account}`),
    symbol: (symbol: string) =>
      enterSymbol(Selectors.symbol, symbol).pipe(
        Effect.zipRight(page.waitFor(Selectors.fundDetail)),
      ),
    buySymbol: (symbol: string) =>
      enterSymbol(Selectors.fundToBuy, symbol).pipe(
        Effect.zipRight(page.waitFor(Selectors.fundToBuyDetail)),
      ),
    action: (action: FundAction) =>
      page.click(Selectors.fundAction).pipe(
        Effect.zipRight(page.click(`text=${action}`)),
      ),
    unit: stock.unit,
    quantity: (quantity: string) => page.fill(Selectors.fundQuantity, quantity),
  };

  // --- Preview, confirm, place, confirm ---

  const placeOrder = Effect.gen(function* () {
    yield* page.click(Selectors.previewOrder);
    if (!(yield* confirm.ask("Place order"))) {
      yield* Console.debug("[fidelity] order not placed");
      return false;
    }
    yield* page.click(Selectors.placeOrder);
    return yield* confirm.ask("Success");
  });

  return Broker.of({
    cashAvailableToTrade: (account) =>
      stock.account(account).pipe(
        Effect.zipRight(innerText(Selectors.cash)),
        Effect.flatMap(parseDecimal),
        readFailed("cash available to trade cannot be found"),
      ),

    quote: (symbol) =>
      Effect.gen(function* () {
        yield* page.goto(urls.tradeStock);
        yield* stock.symbol(symbol);

        const name = yield* innerText(Selectors.companyTitle);
        const lastPrice = yield* parseDecimal(yield* innerText(Selectors.lastPrice));

        const changes = yield* innerTexts(Selectors.changes);
        const dollarChange = yield* parseDecimal(yield* nth(changes, 0, "dollar change"));
        const percentChange = yield* parseDecimal(yield* nth(changes, 1, "percent change"));

        const prices = yield* innerTexts(Selectors.priceLayout);
        const [bid, bidSize] = yield* parseSizedPrice(yield* nth(prices, 0, "bid"));
        const [ask, askSize] = yield* parseSizedPrice(yield* nth(prices, 1, "ask"));

        const volume = yield* parseInteger(yield* innerText(Selectors.volume));

        return {
          symbol,
          name,
          lastPrice,
          dollarChange,
          percentChange,
          bid,
          bidSize,
          ask,
          askSize,
          volume,
        } satisfies Quote;
      }).pipe(readFailed("quote information cannot be found")),

    downloadPositions: (saveTo) =>
      page.goto(urls.positions).pipe(
        Effect.zipRight(page.download(Selectors.download, saveTo)),
        readFailed("file cannot be downloaded"),
      ),

    marketOrder: (order) =>
      fillStockTicket(order).pipe(
        Effect.zipRight(stock.market()),
        Effect.zipRight(placeOrder),
        orderFailed("market order failed"),
      ),

    limitOrder: (order) =>
      fillStockTicket(order).pipe(
        Effect.zipRight(stock.limit(order.limit)),
        Effect.zipRight(placeOrder),
        orderFailed("limit order failed"),
      ),

    marketableLimitOrder: (order) => {
      const buffer = order.buffer ?? DEFAULT_BUFFER;
      if (!Number.isInteger(buffer)) {
        return Effect.fail(
          new InvalidArgument({ message: "buffer must be a whole number of cents" }),
        );
      }
      if (buffer < 0) {
        return Effect.fail(
          new InvalidArgument({ message: "buffer must be nonnegative" }),
        );
      }
      return Effect.gen(function* () {
        yield* fillStockTicket(order);
        const { bid, ask } = yield* stock.bidAsk();
        const limit = order.action === "BUY"
          ? formatDollars(ask + BigInt(buffer))
          : formatDollars(bid - BigInt(buffer));
        yield* Console.debug(`[fidelity] marketable limit at ${limit}`);
        yield* stock.limit(limit);
        return yield* placeOrder;
      }).pipe(orderFailed("marketable limit order failed"));
    },

    gtcOrder: (order) =>
      Effect.all(
        [
          stock.account(order.account),
          stock.symbol(order.symbol),
          stock.action(order.action),
          stock.unit("SHARES"),
          stock.quantity(order.shares),
          stock.limit(order.limit),
          stock.gtc(),
        ],
        { discard: true },
      ).pipe(
        Effect.zipRight(placeOrder),
        orderFailed("good-til-canceled order failed"),
      ),

    buyMutualFund: (order) =>
      Effect.all(
        [
          fund.account(order.account),
          fund.symbol(order.symbol),
          fund.action("Buy"),
          fund.quantity(order.dollars),
        ],
        { discard: true },
      ).pipe(
        Effect.zipRight(placeOrder),
        orderFailed("mutual fund buy order failed"),
      ),

    sellMutualFund: (order) =>
      Effect.all(
        [
          fund.account(order.account),
          fund.symbol(order.symbol),
          fund.action("Sell"),
          fund.unit(order.unit),
          fund.quantity(order.quantity),
        ],
        { discard: true },
      ).pipe(
        Effect.zipRight(placeOrder),
        orderFailed("mutual fund sell order failed"),
      ),

    exchangeMutualFund: (order) =>
      Effect.all(
        [
          fund.account(order.account),
          fund.symbol(order.sellSymbol),
          fund.action("Exchange"),
          fund.unit(order.unit),
          fund.quantity(order.quantity),
          fund.buySymbol(order.buySymbol),
        ],
        { discard: true },
      ).pipe(
        Effect.zipRight(placeOrder),
        orderFailed("mutual fund exchange order failed"),
      ),
  });
});

// --- Session ---
// Opening the session lands on the login page; closing it logs out.

export const FidelityLive = Layer.scoped(
  Broker,
  Effect.gen(function* () {
    const page = yield* BrokerPage;
    const urls = yield* FidelityUrls;

    yield* Effect.acquireRelease(
      page.goto(urls.login).pipe(
        Effect.tap(() => Console.debug("[fidelity] at login page")),
      ),
      () =>
        page.goto(urls.logout).pipe(
          Effect.tap(() => Console.debug("[fidelity] logged out")),
          Effect.catchAll((e) =>
            Console.error(`[fidelity] logout failed: ${e.message}`)
          ),
        ),
    );

    return yield* makeFidelityBroker;
  }),
);
