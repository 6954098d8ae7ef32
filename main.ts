import { Command, Options, Prompt } from "@effect/cli";
import type { Terminal } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import {
  Config,
  ConfigError,
  Console,
  Effect,
  Layer,
  Option,
} from "effect";
import { Broker, type PageError } from "./src/broker.ts";
import { Confirm, ConfirmAlwaysLive, ConfirmLive } from "./src/confirm.ts";
import type { Action, Unit } from "./src/domain.ts";
import {
  type CliError,
  formatCash,
  formatError,
  formatOrderResult,
  formatQuote,
} from "./src/format.ts";
import type { BrokerPage } from "./src/page.ts";
import { DEFAULT_BUFFER, FidelityLive } from "./src/providers/fidelity.ts";
import { BrokerPageTestLive } from "./src/providers/page-mock.ts";
import { PlaywrightPageLive } from "./src/providers/playwright.ts";

// --- Layers ---
// Set BROKER_PAGE to "playwright" (default) or "test".

type PageLayer = Layer.Layer<
  BrokerPage | Confirm,
  PageError | ConfigError.ConfigError,
  Terminal.Terminal
>;

const PageLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const page = yield* Config.literal("playwright", "test")("BROKER_PAGE").pipe(
      Config.withDefault("playwright" as const),
    );
    const live: PageLayer = page === "test"
      ? Layer.merge(BrokerPageTestLive, ConfirmAlwaysLive)
      : Layer.merge(PlaywrightPageLive, ConfirmLive);
    return live;
  }),
);

const SessionLive = FidelityLive.pipe(Layer.provideMerge(PageLive));

/** Runs once the user has logged in on the page the session opened. */
const afterLogin = <A, E, R>(run: Effect.Effect<A, E, R>) =>
  Effect.gen(function* () {
    const confirm = yield* Confirm;
    if (!(yield* confirm.ask("Logged in"))) {
      yield* Console.log("Cancelled.");
      return;
    }
    yield* run;
  });

const inSession = <Name extends string, R, E, A>(
  self: Command.Command<Name, R, E, A>,
) => Command.provide(self, SessionLive);

// --- Options ---

const actionChoices: Array<[string, Action]> = [["buy", "BUY"], ["sell", "SELL"]];
const unitChoices: Array<[string, Unit]> = [
  ["shares", "SHARES"],
  ["dollars", "DOLLARS"],
];

const account = Options.text("account").pipe(
  Options.withDescription("Brokerage account number"),
);

const symbol = Options.text("symbol").pipe(
  Options.withDescription("Stock, ETF or mutual fund symbol"),
  Options.withFallbackPrompt(
    Prompt.text({
      message: "Enter a symbol:",
      validate: (value) =>
        value.trim().length === 0
          ? Effect.fail("Symbol cannot be empty")
          : Effect.succeed(value.trim()),
    }),
  ),
);

const action = Options.choiceWithValue("action", actionChoices);
const unit = Options.choiceWithValue("unit", unitChoices);
const quantity = Options.text("quantity").pipe(
  Options.withDescription("Amount in the chosen unit"),
);
const limit = Options.text("limit").pipe(
  Options.withDescription("Limit price in dollars"),
);
const buffer = Options.integer("buffer").pipe(
  Options.withDescription("Cents past the ask (buy) or bid (sell)"),
  Options.withDefault(DEFAULT_BUFFER),
);

const describe = (
  kind: string,
  order: { action: Action; quantity: string; unit: Unit; symbol: string },
) =>
  `${kind} ${order.action.toLowerCase()} of ${order.quantity} ${order.unit.toLowerCase()} ${order.symbol}`;

const report = (description: string) => (placed: boolean) =>
  Console.log(formatOrderResult(description, placed));

// --- Read commands ---

const quote = Command.make("quote", { symbol }).pipe(
  Command.withDescription("Show the quote for a stock or ETF"),
  Command.withHandler(({ symbol }) =>
    afterLogin(
      Effect.gen(function* () {
        const broker = yield* Broker;
        yield* Console.log(formatQuote(yield* broker.quote(symbol)));
      }),
    )
  ),
  inSession,
);

const cash = Command.make("cash", { account }).pipe(
  Command.withDescription("Show the cash available to trade in an account"),
  Command.withHandler(({ account }) =>
    afterLogin(
      Effect.gen(function* () {
        const broker = yield* Broker;
        const amount = yield* broker.cashAvailableToTrade(account);
        yield* Console.log(formatCash(account, amount));
      }),
    )
  ),
  inSession,
);

const positions = Command.make("positions", {
  output: Options.text("output").pipe(
    Options.withDescription(
      "Where to save the positions CSV (default: the site's file name, here)",
    ),
    Options.optional,
  ),
}).pipe(
  Command.withDescription("Download the portfolio positions CSV"),
  Command.withHandler(({ output }) =>
    afterLogin(
      Effect.gen(function* () {
        const broker = yield* Broker;
        const path = yield* broker.downloadPositions(
          Option.getOrUndefined(output),
        );
        yield* Console.log(`Positions saved to ${path}`);
      }),
    )
  ),
  inSession,
);

// --- Stock and ETF orders ---

const market = Command.make("market", {
  account,
  symbol,
  action,
  unit,
  quantity,
}).pipe(
  Command.withDescription("Place a market order"),
  Command.withHandler((order) =>
    afterLogin(
      Broker.pipe(
        Effect.flatMap((broker) => broker.marketOrder(order)),
        Effect.flatMap(report(describe("Market", order))),
      ),
    )
  ),
  inSession,
);

const limitOrder = Command.make("limit", {
  account,
  symbol,
  action,
  unit,
  quantity,
  limit,
}).pipe(
  Command.withDescription("Place a limit order"),
  Command.withHandler((order) =>
    afterLogin(
      Broker.pipe(
        Effect.flatMap((broker) => broker.limitOrder(order)),
        Effect.flatMap(report(`${describe("Limit", order)} at ${order.limit}`)),
      ),
    )
  ),
  inSession,
);

const marketableLimit = Command.make("marketable-limit", {
  account,
  symbol,
  action,
  unit,
  quantity,
  buffer,
}).pipe(
  Command.withDescription("Place a limit order priced just past the bid or ask"),
  Command.withHandler((order) =>
    afterLogin(
      Broker.pipe(
        Effect.flatMap((broker) => broker.marketableLimitOrder(order)),
        Effect.flatMap(report(describe("Marketable limit", order))),
      ),
    )
  ),
  inSession,
);

const gtc = Command.make("gtc", {
  account,
  symbol,
  action,
  shares: Options.text("shares").pipe(
    Options.withDescription("Number of shares"),
  ),
  limit,
}).pipe(
  Command.withDescription("Place a good-til-canceled limit order"),
  Command.withHandler((order) =>
    afterLogin(
      Broker.pipe(
        Effect.flatMap((broker) => broker.gtcOrder(order)),
        Effect.flatMap(
          report(
            `GTC ${order.action.toLowerCase()} of ${order.shares} shares ${order.symbol} at ${order.limit}`,
          ),
        ),
      ),
    )
  ),
  inSession,
);

const order = Command.make("order").pipe(
  Command.withDescription("Stock and ETF orders"),
  Command.withSubcommands([market, limitOrder, marketableLimit, gtc]),
);

// --- Mutual fund orders ---

const fundBuy = Command.make("buy", {
  account,
  symbol,
  dollars: Options.text("dollars").pipe(
    Options.withDescription("Amount to buy in dollars"),
  ),
}).pipe(
  Command.withDescription("Buy a mutual fund"),
  Command.withHandler((order) =>
    afterLogin(
      Broker.pipe(
        Effect.flatMap((broker) => broker.buyMutualFund(order)),
        Effect.flatMap(report(`Buy of $${order.dollars} ${order.symbol}`)),
      ),
    )
  ),
  inSession,
);

const fundSell = Command.make("sell", {
  account,
  symbol,
  unit,
  quantity,
}).pipe(
  Command.withDescription("Sell a mutual fund"),
  Command.withHandler((order) =>
    afterLogin(
      Broker.pipe(
        Effect.flatMap((broker) => broker.sellMutualFund(order)),
        Effect.flatMap(
          report(
            `Sell of ${order.quantity} ${order.unit.toLowerCase()} ${order.symbol}`,
          ),
        ),
      ),
    )
  ),
  inSession,
);

const fundExchange = Command.make("exchange", {
  account,
  sellSymbol: Options.text("sell-symbol").pipe(
    Options.withDescription("Mutual fund to sell"),
  ),
  unit,
  quantity,
  buySymbol: Options.text("buy-symbol").pipe(
    Options.withDescription("Mutual fund to buy"),
  ),
}).pipe(
  Command.withDescription("Exchange one mutual fund for another"),
  Command.withHandler((order) =>
    afterLogin(
      Broker.pipe(
        Effect.flatMap((broker) => broker.exchangeMutualFund(order)),
        Effect.flatMap(
          report(
            `Exchange of ${order.quantity} ${order.unit.toLowerCase()} ${order.sellSymbol} for ${order.buySymbol}`,
          ),
        ),
      ),
    )
  ),
  inSession,
);

const fund = Command.make("fund").pipe(
  Command.withDescription("Mutual fund orders"),
  Command.withSubcommands([fundBuy, fundSell, fundExchange]),
);

// --- Run ---

const command = Command.make("trade-ticket").pipe(
  Command.withSubcommands([quote, cash, positions, order, fund]),
);

const cli = Command.run(command, {
  name: "trade-ticket",
  version: "0.1.0",
});

const logCliError = (e: CliError) => Console.error(formatError(e));

cli(process.argv).pipe(
  Effect.catchTags({
    PageError: logCliError,
    ParseError: logCliError,
    InvalidArgument: logCliError,
  }),
  Effect.catchIf(ConfigError.isConfigError, logCliError),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
