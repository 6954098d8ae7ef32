// BrokerPage mock — in-process page for testing and development.
//
// Records every call as a line ("click #placeOrderBtn") and answers
// reads from a fixed table keyed by selector.

import { type Context, Effect, Layer } from "effect";
import { PageError } from "../broker.ts";
import { BrokerPage } from "../page.ts";

// --- Types ---

export interface PageScript {
  /** Rendered text per selector. A list feeds `allInnerTexts`; `innerText`
   *  reads its first entry. */
  readonly texts?: Readonly<Record<string, string | ReadonlyArray<string>>>;
  /** Selector or URL whose every operation fails. */
  readonly failOn?: string;
  /** Suggested file name for a download saved without a destination. */
  readonly suggestedFilename?: string;
  /** Selector or URL whose every operation dies with a defect. */
  readonly dieOn?: string;
}

export interface RecordingPage {
  readonly page: Context.Tag.Service<BrokerPage>;
  readonly calls: ReadonlyArray<string>;
}

// --- Recording page ---

export function makeRecordingPage(script: PageScript = {}): RecordingPage {
  const calls: string[] = [];
  const texts = script.texts ?? {};

  const record = (operation: string, target: string, line: string) =>
    Effect.suspend(() => {
      calls.push(line);
      if (target === script.dieOn) {
        return Effect.die(new Error(`${operation} crashed on ${target}`));
      }
      return target === script.failOn
        ? Effect.fail(
          new PageError({ operation, target, message: "element not found" }),
        )
        : Effect.void;
    });

  const lookup = (selector: string): ReadonlyArray<string> => {
    const value = texts[selector];
    if (value === undefined) return [];
    return typeof value === "string" ? [value] : value;
  };

  const page = BrokerPage.of({
    goto: (url) => record("goto", url, `goto ${url}`),
    click: (selector) => record("click", selector, `click ${selector}`),
    fill: (selector, value) =>
      record("fill", selector, `fill ${selector} ${value}`),
    press: (selector, key) =>
      record("press", selector, `press ${selector} ${key}`),
    innerText: (selector) =>
      record("innerText", selector, `innerText ${selector}`).pipe(
        Effect.flatMap(() => {
          const [first] = lookup(selector);
          return first === undefined
            ? Effect.fail(
              new PageError({
                operation: "innerText",
                target: selector,
                message: "element not found",
              }),
            )
            : Effect.succeed(first);
        }),
      ),
    allInnerTexts: (selector) =>
      record("allInnerTexts", selector, `allInnerTexts ${selector}`).pipe(
        Effect.as(lookup(selector)),
      ),
    waitFor: (selector) => record("waitFor", selector, `waitFor ${selector}`),
    download: (selector, saveTo) =>
      record("download", selector, `download ${selector}`).pipe(
        Effect.as(saveTo ?? script.suggestedFilename ?? "Portfolio_Positions.csv"),
      ),
  });

  return { page, calls };
}

// --- Sample ticket ---

export const sampleTicket: PageScript = {
  texts: {
    ".funds-cash": "$12,345.67",
    ".company-title": "SAMPLE HOLDINGS INC",
    ".last-price": "$101.25",
    ".eq-ticket__symbol__dollar_percent_chg_font": ["+$1.25", "(+1.25%)"],
    ".block-price-layout": ["$101.20 x 300", "$101.30 x 1,200"],
    ".block-volume": "4,567,890",
    ".number": ["$101.20", "$101.30"],
  },
};

export const BrokerPageTestLive = Layer.sync(
  BrokerPage,
  () => makeRecordingPage(sampleTicket).page,
);
