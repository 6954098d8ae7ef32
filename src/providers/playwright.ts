// Playwright — implementation of BrokerPage.

import { Config, Console, Effect, Layer } from "effect";
import {
  chromium,
  type Download,
  firefox,
  type Page,
  webkit,
} from "playwright-core";
import { PageError } from "../broker.ts";
import { BrokerPage } from "../page.ts";

const engines = { chromium, firefox, webkit } as const;

// --- Config ---

export const BrowserConfig = Config.all({
  engine: Config.literal("chromium", "firefox", "webkit")("BROKER_BROWSER").pipe(
    Config.withDefault("firefox" as const),
  ),
  headless: Config.boolean("BROKER_HEADLESS").pipe(Config.withDefault(false)),
  timeout: Config.integer("BROKER_TIMEOUT").pipe(
    Config.withDefault(10),
    Config.validate({
      message: "timeout must be positive",
      validation: (seconds) => seconds > 0,
    }),
  ),
});

// --- Page wrapper ---

/** Playwright deletes its temporary copy when the browser closes, so a
 *  download always lands in `saveTo`, or under the site's suggested name in
 *  the working directory. */
export async function saveDownload(
  download: Pick<Download, "saveAs" | "suggestedFilename">,
  saveTo?: string,
): Promise<string> {
  const destination = saveTo ?? download.suggestedFilename();
  await download.saveAs(destination);
  return destination;
}

function attempt<A>(
  operation: string,
  target: string,
  run: () => Promise<A>,
): Effect.Effect<A, PageError> {
  return Effect.tryPromise({
    try: run,
    catch: (e) =>
      new PageError({
        operation,
        target,
        message: e instanceof Error ? e.message : String(e),
      }),
  });
}

export function fromPlaywright(page: Page) {
  return BrokerPage.of({
    goto: (url) => attempt("goto", url, () => page.goto(url)).pipe(Effect.asVoid),
    click: (selector) => attempt("click", selector, () => page.click(selector)),
    fill: (selector, value) =>
      attempt("fill", selector, () => page.fill(selector, value)),
    press: (selector, key) =>
      attempt("press", selector, () => page.locator(selector).press(key)),
    innerText: (selector) =>
      attempt("innerText", selector, () => page.innerText(selector)),
    allInnerTexts: (selector) =>
      attempt("allInnerTexts", selector, () =>
        page.locator(selector).allInnerTexts()
      ),
    waitFor: (selector) =>
      attempt("waitFor", selector, () => page.locator(selector).waitFor()),
    download: (selector, saveTo) =>
      attempt("download", selector, async () => {
        const [download] = await Promise.all([
          page.waitForEvent("download"),
          page.click(selector),
        ]);
        return saveDownload(download, saveTo);
      }),
  });
}

// --- Playwright layer ---

export const PlaywrightPageLive = Layer.scoped(
  BrokerPage,
  Effect.gen(function* () {
    const { engine, headless, timeout } = yield* BrowserConfig;

    const browser = yield* Effect.acquireRelease(
      attempt("launch", engine, () => engines[engine].launch({ headless })),
      (browser) =>
        attempt("close", engine, () => browser.close()).pipe(
          Effect.tap(() => Console.debug(`[page] ${engine} closed`)),
          Effect.catchAll((e) =>
            Console.error(`[page] failed to close ${engine}: ${e.message}`)
          ),
        ),
    );

    const page = yield* attempt("newPage", engine, () => browser.newPage());
    page.setDefaultTimeout(timeout * 1000);
    yield* Console.debug(
      `[page] ${engine} ready (headless: ${headless}, timeout: ${timeout}s)`,
    );

    return fromPlaywright(page);
  }),
);
