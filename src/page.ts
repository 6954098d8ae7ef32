// BrokerPage — the single browser page a trading session drives.

import { Context, type Effect } from "effect";
import type { PageError } from "./broker.ts";

export class BrokerPage extends Context.Tag("BrokerPage")<
  BrokerPage,
  {
    readonly goto: (url: string) => Effect.Effect<void, PageError>;
    readonly click: (selector: string) => Effect.Effect<void, PageError>;
    readonly fill: (
      selector: string,
      value: string,
    ) => Effect.Effect<void, PageError>;
    readonly press: (
      selector: string,
      key: string,
    ) => Effect.Effect<void, PageError>;
    readonly innerText: (selector: string) => Effect.Effect<string, PageError>;
    readonly allInnerTexts: (
      selector: string,
    ) => Effect.Effect<ReadonlyArray<string>, PageError>;
    readonly waitFor: (selector: string) => Effect.Effect<void, PageError>;
    /** Click `selector` and save the download it starts to `saveTo`, or to
     *  the suggested file name in the working directory. Resolves to where
     *  the file was saved. */
    readonly download: (
      selector: string,
      saveTo?: string,
    ) => Effect.Effect<string, PageError>;
  }
>() {}
