// Confirm — yes/no gate the user answers at the terminal.

import { Terminal } from "@effect/platform";
import { Context, Effect, Layer } from "effect";

export class Confirm extends Context.Tag("Confirm")<
  Confirm,
  {
    readonly ask: (message: string) => Effect.Effect<boolean>;
  }
>() {}

// --- Terminal prompt ---
// "[Y/n]": an empty answer or "y" accepts. Quitting (Ctrl+C / Ctrl+D) declines.

export type ConfirmTerminal = Pick<Terminal.Terminal, "display" | "readLine">;

export const isYes = (answer: string): boolean => {
  const normalized = answer.trim().toLowerCase();
  return normalized === "" || normalized === "y";
};

export function makeConfirm(terminal: ConfirmTerminal) {
  return Confirm.of({
    ask: (message) =>
      terminal.display(`${message} [Y/n] `).pipe(
        Effect.orDie,
        Effect.zipRight(terminal.readLine),
        Effect.map(isYes),
        Effect.catchTag("QuitException", () => Effect.succeed(false)),
      ),
  });
}

export const ConfirmLive = Layer.effect(
  Confirm,
  Effect.map(Terminal.Terminal, makeConfirm),
);

// --- Unattended ---

export const ConfirmAlwaysLive = Layer.succeed(
  Confirm,
  Confirm.of({ ask: () => Effect.succeed(true) }),
);
