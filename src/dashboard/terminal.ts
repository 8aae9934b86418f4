import readline from "readline";
import type { Logger } from "../logging/logger.js";
import type { DashboardController } from "./controller.js";

export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export interface TerminalLoopDeps {
  controller: DashboardController;
  input: KeyInput;
  logger: Logger;
  refreshIntervalMs: number;
  signal?: AbortSignal;
}

/**
 * Drives the controller from a keyboard stream: a redraw every refresh
 * interval, and one right after any key that changed something. Keys are
 * handled one at a time, in arrival order. Resolves when the operator quits
 * or the signal aborts; the input is restored to its previous mode.
 */
export function runTerminalLoop(deps: TerminalLoopDeps): Promise<void> {
  const { controller, input, logger, signal } = deps;

  return new Promise<void>((resolve) => {
    let stopped = false;
    let keyChain: Promise<void> = Promise.resolve();
    const wasRaw = input.isRaw ?? false;

    const refresh = (): void => {
      if (stopped) return;
      try {
        controller.refresh();
      } catch (err) {
        logger.error("render failed", err);
      }
    };

    const onKey = (str: string | undefined, key: readline.Key | undefined): void => {
      const pressed = key?.ctrl && key.name === "c" ? "\u0003" : (str ?? key?.sequence ?? "");
      if (!pressed) return;
      keyChain = keyChain
        .then(async () => {
          if (stopped) return;
          logger.debug(`key ${JSON.stringify(pressed)}, pending=${controller.pending ?? "none"}`);
          const outcome = await controller.handleKey(pressed);
          if (outcome === "quit") stop();
          else if (outcome !== "ignored") refresh();
        })
        .catch((err: unknown) => logger.error("key handling failed", err));
    };

    const stop = (): void => {
      if (stopped) return;
      stopped = true;
      clearInterval(timer);
      input.removeListener("keypress", onKey);
      signal?.removeEventListener("abort", stop);
      if (input.isTTY && input.setRawMode) input.setRawMode(wasRaw);
      input.pause();
      resolve();
    };

    readline.emitKeypressEvents(input);
    if (input.isTTY && input.setRawMode) input.setRawMode(true);
    input.on("keypress", onKey);
    input.resume();

    const timer = setInterval(refresh, deps.refreshIntervalMs);
    if (signal?.aborted) {
      stop();
      return;
    }
    signal?.addEventListener("abort", stop, { once: true });
    refresh();
  });
}
