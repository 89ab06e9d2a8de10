import type { AppEvent } from "@tailscope/contracts";
import { type App, type EventQueue, formatError, type Logger, toError } from "@tailscope/core";
import { parseInput } from "./input.js";
import { render } from "./render.js";

const screen = {
  enterAltScreen: "\x1b[?1049h",
  leaveAltScreen: "\x1b[?1049l",
  hideCursor: "\x1b[?25l",
  showCursor: "\x1b[?25h",
  enableMouse: "\x1b[?1000h\x1b[?1006h",
  disableMouse: "\x1b[?1000l\x1b[?1006l",
  home: "\x1b[H",
  clear: "\x1b[2J",
} as const;

/** Turns the App's tick requests into queued tick events. */
export class Ticker {
  private queue: EventQueue<AppEvent> | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly now: () => number = Date.now) {}

  attach(queue: EventQueue<AppEvent>): void {
    this.queue = queue;
  }

  readonly schedule = (delayMs: number): void => {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.queue?.push({ type: "tick", atMs: this.now() });
    }, delayMs);
  };

  stop(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }
}

export interface TerminalOptions {
  stdin: NodeJS.ReadStream;
  stdout: NodeJS.WriteStream;
  logger: Logger;
  ticker: Ticker;
}

/** Owns the terminal for the lifetime of the App: raw input, alternate screen, redraw per update. */
export async function runTerminal(app: App, { stdin, stdout, logger, ticker }: TerminalOptions): Promise<void> {
  if (!stdin.isTTY || !stdout.isTTY) {
    throw new Error("tailscope needs an interactive terminal");
  }

  const onData = (chunk: Buffer | string): void => {
    for (const event of parseInput(chunk.toString())) {
      app.queue.push(event);
    }
  };
  const onResize = (): void => {
    app.queue.push({ type: "resize", width: stdout.columns, height: stdout.rows });
  };
  const onTerminate = (): void => app.quit();

  stdin.setRawMode(true);
  stdin.setEncoding("utf8");
  stdin.on("data", onData);
  stdin.resume();
  stdout.on("resize", onResize);
  process.once("SIGTERM", onTerminate);
  stdout.write(screen.enterAltScreen + screen.hideCursor + screen.enableMouse);

  ticker.attach(app.queue);
  app.update({ type: "resize", width: stdout.columns, height: stdout.rows });
  app.start();

  try {
    await app.run((current) => {
      stdout.write(screen.home + screen.clear + render(current));
    });
  } catch (error) {
    logger.error("terminal loop failed", { error: formatError(toError(error)) });
    throw error;
  } finally {
    ticker.stop();
    app.quit();
    stdin.off("data", onData);
    stdout.off("resize", onResize);
    process.off("SIGTERM", onTerminate);
    stdout.write(screen.disableMouse + screen.showCursor + screen.leaveAltScreen);
    stdin.setRawMode(false);
    stdin.pause();
    await logger.flush();
  }
}
