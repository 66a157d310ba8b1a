import readline from "node:readline";
import { z } from "zod";

import { describe } from "./errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("mpris", "host");

export interface HostUpdate {
  /** Markup text for the cell. */
  text: string;
  status: StatusString;
  player: string;
}

/** Boundary to the program that displays the cell and reports clicks. */
export interface BarHost {
  publish(update: HostUpdate): void;
  hide(): void;
  onClick(listener: (button: number) => void): () => void;
  close(): void;
}

/**
 * Style classes on the cell: one for the status and one for the player, each
 * replacing its previous value.
 */
export class StyleClasses {
  private readonly classes = new Set<string>();
  private lastStatus = "";
  private lastPlayer = "";

  apply(status: string, player: string): string[] {
    if (this.lastStatus) this.classes.delete(this.lastStatus);
    if (this.lastPlayer) this.classes.delete(this.lastPlayer);
    this.classes.add(status);
    this.classes.add(player);
    this.lastStatus = status;
    this.lastPlayer = player;
    return [...this.classes];
  }

  list(): string[] {
    return [...this.classes];
  }
}

const clickEvent = z.object({ button: z.number().int() }).passthrough();

/**
 * Parses one click line: a bare button id, or a click-event object with a
 * `button` member as sent inside an endless JSON array.
 */
export function parseClickLine(line: string): number | null {
  const trimmed = line.trim().replace(/^[[,]\s*/, "");
  if (!trimmed) return null;
  if (/^\d+$/.test(trimmed)) return Number(trimmed);
  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    return null;
  }
  const parsed = clickEvent.safeParse(raw);
  return parsed.success ? parsed.data.button : null;
}

export interface StdioHostOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Called once the output stream fails, e.g. when the bar closes the pipe. */
  onError?: (error: Error) => void;
}

/**
 * Writes one JSON object per update to stdout (`text`, `alt`, `class`) and
 * reads click lines from stdin.
 */
export class StdioHost implements BarHost {
  private readonly output: NodeJS.WritableStream;
  private readonly reader: readline.Interface;
  private readonly listeners = new Set<(button: number) => void>();
  private readonly styles = new StyleClasses();
  private lastLine: string | null = null;
  private visible = false;
  private broken = false;

  constructor(options: StdioHostOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.output.on("error", (error: Error) => {
      if (this.broken) return;
      this.broken = true;
      log.error(`output failed: ${describe(error)}`);
      options.onError?.(error);
    });
    this.reader = readline.createInterface({
      input: options.input ?? process.stdin,
      terminal: false,
    });
    this.reader.on("line", (line: string) => this.handleLine(line));
  }

  get isVisible(): boolean {
    return this.visible;
  }

  publish(update: HostUpdate): void {
    this.visible = true;
    this.write({
      text: update.text,
      alt: update.player,
      class: this.styles.apply(update.status, update.player),
    });
  }

  hide(): void {
    if (!this.visible && this.lastLine !== null) return;
    this.visible = false;
    this.write({ text: "", class: [] });
  }

  onClick(listener: (button: number) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  close(): void {
    this.listeners.clear();
    this.reader.close();
  }

  private write(payload: Record<string, unknown>): void {
    const line = JSON.stringify(payload);
    if (this.broken || line === this.lastLine) return;
    this.lastLine = line;
    this.output.write(`${line}\n`);
  }

  private handleLine(line: string): void {
    const button = parseClickLine(line);
    if (button === null) {
      if (line.trim() && line.trim() !== "[") log.debug("ignoring input line", { line });
      return;
    }
    for (const listener of [...this.listeners]) listener(button);
  }
}
