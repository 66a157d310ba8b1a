import type { PlayerConnection } from "./bus/mediaBus.js";
import type { CommandRunner } from "./actions.js";
import { describe } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

type BuiltinCommand = "playPause" | "previous" | "next";

const BUILTIN_COMMANDS: Partial<Record<number, BuiltinCommand>> = {
  1: "playPause",
  2: "previous",
  3: "next",
};

export interface InputDispatcherOptions {
  getSnapshot: () => PlayerInfo | null;
  getConnection: () => PlayerConnection | null;
  /** Override commands keyed by button id. */
  clickActions: Partial<Record<number, string>>;
  runCommand: CommandRunner;
  log?: Logger;
}

export class InputDispatcher {
  private readonly log: Logger;

  constructor(private readonly options: InputDispatcherOptions) {
    this.log = options.log ?? createLogger("mpris", "input");
  }

  /** Resolves to whether the click was handled. */
  async handleClick(button: number): Promise<boolean> {
    const info = this.options.getSnapshot();
    if (!info) return false;

    const override = this.options.clickActions[button];
    if (override) {
      this.options.runCommand(override);
      return true;
    }

    const command = BUILTIN_COMMANDS[button];
    const connection = this.options.getConnection();
    if (!command || !connection) return false;

    try {
      await connection[command]();
    } catch (error) {
      this.log.error(`error running builtin on-click action: ${describe(error)}`, {
        player: info.name,
        button,
      });
      return false;
    }
    return true;
  }
}
