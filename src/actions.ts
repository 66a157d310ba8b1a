import { spawn } from "node:child_process";

import { describe } from "./errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("mpris", "action");

export type CommandRunner = (command: string) => void;

/**
 * Runs a user command through the shell, detached from this process.
 */
export const runShellCommand: CommandRunner = (command) => {
  log.debug("running command", { command });
  const child = spawn("/bin/sh", ["-c", command], {
    detached: true,
    stdio: "ignore",
  });
  child.on("error", (error) => {
    log.error(`unable to run command: ${describe(error)}`, { command });
  });
  child.on("exit", (code) => {
    if (code) log.warn("command exited with failure", { command, code });
  });
  child.unref();
};
