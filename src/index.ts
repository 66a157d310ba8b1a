#!/usr/bin/env node
import { parseArgs } from "node:util";

import { DBusMediaBus } from "./bus/dbusBus.js";
import { loadConfig, type ModuleConfig } from "./config.js";
import { describe } from "./errors.js";
import { StdioHost } from "./host.js";
import { configureLogging, createLogger, LOG_LEVELS, type LogLevel } from "./logger.js";
import { MprisModule } from "./module.js";

const log = createLogger("mpris");

const { values } = parseArgs({
  options: {
    config: { type: "string", short: "c" },
    "log-level": { type: "string", short: "l" },
  },
});

const levelArg = values["log-level"];
let level: LogLevel | undefined;
if (levelArg !== undefined) {
  if (!isLogLevel(levelArg)) {
    log.error(`unknown log level "${levelArg}", expected one of ${LOG_LEVELS.join(", ")}`);
    process.exit(2);
  }
  level = levelArg;
}

let config: ModuleConfig;
try {
  config = await loadConfig(values.config);
} catch (error) {
  log.error(describe(error));
  process.exit(1);
}
configureLogging({ level: level ?? config.logLevel });

let bus: DBusMediaBus;
try {
  bus = new DBusMediaBus();
} catch (error) {
  log.error(`unable to connect to the session bus: ${describe(error)}`);
  process.exit(1);
}
const host = new StdioHost({ onError: () => void shutdown(1) });
const mpris = new MprisModule(config, { bus, host });

let stopping = false;
async function shutdown(code = 0): Promise<void> {
  if (stopping) return;
  stopping = true;
  // force exit if a bus call never settles
  const forceExit = setTimeout(() => process.exit(1), 3000);
  try {
    await mpris.stop();
  } catch (error) {
    log.error(`shutdown failed: ${describe(error)}`);
  }
  host.close();
  bus.disconnect();
  clearTimeout(forceExit);
  process.exit(code);
}

bus.onError((error) => {
  log.error(`session bus failed: ${describe(error)}`);
  void shutdown(1);
});
process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());

try {
  await mpris.start();
} catch (error) {
  log.error(`unable to create MPRIS client: ${describe(error)}`);
  host.close();
  bus.disconnect();
  process.exit(1);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
