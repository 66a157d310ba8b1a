import { readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";

import { describe, MprisError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

export const DEFAULT_FORMAT = "{player} ({status}): {dynamic}";

/** Aggregate target: follow whichever player was active most recently. */
export const PLAYER_ALIAS = "playerctld";

const iconTable = z.record(z.string());

const schema = z
  .object({
    format: z.string().default(DEFAULT_FORMAT),
    "format-playing": z.string().optional(),
    "format-paused": z.string().optional(),
    "format-stopped": z.string().optional(),
    interval: z.number().int().nonnegative().default(0),
    player: z.string().min(1).default(PLAYER_ALIAS),
    "ignored-players": z.array(z.string()).default([]),
    "player-icons": iconTable.optional(),
    "status-icons": iconTable.optional(),
    "on-click": z.string().optional(),
    "on-middle-click": z.string().optional(),
    "on-right-click": z.string().optional(),
    "log-level": z.enum(LOG_LEVELS).default("info"),
  })
  .strict();

export type RawConfig = z.input<typeof schema>;

export interface ModuleConfig {
  format: string;
  formats: Partial<Record<StatusString, string>>;
  /** Seconds between forced refreshes; 0 disables the timer. */
  interval: number;
  player: string;
  ignoredPlayers: readonly string[];
  playerIcons?: IconTable;
  statusIcons?: IconTable;
  /** Override commands keyed by button id. */
  clickActions: Partial<Record<number, string>>;
  logLevel: LogLevel;
}

export class ConfigError extends MprisError {
  constructor(
    message: string,
    readonly source?: string
  ) {
    super(source ? `${source}: ${message}` : message);
  }
}

/**
 * Validates a raw module configuration object and maps it to the typed form.
 */
export function parseConfig(raw: unknown, source?: string): ModuleConfig {
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid configuration (${issues})`, source);
  }
  const cfg = result.data;
  return {
    format: cfg.format,
    formats: {
      playing: cfg["format-playing"],
      paused: cfg["format-paused"],
      stopped: cfg["format-stopped"],
    },
    interval: cfg.interval,
    player: cfg.player,
    ignoredPlayers: cfg["ignored-players"],
    playerIcons: cfg["player-icons"],
    statusIcons: cfg["status-icons"],
    clickActions: {
      1: cfg["on-click"],
      2: cfg["on-middle-click"],
      3: cfg["on-right-click"],
    },
    logLevel: cfg["log-level"],
  };
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
  return path.join(base, "mpris-status", "config.json");
}

/**
 * Reads and validates the configuration file. A missing file at the default
 * location yields the defaults; a missing explicit file is an error.
 */
export async function loadConfig(file?: string): Promise<ModuleConfig> {
  const target = file ?? defaultConfigPath();
  let text: string;
  try {
    text = await readFile(target, "utf8");
  } catch (error) {
    if (!file && isNotFound(error)) return parseConfig({});
    throw new ConfigError(`unable to read configuration: ${describe(error)}`, target);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`malformed JSON: ${describe(error)}`, target);
  }
  return parseConfig(raw, target);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
