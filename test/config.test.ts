import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  ConfigError,
  DEFAULT_FORMAT,
  defaultConfigPath,
  loadConfig,
  parseConfig,
} from "../src/config.js";

describe("parseConfig", () => {
  it("fills in the defaults", () => {
    expect(parseConfig({})).toEqual({
      format: DEFAULT_FORMAT,
      formats: { playing: undefined, paused: undefined, stopped: undefined },
      interval: 0,
      player: "playerctld",
      ignoredPlayers: [],
      playerIcons: undefined,
      statusIcons: undefined,
      clickActions: { 1: undefined, 2: undefined, 3: undefined },
      logLevel: "info",
    });
  });

  it("maps the recognised keys", () => {
    const config = parseConfig({
      "format-paused": "{title}",
      interval: 5,
      player: "spotify",
      "ignored-players": ["firefox"],
      "status-icons": { paused: "||", default: ">" },
      "on-right-click": "notify-send next",
      "log-level": "debug",
    });

    expect(config.formats.paused).toBe("{title}");
    expect(config.interval).toBe(5);
    expect(config.player).toBe("spotify");
    expect(config.ignoredPlayers).toEqual(["firefox"]);
    expect(config.statusIcons).toEqual({ paused: "||", default: ">" });
    expect(config.clickActions[3]).toBe("notify-send next");
    expect(config.logLevel).toBe("debug");
  });

  it("rejects a negative interval", () => {
    expect(() => parseConfig({ interval: -1 })).toThrow(ConfigError);
    expect(() => parseConfig({ interval: -1 })).toThrow(/interval:/);
  });

  it("rejects unknown keys", () => {
    expect(() => parseConfig({ "max-length": 20 })).toThrow(/invalid configuration/);
  });
});

describe("defaultConfigPath", () => {
  it("honours XDG_CONFIG_HOME", () => {
    expect(defaultConfigPath({ XDG_CONFIG_HOME: "/tmp/cfg" })).toBe(
      "/tmp/cfg/mpris-status/config.json"
    );
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "mpris-status-tests-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads a JSON file", async () => {
    const file = path.join(dir, "config.json");
    await fs.writeFile(file, JSON.stringify({ player: "mpv", interval: 1 }));

    const config = await loadConfig(file);

    expect(config.player).toBe("mpv");
    expect(config.interval).toBe(1);
  });

  it("rejects malformed JSON", async () => {
    const file = path.join(dir, "config.json");
    await fs.writeFile(file, "{ player: ");

    await expect(loadConfig(file)).rejects.toThrow(/malformed JSON/);
  });

  it("rejects a missing explicit file", async () => {
    await expect(loadConfig(path.join(dir, "absent.json"))).rejects.toBeInstanceOf(ConfigError);
  });
});
