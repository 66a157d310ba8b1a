import type { PlayerConnection } from "./bus/mediaBus.js";
import { playerNameOf, type PlayerDirectory } from "./directory.js";
import { describe, QueryError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { PlayerSession } from "./session.js";

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

const STATUS_STRINGS: Record<PlaybackStatus, StatusString> = {
  Playing: "playing",
  Paused: "paused",
  Stopped: "stopped",
};

export interface SnapshotOptions {
  ignoredPlayers: readonly string[];
  log?: Logger;
}

/**
 * Reads the current state of the bound player. Resolves to a complete
 * PlayerInfo or to null; a failed query never leaves a partial value behind.
 */
export async function getPlayerInfo(
  session: PlayerSession,
  directory: PlayerDirectory,
  options: SnapshotOptions
): Promise<PlayerInfo | null> {
  const log = options.log ?? createLogger("mpris", "snapshot");
  const connection = session.connection;
  if (!connection) {
    log.debug("no player", { player: session.target });
    return null;
  }

  try {
    return await fetchSnapshot(connection, session.isAlias ? directory : null, options, log);
  } catch (error) {
    log.error(describe(error), { player: connection.name });
    return null;
  }
}

async function fetchSnapshot(
  connection: PlayerConnection,
  directory: PlayerDirectory | null,
  options: SnapshotOptions,
  log: Logger
): Promise<PlayerInfo | null> {
  const status = parsePlaybackStatus(
    await query("status", () => connection.getPlaybackStatus())
  );

  // the alias follows the most recently active player, which may differ from the bound one
  const instance = (directory && (await directory.mostRecentPlayer())) || connection.name;
  const name = playerNameOf(instance);

  if (options.ignoredPlayers.some((ignored) => ignored === name || ignored === instance)) {
    log.info("ignoring player update", { player: instance });
    return null;
  }

  const info: Mutable<PlayerInfo> = {
    name,
    instance,
    status,
    statusString: STATUS_STRINGS[status],
  };

  const artist = present(await query("artist", () => connection.getArtist()));
  if (artist) {
    info.artist = artist;
    log.debug("artist", { player: name, artist });
  }
  const album = present(await query("album", () => connection.getAlbum()));
  if (album) {
    info.album = album;
    log.debug("album", { player: name, album });
  }
  const title = present(await query("title", () => connection.getTitle()));
  if (title) {
    info.title = title;
    log.debug("title", { player: name, title });
  }
  const length = formatLength(await query("length", () => connection.getLength()));
  if (length) {
    info.length = length;
    log.debug("mpris:length", { player: name, length });
  }

  return Object.freeze(info);
}

export function parsePlaybackStatus(raw: string): PlaybackStatus {
  switch (raw) {
    case "Playing":
    case "Paused":
    case "Stopped":
      return raw;
    default:
      throw new QueryError("status", `unexpected playback status "${raw}"`);
  }
}

/** Microseconds as `HH:MM:SS` (or `MM:SS` below an hour); absent when not positive. */
export function formatLength(raw: string | undefined): string | undefined {
  if (raw === undefined) return undefined;
  const micros = Number.parseInt(raw, 10);
  if (!Number.isFinite(micros) || micros <= 0) return undefined;

  const total = Math.floor(micros / 1_000_000);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  return hours > 0
    ? `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`
    : `${pad(minutes)}:${pad(seconds)}`;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

async function query<T>(field: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new QueryError(field, error);
  }
}
