import DBus from "dbus-next";

import { describe } from "../errors.js";
import { createLogger } from "../logger.js";
import type { MediaBus, PlayerConnection, PlayerWatcher } from "./mediaBus.js";

export const MPRIS_PREFIX = "org.mpris.MediaPlayer2.";
const MPRIS_PATH = "/org/mpris/MediaPlayer2";
const PLAYER_IFACE = "org.mpris.MediaPlayer2.Player";
const PROPERTIES_IFACE = "org.freedesktop.DBus.Properties";
const PLAYERCTLD = "playerctld";
const PLAYERCTLD_IFACE = "com.github.altdesktop.playerctld";

const log = createLogger("mpris", "dbus");

type NameOwnerChangedListener = (name: string, oldOwner: string, newOwner: string) => void;
type PropertiesChangedListener = (
  iface: string,
  changed: Record<string, unknown>,
  invalidated: string[]
) => void;

/** The parts of a dbus-next `ClientInterface` in use here. */
export interface RemoteInterface {
  [member: string]: unknown;
  on(event: "NameOwnerChanged", listener: NameOwnerChangedListener): unknown;
  on(event: "PropertiesChanged", listener: PropertiesChangedListener): unknown;
  removeListener(event: "NameOwnerChanged", listener: NameOwnerChangedListener): unknown;
  removeListener(event: "PropertiesChanged", listener: PropertiesChangedListener): unknown;
}

export interface RemoteObject {
  getInterface(name: string): RemoteInterface;
}

/** The parts of a dbus-next `MessageBus` in use here. */
export interface BusConnection {
  getProxyObject(name: string, path: string): Promise<RemoteObject>;
  on(event: "error", listener: (error: Error) => void): unknown;
  disconnect(): void;
}

/**
 * MediaBus over the D-Bus session bus. When playerctld runs, its
 * `PlayerNames` property supplies the activity order of the players.
 */
export class DBusMediaBus implements MediaBus {
  private daemon: Promise<RemoteInterface> | null = null;

  constructor(private readonly bus: BusConnection = DBus.sessionBus()) {}

  /** Reports a failure of the bus connection itself. */
  onError(listener: (error: Error) => void): void {
    this.bus.on("error", listener);
  }

  async listPlayers(): Promise<string[]> {
    const iface = await this.daemonInterface();
    const names = stringList(await invoke(iface, "ListNames")).filter((n) =>
      n.startsWith(MPRIS_PREFIX)
    );

    let ordered = names;
    if (names.includes(MPRIS_PREFIX + PLAYERCTLD)) {
      try {
        ordered = await this.playerctldOrder();
      } catch (error) {
        log.debug("playerctld order unavailable, using bus order", { error });
      }
    }

    const players = ordered
      .filter((n) => n.startsWith(MPRIS_PREFIX))
      .map((n) => n.slice(MPRIS_PREFIX.length))
      .filter((n) => n !== PLAYERCTLD);
    return [...new Set(players)];
  }

  async connect(name: string): Promise<PlayerConnection> {
    const obj = await this.bus.getProxyObject(MPRIS_PREFIX + name, MPRIS_PATH);
    return new DBusPlayerConnection(
      name,
      obj.getInterface(PLAYER_IFACE),
      obj.getInterface(PROPERTIES_IFACE)
    );
  }

  async watchPlayers(listener: PlayerWatcher): Promise<() => void> {
    const iface = await this.daemonInterface();
    let closed = false;
    let detachActive: (() => void) | null = null;

    // playerctld announces a new most recent player through PlayerNames
    const onActiveChanged: PropertiesChangedListener = (name, changed) => {
      if (name === PLAYERCTLD_IFACE && "PlayerNames" in changed) listener.onActiveChanged();
    };
    const watchActive = async () => {
      try {
        const props = await this.playerctldProperties();
        if (closed) return;
        detachActive?.();
        props.on("PropertiesChanged", onActiveChanged);
        detachActive = () => props.removeListener("PropertiesChanged", onActiveChanged);
      } catch (error) {
        log.debug(`playerctld not watched: ${describe(error)}`);
      }
    };

    const onNameOwnerChanged: NameOwnerChangedListener = (name, oldOwner, newOwner) => {
      if (!name.startsWith(MPRIS_PREFIX)) return;
      const player = name.slice(MPRIS_PREFIX.length);
      if (player === PLAYERCTLD) {
        if (newOwner) {
          void watchActive();
        } else {
          detachActive?.();
          detachActive = null;
        }
        return;
      }
      if (!oldOwner && newOwner) listener.onAppeared(player);
      else if (oldOwner && !newOwner) listener.onVanished(player);
    };
    iface.on("NameOwnerChanged", onNameOwnerChanged);

    let names: string[];
    try {
      names = stringList(await invoke(iface, "ListNames"));
    } catch (error) {
      iface.removeListener("NameOwnerChanged", onNameOwnerChanged);
      throw error;
    }
    if (names.includes(MPRIS_PREFIX + PLAYERCTLD)) await watchActive();

    return () => {
      closed = true;
      iface.removeListener("NameOwnerChanged", onNameOwnerChanged);
      detachActive?.();
      detachActive = null;
    };
  }

  disconnect(): void {
    this.bus.disconnect();
  }

  private daemonInterface(): Promise<RemoteInterface> {
    this.daemon ??= this.bus
      .getProxyObject("org.freedesktop.DBus", "/org/freedesktop/DBus")
      .then((obj) => obj.getInterface("org.freedesktop.DBus"))
      .catch((error: unknown) => {
        this.daemon = null;
        throw error;
      });
    return this.daemon;
  }

  private async playerctldOrder(): Promise<string[]> {
    const props = await this.playerctldProperties();
    return stringList(unwrap(await invoke(props, "Get", PLAYERCTLD_IFACE, "PlayerNames")));
  }

  private async playerctldProperties(): Promise<RemoteInterface> {
    const obj = await this.bus.getProxyObject(MPRIS_PREFIX + PLAYERCTLD, MPRIS_PATH);
    return obj.getInterface(PROPERTIES_IFACE);
  }
}

class DBusPlayerConnection implements PlayerConnection {
  private readonly listeners = new Set<(signal: PlayerSignal) => void>();

  private readonly onPropertiesChanged: PropertiesChangedListener = (iface, changed) => {
    if (iface !== PLAYER_IFACE) return;
    for (const signal of playerSignals(changed)) {
      for (const listener of [...this.listeners]) listener(signal);
    }
  };

  constructor(
    readonly name: string,
    private readonly player: RemoteInterface,
    private readonly props: RemoteInterface
  ) {}

  async getPlaybackStatus(): Promise<string> {
    const status = unwrap(await invoke(this.props, "Get", PLAYER_IFACE, "PlaybackStatus"));
    if (typeof status !== "string") {
      throw new TypeError(`PlaybackStatus has unexpected type ${typeof status}`);
    }
    return status;
  }

  async getArtist(): Promise<string | undefined> {
    return metadataText(await this.metadata(), "xesam:artist");
  }

  async getAlbum(): Promise<string | undefined> {
    return metadataText(await this.metadata(), "xesam:album");
  }

  async getTitle(): Promise<string | undefined> {
    return metadataText(await this.metadata(), "xesam:title");
  }

  async getLength(): Promise<string | undefined> {
    return metadataNumber(await this.metadata(), "mpris:length");
  }

  async playPause(): Promise<void> {
    await invoke(this.player, "PlayPause");
  }

  async previous(): Promise<void> {
    await invoke(this.player, "Previous");
  }

  async next(): Promise<void> {
    await invoke(this.player, "Next");
  }

  subscribe(listener: (signal: PlayerSignal) => void): () => void {
    if (this.listeners.size === 0) {
      this.props.on("PropertiesChanged", this.onPropertiesChanged);
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
      if (this.listeners.size === 0) {
        this.props.removeListener("PropertiesChanged", this.onPropertiesChanged);
      }
    };
  }

  close(): void {
    this.listeners.clear();
    this.props.removeListener("PropertiesChanged", this.onPropertiesChanged);
  }

  private async metadata(): Promise<Record<string, unknown>> {
    return metadataRecord(await invoke(this.props, "Get", PLAYER_IFACE, "Metadata"));
  }
}

/** Calls a D-Bus method on a proxy interface. */
async function invoke(iface: RemoteInterface, method: string, ...args: unknown[]): Promise<unknown> {
  const member = iface[method];
  if (typeof member !== "function") {
    throw new TypeError(`method ${method} is not available on the interface`);
  }
  const result: unknown = await member.apply(iface, args);
  return result;
}

export function unwrap(value: unknown): unknown {
  return value instanceof DBus.Variant ? value.value : value;
}

export function metadataRecord(value: unknown): Record<string, unknown> {
  const inner = unwrap(value);
  if (typeof inner !== "object" || inner === null || Array.isArray(inner)) return {};
  return Object.fromEntries(Object.entries(inner).map(([key, v]) => [key, unwrap(v)]));
}

/** String metadata; string lists such as `xesam:artist` are joined with ", ". */
export function metadataText(metadata: Record<string, unknown>, key: string): string | undefined {
  const value = metadata[key];
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const parts = value.filter((v): v is string => typeof v === "string");
    return parts.length ? parts.join(", ") : undefined;
  }
  return undefined;
}

export function metadataNumber(metadata: Record<string, unknown>, key: string): string | undefined {
  const value = metadata[key];
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "number" || typeof value === "string") return String(value);
  return undefined;
}

export function playerSignals(changed: Record<string, unknown>): PlayerSignal[] {
  const signals: PlayerSignal[] = [];
  switch (unwrap(changed["PlaybackStatus"])) {
    case "Playing":
      signals.push("play");
      break;
    case "Paused":
      signals.push("pause");
      break;
    case "Stopped":
      signals.push("stop");
      break;
  }
  if ("Metadata" in changed) signals.push("metadata");
  return signals;
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string");
}
