import { EventEmitter } from "node:events";
import DBus from "dbus-next";
import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";

import {
  DBusMediaBus,
  metadataNumber,
  metadataRecord,
  metadataText,
  playerSignals,
  type BusConnection,
  type RemoteObject,
} from "../src/bus/dbusBus.js";

const { Variant } = DBus;

const DAEMON = "org.freedesktop.DBus";
const PROPERTIES = "org.freedesktop.DBus.Properties";
const PLAYER = "org.mpris.MediaPlayer2.Player";
const PLAYERCTLD = "org.mpris.MediaPlayer2.playerctld";
const PLAYERCTLD_IFACE = "com.github.altdesktop.playerctld";

/** Proxy interface: an emitter carrying the remote methods as members. */
class StubInterface extends EventEmitter {
  [member: string]: unknown;

  constructor(methods: Record<string, unknown> = {}) {
    super();
    Object.assign(this, methods);
  }
}

/** In-process stand-in for the session bus connection. */
class StubBus extends EventEmitter implements BusConnection {
  names: string[] = [DAEMON, ":1.4"];
  disconnected = false;
  readonly daemon = new StubInterface({ ListNames: async () => [...this.names] });
  private readonly objects = new Map<string, Record<string, StubInterface>>([
    [DAEMON, { [DAEMON]: this.daemon }],
  ]);

  add(name: string, interfaces: Record<string, StubInterface>): void {
    this.objects.set(name, interfaces);
    if (!this.names.includes(name)) this.names.push(name);
  }

  /** Runs playerctld; its Get fails when the order is an error. */
  addPlayerctld(order: string[] | Error): StubInterface {
    const props = new StubInterface({
      Get: async (iface: string, property: string) => {
        if (order instanceof Error) throw order;
        if (iface !== PLAYERCTLD_IFACE || property !== "PlayerNames") {
          throw new Error(`no property ${iface}.${property}`);
        }
        return new Variant("as", order);
      },
    });
    this.add(PLAYERCTLD, { [PROPERTIES]: props });
    return props;
  }

  async getProxyObject(name: string, _path: string): Promise<RemoteObject> {
    const interfaces = this.objects.get(name);
    if (!interfaces) throw new Error(`The name ${name} was not provided by any .service files`);
    return {
      getInterface: (iface: string) => {
        const found = interfaces[iface];
        if (!found) throw new Error(`interface not found in proxy object: ${iface}`);
        return found;
      },
    };
  }

  disconnect(): void {
    this.disconnected = true;
  }
}

const mpris = (player: string) => `org.mpris.MediaPlayer2.${player}`;

describe("DBusMediaBus.listPlayers", () => {
  let bus: StubBus;

  beforeEach(() => {
    bus = new StubBus();
    bus.add(mpris("spotify"), {});
    bus.add(mpris("vlc"), {});
  });

  it("lists MPRIS players in bus order without playerctld", async () => {
    bus.add("org.gnome.Shell", {});

    expect(await new DBusMediaBus(bus).listPlayers()).toEqual(["spotify", "vlc"]);
  });

  it("orders players by playerctld's PlayerNames", async () => {
    bus.addPlayerctld([mpris("vlc"), mpris("spotify")]);

    expect(await new DBusMediaBus(bus).listPlayers()).toEqual(["vlc", "spotify"]);
  });

  it("never lists playerctld and drops duplicates", async () => {
    bus.addPlayerctld([mpris("vlc"), PLAYERCTLD, mpris("spotify"), mpris("vlc")]);

    expect(await new DBusMediaBus(bus).listPlayers()).toEqual(["vlc", "spotify"]);
  });

  it("falls back to bus order when playerctld cannot be read", async () => {
    bus.addPlayerctld(new Error("org.freedesktop.DBus.Error.NoReply"));

    expect(await new DBusMediaBus(bus).listPlayers()).toEqual(["spotify", "vlc"]);
  });
});

describe("DBusMediaBus.watchPlayers", () => {
  let bus: StubBus;
  let watcher: {
    onAppeared: Mock<(name: string) => void>;
    onVanished: Mock<(name: string) => void>;
    onActiveChanged: Mock<() => void>;
  };

  beforeEach(() => {
    bus = new StubBus();
    watcher = {
      onAppeared: vi.fn<(name: string) => void>(),
      onVanished: vi.fn<(name: string) => void>(),
      onActiveChanged: vi.fn<() => void>(),
    };
  });

  it("maps name owner changes to appearances and vanishes", async () => {
    await new DBusMediaBus(bus).watchPlayers(watcher);

    bus.daemon.emit("NameOwnerChanged", mpris("vlc"), "", ":1.7");
    bus.daemon.emit("NameOwnerChanged", mpris("vlc"), ":1.7", "");

    expect(watcher.onAppeared.mock.calls).toEqual([["vlc"]]);
    expect(watcher.onVanished.mock.calls).toEqual([["vlc"]]);
  });

  it("ignores owner hand-overs, other names and playerctld", async () => {
    await new DBusMediaBus(bus).watchPlayers(watcher);

    bus.daemon.emit("NameOwnerChanged", mpris("vlc"), ":1.7", ":1.8");
    bus.daemon.emit("NameOwnerChanged", "org.gnome.Shell", "", ":1.9");
    bus.daemon.emit("NameOwnerChanged", PLAYERCTLD, "", ":1.3");
    bus.daemon.emit("NameOwnerChanged", PLAYERCTLD, ":1.3", "");

    expect(watcher.onAppeared).not.toHaveBeenCalled();
    expect(watcher.onVanished).not.toHaveBeenCalled();
  });

  it("reports a new most recent player from playerctld", async () => {
    const props = bus.addPlayerctld([mpris("vlc")]);
    await new DBusMediaBus(bus).watchPlayers(watcher);

    props.emit("PropertiesChanged", PLAYERCTLD_IFACE, { PlayerNames: new Variant("as", []) }, []);
    props.emit("PropertiesChanged", PLAYER, { Volume: new Variant("d", 0.5) }, []);

    expect(watcher.onActiveChanged).toHaveBeenCalledTimes(1);
  });

  it("starts following playerctld once it appears", async () => {
    await new DBusMediaBus(bus).watchPlayers(watcher);
    const props = bus.addPlayerctld([]);

    bus.daemon.emit("NameOwnerChanged", PLAYERCTLD, "", ":1.3");
    await vi.waitFor(() => expect(props.listenerCount("PropertiesChanged")).toBe(1));
    props.emit("PropertiesChanged", PLAYERCTLD_IFACE, { PlayerNames: new Variant("as", []) }, []);

    expect(watcher.onActiveChanged).toHaveBeenCalledTimes(1);
  });

  it("detaches every listener when the watch is removed", async () => {
    const props = bus.addPlayerctld([]);
    const unwatch = await new DBusMediaBus(bus).watchPlayers(watcher);

    unwatch();

    expect(bus.daemon.listenerCount("NameOwnerChanged")).toBe(0);
    expect(props.listenerCount("PropertiesChanged")).toBe(0);
  });
});

describe("DBusMediaBus connections", () => {
  let bus: StubBus;
  let player: StubInterface;
  let props: StubInterface;

  beforeEach(() => {
    bus = new StubBus();
    player = new StubInterface({ Next: vi.fn(async () => undefined) });
    props = new StubInterface({
      Get: async (_iface: string, property: string) =>
        property === "PlaybackStatus"
          ? new Variant("s", "Playing")
          : new Variant("a{sv}", { "xesam:title": new Variant("s", "Song") }),
    });
    bus.add(mpris("spotify"), { [PLAYER]: player, [PROPERTIES]: props });
  });

  it("reads properties and sends commands", async () => {
    const connection = await new DBusMediaBus(bus).connect("spotify");

    expect(connection.name).toBe("spotify");
    expect(await connection.getPlaybackStatus()).toBe("Playing");
    expect(await connection.getTitle()).toBe("Song");
    await connection.next();
    expect(player["Next"]).toHaveBeenCalledTimes(1);
  });

  it("rejects a command the player does not implement", async () => {
    const connection = await new DBusMediaBus(bus).connect("spotify");

    await expect(connection.previous()).rejects.toThrow("method Previous is not available");
  });

  it("forwards player property changes until closed", async () => {
    const connection = await new DBusMediaBus(bus).connect("spotify");
    const signals: PlayerSignal[] = [];
    connection.subscribe((signal) => signals.push(signal));

    props.emit("PropertiesChanged", PLAYER, { PlaybackStatus: new Variant("s", "Paused") }, []);
    connection.close();
    props.emit("PropertiesChanged", PLAYER, { PlaybackStatus: new Variant("s", "Playing") }, []);

    expect(signals).toEqual(["pause"]);
    expect(props.listenerCount("PropertiesChanged")).toBe(0);
  });

  it("reports bus connection errors", () => {
    const mediaBus = new DBusMediaBus(bus);
    const onError = vi.fn<(error: Error) => void>();
    mediaBus.onError(onError);

    const error = new Error("connection closed");
    bus.emit("error", error);

    expect(onError).toHaveBeenCalledWith(error);
  });
});

describe("MPRIS property helpers", () => {
  const metadata = metadataRecord(
    new Variant("a{sv}", {
      "xesam:title": new Variant("s", "Song"),
      "xesam:artist": new Variant("as", ["A", "B"]),
      "mpris:length": new Variant("x", 201000000n),
    })
  );

  it("unwraps the metadata variants", () => {
    expect(metadata).toEqual({
      "xesam:title": "Song",
      "xesam:artist": ["A", "B"],
      "mpris:length": 201000000n,
    });
  });

  it("reads text and joins artist lists", () => {
    expect(metadataText(metadata, "xesam:title")).toBe("Song");
    expect(metadataText(metadata, "xesam:artist")).toBe("A, B");
    expect(metadataText(metadata, "xesam:album")).toBeUndefined();
  });

  it("prints the length in microseconds", () => {
    expect(metadataNumber(metadata, "mpris:length")).toBe("201000000");
    expect(metadataNumber({ "mpris:length": 0 }, "mpris:length")).toBe("0");
  });

  it("derives player signals from changed properties", () => {
    expect(
      playerSignals({
        PlaybackStatus: new Variant("s", "Paused"),
        Metadata: new Variant("a{sv}", {}),
      })
    ).toEqual(["pause", "metadata"]);
    expect(playerSignals({ PlaybackStatus: new Variant("s", "Stopped") })).toEqual(["stop"]);
    expect(playerSignals({ Volume: new Variant("d", 0.5) })).toEqual([]);
  });
});
