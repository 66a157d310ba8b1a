import type { MediaBus, PlayerConnection } from "./bus/mediaBus.js";
import { PLAYER_ALIAS } from "./config.js";
import type { PlayerDirectory } from "./directory.js";
import { ConnectionError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export type SessionState =
  | { kind: "disconnected" }
  | { kind: "connected"; connection: PlayerConnection; unsubscribe: () => void };

export interface PlayerSessionOptions {
  /** Configured target: a player name or the aggregate alias. */
  player: string;
  onSignal: (signal: PlayerSignal, player: string) => void;
  log?: Logger;
}

/**
 * Owns the connection to one concrete player. Only one handle is ever held;
 * it is released before a new one can be acquired.
 */
export class PlayerSession {
  private state: SessionState = { kind: "disconnected" };
  private readonly log: Logger;

  constructor(
    private readonly bus: MediaBus,
    private readonly directory: PlayerDirectory,
    private readonly options: PlayerSessionOptions
  ) {
    this.log = options.log ?? createLogger("mpris", "session");
  }

  get target(): string {
    return this.options.player;
  }

  get isAlias(): boolean {
    return this.options.player === PLAYER_ALIAS;
  }

  get connection(): PlayerConnection | null {
    return this.state.kind === "connected" ? this.state.connection : null;
  }

  /** Name of the bound player, or null while disconnected. */
  get boundName(): string | null {
    return this.connection?.name ?? null;
  }

  async ensureConnected(): Promise<PlayerConnection> {
    if (this.state.kind === "connected") return this.state.connection;

    const name = await this.resolveTarget();
    let connection: PlayerConnection;
    try {
      connection = await this.bus.connect(name);
    } catch (error) {
      throw new ConnectionError(name, error);
    }

    const unsubscribe = connection.subscribe((signal) => {
      this.log.debug(`player-${signal} signal`, { player: name });
      this.options.onSignal(signal, name);
    });
    this.state = { kind: "connected", connection, unsubscribe };
    this.log.debug("connected", { player: name });
    return connection;
  }

  /** Releases the handle if bound; the next pass reconnects. */
  invalidate(reason: string): void {
    if (this.state.kind !== "connected") return;
    const { connection, unsubscribe } = this.state;
    this.state = { kind: "disconnected" };
    unsubscribe();
    connection.close();
    this.log.debug("disconnected", { player: connection.name, reason });
  }

  /** Returns true when the vanished name was the bound player. */
  handleVanished(name: string): boolean {
    if (this.boundName !== name) return false;
    this.invalidate("vanished");
    return true;
  }

  private async resolveTarget(): Promise<string> {
    if (!this.isAlias) return this.options.player;
    const player = await this.directory.mostRecentPlayer();
    if (!player) throw new ConnectionError(this.options.player, "no players running");
    return player;
  }
}
