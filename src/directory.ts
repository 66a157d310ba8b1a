import type { MediaBus } from "./bus/mediaBus.js";
import { DirectoryError } from "./errors.js";

export class PlayerDirectory {
  constructor(private readonly bus: MediaBus) {}

  /** Running players, most recently active first. */
  async listActivePlayers(): Promise<string[]> {
    try {
      return await this.bus.listPlayers();
    } catch (error) {
      throw new DirectoryError(error);
    }
  }

  async mostRecentPlayer(): Promise<string | undefined> {
    const [first] = await this.listActivePlayers();
    return first;
  }
}

/**
 * Player name of an MPRIS instance: `firefox.instance_1_84` is `firefox`.
 */
export function playerNameOf(instance: string): string {
  const dot = instance.indexOf(".");
  return dot === -1 ? instance : instance.slice(0, dot);
}
