/**
 * Boundary to the media-control bus. Player names are MPRIS instance names,
 * i.e. the bus name without the `org.mpris.MediaPlayer2.` prefix.
 */
export interface MediaBus {
  /** Running players, most recently active first. */
  listPlayers(): Promise<string[]>;
  connect(name: string): Promise<PlayerConnection>;
  /** Observes players appearing, vanishing and becoming the most recent one. */
  watchPlayers(listener: PlayerWatcher): Promise<() => void>;
  disconnect(): void;
}

export interface PlayerWatcher {
  onAppeared(name: string): void;
  onVanished(name: string): void;
  /** The most recently active player changed without any player coming or going. */
  onActiveChanged(): void;
}

export interface PlayerConnection {
  readonly name: string;
  /** Raw `PlaybackStatus` text, e.g. "Playing". */
  getPlaybackStatus(): Promise<string>;
  getArtist(): Promise<string | undefined>;
  getAlbum(): Promise<string | undefined>;
  getTitle(): Promise<string | undefined>;
  /** `mpris:length` printed as a decimal string of microseconds. */
  getLength(): Promise<string | undefined>;
  playPause(): Promise<void>;
  previous(): Promise<void>;
  next(): Promise<void>;
  subscribe(listener: (signal: PlayerSignal) => void): () => void;
  close(): void;
}
