import { runShellCommand, type CommandRunner } from "./actions.js";
import type { MediaBus } from "./bus/mediaBus.js";
import type { ModuleConfig } from "./config.js";
import { PlayerDirectory } from "./directory.js";
import { describe, TemplateError } from "./errors.js";
import type { BarHost } from "./host.js";
import { InputDispatcher } from "./input.js";
import { createLogger, type Logger } from "./logger.js";
import { TemplateRenderer } from "./renderer.js";
import { RefreshScheduler } from "./scheduler.js";
import { PlayerSession } from "./session.js";
import { getPlayerInfo } from "./snapshot.js";

export interface MprisModuleDeps {
  bus: MediaBus;
  host: BarHost;
  runCommand?: CommandRunner;
  graceDelayMs?: number;
  log?: Logger;
}

/**
 * The status cell: keeps one player session, refreshes on bus signals and
 * timer ticks, and turns clicks into transport commands.
 */
export class MprisModule {
  private readonly directory: PlayerDirectory;
  private readonly session: PlayerSession;
  private readonly renderer: TemplateRenderer;
  private readonly scheduler: RefreshScheduler;
  private readonly input: InputDispatcher;
  private readonly host: BarHost;
  private readonly log: Logger;
  private snapshot: PlayerInfo | null = null;
  private teardown: Array<() => void> = [];

  constructor(
    private readonly config: ModuleConfig,
    private readonly deps: MprisModuleDeps
  ) {
    this.log = deps.log ?? createLogger("mpris", config.player);
    this.host = deps.host;
    this.directory = new PlayerDirectory(deps.bus);
    this.session = new PlayerSession(deps.bus, this.directory, {
      player: config.player,
      onSignal: (signal) => this.onPlayerSignal(signal),
      log: this.log.child("session"),
    });
    this.renderer = new TemplateRenderer({
      format: config.format,
      formats: config.formats,
      playerIcons: config.playerIcons,
      statusIcons: config.statusIcons,
    });
    this.scheduler = new RefreshScheduler(() => this.update(), {
      intervalMs: config.interval * 1000,
      graceDelayMs: deps.graceDelayMs,
      log: this.log.child("scheduler"),
    });
    this.input = new InputDispatcher({
      getSnapshot: () => this.snapshot,
      getConnection: () => this.session.connection,
      clickActions: config.clickActions,
      runCommand: deps.runCommand ?? runShellCommand,
      log: this.log.child("input"),
    });
  }

  get lastSnapshot(): PlayerInfo | null {
    return this.snapshot;
  }

  get connectedPlayer(): string | null {
    return this.session.boundName;
  }

  async start(): Promise<void> {
    const unwatch = await this.deps.bus.watchPlayers({
      onAppeared: (name) => this.onPlayerAppeared(name),
      onVanished: (name) => this.onPlayerVanished(name),
      onActiveChanged: () => this.onActiveChanged(),
    });
    const unclick = this.host.onClick((button) => {
      void this.handleClick(button);
    });
    this.teardown = [unwatch, unclick];
    this.scheduler.start();
  }

  async stop(): Promise<void> {
    for (const release of this.teardown) release();
    this.teardown = [];
    await this.scheduler.stop();
    this.session.invalidate("teardown");
    this.snapshot = null;
  }

  /** Waits until queued refresh work has run. */
  settled(): Promise<void> {
    return this.scheduler.whenIdle();
  }

  async handleClick(button: number): Promise<boolean> {
    try {
      const handled = await this.input.handleClick(button);
      this.log.debug("click", { button, handled });
      return handled;
    } catch (error) {
      this.log.error(`click handling failed: ${describe(error)}`, { button });
      return false;
    }
  }

  private onPlayerAppeared(name: string): void {
    this.log.debug("name-appeared", { player: name });
    this.scheduler.post(() => this.session.invalidate("player appeared"));
    this.scheduler.requestAfterGrace();
  }

  private onPlayerVanished(name: string): void {
    this.log.debug("name-vanished", { player: name });
    this.scheduler.post(() => {
      this.session.handleVanished(name);
    });
    this.scheduler.request();
  }

  private onActiveChanged(): void {
    // a concrete binding only follows its own player
    if (!this.session.isAlias) return;
    this.log.debug("active player changed");
    this.scheduler.request();
  }

  private onPlayerSignal(signal: PlayerSignal): void {
    if (signal === "stop") this.scheduler.post(() => this.host.hide());
    this.scheduler.request();
  }

  private async update(): Promise<void> {
    try {
      await this.session.ensureConnected();
    } catch (error) {
      this.log.error(describe(error));
      this.snapshot = null;
      this.host.hide();
      return;
    }

    const info = await getPlayerInfo(this.session, this.directory, {
      ignoredPlayers: this.config.ignoredPlayers,
      log: this.log.child("snapshot"),
    });
    this.snapshot = info;
    if (!info) {
      this.host.hide();
      return;
    }

    if (this.session.isAlias && info.instance !== this.session.boundName) {
      this.session.invalidate("active player changed");
      this.scheduler.request();
      return;
    }

    if (info.status === "Stopped") {
      this.log.debug("player stopped", { player: info.name });
      this.host.hide();
      return;
    }

    let text: string;
    try {
      text = this.renderer.render(info);
    } catch (error) {
      if (!(error instanceof TemplateError)) throw error;
      this.log.warn(`skipping update: ${error.message}`, { player: info.name });
      return;
    }
    this.log.debug("running update", { player: info.name });
    this.host.publish({ text, status: info.statusString, player: info.name });
  }
}
