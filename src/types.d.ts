type PlaybackStatus = "Playing" | "Paused" | "Stopped"; //PlaybackStatus

type StatusString = "playing" | "paused" | "stopped";

type PlayerInfo = {
  readonly name: string; // player name without the instance suffix, e.g. "firefox"
  readonly instance: string; // bus instance, e.g. "firefox.instance_1_84"
  readonly status: PlaybackStatus;
  readonly statusString: StatusString;
  readonly artist?: string; //Metadata["xesam:artist"] joined
  readonly album?: string; //Metadata["xesam:album"]
  readonly title?: string; //Metadata["xesam:title"]
  readonly length?: string; //Metadata["mpris:length"] as HH:MM:SS or MM:SS
};

type PlayerSignal = "play" | "pause" | "stop" | "metadata";

type IconTable = Readonly<Record<string, string>>;
