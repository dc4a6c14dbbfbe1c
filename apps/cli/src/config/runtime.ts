import { log } from "@othello-lab/core";
import type { LogLevel } from "@othello-lab/core";
import { ConfigData } from "./defaults";
import { resolveConfig } from "./resolve";
import { PlaySettings, parseLogLevel, toPlaySettings } from "./settings";

/** Everything a game needs from the configuration, already validated */
export interface RuntimeConfig {
  play: PlaySettings;
  logLevel: LogLevel;
  /** The layered string values the settings were read from */
  raw: ConfigData;
}

/**
 * Resolve the layered configuration, validate it and apply the log level.
 * Throws on the first invalid value, before any game starts.
 */
export async function loadRuntimeConfig(): Promise<RuntimeConfig> {
  const raw = await resolveConfig();
  const runtime: RuntimeConfig = {
    play: toPlaySettings(raw),
    logLevel: parseLogLevel(raw.logLevel),
    raw,
  };
  log.level(runtime.logLevel);
  return runtime;
}
