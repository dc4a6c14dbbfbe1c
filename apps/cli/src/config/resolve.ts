import { ConfigData, DEFAULTS, ENV_MAP, CONFIG_KEYS } from "./defaults";
import { readConfigFile } from "./configFile";

export type ConfigSource = "default" | "config file" | "environment" | "command line";

export interface ResolvedValue {
  value: string;
  source: ConfigSource;
}

export type ResolvedConfig = Record<keyof ConfigData, ResolvedValue>;

const cliOverrides: Partial<ConfigData> = {};

export function setCliOverride<K extends keyof ConfigData>(
  key: K,
  value: ConfigData[K],
): void {
  cliOverrides[key] = value;
}

export function clearCliOverrides(): void {
  for (const key of CONFIG_KEYS) {
    delete cliOverrides[key];
  }
}

function fromEnvironment(): Partial<ConfigData> {
  const values: Partial<ConfigData> = {};
  for (const key of CONFIG_KEYS) {
    const value = process.env[ENV_MAP[key]];
    if (value !== undefined) values[key] = value;
  }
  return values;
}

type Layer = readonly [ConfigSource, Partial<ConfigData>];

/** The last layer holding a non-empty value wins */
function pick(key: keyof ConfigData, layers: readonly Layer[]): ResolvedValue {
  let resolved: ResolvedValue = { value: DEFAULTS[key], source: "default" };
  for (const [source, values] of layers) {
    const value = values[key];
    if (value !== undefined && value !== "") resolved = { value, source };
  }
  return resolved;
}

/**
 * Every key with the layer it came from. Layers, lowest first: defaults,
 * the config file, environment variables, command-line flags.
 */
export async function resolveConfigSources(): Promise<ResolvedConfig> {
  const layers: Layer[] = [
    ["config file", await readConfigFile()],
    ["environment", fromEnvironment()],
    ["command line", cliOverrides],
  ];

  return {
    depth: pick("depth", layers),
    color: pick("color", layers),
    evaluator: pick("evaluator", layers),
    logLevel: pick("logLevel", layers),
  };
}

export async function resolveConfig(): Promise<ConfigData> {
  const sources = await resolveConfigSources();
  return {
    depth: sources.depth.value,
    color: sources.color.value,
    evaluator: sources.evaluator.value,
    logLevel: sources.logLevel.value,
  };
}
