import { Command } from "commander";
import {
  resolveConfig,
  resolveConfigSources,
  updateConfigFile,
  getConfigPath,
  CONFIG_KEYS,
  ENV_MAP,
  VALIDATORS,
  ConfigData,
} from "../config";
import type { ResolvedValue } from "../config";
import { errorMessage } from "./errors";

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.othello/config.json)");

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      if (!isValidKey(key)) {
        console.error(
          `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
        );
        process.exit(1);
      }
      try {
        VALIDATORS[key](value);
      } catch (err: unknown) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
      await updateConfigFile(key, value);
      console.log(`Set ${key} = ${value}`);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      if (!isValidKey(key)) {
        console.error(
          `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
        );
        process.exit(1);
      }
      const resolved = await resolveConfig();
      console.log(resolved[key]);
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      await printConfigList();
    });
}

async function printConfigList(): Promise<void> {
  const resolved = await resolveConfigSources();

  console.log(`\nConfig file: ${getConfigPath()}`);
  console.log("──────────────────────────────────────");

  for (const key of CONFIG_KEYS) {
    console.log(`  ${key}: ${resolved[key].value}  (${describeSource(key, resolved[key])})`);
  }
  console.log("");
}

export function describeSource(key: keyof ConfigData, resolved: ResolvedValue): string {
  return resolved.source === "environment" ? `env: ${ENV_MAP[key]}` : resolved.source;
}

function isValidKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}
