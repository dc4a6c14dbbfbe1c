import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { CONFIG_KEYS, ConfigData } from "./defaults";

export function getConfigDir(): string {
  return process.env.OTHELLO_CONFIG_DIR || join(homedir(), ".othello");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/** Keep only the known keys that hold strings */
function pickConfig(parsed: unknown): Partial<ConfigData> {
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  const data: Partial<ConfigData> = {};
  for (const key of CONFIG_KEYS) {
    const value: unknown = Reflect.get(parsed, key);
    if (typeof value === "string") data[key] = value;
  }
  return data;
}

export async function readConfigFile(): Promise<Partial<ConfigData>> {
  const path = getConfigPath();
  try {
    const raw = await readFile(path, "utf-8");
    return pickConfig(JSON.parse(raw));
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return {};
    }
    if (err instanceof SyntaxError) {
      console.error(
        `Warning: ${path} is malformed and was ignored. ` +
          `Run "othello config set <key> <value>" to recreate it.`,
      );
      return {};
    }
    throw err;
  }
}

export async function writeConfigFile(
  data: Partial<ConfigData>,
): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
  await writeFile(getConfigPath(), JSON.stringify(data, null, 2) + "\n", "utf-8");
}

export async function updateConfigFile(
  key: keyof ConfigData,
  value: string,
): Promise<Partial<ConfigData>> {
  const existing = await readConfigFile();
  existing[key] = value;
  await writeConfigFile(existing);
  return existing;
}
