import {
  loadConfig,
  saveConfig,
  applyConfigValue,
  isConfigKey,
  configPath,
  CONFIG_KEYS,
} from "../core/config.js";
import { UsageError } from "../core/errors.js";

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

export async function configShow(): Promise<void> {
  const cfg = loadConfig();

  console.log(`${BOLD}Diskmark Configuration${RESET}`);
  console.log(`${DIM}${configPath()}${RESET}\n`);

  console.log(`  Encoding: ${cfg.encoding}`);
  console.log(`  Format:   ${cfg.format}`);
  console.log(`  Legacy:   ${cfg.legacy}`);
}

export async function configSet(key: string, value: string): Promise<void> {
  if (!isConfigKey(key)) {
    throw new UsageError(`Unknown config key: "${key}"\nValid keys: ${CONFIG_KEYS.join(", ")}`);
  }

  const result = applyConfigValue(loadConfig(), key, value);
  if ("error" in result) {
    throw new UsageError(result.error);
  }

  saveConfig(result.config);
  console.log(`${key} set to: ${value}`);
}
