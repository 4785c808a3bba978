/**
 * Config command - Show where settings come from and what they resolve to
 */

import chalk from "chalk";
import { existsSync } from "fs";
import { getUserConfigPath, loadConfig } from "../../utils/load-config";

export async function configCommand(): Promise<void> {
  const configPath = getUserConfigPath();
  const { config, errors } = await loadConfig();

  const status = existsSync(configPath)
    ? errors.length > 0
      ? chalk.red("invalid, defaults in use")
      : chalk.green("loaded")
    : chalk.dim("not found, defaults in use");

  console.log(`User config: ${configPath} (${status})`);
  console.log("\nEffective settings:");
  console.log(JSON.stringify(config, null, 2));
}
