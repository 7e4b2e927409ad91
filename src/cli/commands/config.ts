/**
 * Config command - Show configuration file location and effective settings
 */

import chalk from "chalk";
import { getUserConfigPath, loadConfig } from "../../utils";

export async function configCommand(): Promise<void> {
  const configPath = getUserConfigPath();
  console.log("User configuration file location:");
  console.log(chalk.white(configPath));

  const { config, errors } = await loadConfig();
  for (const { path } of errors) {
    console.log(chalk.yellow(`\nWarning: ${path} is invalid and was ignored.`));
  }

  console.log(chalk.dim("\nEffective configuration:"));
  console.log(JSON.stringify(config, null, 2));
  console.log("\nCreate this file to customize conversion settings.");
}
