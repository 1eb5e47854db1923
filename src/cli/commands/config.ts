/**
 * Config command - Show the configuration file location and the effective settings
 */

import chalk from "chalk";
import { getUserConfigPath, loadConfig } from "../../utils";

export async function configCommand(opts: { config?: string }): Promise<void> {
  const { config, errors, sources } = await loadConfig(opts.config);

  console.log("User configuration file location:");
  console.log(getUserConfigPath());

  if (sources.length > 0) {
    console.log("\nApplied configuration files:");
    for (const source of sources) {
      console.log(`  ${source}`);
    }
  } else {
    console.log("\nCreate this file to customize conversion settings.");
  }

  for (const { path, error } of errors) {
    const detail = error instanceof Error ? error.message : String(error);
    console.error(chalk.yellow(`Ignoring ${path}: ${detail}`));
  }

  console.log("\nEffective settings:");
  console.log(JSON.stringify(config, null, 2));
}
