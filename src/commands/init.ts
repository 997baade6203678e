import { writeFileSync, existsSync, mkdirSync } from "fs";
import { join } from "path";
import ora from "ora";
import { getDefaultConfig, getGlobalConfigDir, getLocalConfigPath } from "../config";

export interface InitOptions {
  local?: boolean;
}

export async function initCommand(options: InitOptions = {}): Promise<void> {
  const spinner = ora();

  // Determine config path based on --local flag
  let configPath: string;
  if (options.local) {
    configPath = getLocalConfigPath();
  } else {
    const globalDir = getGlobalConfigDir();
    if (!existsSync(globalDir)) {
      mkdirSync(globalDir, { recursive: true });
    }
    configPath = join(globalDir, "config.yaml");
  }

  if (existsSync(configPath)) {
    spinner.info(`Config file already exists: ${configPath}`);
    return;
  }

  spinner.start("Creating config file...");
  writeFileSync(configPath, getDefaultConfig());
  spinner.succeed(`Created config file: ${configPath}`);

  console.log("\nNext steps:");
  console.log("1. Review exclusions and extensions in the config file");
  console.log("2. Preview: photodate fix --directory ~/Pictures --dry-run");
  console.log("3. Run:     photodate fix --directory ~/Pictures");
}
