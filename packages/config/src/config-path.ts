import os from "os";
import path from "path";
import { resolveRuntimeOptions } from "./runtime-env";
import type { ConfigModuleOptions, ConfigPaths } from "./types";

export const SYSTEM_CONFIG_PATH = "/etc/repokit/config.yaml";

export function getUserConfigPath(home: string = os.homedir()): string {
  return path.join(home, ".repokit", "config.yaml");
}

/**
 * Module options first, then `REPOKIT_SYSTEM_CONFIG` / `REPOKIT_USER_CONFIG`,
 * then the fixed locations.
 */
export function resolveConfigPaths(
  options: ConfigModuleOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ConfigPaths {
  const resolved = resolveRuntimeOptions(options, env);
  return {
    system: path.resolve(resolved.systemConfigPath ?? SYSTEM_CONFIG_PATH),
    user: path.resolve(resolved.userConfigPath ?? getUserConfigPath()),
  };
}
