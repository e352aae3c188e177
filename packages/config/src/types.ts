import type { LogLevel } from "@repokit/io";

export interface ConfigModuleOptions {
  /**
   * System-wide config file. Options it sets win over the user file.
   */
  systemConfigPath?: string;
  userConfigPath?: string;
  /**
   * Log level applied before the config files are read.
   */
  logLevel?: LogLevel;
}

export interface ConfigPaths {
  system: string;
  user: string;
}
