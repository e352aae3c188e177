import { isLogLevel, type LogLevel } from "@repokit/io";
import type { ConfigModuleOptions } from "./types";

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

function parseString(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function resolveConfigRuntimeOptionsFromEnv(
  env: NodeJS.ProcessEnv
): ConfigModuleOptions {
  const options: ConfigModuleOptions = {};

  const systemConfigPath = parseString(env.REPOKIT_SYSTEM_CONFIG);
  if (systemConfigPath !== undefined) {
    options.systemConfigPath = systemConfigPath;
  }

  const userConfigPath = parseString(env.REPOKIT_USER_CONFIG);
  if (userConfigPath !== undefined) {
    options.userConfigPath = userConfigPath;
  }

  const logLevel = parseLogLevel(env.REPOKIT_LOG_LEVEL);
  if (logLevel !== undefined) {
    options.logLevel = logLevel;
  }

  return options;
}

export function resolveRuntimeOptions(
  moduleOptions?: ConfigModuleOptions,
  env: NodeJS.ProcessEnv = process.env
): ConfigModuleOptions {
  const envOptions = resolveConfigRuntimeOptionsFromEnv(env);
  return {
    ...envOptions,
    ...(moduleOptions ?? {}),
  } satisfies ConfigModuleOptions;
}
