import { Inject } from "@nestjs/common";
import type { FactoryProvider } from "@nestjs/common";
import type { Logger } from "pino";
import { LoggerService } from "./logger.service";

const LOGGER_TOKEN_PREFIX = "REPOKIT_LOGGER_SCOPE";
const ROOT_LOGGER_TOKEN = Symbol.for(`${LOGGER_TOKEN_PREFIX}::root`);

export type LoggerScope = string | undefined;

export const getLoggerToken = (scope?: LoggerScope): symbol =>
  scope ? Symbol.for(`${LOGGER_TOKEN_PREFIX}::${scope}`) : ROOT_LOGGER_TOKEN;

const registeredLoggerProviders = new Map<symbol, FactoryProvider<Logger>>();

/**
 * Returns the provider resolving the logger of `scope`, creating it on first
 * use so every module asking for the same scope shares one token.
 */
export const createLoggerProvider = (
  scope?: LoggerScope
): FactoryProvider<Logger> => {
  const token = getLoggerToken(scope);
  const existing = registeredLoggerProviders.get(token);
  if (existing) {
    return existing;
  }

  const provider: FactoryProvider<Logger> = {
    provide: token,
    useFactory: (loggerService: LoggerService) => loggerService.getLogger(scope),
    inject: [LoggerService],
  };
  registeredLoggerProviders.set(token, provider);
  return provider;
};

export const InjectLogger = (scope?: LoggerScope) => {
  createLoggerProvider(scope);
  return Inject(getLoggerToken(scope));
};
