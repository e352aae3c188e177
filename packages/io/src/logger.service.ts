import { Injectable } from "@nestjs/common";
import pino, { type Bindings, type Logger, type LoggerOptions } from "pino";
import type { LoggingConfig, LoggingDestination, LogLevel } from "./types";

const EMITTING_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;

/**
 * Standard output carries command output, so logs go to standard error
 * unless configured otherwise.
 */
const DEFAULT_DESTINATION: LoggingDestination = { type: "stderr" };

type EmittingLevel = (typeof EMITTING_LEVELS)[number];

export interface LoggerEvent {
  level: EmittingLevel;
  args: unknown[];
}

export type LoggerListener = (event: LoggerEvent) => void;

const isEmittingLevel = (property: string | symbol): property is EmittingLevel =>
  typeof property === "string" &&
  EMITTING_LEVELS.some((level) => level === property);

@Injectable()
export class LoggerService {
  private rootLogger: Logger | null = null;
  private rawLogger: Logger | null = null;
  private cachedSignature = "";
  private level: LogLevel = "info";
  private readonly scoped = new Map<string, Logger>();
  private readonly children = new Set<WeakRef<Logger>>();
  private readonly wrapped = new WeakSet<Logger>();
  private readonly listeners = new Set<LoggerListener>();

  registerListener(listener: LoggerListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  configure(config?: LoggingConfig): Logger {
    const signature = this.computeSignature(config);
    if (this.rootLogger && signature === this.cachedSignature) {
      return this.rootLogger;
    }
    if (config?.level) {
      this.level = config.level;
    }
    this.installRoot(this.buildLogger(config));
    this.cachedSignature = signature;
    return this.getLogger();
  }

  /**
   * Returns the root logger, or the child bound to `scope`. One child is
   * kept per scope.
   */
  getLogger(scope?: string): Logger {
    const root = this.rawLogger ?? this.installRoot(this.buildLogger());
    if (!scope) {
      return this.rootLogger ?? this.wrapLogger(root);
    }

    const existing = this.scoped.get(scope);
    if (existing) {
      return existing;
    }
    const logger = this.wrapLogger(root.child({ scope }));
    this.scoped.set(scope, logger);
    return logger;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Changes the level of the root logger and of every logger handed out so
   * far, so scoped loggers created before the change follow it.
   */
  setLevel(level: LogLevel): void {
    this.level = level;
    if (this.rawLogger) {
      this.rawLogger.level = level;
    }
    for (const logger of this.scoped.values()) {
      logger.level = level;
    }
    for (const reference of this.children) {
      const child = reference.deref();
      if (child) {
        child.level = level;
      } else {
        this.children.delete(reference);
      }
    }
  }

  reset(): void {
    this.rootLogger = null;
    this.rawLogger = null;
    this.cachedSignature = "";
    this.level = "info";
    this.scoped.clear();
    this.children.clear();
  }

  private installRoot(rawLogger: Logger): Logger {
    this.rawLogger = rawLogger;
    this.rootLogger = this.wrapLogger(rawLogger);
    this.scoped.clear();
    this.children.clear();
    return rawLogger;
  }

  private computeSignature(config?: LoggingConfig): string {
    return JSON.stringify(config ?? {});
  }

  private resolvePrettyTransport(
    destination: LoggingDestination
  ): LoggerOptions["transport"] {
    const wantsPretty = destination.pretty ?? process.stderr.isTTY;
    if (!wantsPretty) return undefined;

    try {
      require.resolve("pino-pretty");
      return {
        target: "pino-pretty",
        options: {
          colorize: destination.colorize ?? true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
          destination: destination.type === "stdout" ? 1 : 2,
        },
      };
    } catch {
      return undefined;
    }
  }

  private buildLogger(config?: LoggingConfig): Logger {
    const destination = config?.destination ?? DEFAULT_DESTINATION;
    const options: LoggerOptions = {
      level: this.level,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    };

    const transport = this.resolvePrettyTransport(destination);
    if (transport) {
      options.transport = transport;
      return pino(options);
    }

    return pino(
      options,
      pino.destination({ fd: destination.type === "stdout" ? 1 : 2 })
    );
  }

  private wrapLogger(logger: Logger): Logger {
    const service = this;

    if (this.wrapped.has(logger)) {
      return logger;
    }

    const proxy = new Proxy(logger, {
      get(target, property, receiver) {
        if (property === "child") {
          return (bindings: Bindings): Logger => {
            const child: Logger = target.child(bindings);
            service.children.add(new WeakRef(child));
            return service.wrapLogger(child);
          };
        }

        if (isEmittingLevel(property)) {
          const original: unknown = Reflect.get(target, property, receiver);
          if (typeof original !== "function") {
            return original;
          }

          return (...args: unknown[]) => {
            service.notify(property, args);
            return original.apply(target, args);
          };
        }

        return Reflect.get(target, property, receiver);
      },
    });

    this.wrapped.add(proxy);
    return proxy;
  }

  private notify(level: EmittingLevel, args: unknown[]): void {
    if (this.listeners.size === 0) {
      return;
    }

    const event: LoggerEvent = { level, args };
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
