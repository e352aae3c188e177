import type { OptionValue } from "@repokit/options";

/**
 * Recoverable failure of a command. The dispatcher logs it and carries on
 * instead of aborting the process.
 */
export class DomainError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DomainError";
  }
}

export class OptionMissedError extends DomainError {
  constructor(message: string) {
    super(message);
    this.name = "OptionMissedError";
  }
}

export class ProcessingError extends DomainError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ProcessingError";
  }
}

export class UnknownCommandError extends Error {
  constructor(readonly command: string) {
    super(`Unknown command: ${command}`);
    this.name = "UnknownCommandError";
  }
}

export class CommandRegistrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CommandRegistrationError";
  }
}

/**
 * Returns `value` unless it is missing, an empty string or an empty list.
 */
export function requireOption<T extends OptionValue>(
  value: T | undefined,
  message: string
): T {
  if (
    value === undefined ||
    value === "" ||
    (Array.isArray(value) && value.length === 0)
  ) {
    throw new OptionMissedError(message);
  }
  return value;
}
