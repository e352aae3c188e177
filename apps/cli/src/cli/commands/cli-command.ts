import type {
  OptionGrammar,
  OptionRecord,
  ReadonlyValues,
  Values,
} from "@repokit/options";
import type { Logger } from "pino";
import type { DomainError } from "../errors";

export interface CliCommandMetadata {
  readonly name: string;
  readonly description: string;
  readonly aliases?: readonly string[];
  /**
   * Synopsis after the program name, e.g. `exec [options] COMMAND [ARG...]`.
   */
  readonly usage?: string;
}

export type CommandResult =
  | { readonly kind: "ok" }
  | { readonly kind: "domain-error"; readonly error: DomainError };

export const COMMAND_OK: CommandResult = { kind: "ok" };

export const commandFailed = (error: DomainError): CommandResult => ({
  kind: "domain-error",
  error,
});

export interface DispatchPolicy {
  /**
   * Log and swallow unknown commands and unexpected failures of the child.
   */
  readonly ignoreErrors?: boolean;
}

export type DispatchOutcome =
  | CommandResult
  | { readonly kind: "skipped"; readonly reason: string }
  | { readonly kind: "failed"; readonly error: unknown };

export interface CommandContext {
  /**
   * Canonical name of the running command.
   */
  readonly name: string;
  readonly options: Values;
  readonly args: readonly string[];
  readonly logger: Logger;
  dispatch(
    name: string,
    options: ReadonlyValues | OptionRecord,
    args: readonly string[],
    policy?: DispatchPolicy
  ): Promise<DispatchOutcome>;
  /**
   * Options passed as `--extra-option GROUP:OPTION[=VALUE]` for `group`.
   */
  extra(group: string): Values;
  lookup(name: string): CliCommand | undefined;
  commands(): readonly CliCommand[];
  buildGrammar(name: string): OptionGrammar;
}

export interface CliCommand {
  readonly metadata: CliCommandMetadata;
  readonly supportInject: boolean;
  /**
   * Whether the command reads grouped options through `--extra-option`.
   */
  readonly supportExtra: boolean;
  declareOptions(grammar: OptionGrammar): void;
  displayName(options: ReadonlyValues): string;
  execute(context: CommandContext): Promise<CommandResult>;
}
