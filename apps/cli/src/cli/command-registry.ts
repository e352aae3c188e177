import { Inject, Injectable } from "@nestjs/common";
import { CLI_COMMANDS } from "./cli.constants";
import type { CliCommand } from "./commands/cli-command";
import { CommandRegistrationError } from "./errors";
import { OptionGrammarFactory } from "./option-grammar.factory";

/**
 * Table of the shipped commands keyed by lower-cased name and alias. Every
 * command's grammar is built once here so conflicting flags surface at
 * start-up rather than on first use.
 */
@Injectable()
export class CommandRegistry {
  private readonly byName = new Map<string, CliCommand>();
  private readonly commands: CliCommand[] = [];

  constructor(
    @Inject(CLI_COMMANDS) commands: CliCommand[],
    @Inject(OptionGrammarFactory) grammars: OptionGrammarFactory
  ) {
    for (const command of commands) {
      this.register(command);
      grammars.build(command);
    }
  }

  lookup(name: string): CliCommand | undefined {
    return this.byName.get(name.toLowerCase());
  }

  list(): CliCommand[] {
    return [...this.commands].sort((left, right) =>
      left.metadata.name.localeCompare(right.metadata.name)
    );
  }

  private register(command: CliCommand): void {
    const { name, aliases = [] } = command.metadata;
    if (name.trim().length === 0) {
      throw new CommandRegistrationError("Command name must not be empty.");
    }

    const keys = [name, ...aliases].map((key) => key.toLowerCase());
    for (const key of keys) {
      const owner = this.byName.get(key);
      if (owner || keys.indexOf(key) !== keys.lastIndexOf(key)) {
        throw new CommandRegistrationError(
          `Command name "${key}" of "${name}" is already registered${
            owner ? ` by "${owner.metadata.name}"` : ""
          }.`
        );
      }
    }

    for (const key of keys) {
      this.byName.set(key, command);
    }
    this.commands.push(command);
  }
}
