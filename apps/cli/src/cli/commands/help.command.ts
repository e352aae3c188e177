import { Injectable } from "@nestjs/common";
import { PROGRAM_NAME } from "../cli.constants";
import { DomainError } from "../errors";
import {
  COMMAND_OK,
  commandFailed,
  type CliCommand,
  type CliCommandMetadata,
  type CommandContext,
  type CommandResult,
} from "./cli-command";

@Injectable()
export class HelpCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "help",
    description: "List the commands or show the options of one command",
    usage: "help [COMMAND]",
  };

  readonly supportInject = false;

  readonly supportExtra = false;

  declareOptions(): void {}

  displayName(): string {
    return this.metadata.name;
  }

  async execute(context: CommandContext): Promise<CommandResult> {
    const [target] = context.args;
    if (!target) {
      this.printUsage(context.commands());
      return COMMAND_OK;
    }

    const command = context.lookup(target);
    if (!command) {
      return commandFailed(new DomainError(`No help for unknown command: ${target}`));
    }

    const { metadata } = command;
    const grammar = context.buildGrammar(metadata.name);
    const aliasLine = metadata.aliases?.length
      ? [`Aliases: ${metadata.aliases.join(", ")}`]
      : [];
    const lines = [
      `Usage: ${PROGRAM_NAME} ${metadata.usage ?? `${metadata.name} [options]`}`,
      "",
      metadata.description,
      ...aliasLine,
      "",
      grammar.formatHelp(),
    ];
    console.log(lines.join("\n"));
    return COMMAND_OK;
  }

  private printUsage(commands: readonly CliCommand[]): void {
    const rows = commands.map(({ metadata }) => {
      const aliasSuffix = metadata.aliases?.length
        ? ` (aliases: ${metadata.aliases.join(", ")})`
        : "";
      return `- ${metadata.name}${aliasSuffix}: ${metadata.description}`;
    });

    console.log(`Usage: ${PROGRAM_NAME} <command> [options] [args]`);
    console.log("");
    console.log("Available commands:");
    for (const row of rows) {
      console.log(row);
    }
  }
}
