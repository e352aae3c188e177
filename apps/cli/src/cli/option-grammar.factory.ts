import { Injectable } from "@nestjs/common";
import { OptionGrammar } from "@repokit/options";
import type { CliCommand } from "./commands/cli-command";

export const GLOBAL_OPTIONS_SECTION = "Global options";

@Injectable()
export class OptionGrammarFactory {
  /**
   * Global flags, then `--inject-option` when no command is given or the
   * command accepts injected options, `--extra-option` for commands reading
   * grouped options, then the command's own declarations.
   * Conflicting declarations raise `OptionConflictError`.
   */
  build(command?: CliCommand): OptionGrammar {
    const grammar = new OptionGrammar()
      .add({
        name: "workingDir",
        flags: ["-w", "--working-dir"],
        kind: "string",
        default: process.cwd(),
        metavar: "DIR",
        help: "Run the command in DIR",
        section: GLOBAL_OPTIONS_SECTION,
      })
      .add({
        name: "relativeDir",
        flags: ["--relative-dir"],
        kind: "string",
        metavar: "DIR",
        help: "Run the command in DIR below the working directory",
        section: GLOBAL_OPTIONS_SECTION,
      })
      .add({
        name: "tryrun",
        flags: ["-T", "--tryrun", "--dry-run"],
        kind: "boolean",
        default: false,
        help: "Report what would be done without doing it",
        section: GLOBAL_OPTIONS_SECTION,
      })
      .add({
        name: "verbose",
        flags: ["-v", "--verbose"],
        kind: "count",
        help: "Log more details, repeat for trace output",
        section: GLOBAL_OPTIONS_SECTION,
      })
      .add({
        name: "force",
        flags: ["--force"],
        kind: "boolean",
        default: false,
        help: "Force the operation",
        section: GLOBAL_OPTIONS_SECTION,
      })
      .add({
        name: "hookDir",
        flags: ["--hook-dir"],
        kind: "string",
        metavar: "DIR",
        help: "Look up hooks in DIR",
        section: GLOBAL_OPTIONS_SECTION,
      });

    if (!command || command.supportInject) {
      grammar.add({
        name: "injectOption",
        flags: ["--inject-option"],
        kind: "list",
        metavar: "GROUP:OPTION[=VALUE]",
        help: "Set an option of this or a nested command",
        section: GLOBAL_OPTIONS_SECTION,
      });
    }

    if (command?.supportExtra) {
      grammar.add({
        name: "extraOption",
        flags: ["--extra-option"],
        kind: "list",
        metavar: "GROUP:OPTION[=VALUE]",
        help: "Set an option of an internal group",
        section: GLOBAL_OPTIONS_SECTION,
      });
    }

    command?.declareOptions(grammar);
    return grammar;
  }
}
