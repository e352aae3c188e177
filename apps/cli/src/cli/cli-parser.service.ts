import { Injectable } from "@nestjs/common";
import type { OptionGrammar, ParseResult } from "@repokit/options";
import type { CliArguments } from "./cli-arguments";

@Injectable()
export class CliParserService {
  /**
   * Removes the first token that does not start with `-` and returns it as the
   * command name. Option values placed before the command name are taken for
   * the name as well, so global flags with values belong after it.
   */
  extractCommand(argv: readonly string[]): CliArguments {
    const index = argv.findIndex((token) => !token.startsWith("-"));
    if (index === -1) {
      return { rest: [...argv] };
    }

    return {
      command: argv[index],
      rest: [...argv.slice(0, index), ...argv.slice(index + 1)],
    };
  }

  parse(grammar: OptionGrammar, argv: readonly string[]): ParseResult {
    return grammar.parse(argv);
  }

  /**
   * Parses one `option[=value]` token, adding the `--` prefix it is written
   * without.
   */
  parseInjected(grammar: OptionGrammar, token: string): ParseResult {
    const argument = token.startsWith("-") ? token : `--${token}`;
    return grammar.parse([argument], "inject");
  }
}
