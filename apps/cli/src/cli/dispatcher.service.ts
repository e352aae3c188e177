import { Inject, Injectable } from "@nestjs/common";
import { LoggerService, verbosityToLevel } from "@repokit/io";
import {
  OptionGrammar,
  Values,
  type OptionRecord,
  type OptionValue,
  type ReadonlyValues,
} from "@repokit/options";
import type { Logger } from "pino";
import { CliParserService } from "./cli-parser.service";
import { HELP_COMMAND } from "./cli.constants";
import { CommandRegistry } from "./command-registry";
import type {
  CliCommand,
  CommandContext,
  CommandResult,
  DispatchOutcome,
  DispatchPolicy,
} from "./commands/cli-command";
import { DomainError, UnknownCommandError } from "./errors";
import { OptionGrammarFactory } from "./option-grammar.factory";
import {
  resolveWorkingDirectory,
  withWorkingDirectory,
} from "./working-directory";

interface Invocation {
  readonly command: CliCommand;
  readonly grammar: OptionGrammar;
  readonly options: Values;
  readonly args: readonly string[];
  readonly defaults: ReadonlyValues;
}

/**
 * Resolves a command, assembles its option set and runs it.
 *
 * Option layers, highest precedence first: command-line arguments, injected
 * options, the default configuration, declared defaults.
 */
@Injectable()
export class DispatcherService {
  private readonly logger: Logger;

  constructor(
    @Inject(CommandRegistry) private readonly registry: CommandRegistry,
    @Inject(OptionGrammarFactory)
    private readonly grammars: OptionGrammarFactory,
    @Inject(CliParserService) private readonly parser: CliParserService,
    @Inject(LoggerService) private readonly loggerService: LoggerService
  ) {
    this.logger = loggerService.getLogger("dispatch");
  }

  async dispatchArgv(
    argv: readonly string[],
    defaults: ReadonlyValues
  ): Promise<DispatchOutcome> {
    const { command: requested, rest } = this.parser.extractCommand(argv);
    const name = requested ?? HELP_COMMAND;
    const command = this.registry.lookup(name);
    if (!command) {
      throw new UnknownCommandError(name);
    }

    // Without a command name only the global grammar applies.
    const grammar = requested
      ? this.grammars.build(command)
      : this.grammars.build();
    const { values, positionals } = this.parser.parse(grammar, rest);

    const verbose = values.pop("verbose");
    if (typeof verbose === "number") {
      this.loggerService.setLevel(verbosityToLevel(verbose));
    }

    return this.invoke({
      command,
      grammar,
      options: values,
      args: positionals,
      defaults,
    });
  }

  /**
   * Runs `name` with `options` on top of its declared defaults. Used by
   * commands that run other commands.
   */
  async dispatch(
    name: string,
    options: ReadonlyValues | OptionRecord,
    args: readonly string[],
    defaults: ReadonlyValues,
    policy: DispatchPolicy = {}
  ): Promise<DispatchOutcome> {
    const command = this.registry.lookup(name);
    if (!command) {
      const error = new UnknownCommandError(name);
      if (!policy.ignoreErrors) {
        throw error;
      }
      this.logger.error({ command: name }, error.message);
      return { kind: "skipped", reason: error.message };
    }

    try {
      const grammar = this.grammars.build(command);
      return await this.invoke({
        command,
        grammar,
        options: grammar.defaults().join(options, grammar),
        args,
        defaults,
      });
    } catch (error) {
      if (!policy.ignoreErrors) {
        throw error;
      }
      this.logger.error(
        { command: command.metadata.name, err: error },
        "Ignoring failed command"
      );
      return { kind: "failed", error };
    }
  }

  buildGrammar(name: string): OptionGrammar {
    const command = this.registry.lookup(name);
    if (!command) {
      throw new UnknownCommandError(name);
    }
    return this.grammars.build(command);
  }

  private async invoke(invocation: Invocation): Promise<DispatchOutcome> {
    const { command, grammar, options, args, defaults } = invocation;

    if (command.supportInject) {
      this.inject(command, grammar, options);
    }
    options.join(defaults, grammar, false);

    const directory = resolveWorkingDirectory(
      options.getString("workingDir"),
      options.getString("relativeDir")
    );
    const displayName = command.displayName(options);
    const logger = this.loggerService.getLogger(displayName);
    const context: CommandContext = {
      name: command.metadata.name,
      options,
      args,
      logger,
      dispatch: (name, childOptions, childArgs, policy) =>
        this.dispatch(name, childOptions, childArgs, defaults, policy),
      extra: (group) => Values.extraValues(options.getList("extraOption"), group),
      lookup: (name) => this.registry.lookup(name),
      commands: () => this.registry.list(),
      buildGrammar: (name) => this.buildGrammar(name),
    };

    this.logger.debug(
      { command: command.metadata.name, directory, args },
      "Dispatching command"
    );

    const result = await withWorkingDirectory(
      directory,
      () => this.execute(command, context),
      { create: true, cleanup: false }
    );

    if (result.kind === "domain-error") {
      logger.error({ command: displayName }, result.error.message);
    }
    return result;
  }

  private async execute(
    command: CliCommand,
    context: CommandContext
  ): Promise<CommandResult> {
    try {
      return await command.execute(context);
    } catch (error) {
      if (error instanceof DomainError) {
        return { kind: "domain-error", error };
      }
      throw error;
    }
  }

  /**
   * Applies the `--inject-option` tokens addressed to the command, then the
   * ungrouped ones. Tokens that do not parse are dropped.
   */
  private inject(
    command: CliCommand,
    grammar: OptionGrammar,
    options: Values
  ): void {
    const tokens = options.getList("injectOption");
    const selected = [
      ...Values.extra(tokens, command.metadata.name),
      ...Values.extra(tokens),
    ];

    for (const token of selected) {
      try {
        const { values, supplied } = this.parser.parseInjected(grammar, token);
        const injected: Record<string, OptionValue | undefined> = {};
        for (const name of supplied) {
          injected[name] = values.get(name);
        }
        options.join(injected, grammar);
      } catch (error) {
        this.logger.debug(
          { command: command.metadata.name, token, err: error },
          "Dropping injected option"
        );
      }
    }
  }
}
