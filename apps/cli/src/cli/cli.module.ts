import { Module, type Provider } from "@nestjs/common";
import { IoModule } from "@repokit/io";
import { CliParserService } from "./cli-parser.service";
import { CliRunnerService } from "./cli-runner.service";
import { CLI_COMMANDS } from "./cli.constants";
import { CommandRegistry } from "./command-registry";
import { BatchCommand } from "./commands/batch.command";
import type { CliCommand } from "./commands/cli-command";
import { ExecCommand } from "./commands/exec.command";
import { HelpCommand } from "./commands/help.command";
import { DispatcherService } from "./dispatcher.service";
import { OptionGrammarFactory } from "./option-grammar.factory";
import { HookRunnerService } from "./process/hook-runner.service";
import { ProcessRunnerService } from "./process/process-runner.service";

const commandProviders: Provider[] = [
  HelpCommand,
  ExecCommand,
  BatchCommand,
  {
    provide: CLI_COMMANDS,
    useFactory: (
      help: HelpCommand,
      exec: ExecCommand,
      batch: BatchCommand
    ): CliCommand[] => [help, exec, batch],
    inject: [HelpCommand, ExecCommand, BatchCommand],
  },
];

/**
 * CliModule bundles the command surface: the shipped commands, their
 * registry and the dispatcher that runs them. The default configuration
 * loader comes from the global ConfigModule.
 */
@Module({
  imports: [IoModule],
  providers: [
    ProcessRunnerService,
    HookRunnerService,
    CliParserService,
    OptionGrammarFactory,
    CommandRegistry,
    DispatcherService,
    CliRunnerService,
    ...commandProviders,
  ],
  exports: [CliRunnerService],
})
export class CliModule {}
