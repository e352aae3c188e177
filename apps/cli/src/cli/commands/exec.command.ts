import { Inject, Injectable } from "@nestjs/common";
import type { OptionGrammar } from "@repokit/options";
import { OptionMissedError, ProcessingError, requireOption } from "../errors";
import {
  HOOK_GROUP,
  HookRunnerService,
  type HookOutcome,
  type HookRequest,
} from "../process/hook-runner.service";
import {
  ProcessRunnerService,
  type ProcessResult,
} from "../process/process-runner.service";
import {
  COMMAND_OK,
  commandFailed,
  type CliCommand,
  type CliCommandMetadata,
  type CommandContext,
  type CommandResult,
} from "./cli-command";

const ENV_ENTRY_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/s;

export function parseEnvEntries(entries: readonly string[]): Record<string, string> {
  const env: Record<string, string> = {};
  for (const entry of entries) {
    const match = ENV_ENTRY_PATTERN.exec(entry);
    if (!match) {
      throw new OptionMissedError(`Invalid environment entry: ${entry}`);
    }
    env[match[1]] = match[2];
  }
  return env;
}

function writeOutput(result: ProcessResult): void {
  if (result.stdout) {
    process.stdout.write(result.stdout);
  }
  if (result.stderr) {
    process.stderr.write(result.stderr);
  }
}

/**
 * Runs PROGRAM in the working directory. The `pre-exec` and `post-exec`
 * hooks run before the program and after it succeeds.
 */
@Injectable()
export class ExecCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "exec",
    description: "Run a program in the working directory",
    aliases: ["run"],
    usage: "exec [options] PROGRAM [ARG...]",
  };

  readonly supportInject = true;
  readonly supportExtra = true;

  constructor(
    @Inject(ProcessRunnerService) private readonly runner: ProcessRunnerService,
    @Inject(HookRunnerService) private readonly hooks: HookRunnerService
  ) {}

  declareOptions(grammar: OptionGrammar): void {
    grammar
      .add({
        name: "env",
        flags: ["-e", "--env"],
        kind: "list",
        metavar: "KEY=VALUE",
        help: "Set an environment variable for the program",
        section: "Exec options",
      })
      .add({
        name: "ignoreExitCode",
        flags: ["--ignore-exit-code"],
        kind: "boolean",
        default: false,
        help: "Succeed even when the program exits with a non-zero status",
        section: "Exec options",
      });
  }

  displayName(): string {
    return this.metadata.name;
  }

  async execute(context: CommandContext): Promise<CommandResult> {
    const { options, logger } = context;
    const [program, ...args] = context.args;
    const command = requireOption(program, "exec: no program given");
    const env = parseEnvEntries(options.getList("env") ?? []);
    const commandLine = [command, ...args].join(" ");
    const cwd = process.cwd();
    const tryrun = options.getBoolean("tryrun") ?? false;
    const hook: Omit<HookRequest, "name"> = {
      extra: context.extra(HOOK_GROUP),
      hookDir: options.getString("hookDir"),
      cwd,
      tryrun,
      logger,
    };

    const before = await this.runHook({ ...hook, name: "pre-exec" });
    if (before) {
      return before;
    }

    if (tryrun) {
      logger.info({ cwd, env }, `Would run: ${commandLine}`);
      return this.afterExec(hook);
    }

    logger.debug({ cwd, env }, `Running: ${commandLine}`);
    let result: ProcessResult;
    try {
      result = await this.runner.run({
        command,
        args,
        cwd,
        env: { ...process.env, ...env },
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return commandFailed(
        new ProcessingError(`Cannot run ${command}: ${reason}`, { cause: error })
      );
    }

    writeOutput(result);

    if (result.exitCode === 0) {
      return this.afterExec(hook);
    }
    if (options.getBoolean("ignoreExitCode")) {
      logger.warn(`${commandLine} exited with status ${result.exitCode}`);
      return COMMAND_OK;
    }
    return commandFailed(
      new ProcessingError(`${commandLine} exited with status ${result.exitCode}`)
    );
  }

  private async afterExec(hook: Omit<HookRequest, "name">): Promise<CommandResult> {
    return (await this.runHook({ ...hook, name: "post-exec" })) ?? COMMAND_OK;
  }

  /**
   * Returns a failed result when the hook cannot run or exits non-zero.
   */
  private async runHook(request: HookRequest): Promise<CommandResult | undefined> {
    let outcome: HookOutcome;
    try {
      outcome = await this.hooks.run(request);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return commandFailed(
        new ProcessingError(`Cannot run hook ${request.name}: ${reason}`, {
          cause: error,
        })
      );
    }
    if (outcome.kind !== "ran") {
      return undefined;
    }
    writeOutput(outcome.result);
    if (outcome.result.exitCode === 0) {
      return undefined;
    }
    return commandFailed(
      new ProcessingError(
        `Hook ${request.name} exited with status ${outcome.result.exitCode}`
      )
    );
  }
}
