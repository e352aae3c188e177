import { Inject, Injectable } from "@nestjs/common";
import { ConfigFileError, DefaultConfigLoader } from "@repokit/config";
import { isLogLevel, LoggerService, verbosityToLevel } from "@repokit/io";
import { OptionParseError, type ReadonlyValues } from "@repokit/options";
import { CLI_LOGGER_SCOPE } from "./cli.constants";
import { DispatcherService } from "./dispatcher.service";
import { UnknownCommandError } from "./errors";

const isUsageError = (error: unknown): error is Error =>
  error instanceof UnknownCommandError ||
  error instanceof OptionParseError ||
  error instanceof ConfigFileError;

@Injectable()
export class CliRunnerService {
  constructor(
    @Inject(DefaultConfigLoader) private readonly loader: DefaultConfigLoader,
    @Inject(DispatcherService) private readonly dispatcher: DispatcherService,
    @Inject(LoggerService) private readonly loggerService: LoggerService
  ) {}

  /**
   * Runs one command line and resolves to the process exit status. Usage and
   * config errors are logged and yield 1; domain errors were already logged by
   * the dispatcher and yield 0.
   */
  async run(argv: string[]): Promise<number> {
    const normalizedArgs = argv[0] === "--" ? argv.slice(1) : argv;
    const logger = this.loggerService.getLogger(CLI_LOGGER_SCOPE);

    try {
      const defaults = await this.loader.load();
      this.applyInitialLevel(defaults);
      await this.dispatcher.dispatchArgv(normalizedArgs, defaults);
      return 0;
    } catch (error) {
      if (isUsageError(error)) {
        logger.error(error.message);
        return 1;
      }
      throw error;
    }
  }

  private applyInitialLevel(defaults: ReadonlyValues): void {
    const logLevel = defaults.getString("logLevel");
    if (isLogLevel(logLevel)) {
      this.loggerService.setLevel(logLevel);
      return;
    }

    const verbose = defaults.getNumber("verbose");
    if (verbose !== undefined && verbose > 0) {
      this.loggerService.setLevel(verbosityToLevel(verbose));
    }
  }
}
