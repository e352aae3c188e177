import { Inject, Injectable } from "@nestjs/common";
import { InjectLogger } from "@repokit/io";
import { Values, type ReadonlyValues } from "@repokit/options";
import type { Logger } from "pino";
import { ConfigFile } from "./config-file";
import { resolveConfigPaths } from "./config-path";
import { CONFIG_LOGGER_SCOPE, MODULE_OPTIONS_TOKEN } from "./config.const";
import { isMissingFileError } from "./errors";
import type { ConfigModuleOptions } from "./types";

/**
 * Builds the process-wide default option set from the system config file and
 * then the user config file. Options from the system file win; the user file
 * only fills options the system file leaves unset.
 *
 * The first call stores the pending load and every later or concurrent call
 * shares it, so the files are read once. A failed load is forgotten and the
 * next call reads again.
 */
@Injectable()
export class DefaultConfigLoader {
  private pending: Promise<ReadonlyValues> | null = null;

  constructor(
    @Inject(MODULE_OPTIONS_TOKEN)
    private readonly options: ConfigModuleOptions,
    @InjectLogger(CONFIG_LOGGER_SCOPE)
    private readonly logger: Logger
  ) {}

  load(): Promise<ReadonlyValues> {
    if (!this.pending) {
      this.pending = this.readDefaults().catch((error: unknown) => {
        this.pending = null;
        throw error;
      });
    }
    return this.pending;
  }

  private async readDefaults(): Promise<ReadonlyValues> {
    const paths = resolveConfigPaths(this.options);
    const defaults = new Values();

    for (const filePath of [paths.system, paths.user]) {
      const file = await this.readOptional(filePath);
      if (file) {
        defaults.join(file.getDefault(), undefined, false);
      }
    }

    this.logger.debug({ options: defaults.keys() }, "Loaded default options");
    return defaults;
  }

  private async readOptional(filePath: string): Promise<ConfigFile | undefined> {
    try {
      const file = await ConfigFile.read(filePath);
      this.logger.debug({ filePath }, "Read config file");
      return file;
    } catch (error) {
      if (isMissingFileError(error)) {
        this.logger.trace({ filePath }, "Config file not present");
        return undefined;
      }
      throw error;
    }
  }
}
