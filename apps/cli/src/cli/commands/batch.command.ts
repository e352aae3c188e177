import { Injectable } from "@nestjs/common";
import { ConfigFile, ConfigFileError, isMissingFileError } from "@repokit/config";
import { Values, type OptionGrammar, type OptionValue } from "@repokit/options";
import path from "path";
import { DomainError, ProcessingError, requireOption } from "../errors";
import { inGroup, parseLimits, projectGroups } from "./batch-groups";
import {
  COMMAND_OK,
  commandFailed,
  type CliCommand,
  type CliCommandMetadata,
  type CommandContext,
  type CommandResult,
} from "./cli-command";

const PROJECT_SECTION = "project";

export interface BatchProject {
  readonly name: string;
  readonly schema: string;
  readonly options: Values;
  readonly args: string[];
}

function toArgs(value: OptionValue | undefined): string[] {
  if (Array.isArray(value)) {
    return value;
  }
  if (typeof value === "string") {
    return value.split(/\s+/).filter((item) => item.length > 0);
  }
  return value === undefined ? [] : [String(value)];
}

@Injectable()
export class BatchCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "batch",
    description: "Run the projects listed in batch files",
    usage: "batch [options] [FILE...]",
  };

  readonly supportInject = true;

  /**
   * Accepted so that `--extra-option` tokens reach the projects.
   */
  readonly supportExtra = true;

  declareOptions(grammar: OptionGrammar): void {
    grammar
      .add({
        name: "file",
        flags: ["-f", "--file", "--batch-file"],
        kind: "list",
        metavar: "FILE",
        help: "Read projects from FILE",
        section: "File options",
      })
      .add({
        name: "group",
        flags: ["-u", "--group"],
        kind: "string",
        metavar: "GROUP1,GROUP2,...",
        help: "Only handle projects of these groups",
        section: "File options",
      })
      .add({
        name: "list",
        flags: ["--list"],
        kind: "boolean",
        default: false,
        help: "List the selected projects instead of running them",
        section: "File options",
      })
      .add({
        name: "ignoreErrors",
        flags: ["--ierror", "--ignore-errors"],
        kind: "boolean",
        default: false,
        help: "Continue with the next project when one fails",
        section: "Error handling options",
      });
  }

  displayName(): string {
    return this.metadata.name;
  }

  async execute(context: CommandContext): Promise<CommandResult> {
    const { options, logger } = context;
    const files = requireOption(
      [...(options.getList("file") ?? []), ...context.args],
      "batch file (--batch-file) is not set"
    );
    const ignoreErrors = options.getBoolean("ignoreErrors") ?? false;
    const failures: string[] = [];

    for (const file of files) {
      const filePath = path.resolve(file);
      let projects: BatchProject[];
      try {
        projects = await this.loadProjects(filePath, context);
      } catch (error) {
        if (!(error instanceof DomainError) || !ignoreErrors) {
          throw error;
        }
        logger.error(error.message);
        failures.push(filePath);
        continue;
      }

      if (options.getBoolean("list")) {
        this.printProjects(filePath, projects);
        continue;
      }

      const failedBefore = failures.length;
      for (const project of projects) {
        logger.debug(
          { project: project.name, schema: project.schema },
          "Running project"
        );
        const outcome = await context.dispatch(
          project.schema,
          project.options,
          project.args,
          { ignoreErrors }
        );
        if (outcome.kind !== "ok") {
          failures.push(project.name);
        }
      }

      if (failures.length > failedBefore && !ignoreErrors) {
        break;
      }
    }

    if (failures.length > 0 && !ignoreErrors) {
      return commandFailed(
        new ProcessingError(`Failed projects: ${failures.join(", ")}`)
      );
    }
    return COMMAND_OK;
  }

  /**
   * Reads the `project.<name>` sections of `filePath` that pass the group
   * filter. A section holding a list yields one project per entry. Each
   * project's options take precedence over the batch's own, and a relative
   * `workingDir` resolves against the current directory.
   */
  async loadProjects(
    filePath: string,
    context: CommandContext
  ): Promise<BatchProject[]> {
    const config = await this.readBatchFile(filePath);
    const limits = parseLimits(context.options.getString("group"));
    const inherited = this.inheritedOptions(context.options);
    const projects: BatchProject[] = [];

    for (const sectionName of config.getSectionNames(PROJECT_SECTION)) {
      const name = ConfigFile.getSubsectionName(sectionName);
      if (!name) {
        continue;
      }

      for (const section of config.getSections(sectionName)) {
        const group = section.pop("group");
        const groups = projectGroups(name, typeof group === "string" ? group : undefined);
        if (!inGroup(limits, groups)) {
          context.logger.debug({ project: name, limits, groups }, "Project not selected");
          continue;
        }

        const schema = section.pop("schema");
        if (typeof schema !== "string" || schema.length === 0) {
          throw new ProcessingError(`Project ${name} in ${filePath} has no schema`);
        }

        const args = toArgs(section.pop("args"));
        const workingDir = section.getString("workingDir");
        if (workingDir !== undefined) {
          section.set("workingDir", path.resolve(workingDir));
        }

        projects.push({
          name,
          schema,
          args,
          options: new Values(section).join(inherited, undefined, false),
        });
      }
    }

    return projects;
  }

  private async readBatchFile(filePath: string): Promise<ConfigFile> {
    try {
      return await ConfigFile.read(filePath);
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new ProcessingError(`cannot open batch file ${filePath}`, {
          cause: error,
        });
      }
      if (error instanceof ConfigFileError) {
        throw new ProcessingError(error.message, { cause: error });
      }
      throw error;
    }
  }

  /**
   * The batch's options as seen by its projects. Projects start in the
   * directory the batch runs in and do not inherit the batch files.
   */
  private inheritedOptions(options: Values): Values {
    const inherited = new Values(options);
    inherited.pop("file");
    inherited.pop("relativeDir");
    inherited.set("workingDir", process.cwd());
    return inherited;
  }

  private printProjects(filePath: string, projects: readonly BatchProject[]): void {
    const counts = new Map<string, number>();
    for (const project of projects) {
      const label = `[${project.schema}] ${project.name}`;
      counts.set(label, (counts.get(label) ?? 0) + 1);
    }

    console.log(`File: ${filePath}`);
    Array.from(counts.keys())
      .sort()
      .forEach((label, index) => {
        const count = counts.get(label) ?? 0;
        const suffix = count > 1 ? ` (${count})` : "";
        console.log(`  ${String(index + 1).padStart(2)}. ${label}${suffix}`);
      });
  }
}
