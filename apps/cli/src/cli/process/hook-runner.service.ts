import fs from "fs/promises";
import path from "path";
import { Inject, Injectable } from "@nestjs/common";
import { isMissingFileError } from "@repokit/config";
import type { ReadonlyValues } from "@repokit/options";
import type { Logger } from "pino";
import { ProcessRunnerService, type ProcessResult } from "./process-runner.service";

export const HOOK_PATH_ENV = "REPOKIT_HOOK_PATH";

/**
 * Extra-option group naming hooks per command, e.g.
 * `--extra-option hook:post-exec=./notify.sh`.
 */
export const HOOK_GROUP = "hook";

export interface HookRequest {
  readonly name: string;
  /**
   * Values of the `hook` extra-option group.
   */
  readonly extra: ReadonlyValues;
  readonly hookDir?: string;
  readonly cwd: string;
  readonly tryrun: boolean;
  readonly logger: Logger;
}

export interface ResolvedHook {
  readonly path: string;
  readonly args: string[];
}

export type HookOutcome =
  | { readonly kind: "none" }
  | { readonly kind: "missing"; readonly path: string }
  | { readonly kind: "dry-run"; readonly path: string }
  | { readonly kind: "ran"; readonly path: string; readonly result: ProcessResult };

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Resolves and runs named hooks. A hook is looked up, first match wins, as
 * the `hook:<name>` extra option (with `hook:<name>-args`), as `<name>` in
 * `--hook-dir`, then as `<name>` in `$REPOKIT_HOOK_PATH`.
 */
@Injectable()
export class HookRunnerService {
  constructor(
    @Inject(ProcessRunnerService) private readonly runner: ProcessRunnerService
  ) {}

  resolve(
    request: Pick<HookRequest, "name" | "extra" | "hookDir" | "cwd">
  ): ResolvedHook | undefined {
    const { name, extra, hookDir, cwd } = request;
    const configured = extra.getString(name);
    if (configured) {
      const args = (extra.getString(`${name}-args`) ?? "")
        .split(/\s+/)
        .filter((item) => item.length > 0);
      return { path: path.resolve(cwd, configured), args };
    }

    const directory = hookDir ?? process.env[HOOK_PATH_ENV];
    if (directory) {
      return { path: path.resolve(cwd, directory, name), args: [] };
    }
    return undefined;
  }

  async run(request: HookRequest): Promise<HookOutcome> {
    const hook = this.resolve(request);
    if (!hook) {
      return { kind: "none" };
    }

    if (!(await isFile(hook.path))) {
      request.logger.debug({ hook: request.name, path: hook.path }, "Hook not present");
      return { kind: "missing", path: hook.path };
    }

    const commandLine = [hook.path, ...hook.args].join(" ");
    if (request.tryrun) {
      request.logger.info(`Would run hook ${request.name}: ${commandLine}`);
      return { kind: "dry-run", path: hook.path };
    }

    request.logger.debug({ hook: request.name }, `Running hook: ${commandLine}`);
    const result = await this.runner.run({
      command: hook.path,
      args: hook.args,
      cwd: request.cwd,
      env: process.env,
    });
    return { kind: "ran", path: hook.path, result };
  }
}
