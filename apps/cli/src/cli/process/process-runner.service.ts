import { execFile } from "child_process";
import { Injectable } from "@nestjs/common";
import util from "util";

const execFileAsync = util.promisify(execFile);
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export interface ProcessRequest {
  command: string;
  args: readonly string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

function readOutput(error: Error, key: "stdout" | "stderr"): string {
  if (key in error) {
    const value: unknown = Reflect.get(error, key);
    return typeof value === "string" ? value : "";
  }
  return "";
}

/**
 * Runs a program without a shell. A non-zero exit status resolves with that
 * status; failing to start the program rejects.
 */
@Injectable()
export class ProcessRunnerService {
  async run(request: ProcessRequest): Promise<ProcessResult> {
    try {
      const { stdout, stderr } = await execFileAsync(
        request.command,
        [...request.args],
        {
          cwd: request.cwd,
          env: request.env,
          encoding: "utf8",
          maxBuffer: MAX_OUTPUT_BYTES,
        }
      );
      return { exitCode: 0, stdout, stderr };
    } catch (error) {
      if (
        error instanceof Error &&
        "code" in error &&
        typeof error.code === "number"
      ) {
        return {
          exitCode: error.code,
          stdout: readOutput(error, "stdout"),
          stderr: readOutput(error, "stderr"),
        };
      }
      throw error;
    }
  }
}
