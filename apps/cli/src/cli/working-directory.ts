import fs from "fs/promises";
import path from "path";

export interface WorkingDirectoryOptions {
  /**
   * Create the directory (and its parents) when it does not exist.
   */
  create?: boolean;
  /**
   * Remove the directory once the action settles.
   */
  cleanup?: boolean;
}

export function resolveWorkingDirectory(
  workingDir?: string,
  relativeDir?: string
): string {
  return path.resolve(workingDir ?? process.cwd(), relativeDir ?? "");
}

/**
 * Runs `action` with `target` as the process working directory and restores
 * the previous directory when it settles, whether it resolved or threw.
 */
export async function withWorkingDirectory<T>(
  target: string,
  action: () => Promise<T>,
  options: WorkingDirectoryOptions = {}
): Promise<T> {
  const previous = process.cwd();
  if (options.create) {
    await fs.mkdir(target, { recursive: true });
  }

  process.chdir(target);
  try {
    return await action();
  } finally {
    process.chdir(previous);
    if (options.cleanup) {
      await fs.rm(target, { recursive: true, force: true });
    }
  }
}
