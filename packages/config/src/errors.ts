export class ConfigFileError extends Error {
  constructor(
    readonly filePath: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(`${filePath}: ${message}`, options);
    this.name = "ConfigFileError";
  }
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
