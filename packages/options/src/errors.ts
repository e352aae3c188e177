export class OptionParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OptionParseError";
  }
}

export class OptionValueError extends OptionParseError {
  constructor(
    readonly option: string,
    message: string
  ) {
    super(message);
    this.name = "OptionValueError";
  }
}

export class OptionConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OptionConflictError";
  }
}
