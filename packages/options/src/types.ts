export type OptionValue = string | boolean | number | string[];

/**
 * How a flag consumes its argument:
 * - `string` / `int`: one value per occurrence, last occurrence wins.
 * - `boolean`: no separate value, `--flag=false` style literals accepted.
 * - `list`: every occurrence is collected.
 * - `count`: every occurrence increments the value (`-vvv`).
 */
export type OptionKind = "string" | "boolean" | "int" | "list" | "count";

export interface OptionDeclaration {
  /**
   * Key the parsed value is stored under. Normalised to camelCase.
   */
  readonly name: string;
  /**
   * Recognised spellings, e.g. `["-w", "--working-dir"]`.
   */
  readonly flags: readonly string[];
  readonly kind: OptionKind;
  readonly default?: OptionValue;
  readonly help?: string;
  readonly metavar?: string;
  /**
   * Heading the option is listed under in help output.
   */
  readonly section?: string;
}

export type OptionRecord = Readonly<Record<string, OptionValue | undefined>>;

export type ParseMode = "strict" | "inject";
