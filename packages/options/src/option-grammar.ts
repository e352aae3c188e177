import { OptionConflictError, OptionParseError, OptionValueError } from "./errors";
import { normalizeOptionName } from "./names";
import type { OptionDeclaration, OptionKind, OptionValue, ParseMode } from "./types";
import { Values } from "./values";

const FLAG_PATTERN = /^(-[A-Za-z0-9]|--[A-Za-z0-9][A-Za-z0-9-]*)$/;
const INTEGER_PATTERN = /^-?\d+$/;
const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);
const DEFAULT_SECTION = "Options";

export interface ParseResult {
  readonly values: Values;
  readonly positionals: string[];
  /**
   * Options set on the command line, in first-seen order.
   */
  readonly supplied: string[];
}

const takesValue = (kind: OptionKind): boolean =>
  kind !== "boolean" && kind !== "count";

function parseBooleanLiteral(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  return undefined;
}

/**
 * Declared flags of one dispatch, together with the parser that turns argv
 * into a {@link Values} seeded with every declared default.
 */
export class OptionGrammar {
  private readonly byName = new Map<string, OptionDeclaration>();
  private readonly byFlag = new Map<string, OptionDeclaration>();

  add(declaration: OptionDeclaration): this {
    const name = normalizeOptionName(declaration.name);
    if (!name) {
      throw new OptionConflictError(
        `Option name "${declaration.name}" is empty.`
      );
    }
    if (this.byName.has(name)) {
      throw new OptionConflictError(`Option "${name}" is declared twice.`);
    }
    if (declaration.flags.length === 0) {
      throw new OptionConflictError(`Option "${name}" declares no flags.`);
    }

    for (const flag of declaration.flags) {
      if (!FLAG_PATTERN.test(flag)) {
        throw new OptionConflictError(
          `Invalid flag ${flag} for option "${name}".`
        );
      }
      const owner = this.byFlag.get(flag);
      if (owner) {
        throw new OptionConflictError(
          `Flag ${flag} of option "${name}" is already used by "${owner.name}".`
        );
      }
    }

    const normalized: OptionDeclaration = { ...declaration, name };
    this.byName.set(name, normalized);
    for (const flag of declaration.flags) {
      this.byFlag.set(flag, normalized);
    }
    return this;
  }

  has(name: string): boolean {
    return this.byName.has(normalizeOptionName(name));
  }

  get(name: string): OptionDeclaration | undefined {
    return this.byName.get(normalizeOptionName(name));
  }

  declarations(): OptionDeclaration[] {
    return Array.from(this.byName.values());
  }

  defaults(): Values {
    return Values.fromDefaults(
      this.declarations().map(
        (declaration) => [declaration.name, declaration.default] as const
      )
    );
  }

  /**
   * Converts a loosely typed value (usually read from a config file) to the
   * declared kind of `name`.
   */
  coerce(name: string, raw: OptionValue): OptionValue {
    const declaration = this.get(name);
    if (!declaration) {
      return raw;
    }

    switch (declaration.kind) {
      case "string":
        return Array.isArray(raw) ? raw.join(",") : String(raw);
      case "boolean": {
        if (typeof raw === "boolean") {
          return raw;
        }
        const parsed =
          typeof raw === "string" || typeof raw === "number"
            ? parseBooleanLiteral(String(raw))
            : undefined;
        if (parsed === undefined) {
          throw new OptionValueError(
            declaration.name,
            `Invalid boolean value for ${declaration.name}: ${String(raw)}`
          );
        }
        return parsed;
      }
      case "int":
      case "count": {
        if (typeof raw === "number" && Number.isInteger(raw)) {
          return raw;
        }
        if (typeof raw === "string" && INTEGER_PATTERN.test(raw.trim())) {
          return Number.parseInt(raw.trim(), 10);
        }
        throw new OptionValueError(
          declaration.name,
          `Invalid integer value for ${declaration.name}: ${String(raw)}`
        );
      }
      case "list":
        return Array.isArray(raw) ? [...raw] : [String(raw)];
    }
  }

  parse(argv: readonly string[], mode: ParseMode = "strict"): ParseResult {
    const values = this.defaults();
    const positionals: string[] = [];
    const supplied: string[] = [];

    const apply = (
      flag: string,
      declaration: OptionDeclaration,
      raw: string | undefined
    ): void => {
      const first = !supplied.includes(declaration.name);
      values.set(
        declaration.name,
        this.readValue(flag, declaration, raw, first ? undefined : values.get(declaration.name))
      );
      if (first) {
        supplied.push(declaration.name);
      }
    };

    for (let i = 0; i < argv.length; i += 1) {
      const token = argv[i];
      if (token === "--") {
        positionals.push(...argv.slice(i + 1));
        break;
      }

      if (!token.startsWith("-") || token === "-") {
        positionals.push(token);
        continue;
      }

      if (token.startsWith("--")) {
        const equals = token.indexOf("=");
        const flag = equals === -1 ? token : token.slice(0, equals);
        const declaration = this.lookupFlag(flag);
        let raw = equals === -1 ? undefined : token.slice(equals + 1);

        if (raw === undefined && takesValue(declaration.kind)) {
          raw = this.requireValue(flag, argv[i + 1]);
          i += 1;
        }
        apply(flag, declaration, raw);
        continue;
      }

      const letters = token.slice(1);
      for (let j = 0; j < letters.length; j += 1) {
        const flag = `-${letters[j]}`;
        const declaration = this.lookupFlag(flag);
        if (!takesValue(declaration.kind)) {
          apply(flag, declaration, undefined);
          continue;
        }

        const attached = letters.slice(j + 1);
        if (attached.length > 0) {
          apply(flag, declaration, attached);
        } else {
          apply(flag, declaration, this.requireValue(flag, argv[i + 1]));
          i += 1;
        }
        break;
      }
    }

    if (mode === "inject" && (supplied.length !== 1 || positionals.length > 0)) {
      throw new OptionParseError(
        `Injected option must set exactly one option: ${argv.join(" ")}`
      );
    }

    return { values, positionals, supplied };
  }

  formatHelp(): string {
    const sections = new Map<string, OptionDeclaration[]>();
    for (const declaration of this.declarations()) {
      const section = declaration.section ?? DEFAULT_SECTION;
      sections.set(section, [...(sections.get(section) ?? []), declaration]);
    }

    const label = (declaration: OptionDeclaration): string => {
      const flags = declaration.flags.join(", ");
      return takesValue(declaration.kind)
        ? `${flags} <${declaration.metavar ?? "value"}>`
        : flags;
    };
    const width = Math.max(
      0,
      ...this.declarations().map((declaration) => label(declaration).length)
    );

    const blocks = Array.from(sections, ([section, declarations]) =>
      [
        `${section}:`,
        ...declarations.map((declaration) =>
          `  ${label(declaration).padEnd(width)}  ${declaration.help ?? ""}`.trimEnd()
        ),
      ].join("\n")
    );
    return blocks.join("\n\n");
  }

  private lookupFlag(flag: string): OptionDeclaration {
    const declaration = this.byFlag.get(flag);
    if (!declaration) {
      throw new OptionParseError(`Unknown option: ${flag}`);
    }
    return declaration;
  }

  private requireValue(flag: string, next: string | undefined): string {
    if (next === undefined || next.startsWith("-")) {
      throw new OptionParseError(`Option ${flag} requires a value.`);
    }
    return next;
  }

  private readValue(
    flag: string,
    declaration: OptionDeclaration,
    raw: string | undefined,
    previous: OptionValue | undefined
  ): OptionValue {
    switch (declaration.kind) {
      case "boolean": {
        if (raw === undefined) {
          return true;
        }
        const parsed = parseBooleanLiteral(raw);
        if (parsed === undefined) {
          throw new OptionValueError(
            declaration.name,
            `Invalid boolean value for ${flag}: ${raw}`
          );
        }
        return parsed;
      }
      case "count": {
        if (raw !== undefined) {
          return this.readInteger(flag, declaration, raw);
        }
        return (typeof previous === "number" ? previous : 0) + 1;
      }
      case "int":
        return this.readInteger(flag, declaration, raw ?? "");
      case "list": {
        const items = Array.isArray(previous) ? previous : [];
        return [...items, raw ?? ""];
      }
      case "string":
        return raw ?? "";
    }
  }

  private readInteger(
    flag: string,
    declaration: OptionDeclaration,
    raw: string
  ): number {
    if (!INTEGER_PATTERN.test(raw)) {
      throw new OptionValueError(
        declaration.name,
        `Invalid integer value for ${flag}: ${raw}`
      );
    }
    return Number.parseInt(raw, 10);
  }
}
