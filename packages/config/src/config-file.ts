import fs from "fs/promises";
import path from "path";
import { parse, YAMLError } from "yaml";
import { Values, type OptionValue } from "@repokit/options";
import { ConfigFileError, isMissingFileError } from "./errors";

type Scalar = string | number | boolean;

const isScalar = (value: unknown): value is Scalar =>
  typeof value === "string" ||
  typeof value === "number" ||
  typeof value === "boolean";

const isMapping = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isMappingList = (value: unknown): value is Record<string, unknown>[] =>
  Array.isArray(value) && value.length > 0 && value.every(isMapping);

type SectionEntry = Record<string, OptionValue>;

/**
 * A parsed YAML config file.
 *
 * Top-level scalars and scalar lists are global options. Every top-level
 * mapping is a section; mappings nested inside a section become sections of
 * their own named by the dotted path, so
 *
 * ```yaml
 * project:
 *   alpha:
 *     schema: exec
 * ```
 *
 * yields the sections `project` and `project.alpha`. A list of mappings
 * holds several entries of one section:
 *
 * ```yaml
 * project:
 *   alpha:
 *     - schema: exec
 *     - schema: batch
 * ```
 */
export class ConfigFile {
  private constructor(
    readonly filePath: string,
    private readonly defaults: Record<string, OptionValue>,
    private readonly sections: ReadonlyMap<string, SectionEntry[]>
  ) {}

  /**
   * Reads and parses `filePath`. A missing file rejects with the original
   * `ENOENT` error so callers can tell it apart with {@link isMissingFileError}.
   */
  static async read(filePath: string): Promise<ConfigFile> {
    const resolved = path.resolve(filePath);
    let content: string;
    try {
      content = await fs.readFile(resolved, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigFileError(resolved, `cannot be read (${reason})`, {
        cause: error,
      });
    }
    return ConfigFile.parse(content, resolved);
  }

  static parse(content: string, filePath = "<inline>"): ConfigFile {
    let document: unknown;
    try {
      document = parse(content);
    } catch (error) {
      if (error instanceof YAMLError) {
        throw new ConfigFileError(filePath, error.message, { cause: error });
      }
      throw error;
    }

    if (document === null || document === undefined) {
      return new ConfigFile(filePath, {}, new Map());
    }
    if (!isMapping(document)) {
      throw new ConfigFileError(filePath, "the document root must be a mapping");
    }

    const defaults: Record<string, OptionValue> = {};
    const sections = new Map<string, SectionEntry[]>();
    for (const [key, value] of Object.entries(document)) {
      if (isMapping(value)) {
        ConfigFile.collectSection(filePath, key, value, sections);
        continue;
      }
      if (isMappingList(value)) {
        ConfigFile.collectEntries(filePath, key, value, sections);
        continue;
      }
      const option = ConfigFile.toOptionValue(filePath, key, value);
      if (option !== undefined) {
        defaults[key] = option;
      }
    }

    return new ConfigFile(filePath, defaults, sections);
  }

  /**
   * `project.alpha` → `alpha`; names without a dot have no subsection.
   */
  static getSubsectionName(name: string): string | undefined {
    const dot = name.indexOf(".");
    return dot === -1 ? undefined : name.slice(dot + 1);
  }

  getDefault(): Values {
    return new Values(this.defaults);
  }

  /**
   * Section names in document order. With a prefix only the sections nested
   * below it are returned, without the prefix section itself.
   */
  getSectionNames(prefix?: string): string[] {
    const names = Array.from(this.sections.keys());
    if (!prefix) {
      return names;
    }
    return names.filter((name) => name.startsWith(`${prefix}.`));
  }

  /**
   * The first entry of section `name`.
   */
  getSection(name: string): Values | undefined {
    const [entry] = this.getSections(name);
    return entry;
  }

  getSections(name: string): Values[] {
    return (this.sections.get(name) ?? []).map((entry) => new Values(entry));
  }

  private static collectSection(
    filePath: string,
    name: string,
    mapping: Record<string, unknown>,
    sections: Map<string, SectionEntry[]>
  ): void {
    const record: SectionEntry = {};
    sections.set(name, [record]);

    for (const [key, value] of Object.entries(mapping)) {
      if (isMapping(value)) {
        ConfigFile.collectSection(filePath, `${name}.${key}`, value, sections);
        continue;
      }
      if (isMappingList(value)) {
        ConfigFile.collectEntries(filePath, `${name}.${key}`, value, sections);
        continue;
      }
      const option = ConfigFile.toOptionValue(filePath, `${name}.${key}`, value);
      if (option !== undefined) {
        record[key] = option;
      }
    }
  }

  private static collectEntries(
    filePath: string,
    name: string,
    mappings: Record<string, unknown>[],
    sections: Map<string, SectionEntry[]>
  ): void {
    const entries = mappings.map((mapping) => {
      const record: SectionEntry = {};
      for (const [key, value] of Object.entries(mapping)) {
        const option = ConfigFile.toOptionValue(filePath, `${name}.${key}`, value);
        if (option !== undefined) {
          record[key] = option;
        }
      }
      return record;
    });
    sections.set(name, entries);
  }

  private static toOptionValue(
    filePath: string,
    key: string,
    value: unknown
  ): OptionValue | undefined {
    if (value === null || value === undefined) {
      return undefined;
    }
    if (isScalar(value)) {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map((item: unknown) => {
        if (!isScalar(item)) {
          throw new ConfigFileError(
            filePath,
            `list "${key}" may only hold scalar values`
          );
        }
        return String(item);
      });
    }
    throw new ConfigFileError(filePath, `unsupported value for "${key}"`);
  }
}
