import { normalizeOptionName } from "./names";
import type { OptionGrammar } from "./option-grammar";
import type { OptionRecord, OptionValue } from "./types";

interface Slot {
  value: OptionValue | undefined;
  /**
   * Set once a layer assigns the slot. Unclaimed slots still hold the
   * declared default and may be filled by lower-precedence joins.
   */
  claimed: boolean;
}

export interface OptionEntry {
  readonly name: string;
  readonly value: OptionValue | undefined;
  readonly claimed: boolean;
}

/**
 * Read-only view of an option set. The cached default configuration is
 * handed out through this type so callers cannot mutate it.
 */
export interface ReadonlyValues {
  get(name: string): OptionValue | undefined;
  has(name: string): boolean;
  isDefault(name: string): boolean;
  keys(): string[];
  snapshot(): OptionEntry[];
  getString(name: string): string | undefined;
  getBoolean(name: string): boolean | undefined;
  getNumber(name: string): number | undefined;
  getList(name: string): string[] | undefined;
  toRecord(): Record<string, OptionValue | undefined>;
}

const cloneValue = (
  value: OptionValue | undefined
): OptionValue | undefined => (Array.isArray(value) ? [...value] : value);

function isReadonlyValues(
  source: ReadonlyValues | OptionRecord
): source is ReadonlyValues {
  return source instanceof Values;
}

function entriesOf(source: ReadonlyValues | OptionRecord): OptionEntry[] {
  if (isReadonlyValues(source)) {
    return source.snapshot();
  }

  return Object.entries(source)
    .filter(([, value]) => value !== undefined)
    .map(([name, value]) => ({
      name: normalizeOptionName(name),
      value,
      claimed: true,
    }));
}

/**
 * Ordered option name → value mapping with layered merge semantics.
 *
 * Every slot remembers whether it was claimed by a layer or still holds its
 * declared default, so `join(source, grammar, false)` only fills slots no
 * higher-precedence layer has touched. An explicitly assigned value equal
 * to the default still counts as claimed.
 *
 * `pop` drops a slot together with its claim, which means a later
 * non-overriding join fills it again from the lower layer.
 */
export class Values implements ReadonlyValues {
  private readonly slots = new Map<string, Slot>();

  constructor(source?: ReadonlyValues | OptionRecord) {
    if (source) {
      for (const entry of entriesOf(source)) {
        this.slots.set(entry.name, {
          value: cloneValue(entry.value),
          claimed: entry.claimed,
        });
      }
    }
  }

  /**
   * Builds a set holding every given option unclaimed at its default.
   */
  static fromDefaults(
    defaults: Iterable<readonly [string, OptionValue | undefined]>
  ): Values {
    const values = new Values();
    for (const [name, value] of defaults) {
      values.slots.set(normalizeOptionName(name), {
        value: cloneValue(value),
        claimed: false,
      });
    }
    return values;
  }

  /**
   * Selects the `group:option[=value]` tokens addressed to `group`, without
   * the group prefix. Without a group only ungrouped tokens are returned.
   */
  static extra(tokens: readonly string[] | undefined, group?: string): string[] {
    const selected: string[] = [];
    for (const token of tokens ?? []) {
      const colon = token.indexOf(":");
      const equals = token.indexOf("=");
      const grouped = colon > 0 && (equals === -1 || colon < equals);
      const tokenGroup = grouped ? token.slice(0, colon) : undefined;

      if (tokenGroup === group) {
        selected.push(grouped ? token.slice(colon + 1) : token);
      }
    }
    return selected;
  }

  /**
   * Reads the `group:option[=value]` tokens addressed to `group` into a set.
   * An option without a value is `true`.
   */
  static extraValues(tokens: readonly string[] | undefined, group: string): Values {
    const values = new Values();
    for (const token of Values.extra(tokens, group)) {
      const equals = token.indexOf("=");
      const name = equals === -1 ? token : token.slice(0, equals);
      if (normalizeOptionName(name)) {
        values.set(name, equals === -1 ? true : token.slice(equals + 1));
      }
    }
    return values;
  }

  get(name: string): OptionValue | undefined {
    return this.slots.get(normalizeOptionName(name))?.value;
  }

  has(name: string): boolean {
    return this.slots.has(normalizeOptionName(name));
  }

  isDefault(name: string): boolean {
    return !(this.slots.get(normalizeOptionName(name))?.claimed ?? false);
  }

  keys(): string[] {
    return Array.from(this.slots.keys());
  }

  snapshot(): OptionEntry[] {
    return Array.from(this.slots, ([name, slot]) => ({
      name,
      value: cloneValue(slot.value),
      claimed: slot.claimed,
    }));
  }

  getString(name: string): string | undefined {
    const value = this.get(name);
    return typeof value === "string" ? value : undefined;
  }

  getBoolean(name: string): boolean | undefined {
    const value = this.get(name);
    return typeof value === "boolean" ? value : undefined;
  }

  getNumber(name: string): number | undefined {
    const value = this.get(name);
    return typeof value === "number" ? value : undefined;
  }

  getList(name: string): string[] | undefined {
    const value = this.get(name);
    return Array.isArray(value) ? [...value] : undefined;
  }

  set(name: string, value: OptionValue | undefined): this {
    this.slots.set(normalizeOptionName(name), {
      value: cloneValue(value),
      claimed: true,
    });
    return this;
  }

  /**
   * Merges `source` into this set.
   *
   * With a grammar, options it does not declare are skipped and values are
   * coerced to the declared kind. With `override` false a value is copied
   * only into slots that are still unclaimed.
   */
  join(
    source: ReadonlyValues | OptionRecord,
    grammar?: OptionGrammar,
    override = true
  ): this {
    for (const entry of entriesOf(source)) {
      if (grammar && !grammar.has(entry.name)) {
        continue;
      }
      if (!override && !this.isDefault(entry.name)) {
        continue;
      }

      const value =
        grammar && entry.value !== undefined
          ? grammar.coerce(entry.name, entry.value)
          : entry.value;

      this.slots.set(entry.name, {
        value: cloneValue(value),
        claimed: entry.claimed,
      });
    }
    return this;
  }

  pop(name: string): OptionValue | undefined {
    const key = normalizeOptionName(name);
    const slot = this.slots.get(key);
    this.slots.delete(key);
    return slot?.value;
  }

  toRecord(): Record<string, OptionValue | undefined> {
    const record: Record<string, OptionValue | undefined> = {};
    for (const [name, slot] of this.slots) {
      record[name] = cloneValue(slot.value);
    }
    return record;
  }
}
