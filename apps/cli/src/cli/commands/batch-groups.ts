import path from "path";

const LIST_SEPARATOR = /\s*,\s*/;

export function splitGroups(value: string | undefined): string[] {
  return (value ?? "")
    .split(LIST_SEPARATOR)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Decides whether a project belongs to the requested groups.
 *
 * Limits are checked in order and the first one naming a group of the
 * project decides: `x` selects it, `-x` rejects it. When no limit matches,
 * the project is selected if the limits contain `default` or consist of
 * exclusions only, unless the project is in `notdefault` or `-default`.
 */
export function inGroup(limits: readonly string[], groups: readonly string[]): boolean {
  let onlyExclusions = true;

  for (const raw of limits) {
    const excluded = raw.startsWith("-");
    const limit = excluded ? raw.slice(1) : raw;
    if (!excluded) {
      onlyExclusions = false;
    }
    if (groups.includes(limit)) {
      return !excluded;
    }
  }

  return (
    (onlyExclusions || limits.includes("default")) &&
    !groups.includes("notdefault") &&
    !groups.includes("-default")
  );
}

/**
 * Groups of a project: its declared groups, its name and the last path
 * segment of its name.
 */
export function projectGroups(name: string, declared: string | undefined): string[] {
  return [...splitGroups(declared), name, path.basename(name)];
}

export function parseLimits(group: string | undefined): string[] {
  const limits = splitGroups(group);
  return limits.length > 0 ? limits : ["default"];
}
