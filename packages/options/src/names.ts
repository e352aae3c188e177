const SEPARATORS = /[-_\s]+/;

function normalizeSegment(segment: string): string {
  return segment === segment.toUpperCase() ? segment.toLowerCase() : segment;
}

/**
 * Maps every spelling of an option name onto one camelCase key:
 * `working-dir`, `Working_Dir`, `WORKING_DIR` and `workingDir` all become
 * `workingDir`. Leading dashes are dropped so flags normalise too.
 */
export function normalizeOptionName(name: string): string {
  const segments = name
    .trim()
    .replace(/^-+/, "")
    .split(SEPARATORS)
    .filter((segment) => segment.length > 0)
    .map(normalizeSegment);

  return segments
    .map((segment, index) =>
      index === 0
        ? segment.charAt(0).toLowerCase() + segment.slice(1)
        : segment.charAt(0).toUpperCase() + segment.slice(1)
    )
    .join("");
}
