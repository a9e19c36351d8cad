/**
 * Project directories are named after the path they hold transcripts for:
 * the leading separator becomes `-` and so does every inner separator,
 * so `/Users/jane/projects/api` is stored as `-Users-jane-projects-api`.
 */
const ENCODED_PREFIX = "-";

/**
 * Reverse the directory-name encoding. Total: names without the leading
 * marker come back unchanged. A hyphen that was part of a real directory
 * name cannot be told apart from a separator and decodes as one.
 */
export function decodeProjectPath(encoded: string): string {
  if (!encoded.startsWith(ENCODED_PREFIX)) {
    return encoded;
  }
  return `/${encoded.slice(ENCODED_PREFIX.length).replaceAll("-", "/")}`;
}

/** Substring containment, not a glob or path-segment match. */
export function matchesProjectFilter(
  projectPath: string,
  filter: string | undefined,
): boolean {
  if (!filter) return true;
  return projectPath.includes(filter);
}
