/**
 * Turns an arbitrary label (observation id, source name, user-supplied
 * output name) into a single path segment.
 * Rules:
 * - Basename only (no path traversal)
 * - Alphanumeric, underscore, hyphen, dot and plus only
 * - Whitespace replaced by underscore
 * - Case preserved, observation ids are case sensitive in the archive
 * - Max 128 characters
 * - Leading dots stripped so the result is never hidden or `..`
 * - Fallback when nothing usable is left
 */
export function sanitizePathSegment(
  name: string | undefined | null,
  fallback = "unnamed",
): string {
  if (!name) return fallback;

  const parts = name.split(/[\\/]/);
  const base = parts.pop() || "";

  let s = base.trim().replace(/\s+/g, "_");
  s = s.replace(/[^A-Za-z0-9._+-]/g, "");
  s = s.replace(/^\.+/, "");

  if (s.length > 128) {
    s = s.slice(0, 128);
  }

  if (!s) return fallback;

  return s;
}

/** Drops a trailing `.fits` (any case), which linmos appends itself. */
export function stripFitsSuffix(filePath: string): string {
  return filePath.replace(/\.fits$/i, "");
}
