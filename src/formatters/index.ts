/**
 * Format bytes to human readable string.
 *
 * @example formatBytes(500) → "500 B"
 * @example formatBytes(1536) → "1.5 KB"
 * @example formatBytes(1572864) → "1.5 MB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`;
}

const PERMISSION_CHARS = "rwxrwxrwx";

/**
 * Format permission bits the way `ls -l` does.
 *
 * @example formatMode(0o644) → "-rw-r--r--"
 * @example formatMode(0o755, "directory") → "drwxr-xr-x"
 */
export function formatMode(mode: number, type: "file" | "directory" | "symlink" = "file"): string {
  const prefix = type === "directory" ? "d" : type === "symlink" ? "L" : "-";
  let out = prefix;
  for (let i = 0; i < PERMISSION_CHARS.length; i++) {
    const bit = 1 << (8 - i);
    out += mode & bit ? PERMISSION_CHARS[i] : "-";
  }
  return out;
}

/**
 * Render a string map as JSON with sorted keys.
 *
 * @example formatMap({ b: "2", a: "1" }) → '{"a":"1","b":"2"}'
 */
export function formatMap(map: Record<string, string> | undefined): string {
  if (!map) return "{}";
  const sorted: Record<string, string> = {};
  for (const key of Object.keys(map).sort()) {
    const value = map[key];
    if (value !== undefined) sorted[key] = value;
  }
  return JSON.stringify(sorted);
}

/**
 * @example formatList(["a", "b"]) → "[a, b]"
 */
export function formatList(items: readonly string[] | null | undefined): string {
  return `[${(items ?? []).join(", ")}]`;
}
