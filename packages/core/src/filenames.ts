const UNSAFE_CHARS = /[^A-Za-z0-9_.-]/g;

/**
 * Reduce a caller-supplied filename to a flat ASCII name that is safe to join
 * onto a server directory. Path separators become word breaks, so
 * `../../etc/passwd` turns into `etc_passwd`. Returns an empty string when
 * nothing usable is left.
 */
export function secureFilename(name: string): string {
  const ascii = name.normalize("NFKD").replace(/[^\x00-\x7f]/g, "");
  const flattened = ascii.replace(/[\\/]/g, " ").split(/\s+/).filter(Boolean).join("_");
  return flattened.replace(UNSAFE_CHARS, "").replace(/^[._]+|[._]+$/g, "");
}

export function ensureExtension(name: string, extension: string): string {
  return name.toLowerCase().endsWith(extension) ? name : `${name}${extension}`;
}

// Swap the trailing extension, or append one when the name has none.
export function replaceExtension(name: string, extension: string): string {
  const separator = Math.max(name.lastIndexOf("/"), name.lastIndexOf("\\"));
  const dot = name.lastIndexOf(".");
  const stem = dot > separator + 1 ? name.slice(0, dot) : name;
  return `${stem}${extension}`;
}
