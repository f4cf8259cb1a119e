/**
 * Check if a ref name is valid
 *
 * Based on git-check-ref-format rules. Names that pass can be joined onto
 * the git directory without escaping it.
 */
export function isValidRefName(name: string): boolean {
  if (name.length === 0) return false;
  if (name.startsWith("/") || name.endsWith("/")) return false;
  if (name.includes("//")) return false;
  if (name.includes("..")) return false;
  if (name.endsWith(".lock")) return false;
  if (name.includes("@{")) return false;

  for (const c of name) {
    const code = c.charCodeAt(0);
    if (code < 0x20 || code === 0x7f) return false;
    if (c === " " || c === "~" || c === "^" || c === ":" || c === "?" || c === "*" || c === "[")
      return false;
    if (c === "\\") return false;
  }

  for (const component of name.split("/")) {
    if (component.startsWith(".")) return false;
  }

  return true;
}
