import { normalize, resolve } from "node:path";

/** Join `name` onto `base`, refusing results that escape `base`. */
export function safeJoin(base: string, name: string): string {
  const resolved = resolve(base, name);
  const normalizedBase = normalize(resolve(base));
  // Append separator to prevent prefix false-positives (e.g. /tmp/bundles vs /tmp/bundles-evil)
  const baseWithSep = normalizedBase.endsWith("/") ? normalizedBase : `${normalizedBase}/`;
  if (!resolved.startsWith(baseWithSep)) {
    throw new Error(`Path traversal detected: ${name}`);
  }
  return resolved;
}
