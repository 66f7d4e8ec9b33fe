import { join, sep } from "node:path";

import { FicpackError } from "./errors.js";

const UNSAFE_NAME_CHARS = /[\0/\\#?&=:]/g;

// Maps an arbitrary label (category, author key, synthetic id) onto a single path segment.
export function bleachName(name: string): string {
  const bleached = name.replace(UNSAFE_NAME_CHARS, "_");
  if (bleached === "." || bleached === "..") return bleached.replaceAll(".", "_");
  return bleached;
}

export function assertInsideRoot(rootAbs: string, absolutePath: string): void {
  const root = rootAbs.endsWith(sep) ? rootAbs : `${rootAbs}${sep}`;
  if (absolutePath === rootAbs) return;
  if (!absolutePath.startsWith(root)) {
    throw new FicpackError(`Unsafe path outside ${rootAbs}: ${absolutePath}`, "Usage", 2);
  }
}

export function joinInside(rootAbs: string, ...segments: string[]): string {
  const abs = join(rootAbs, ...segments);
  assertInsideRoot(rootAbs, abs);
  return abs;
}
