import type { Entry } from "./scan.js";

/** UTF-8 byte order, so report order does not depend on UTF-16 surrogates. */
export function comparePaths(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
}

/**
 * Directories before files, then ascending byte order of the path. A
 * directory's path is a prefix of its descendants' paths, so it always sorts
 * before them.
 */
export function compareEntries(a: Entry, b: Entry): number {
  if (a.isDirectory !== b.isDirectory) {
    return a.isDirectory ? -1 : 1;
  }
  return comparePaths(a.relativePath, b.relativePath);
}

export function sortParentFirst(entries: Entry[]): Entry[] {
  return entries.sort(compareEntries);
}

// Exact reverse of sortParentFirst: files go first, then directories
// deepest-path first, so a directory is only reached once it is empty.
export function sortChildFirst(entries: Entry[]): Entry[] {
  return entries.sort((a, b) => compareEntries(b, a));
}
