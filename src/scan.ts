// src/scan.ts
import { constants } from "node:fs";
import path from "node:path";
import * as walk from "@nodelib/fs.walk";
import type { Entry as WalkEntry } from "@nodelib/fs.walk";
import { createIgnorer, type Ignorer } from "./ignore.js";
import { toRel } from "./path-rel.js";

export interface Entry {
  /** Unique key within one tree; "/"-joined and relative to the scan root. */
  relativePath: string;
  absolutePath: string;
  isDirectory: boolean;
  mode: number;
  size: number;
}

/** lstat type is a regular file; false for links, fifos and sockets. */
export function isRegularFile(entry: Entry): boolean {
  return (entry.mode & constants.S_IFMT) === constants.S_IFREG;
}

export type TreeIndex = ReadonlyMap<string, Entry>;

export interface ScanOptions {
  ignore?: readonly string[];
  concurrency?: number;
}

function walkAll(
  root: string,
  settings: walk.Options,
): Promise<WalkEntry[]> {
  return new Promise((resolve, reject) => {
    walk.walk(root, settings, (err, entries) => {
      if (err) reject(err);
      else resolve(entries);
    });
  });
}

/**
 * Scan every descendant of `root`. A directory is always emitted before its
 * children. Links are not followed: whatever lstat reports as a non-directory
 * is treated as a file. The first unreadable directory rejects the scan.
 */
export async function scanTree(
  root: string,
  { ignore = [], concurrency = 64 }: ScanOptions = {},
): Promise<Entry[]> {
  const absRoot = path.resolve(root);
  const ig: Ignorer = createIgnorer(ignore);
  const found = await walkAll(absRoot, {
    stats: true,
    followSymbolicLinks: false,
    concurrency,
    // Do not descend into ignored directories
    deepFilter: (e) => !ig.ignoresDir(toRel(e.path, absRoot)),
    // Do not emit ignored entries
    entryFilter: (e) => {
      const r = toRel(e.path, absRoot);
      return e.dirent.isDirectory() ? !ig.ignoresDir(r) : !ig.ignoresFile(r);
    },
  });

  const entries: Entry[] = [];
  for (const e of found) {
    const st = e.stats;
    entries.push({
      relativePath: toRel(e.path, absRoot),
      absolutePath: e.path,
      isDirectory: e.dirent.isDirectory(),
      mode: st?.mode ?? 0,
      size: st?.size ?? 0,
    });
  }
  return entries;
}

export function buildTreeIndex(entries: readonly Entry[]): TreeIndex {
  const m = new Map<string, Entry>();
  for (const e of entries) {
    m.set(e.relativePath, e);
  }
  return m;
}
