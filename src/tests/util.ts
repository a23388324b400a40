import fsp from "node:fs/promises";
import { dirname, join } from "node:path";
import { syncTrees, type SyncOptions } from "../sync.js";
import type { Entry } from "../scan.js";

export async function fileExists(p: string) {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}

export async function dirExists(p: string) {
  return !!(await fsp
    .stat(p)
    .then((st) => st.isDirectory())
    .catch(() => false));
}

export type Roots = {
  srcRoot: string;
  dstRoot: string;
};

export async function mkCase(tmpBase: string, name: string): Promise<Roots> {
  const base = join(tmpBase, name);
  const srcRoot = join(base, "src");
  const dstRoot = join(base, "dst");
  await fsp.mkdir(srcRoot, { recursive: true });
  await fsp.mkdir(dstRoot, { recursive: true });
  return { srcRoot, dstRoot };
}

/**
 * Populate `root` from a tree map: keys ending in "/" are directories, every
 * other key is a file with the given content.
 */
export async function writeTree(
  root: string,
  tree: Record<string, string>,
): Promise<void> {
  for (const [rel, content] of Object.entries(tree)) {
    const p = join(root, rel);
    if (rel.endsWith("/")) {
      await fsp.mkdir(p, { recursive: true });
    } else {
      await fsp.mkdir(dirname(p), { recursive: true });
      await fsp.writeFile(p, content);
    }
  }
}

/** Sorted relative paths under `root`, directories with a trailing "/". */
export async function listTree(root: string, prefix = ""): Promise<string[]> {
  const out: string[] = [];
  for (const d of await fsp.readdir(join(root, prefix), {
    withFileTypes: true,
  })) {
    const rel = prefix ? `${prefix}/${d.name}` : d.name;
    if (d.isDirectory()) {
      out.push(`${rel}/`);
      out.push(...(await listTree(root, rel)));
    } else {
      out.push(rel);
    }
  }
  return out.sort();
}

export function paths(entries: readonly Entry[]): string[] {
  return entries.map((e) => e.relativePath);
}

export async function sync(
  r: Roots,
  opts: Omit<SyncOptions, "source" | "destination"> = {},
) {
  return await syncTrees({
    source: r.srcRoot,
    destination: r.dstRoot,
    concurrency: 4,
    ...opts,
  });
}

export function wait(ms: number) {
  return ms > 0
    ? new Promise((resolve) => setTimeout(resolve, ms))
    : Promise.resolve();
}
