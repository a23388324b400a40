// src/diff.ts
import { fileDigest, type HashAlg } from "./hash.js";
import { NullLogger, type Logger } from "./logger.js";
import { comparePaths, sortChildFirst, sortParentFirst } from "./order.js";
import { parallelMapLimit } from "./pool.js";
import { isRegularFile, type Entry, type TreeIndex } from "./scan.js";
import { ComparisonError, toError } from "./errors.js";
import type { SyncConfig } from "./config.js";

export interface ComparisonFailure {
  entry: Entry;
  error: Error;
}

export interface DiffResult {
  /** Source entries to create or overwrite, parents first. */
  copy: Entry[];
  /** Destination entries to remove, children first. */
  remove: Entry[];
  /** Files that could not be hashed; each one is also in `copy`. */
  comparisonFailures: ComparisonFailure[];
}

export type DiffOptions = Pick<
  SyncConfig,
  "hash" | "concurrency" | "failFast"
> & {
  logger?: Logger;
};

type Pair = { src: Entry; dst: Entry };

async function sameContent(alg: HashAlg, { src, dst }: Pair): Promise<boolean> {
  // an lstat size is only the content size for a regular file
  if (isRegularFile(src) && isRegularFile(dst) && src.size !== dst.size) {
    return false;
  }
  // one stream per task: the pool limit bounds open files
  const a = await fileDigest(alg, src.absolutePath);
  const b = await fileDigest(alg, dst.absolutePath);
  return a === b;
}

export async function diffTrees(
  src: TreeIndex,
  dst: TreeIndex,
  { hash, concurrency, failFast, logger = new NullLogger() }: DiffOptions,
): Promise<DiffResult> {
  const copy: Entry[] = [];
  const remove: Entry[] = [];
  const candidates: Pair[] = [];

  for (const [rel, s] of src) {
    const d = dst.get(rel);
    if (!d) {
      copy.push(s);
    } else if (s.isDirectory !== d.isDirectory) {
      // type changed: clear the destination entry, then create it anew
      logger.debug("type changed", { path: rel, directory: s.isDirectory });
      remove.push(d);
      copy.push(s);
    } else if (!s.isDirectory && !isRegularFile(d)) {
      // a copy would write through a destination link; replace the link
      logger.debug("replacing non-regular entry", { path: rel });
      remove.push(d);
      copy.push(s);
    } else if (!s.isDirectory) {
      candidates.push({ src: s, dst: d });
    }
  }

  for (const [rel, d] of dst) {
    if (!src.has(rel)) remove.push(d);
  }

  const comparisonFailures: ComparisonFailure[] = [];
  const verdicts = await parallelMapLimit(
    candidates,
    concurrency,
    async (pair): Promise<boolean> => {
      try {
        return await sameContent(hash, pair);
      } catch (err) {
        if (failFast) {
          throw new ComparisonError(pair.src.relativePath, err);
        }
        const error = toError(err);
        logger.warn("compare failed; treating as changed", {
          path: pair.src.relativePath,
          error: error.message,
        });
        comparisonFailures.push({ entry: pair.src, error });
        return false;
      }
    },
  );
  candidates.forEach((pair, i) => {
    if (!verdicts[i]) copy.push(pair.src);
  });

  comparisonFailures.sort((a, b) =>
    comparePaths(a.entry.relativePath, b.entry.relativePath),
  );
  logger.debug("diff complete", {
    compared: candidates.length,
    copy: copy.length,
    remove: remove.length,
  });
  return {
    copy: sortParentFirst(copy),
    remove: sortChildFirst(remove),
    comparisonFailures,
  };
}
