// src/apply.ts
import { createReadStream, createWriteStream } from "node:fs";
import { chmod, mkdir, rmdir, unlink } from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import type { ApplyOrder, SyncConfig } from "./config.js";
import type { DiffResult } from "./diff.js";
import { ApplyError, isErrnoException, toError } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { ancestorsOf, toAbs } from "./path-rel.js";
import { parallelMapLimit } from "./pool.js";
import type { Entry } from "./scan.js";

export type ActionKind = "copy" | "delete";

export type EntryOutcome =
  | { status: "ok" }
  | { status: "skipped"; reason: string }
  | { status: "failed"; error: Error };

export type EntryResult = { action: ActionKind; entry: Entry } & EntryOutcome;

export interface ApplyReport {
  /** One result per action, in the order the actions were applied. */
  results: EntryResult[];
  copied: number;
  deleted: number;
  skipped: number;
  failed: number;
}

export type ApplyOptions = Pick<
  SyncConfig,
  "concurrency" | "order" | "failFast"
> & {
  logger?: Logger;
};

const permBits = (mode: number) => mode & 0o7777;

export function summarizeResults(results: EntryResult[]): ApplyReport {
  const report: ApplyReport = {
    results,
    copied: 0,
    deleted: 0,
    skipped: 0,
    failed: 0,
  };
  for (const r of results) {
    if (r.status === "ok") {
      if (r.action === "copy") report.copied += 1;
      else report.deleted += 1;
    } else if (r.status === "skipped") {
      report.skipped += 1;
    } else {
      report.failed += 1;
    }
  }
  return report;
}

/**
 * Deletes that must happen before any copy even in copy-first order: the
 * destination entry sits on a path a copy is about to create, or beneath a
 * directory that a source file replaces.
 */
export function blockingDeletes(
  remove: readonly Entry[],
  copy: readonly Entry[],
): Entry[] {
  const copyPaths = new Set(copy.map((e) => e.relativePath));
  const copiedFiles = new Set(
    copy.filter((e) => !e.isDirectory).map((e) => e.relativePath),
  );
  return remove.filter(
    (d) =>
      copyPaths.has(d.relativePath) ||
      ancestorsOf(d.relativePath).some((a) => copiedFiles.has(a)),
  );
}

class Executor {
  private readonly results: EntryResult[] = [];
  // relative paths whose directory could not be created
  private readonly missingDirs = new Set<string>();
  // relative paths of directories that still hold something we failed to delete
  private readonly nonEmptyDirs = new Set<string>();

  constructor(
    private readonly dstRoot: string,
    private readonly concurrency: number,
    private readonly failFast: boolean,
    private readonly logger: Logger,
  ) {}

  report(): ApplyReport {
    return summarizeResults([...this.results]);
  }

  private record(result: EntryResult): void {
    this.results.push(result);
    if (result.status === "failed") {
      this.logger.error(`${result.action} failed`, {
        path: result.entry.relativePath,
        error: result.error.message,
      });
      if (this.failFast) {
        throw new ApplyError(
          result.entry.relativePath,
          result.error,
          this.report(),
        );
      }
    } else if (result.status === "skipped") {
      this.logger.warn(`${result.action} skipped`, {
        path: result.entry.relativePath,
        reason: result.reason,
      });
    }
  }

  async deleteEntries(entries: readonly Entry[]): Promise<void> {
    for (const entry of entries) {
      const rel = entry.relativePath;
      const outcome: EntryOutcome = this.nonEmptyDirs.has(rel)
        ? { status: "skipped", reason: "a descendant could not be removed" }
        : await this.deleteOne(entry);
      if (outcome.status !== "ok") {
        for (const a of ancestorsOf(rel)) this.nonEmptyDirs.add(a);
      } else {
        this.logger.info("delete", { path: rel });
      }
      this.record({ action: "delete", entry, ...outcome });
    }
  }

  private async deleteOne(entry: Entry): Promise<EntryOutcome> {
    try {
      if (entry.isDirectory) {
        await rmdir(entry.absolutePath);
      } else {
        await unlink(entry.absolutePath);
      }
      return { status: "ok" };
    } catch (err) {
      // already gone counts as deleted
      if (isErrnoException(err) && err.code === "ENOENT") {
        return { status: "ok" };
      }
      return { status: "failed", error: toError(err) };
    }
  }

  async copyEntries(entries: readonly Entry[]): Promise<void> {
    const dirs = entries.filter((e) => e.isDirectory);
    const files = entries.filter((e) => !e.isDirectory);
    const created = await this.createDirs(dirs);
    await this.copyFiles(files);
    await this.restoreDirModes(created);
  }

  private missingAncestor(rel: string): string | undefined {
    return ancestorsOf(rel).find((a) => this.missingDirs.has(a));
  }

  // Strictly sequential: the list order is what puts parents first.
  private async createDirs(
    dirs: readonly Entry[],
  ): Promise<{ entry: Entry; index: number }[]> {
    const created: { entry: Entry; index: number }[] = [];
    for (const entry of dirs) {
      const rel = entry.relativePath;
      const missing = this.missingAncestor(rel);
      let outcome: EntryOutcome;
      if (missing !== undefined) {
        outcome = {
          status: "skipped",
          reason: `parent directory '${missing}' was not created`,
        };
      } else {
        try {
          // owner rwx until the files are in; the exact mode is set afterwards
          await mkdir(toAbs(rel, this.dstRoot), {
            mode: permBits(entry.mode) | 0o700,
          });
          outcome = { status: "ok" };
          created.push({ entry, index: this.results.length });
          this.logger.info("mkdir", { path: rel });
        } catch (err) {
          outcome = { status: "failed", error: toError(err) };
        }
      }
      if (outcome.status !== "ok") this.missingDirs.add(rel);
      this.record({ action: "copy", entry, ...outcome });
    }
    return created;
  }

  private async copyFiles(files: readonly Entry[]): Promise<void> {
    const done: (EntryResult | undefined)[] = new Array(files.length);
    try {
      await parallelMapLimit(files, this.concurrency, async (entry, i) => {
        const rel = entry.relativePath;
        const missing = this.missingAncestor(rel);
        const outcome: EntryOutcome =
          missing !== undefined
            ? {
                status: "skipped",
                reason: `parent directory '${missing}' was not created`,
              }
            : await this.copyFile(entry);
        done[i] = { action: "copy", entry, ...outcome };
        if (outcome.status === "ok") {
          this.logger.info("copy", { path: rel });
        } else if (outcome.status === "failed" && this.failFast) {
          throw outcome.error;
        }
      });
    } finally {
      // record in list order, not completion order
      for (const r of done) {
        if (r) this.record(r);
      }
    }
  }

  private async copyFile(entry: Entry): Promise<EntryOutcome> {
    const target = toAbs(entry.relativePath, this.dstRoot);
    const mode = permBits(entry.mode);
    try {
      await pipeline(
        createReadStream(entry.absolutePath),
        createWriteStream(target, { mode }),
      );
      // mode only applies when the file is created; an overwrite keeps the old one
      await chmod(target, mode);
      return { status: "ok" };
    } catch (err) {
      return { status: "failed", error: toError(err) };
    }
  }

  private async restoreDirModes(
    created: { entry: Entry; index: number }[],
  ): Promise<void> {
    // deepest first, so a parent losing owner write/exec cannot block a child
    for (const { entry, index } of [...created].reverse()) {
      try {
        await chmod(
          toAbs(entry.relativePath, this.dstRoot),
          permBits(entry.mode),
        );
      } catch (err) {
        const result: EntryResult = {
          action: "copy",
          entry,
          status: "failed",
          error: toError(err),
        };
        this.results[index] = result;
        this.logger.error("chmod failed", {
          path: entry.relativePath,
          error: result.error.message,
        });
        if (this.failFast) {
          throw new ApplyError(entry.relativePath, result.error, this.report());
        }
      }
    }
  }
}

/**
 * Apply a diff to `dstRoot`.
 *
 * delete-first: every delete, then every copy.
 * copy-first: deletes that clear a path needed by a copy, then every copy,
 * then the remaining deletes.
 *
 * Per-entry failures are collected in the returned report; with `failFast`
 * the first one rejects with an ApplyError instead.
 */
export async function applyDiff(
  diff: Pick<DiffResult, "copy" | "remove">,
  dstRoot: string,
  {
    concurrency,
    order,
    failFast,
    logger = new NullLogger(),
  }: ApplyOptions,
): Promise<ApplyReport> {
  const exec = new Executor(dstRoot, concurrency, failFast, logger);
  await runInOrder(exec, diff, order);
  const report = exec.report();
  logger.debug("apply complete", {
    copied: report.copied,
    deleted: report.deleted,
    skipped: report.skipped,
    failed: report.failed,
  });
  return report;
}

async function runInOrder(
  exec: Executor,
  { copy, remove }: Pick<DiffResult, "copy" | "remove">,
  order: ApplyOrder,
): Promise<void> {
  if (order === "delete-first") {
    await exec.deleteEntries(remove);
    await exec.copyEntries(copy);
    return;
  }
  const early = new Set(blockingDeletes(remove, copy));
  await exec.deleteEntries(remove.filter((e) => early.has(e)));
  await exec.copyEntries(copy);
  await exec.deleteEntries(remove.filter((e) => !early.has(e)));
}
