// src/sync.ts
import path from "node:path";
import { realpath, stat } from "node:fs/promises";
import { applyDiff, type ApplyReport } from "./apply.js";
import {
  resolveSyncConfig,
  type SyncConfig,
  type SyncConfigInput,
} from "./config.js";
import { diffTrees, type ComparisonFailure } from "./diff.js";
import { ConfigError, ScanError, errorMessage } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { isWithin } from "./path-rel.js";
import { writeReport } from "./report.js";
import { buildTreeIndex, scanTree, type Entry } from "./scan.js";

export type SyncOptions = SyncConfigInput & {
  source: string;
  destination: string;
  logger?: Logger;
};

export interface SyncResult {
  config: SyncConfig;
  copy: Entry[];
  remove: Entry[];
  comparisonFailures: ComparisonFailure[];
  /** null on a dry run */
  report: ApplyReport | null;
}

async function resolveRoot(
  root: string,
  label: "source" | "destination",
): Promise<string> {
  const abs = path.resolve(root);
  const st = await stat(abs).catch((err: unknown) => {
    throw new ConfigError(
      `${label} '${root}' is not accessible: ${errorMessage(err)}`,
      { cause: err },
    );
  });
  if (!st.isDirectory()) {
    throw new ConfigError(`${label} '${root}' must be a directory`);
  }
  return await realpath(abs);
}

/**
 * Check both roots before touching anything. Overlapping roots are refused:
 * a source inside the destination would show up as destination-only and be
 * deleted, a destination inside the source would be copied into itself.
 */
export async function validateRoots(
  source: string,
  destination: string,
): Promise<{ source: string; destination: string }> {
  const src = await resolveRoot(source, "source");
  const dst = await resolveRoot(destination, "destination");
  if (src === dst) {
    throw new ConfigError(
      `source and destination are the same directory: ${src}`,
    );
  }
  if (isWithin(dst, src) || isWithin(src, dst)) {
    throw new ConfigError(
      `source '${src}' and destination '${dst}' must not contain one another`,
    );
  }
  return { source: src, destination: dst };
}

async function scanSide(
  root: string,
  config: SyncConfig,
  logger: Logger,
): Promise<Entry[]> {
  try {
    const entries = await scanTree(root, { ignore: config.ignore });
    logger.debug("scanned", { root, entries: entries.length });
    return entries;
  } catch (err) {
    throw new ScanError(root, err);
  }
}

export async function syncTrees(options: SyncOptions): Promise<SyncResult> {
  const { source, destination, logger = new NullLogger(), ...input } = options;
  const config = resolveSyncConfig(input);
  const roots = await validateRoots(source, destination);

  const [srcEntries, dstEntries] = await Promise.all([
    scanSide(roots.source, config, logger.child("scan")),
    scanSide(roots.destination, config, logger.child("scan")),
  ]);

  const diff = await diffTrees(
    buildTreeIndex(srcEntries),
    buildTreeIndex(dstEntries),
    { ...config, logger: logger.child("diff") },
  );
  logger.info("diff", {
    copy: diff.copy.length,
    delete: diff.remove.length,
    dryRun: config.dryRun,
  });

  const report = config.dryRun
    ? null
    : await applyDiff(diff, roots.destination, {
        ...config,
        logger: logger.child("apply"),
      });

  if (config.copyReport) await writeReport(config.copyReport, diff.copy);
  if (config.deleteReport) await writeReport(config.deleteReport, diff.remove);

  return { config, ...diff, report };
}
