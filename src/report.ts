import { writeFile } from "node:fs/promises";
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import type { Entry } from "./scan.js";
import type { SyncResult } from "./sync.js";

export function formatReport(entries: readonly Entry[]): string {
  return entries.map((e) => `${e.relativePath}\n`).join("");
}

/** One relative path per line, in list order. An empty list is an empty file. */
export async function writeReport(
  file: string,
  entries: readonly Entry[],
): Promise<void> {
  await writeFile(file, formatReport(entries), "utf8");
}

export function formatSummary(result: SyncResult): string {
  const { copy, remove, comparisonFailures, report } = result;
  const table = new AsciiTable3(report ? "Sync summary" : "Sync summary (dry run)")
    .setHeading("", "Planned", "Done", "Skipped", "Failed")
    .setAlign(1, AlignmentEnum.LEFT)
    .setStyle("unicode-round");

  const applied = (action: "copy" | "delete") => {
    if (!report) return ["-", "-", "-"];
    let done = 0;
    let skipped = 0;
    let failed = 0;
    for (const r of report.results) {
      if (r.action !== action) continue;
      if (r.status === "ok") done += 1;
      else if (r.status === "skipped") skipped += 1;
      else failed += 1;
    }
    return [done, skipped, failed];
  };

  table.addRowMatrix([
    ["copy", copy.length, ...applied("copy")],
    ["delete", remove.length, ...applied("delete")],
  ]);
  if (comparisonFailures.length) {
    table.addRow("unreadable", comparisonFailures.length, "-", "-", "-");
  }
  return table.toString();
}
