#!/usr/bin/env node
// src/cli.ts
import fs from "node:fs";
import path from "node:path";
import { Command, CommanderError, Option } from "commander";
import { APPLY_ORDERS } from "./config.js";
import { CLI_NAME, ENV_CONCURRENCY, ENV_HASH } from "./constants.js";
import { ExitCodes, SyncError, errorMessage } from "./errors.js";
import { HASH_ALGOS } from "./hash.js";
import { collectIgnoreOption } from "./ignore.js";
import { ConsoleLogger, LOG_LEVELS, parseLogLevel } from "./logger.js";
import { formatSummary } from "./report.js";
import { syncTrees } from "./sync.js";

export interface CliOptions {
  hash?: string;
  dryRun: boolean;
  concurrency?: string;
  order: string;
  ignore: string[];
  copyReport?: string;
  deleteReport?: string;
  failFast: boolean;
  summary: boolean;
  quiet: boolean;
  logLevel: string;
}

type Write = (text: string) => void;

const noPatterns: string[] = [];

function readVersion(): string {
  try {
    const raw = fs.readFileSync(
      path.join(__dirname, "..", "package.json"),
      "utf8",
    );
    const pkg: unknown = JSON.parse(raw);
    if (
      typeof pkg === "object" &&
      pkg !== null &&
      "version" in pkg &&
      typeof pkg.version === "string"
    ) {
      return pkg.version;
    }
  } catch {
    // fall through: a missing package.json only affects --version
  }
  return "0.0.0";
}

export function buildProgram(): Command {
  return new Command()
    .name(CLI_NAME)
    .description(
      "Make <destination> an exact copy of <source>: " +
        "copy new and changed files, delete the rest",
    )
    .version(readVersion())
    .argument("<source>", "directory to copy from")
    .argument("<destination>", "directory to bring in line with <source>")
    .addOption(
      new Option("--hash <algorithm>", "content hash algorithm")
        .choices([...HASH_ALGOS])
        .env(ENV_HASH),
    )
    .option("-n, --dry-run", "compute the changes but do not apply them", false)
    .addOption(
      new Option(
        "-j, --concurrency <n>",
        "parallel hash/copy workers (default: number of CPUs)",
      ).env(ENV_CONCURRENCY),
    )
    .addOption(
      new Option("--order <order>", "whether deletes run before or after copies")
        .choices([...APPLY_ORDERS])
        .default("delete-first"),
    )
    .option(
      "-i, --ignore <pattern>",
      "gitignore-style rule excluded on both sides (repeat or comma-separated)",
      collectIgnoreOption,
      noPatterns,
    )
    .option("--copy-report <file>", "write the copy list to <file>")
    .option("--delete-report <file>", "write the delete list to <file>")
    .option("--fail-fast", "stop at the first failed entry", false)
    .option("--summary", "print a summary table when done", false)
    .option("-q, --quiet", "only log errors", false)
    .option(
      "--log-level <level>",
      `log verbosity (${LOG_LEVELS.join(", ")})`,
      "info",
    );
}

export async function runSync(
  source: string,
  destination: string,
  opts: CliOptions,
  write: Write,
): Promise<number> {
  const logger = new ConsoleLogger(
    opts.quiet ? "error" : parseLogLevel(opts.logLevel),
  );
  const result = await syncTrees({
    source,
    destination,
    logger,
    hash: opts.hash,
    dryRun: opts.dryRun,
    concurrency: opts.concurrency,
    order: opts.order,
    ignore: opts.ignore,
    failFast: opts.failFast,
    copyReport: opts.copyReport ?? null,
    deleteReport: opts.deleteReport ?? null,
  });
  if (opts.summary) {
    write(formatSummary(result));
  }
  const failed = result.report?.failed ?? 0;
  if (failed > 0) {
    logger.error(`${failed} of ${result.report?.results.length} actions failed`);
    return ExitCodes.PartialFailure;
  }
  return ExitCodes.Success;
}

function reportFatal(err: unknown): number {
  console.error(`${CLI_NAME}: ${errorMessage(err)}`);
  return err instanceof SyncError ? err.code : ExitCodes.Failure;
}

/** Parse `argv`, run one sync and resolve to the process exit code. */
export async function runCli(
  argv: readonly string[],
  {
    from = "node",
    write = (text) => process.stdout.write(text),
  }: { from?: "node" | "user"; write?: Write } = {},
): Promise<number> {
  let code: number = ExitCodes.Success;
  const program = buildProgram()
    .exitOverride()
    .action(async (source: string, destination: string, opts: CliOptions) => {
      code = await runSync(source, destination, opts, write);
    });
  try {
    await program.parseAsync(argv, { from });
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander already printed help, version or the usage error
      return err.exitCode === 0 ? ExitCodes.Success : ExitCodes.Config;
    }
    return reportFatal(err);
  }
  return code;
}

if (require.main === module) {
  void (async () => {
    process.exitCode = await runCli(process.argv);
  })();
}
