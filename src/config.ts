import { ENV_CONCURRENCY, ENV_HASH } from "./constants.js";
import { ConfigError } from "./errors.js";
import { normalizeHashAlg, type HashAlg } from "./hash.js";
import { normalizeIgnorePatterns } from "./ignore.js";
import { defaultConcurrency } from "./pool.js";

export const APPLY_ORDERS = ["delete-first", "copy-first"] as const;
export type ApplyOrder = (typeof APPLY_ORDERS)[number];

/**
 * Everything a run needs besides the two roots. Built once and handed to the
 * diff engine and executor; nothing reads process-wide settings after this.
 */
export interface SyncConfig {
  hash: HashAlg;
  concurrency: number;
  order: ApplyOrder;
  dryRun: boolean;
  failFast: boolean;
  ignore: string[];
  copyReport: string | null;
  deleteReport: string | null;
}

export interface SyncConfigInput {
  hash?: string;
  concurrency?: number | string;
  order?: string;
  dryRun?: boolean;
  failFast?: boolean;
  ignore?: readonly string[];
  copyReport?: string | null;
  deleteReport?: string | null;
}

export function parseConcurrency(raw: number | string): number {
  const n = typeof raw === "number" ? raw : Number(raw.trim());
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(
      `concurrency must be a positive integer, got '${String(raw)}'`,
    );
  }
  return n;
}

export function parseApplyOrder(raw: string): ApplyOrder {
  const order = APPLY_ORDERS.find((o) => o === raw.trim().toLowerCase());
  if (!order) {
    throw new ConfigError(
      `unknown order '${raw}', expected one of ${APPLY_ORDERS.join(", ")}`,
    );
  }
  return order;
}

export function resolveSyncConfig(
  input: SyncConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): SyncConfig {
  const concurrencyRaw = input.concurrency ?? env[ENV_CONCURRENCY];
  return {
    hash: normalizeHashAlg(input.hash ?? env[ENV_HASH]),
    concurrency:
      concurrencyRaw === undefined || concurrencyRaw === ""
        ? defaultConcurrency()
        : parseConcurrency(concurrencyRaw),
    order: input.order ? parseApplyOrder(input.order) : "delete-first",
    dryRun: input.dryRun ?? false,
    failFast: input.failFast ?? false,
    ignore: normalizeIgnorePatterns(input.ignore ?? []),
    copyReport: input.copyReport ?? null,
    deleteReport: input.deleteReport ?? null,
  };
}
