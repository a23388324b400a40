// src/hash.ts
import { createReadStream } from "node:fs";
import { createHash } from "node:crypto";
import { buf as crc32 } from "crc-32";
import { ConfigError } from "./errors.js";

export const STREAM_HWM = 1024 * 1024; // 1MB read chunks

export const HASH_ALGOS = ["md5", "crc32"] as const;

export type HashAlg = (typeof HASH_ALGOS)[number];

export function defaultHashAlg(): HashAlg {
  return "md5";
}

/**
 * Validate a requested algorithm name (case-insensitive).
 * Anything outside HASH_ALGOS is a configuration error.
 */
export function normalizeHashAlg(requested?: string): HashAlg {
  if (!requested) return defaultHashAlg();
  const low = requested.trim().toLowerCase();
  const match = HASH_ALGOS.find((alg) => alg === low);
  if (match) return match;
  throw new ConfigError(
    `Unknown hash algorithm "${requested}". Try one of: ${HASH_ALGOS.join(", ")}`,
  );
}

interface Digester {
  update(chunk: Buffer): void;
  digest(): string;
}

function md5Digester(): Digester {
  const h = createHash("md5");
  return {
    update: (chunk) => {
      h.update(chunk);
    },
    digest: () => h.digest("hex"),
  };
}

function crc32Digester(): Digester {
  let seed = 0;
  return {
    update: (chunk) => {
      seed = crc32(chunk, seed);
    },
    // crc-32 hands back a signed int32
    digest: () => (seed >>> 0).toString(16).padStart(8, "0"),
  };
}

function makeDigester(alg: HashAlg): Digester {
  switch (alg) {
    case "md5":
      return md5Digester();
    case "crc32":
      return crc32Digester();
  }
}

/**
 * Stream a file through the selected algorithm and return a lowercase hex
 * digest. Open and read errors reject.
 */
export async function fileDigest(alg: HashAlg, path: string): Promise<string> {
  const d = makeDigester(alg);
  const rs = createReadStream(path, { highWaterMark: STREAM_HWM });
  for await (const chunk of rs) {
    d.update(chunk);
  }
  return d.digest();
}
