// src/path-rel.ts
import path from "node:path";

// Relative paths are always "/"-joined, whatever the platform separator is.
export function toRel(abs: string, root: string): string {
  if (abs === root) return "";
  const prefix = root.endsWith("/") ? root : root + "/";
  if (abs.startsWith(prefix)) return abs.slice(prefix.length);
  const rel = path.relative(root, abs);
  return rel.split(path.sep).join("/");
}

export function toAbs(rel: string, root: string): string {
  return rel ? path.join(root, ...rel.split("/")) : root;
}

export function parentOf(rel: string): string {
  const i = rel.lastIndexOf("/");
  return i === -1 ? "" : rel.slice(0, i);
}

/** Ancestors of `rel`, nearest first, excluding the root (""). */
export function ancestorsOf(rel: string): string[] {
  const out: string[] = [];
  for (let p = parentOf(rel); p !== ""; p = parentOf(p)) {
    out.push(p);
  }
  return out;
}

/** True if `inner` is `outer` or lies beneath it (absolute paths). */
export function isWithin(inner: string, outer: string): boolean {
  const rel = path.relative(outer, inner);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}
