import fsp from "node:fs/promises";
import os from "node:os";
import { join } from "node:path";
import { buildTreeIndex, scanTree } from "../scan.js";
import { paths, writeTree } from "./util";

describe("scanTree", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await fsp.mkdtemp(join(os.tmpdir(), "dirmirror-scan-"));
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("finds every file and directory with root-relative paths", async () => {
    const root = join(tmp, "basic");
    await writeTree(root, {
      "a/x.txt": "hi",
      "a/b/y.txt": "yo",
      "a/empty/": "",
      "z.txt": "zz",
    });
    const entries = await scanTree(root);
    expect(paths(entries).sort()).toEqual([
      "a",
      "a/b",
      "a/b/y.txt",
      "a/empty",
      "a/x.txt",
      "z.txt",
    ]);
    const x = entries.find((e) => e.relativePath === "a/x.txt");
    expect(x).toMatchObject({
      absolutePath: join(root, "a", "x.txt"),
      isDirectory: false,
      size: 2,
    });
    const b = entries.find((e) => e.relativePath === "a/b");
    expect(b?.isDirectory).toBe(true);
  });

  test("a directory always comes before its children", async () => {
    const root = join(tmp, "order");
    await writeTree(root, {
      "p/q/r/s.txt": "1",
      "p/q/t.txt": "2",
      "p/u/v.txt": "3",
    });
    const rels = paths(await scanTree(root));
    for (const rel of rels) {
      const i = rel.lastIndexOf("/");
      if (i === -1) continue;
      expect(rels.indexOf(rel.slice(0, i))).toBeLessThan(rels.indexOf(rel));
    }
  });

  test("records permission bits", async () => {
    const root = join(tmp, "modes");
    await writeTree(root, { "m.sh": "#!/bin/sh\n" });
    await fsp.chmod(join(root, "m.sh"), 0o751);
    const [entry] = await scanTree(root);
    expect(entry.mode & 0o7777).toBe(0o751);
  });

  test("symlinks are listed as files and not followed", async () => {
    const root = join(tmp, "links");
    await writeTree(root, { "real/inner.txt": "in" });
    await fsp.symlink(join(root, "real"), join(root, "alias"));
    const entries = await scanTree(root);
    expect(paths(entries).sort()).toEqual(["alias", "real", "real/inner.txt"]);
    expect(entries.find((e) => e.relativePath === "alias")?.isDirectory).toBe(
      false,
    );
  });

  test("ignore rules drop entries and whole directories", async () => {
    const root = join(tmp, "ignored");
    await writeTree(root, {
      "build/out.js": "x",
      "logs/app.log": "log",
      "logs/keep.txt": "k",
      "src/build": "a file named build",
    });
    const entries = await scanTree(root, { ignore: ["*.log", "build/"] });
    expect(paths(entries).sort()).toEqual([
      "logs",
      "logs/keep.txt",
      "src",
      "src/build",
    ]);
  });

  test("a missing root rejects", async () => {
    await expect(scanTree(join(tmp, "does-not-exist"))).rejects.toMatchObject({
      code: "ENOENT",
    });
  });

  test("an empty root scans to nothing", async () => {
    const root = join(tmp, "empty");
    await fsp.mkdir(root);
    await expect(scanTree(root)).resolves.toEqual([]);
  });
});

describe("buildTreeIndex", () => {
  test("keys entries by relative path", () => {
    const a = {
      relativePath: "a",
      absolutePath: "/r/a",
      isDirectory: true,
      mode: 0o40755,
      size: 0,
    };
    const ax = {
      relativePath: "a/x",
      absolutePath: "/r/a/x",
      isDirectory: false,
      mode: 0o100644,
      size: 3,
    };
    const index = buildTreeIndex([a, ax]);
    expect(index.size).toBe(2);
    expect(index.get("a/x")).toBe(ax);
    expect(index.get("a")).toBe(a);
    expect(index.has("x")).toBe(false);
  });
});
