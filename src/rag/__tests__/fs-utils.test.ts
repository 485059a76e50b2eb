import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import { mkdir, readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { readFileIfExists, writeFileAtomic } from "../fs-utils.js";
import { makeTempDir, removeDir } from "./helpers.js";

describe("fs-utils", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("returns null for a file that does not exist", async () => {
    expect(await readFileIfExists(path.join(dir, "missing", "chunks.json"))).toBeNull();
  });

  it("rethrows errors other than a missing file", async () => {
    const subdir = path.join(dir, "a-directory");
    await mkdir(subdir);
    await expect(readFileIfExists(subdir)).rejects.toMatchObject({ code: "EISDIR" });
  });

  it("creates parent directories and leaves no temp files behind", async () => {
    const filePath = path.join(dir, "nested", "chunks.json");
    await writeFileAtomic(filePath, "[]");
    await writeFileAtomic(filePath, '[{"doc_id":"d1"}]');

    expect(await readFile(filePath, "utf-8")).toBe('[{"doc_id":"d1"}]');
    expect(await readdir(path.join(dir, "nested"))).toEqual(["chunks.json"]);
  });
});
