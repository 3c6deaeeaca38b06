import fs from "fs";
import path from "path";
import { ListFilesTool } from "../../src/features/FileTools/ListFilesTool";
import { makeWorkdir, removeWorkdir, writeTree } from "../helpers/tempWorkdir";

describe("ListFilesTool", () => {
  let dir: string;
  let tool: ListFilesTool;

  beforeEach(() => {
    dir = makeWorkdir();
    tool = new ListFilesTool(dir);
    writeTree(dir, {
      "b.txt": "b",
      "a/z.md": "z",
      "a/inner/deep.ts": "x",
      "C.txt": "c",
    });
    fs.mkdirSync(path.join(dir, "empty"));
  });

  afterEach(() => {
    removeWorkdir(dir);
  });

  test("lists the working directory recursively in sorted depth-first order", async () => {
    const output = await tool.exec({});
    expect(JSON.parse(output)).toEqual([
      "C.txt",
      "a/",
      "a/inner/",
      "a/inner/deep.ts",
      "a/z.md",
      "b.txt",
      "empty/",
    ]);
  });

  test("entries are relative to the requested path and exclude the root", async () => {
    const entries: string[] = JSON.parse(await tool.exec({ path: "a" }));
    expect(entries).toEqual(["inner/", "inner/deep.ts", "z.md"]);
    expect(entries).not.toContain("");
    expect(entries).not.toContain("a/");
  });

  test("directory entries end with a separator and file entries do not", async () => {
    const entries: string[] = JSON.parse(await tool.exec({ path: "." }));
    for (const entry of entries) {
      const isDir = fs.statSync(path.join(dir, entry)).isDirectory();
      expect(entry.endsWith(path.sep)).toBe(isDir);
    }
  });

  test("an empty directory lists as an empty array", async () => {
    await expect(tool.exec({ path: "empty" })).resolves.toBe("[]");
  });

  test("fails with NotFound for a missing path", async () => {
    await expect(tool.exec({ path: "nope" })).rejects.toMatchObject({
      code: "NotFound",
      message: "no such file or directory: nope",
    });
  });

  test("fails with NotADirectory for a file", async () => {
    await expect(tool.exec({ path: "b.txt" })).rejects.toMatchObject({
      code: "NotADirectory",
      message: "b.txt is not a directory",
    });
  });
});
