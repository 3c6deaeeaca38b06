import fs from "fs";
import path from "path";
import { RemoveDirectoryTool } from "../../src/features/DirectoryTools/RemoveDirectoryTool";
import { makeWorkdir, removeWorkdir, writeTree } from "../helpers/tempWorkdir";

describe("RemoveDirectoryTool", () => {
  let dir: string;
  let tool: RemoveDirectoryTool;

  beforeEach(() => {
    dir = makeWorkdir();
    tool = new RemoveDirectoryTool(dir);
  });

  afterEach(() => {
    removeWorkdir(dir);
  });

  test("removes an empty directory", async () => {
    fs.mkdirSync(path.join(dir, "empty"));
    await expect(tool.exec({ path: "empty", recursive: false })).resolves.toBe(
      "Successfully removed directory empty"
    );
    expect(fs.existsSync(path.join(dir, "empty"))).toBe(false);
  });

  test("refuses a non-empty directory unless recursive", async () => {
    writeTree(dir, { "full/a.txt": "a", "full/sub/b.txt": "b" });

    await expect(tool.exec({ path: "full", recursive: false })).rejects.toMatchObject({
      code: "NotEmpty",
      message: "directory not empty: full",
    });
    expect(fs.existsSync(path.join(dir, "full/a.txt"))).toBe(true);

    await expect(tool.exec({ path: "full", recursive: true })).resolves.toBe(
      "Successfully removed directory full"
    );
    expect(fs.existsSync(path.join(dir, "full"))).toBe(false);
  });

  test("fails with NotFound for a missing directory when not recursive", async () => {
    await expect(tool.exec({ path: "ghost", recursive: false })).rejects.toMatchObject({
      code: "NotFound",
    });
  });

  test("treats a missing directory as removed when recursive", async () => {
    await expect(tool.exec({ path: "ghost", recursive: true })).resolves.toBe(
      "Successfully removed directory ghost"
    );
  });

  test("refuses to remove a file", async () => {
    writeTree(dir, { "file.txt": "x" });
    await expect(tool.exec({ path: "file.txt", recursive: false })).rejects.toMatchObject({
      code: "NotADirectory",
    });
    await expect(tool.exec({ path: "file.txt", recursive: true })).rejects.toMatchObject({
      code: "NotADirectory",
    });
    expect(fs.existsSync(path.join(dir, "file.txt"))).toBe(true);
  });

  test("rejects an empty path", async () => {
    await expect(tool.exec({ path: "", recursive: true })).rejects.toMatchObject({
      code: "InvalidArguments",
    });
  });

  test("description tells the model that files are refused even when recursive", () => {
    expect(tool.description).toContain(
      "a path that names a file fails even with recursive set"
    );
  });

  test("recursive defaults to false when decoding", () => {
    expect(tool.input.parse({ path: "x" })).toEqual({ path: "x", recursive: false });
  });
});
