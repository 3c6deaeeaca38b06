import { promises as fs } from "fs";
import { z } from "zod";
import type { FunctionTool } from "../../adapters/tools/FunctionToolRegistry";
import type { JsonObjectSchema } from "../../shared/contracts";
import { ToolError, fromFsError, isNotFound } from "../../shared/errors";
import { resolveInWorkdir } from "../workspace";

const RemoveDirectoryArgs = z.object({
  path: z.string(),
  recursive: z.boolean().default(false),
});

export type RemoveDirectoryArgs = z.infer<typeof RemoveDirectoryArgs>;

export class RemoveDirectoryTool implements FunctionTool<RemoveDirectoryArgs> {
  readonly name = "remove_directory";
  readonly description =
    "Remove a directory at the given relative path. If recursive is true, remove all contents recursively; otherwise, only if empty. Only directories are removed: a path that names a file fails even with recursive set, and a recursive removal of a missing path succeeds.";

  readonly schema: JsonObjectSchema = {
    type: "object",
    properties: {
      path: {
        type: "string",
        description: "The relative path of the directory to remove.",
      },
      recursive: {
        type: "boolean",
        description: "Whether to remove directory recursively along with its contents.",
        default: false,
      },
    },
    required: ["path"],
    additionalProperties: false,
  };

  readonly input = RemoveDirectoryArgs;

  constructor(private readonly workdir: string) {}

  async exec(args: RemoveDirectoryArgs): Promise<string> {
    if (!args.path) {
      throw new ToolError("InvalidArguments", "path must not be empty");
    }
    const resolved = resolveInWorkdir(this.workdir, args.path);

    try {
      if (args.recursive) {
        await this.removeTree(resolved, args.path);
      } else {
        await fs.rmdir(resolved);
      }
    } catch (err) {
      throw fromFsError(err, args.path);
    }
    return `Successfully removed directory ${args.path}`;
  }

  // A missing tree counts as removed; a plain file is refused.
  private async removeTree(resolved: string, target: string): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await fs.lstat(resolved)).isDirectory();
    } catch (err) {
      if (isNotFound(err)) return;
      throw err;
    }
    if (!isDirectory) {
      throw new ToolError("NotADirectory", `${target} is not a directory`);
    }
    await fs.rm(resolved, { recursive: true, force: true });
  }
}
