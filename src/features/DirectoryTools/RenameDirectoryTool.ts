import { promises as fs } from "fs";
import { z } from "zod";
import type { FunctionTool } from "../../adapters/tools/FunctionToolRegistry";
import type { JsonObjectSchema } from "../../shared/contracts";
import { ToolError, fromFsError } from "../../shared/errors";
import { resolveInWorkdir } from "../workspace";

const RenameDirectoryArgs = z.object({
  old_path: z.string(),
  new_path: z.string(),
});

export type RenameDirectoryArgs = z.infer<typeof RenameDirectoryArgs>;

export class RenameDirectoryTool implements FunctionTool<RenameDirectoryArgs> {
  readonly name = "rename_directory";
  readonly description = "Rename or move a directory from the old path to the new path.";

  readonly schema: JsonObjectSchema = {
    type: "object",
    properties: {
      old_path: {
        type: "string",
        description: "The current relative path of the directory.",
      },
      new_path: {
        type: "string",
        description: "The new relative path for the directory.",
      },
    },
    required: ["old_path", "new_path"],
    additionalProperties: false,
  };

  readonly input = RenameDirectoryArgs;

  constructor(private readonly workdir: string) {}

  async exec(args: RenameDirectoryArgs): Promise<string> {
    const { old_path: from, new_path: to } = args;
    if (!from || !to) {
      throw new ToolError("InvalidArguments", "old_path and new_path must not be empty");
    }
    try {
      await fs.rename(resolveInWorkdir(this.workdir, from), resolveInWorkdir(this.workdir, to));
    } catch (err) {
      // ENOENT on rename is almost always the source; report that path.
      throw fromFsError(err, from);
    }
    return `Successfully renamed directory from ${from} to ${to}`;
  }
}
