import { promises as fs } from "fs";
import { z } from "zod";
import type { FunctionTool } from "../../adapters/tools/FunctionToolRegistry";
import type { JsonObjectSchema } from "../../shared/contracts";
import { ToolError, fromFsError } from "../../shared/errors";
import { resolveInWorkdir } from "../workspace";

const MakeDirectoryArgs = z.object({
  path: z.string(),
});

export type MakeDirectoryArgs = z.infer<typeof MakeDirectoryArgs>;

export class MakeDirectoryTool implements FunctionTool<MakeDirectoryArgs> {
  readonly name = "make_directory";
  readonly description =
    "Create a new directory at the given relative path, creating parent directories as needed.";

  readonly schema: JsonObjectSchema = {
    type: "object",
    properties: {
      path: {
        type: "string",
        description: "The relative path of the directory to create.",
      },
    },
    required: ["path"],
    additionalProperties: false,
  };

  readonly input = MakeDirectoryArgs;

  constructor(private readonly workdir: string) {}

  async exec(args: MakeDirectoryArgs): Promise<string> {
    if (!args.path) {
      throw new ToolError("InvalidArguments", "path must not be empty");
    }
    try {
      await fs.mkdir(resolveInWorkdir(this.workdir, args.path), { recursive: true });
    } catch (err) {
      throw fromFsError(err, args.path);
    }
    return `Successfully created directory ${args.path}`;
  }
}
