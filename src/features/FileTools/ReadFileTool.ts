import { promises as fs } from "fs";
import { z } from "zod";
import type { FunctionTool } from "../../adapters/tools/FunctionToolRegistry";
import type { JsonObjectSchema } from "../../shared/contracts";
import { ToolError, fromFsError } from "../../shared/errors";
import { resolveInWorkdir } from "../workspace";

const ReadFileArgs = z.object({
  path: z.string(),
});

export type ReadFileArgs = z.infer<typeof ReadFileArgs>;

export class ReadFileTool implements FunctionTool<ReadFileArgs> {
  readonly name = "read_file";
  readonly description =
    "Read the contents of a given relative file path. Use this when you want to see what's inside a file. Do not use this with directory names.";

  readonly schema: JsonObjectSchema = {
    type: "object",
    properties: {
      path: {
        type: "string",
        description: "The relative path of a file in the working directory.",
      },
    },
    required: ["path"],
    additionalProperties: false,
  };

  readonly input = ReadFileArgs;

  constructor(private readonly workdir: string) {}

  async exec(args: ReadFileArgs): Promise<string> {
    if (!args.path) {
      throw new ToolError("InvalidArguments", "path must not be empty");
    }
    try {
      return await fs.readFile(resolveInWorkdir(this.workdir, args.path), "utf8");
    } catch (err) {
      throw fromFsError(err, args.path);
    }
  }
}
