import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import type { FunctionTool } from "../../adapters/tools/FunctionToolRegistry";
import type { JsonObjectSchema } from "../../shared/contracts";
import { ToolError, fromFsError, isNotFound } from "../../shared/errors";
import { resolveInWorkdir } from "../workspace";
import { replaceAllBytes } from "./replaceBytes";

const EditFileArgs = z.object({
  path: z.string(),
  old_str: z.string(),
  new_str: z.string(),
});

export type EditFileArgs = z.infer<typeof EditFileArgs>;

export class EditFileTool implements FunctionTool<EditFileArgs> {
  readonly name = "edit_file";
  readonly description = `Make edits to a text file.

Replaces 'old_str' with 'new_str' in the given file. Every occurrence of 'old_str' is replaced. 'old_str' and 'new_str' MUST be different from each other.

If the file specified with path doesn't exist and 'old_str' is empty, it will be created with 'new_str' as its content.
`;

  readonly schema: JsonObjectSchema = {
    type: "object",
    properties: {
      path: {
        type: "string",
        description: "The path to the file",
      },
      old_str: {
        type: "string",
        description: "Text to search for - must match exactly. Use an empty string to create a new file.",
      },
      new_str: {
        type: "string",
        description: "Text to replace old_str with",
      },
    },
    required: ["path", "old_str", "new_str"],
    additionalProperties: false,
  };

  readonly input = EditFileArgs;

  constructor(private readonly workdir: string) {}

  async exec(args: EditFileArgs): Promise<string> {
    const { path: target, old_str: oldStr, new_str: newStr } = args;
    if (!target || oldStr === newStr) {
      throw new ToolError(
        "InvalidArguments",
        "invalid input parameters: path must not be empty and old_str must differ from new_str"
      );
    }

    const resolved = resolveInWorkdir(this.workdir, target);
    let current: Buffer;
    try {
      current = await fs.readFile(resolved);
    } catch (err) {
      if (isNotFound(err) && oldStr === "") {
        return this.createFile(resolved, target, newStr);
      }
      throw fromFsError(err, target);
    }

    const updated = replaceAllBytes(
      current,
      Buffer.from(oldStr, "utf8"),
      Buffer.from(newStr, "utf8")
    );
    if (oldStr !== "" && updated.equals(current)) {
      throw new ToolError("NoMatch", "old_str not found in file");
    }

    try {
      await fs.writeFile(resolved, updated);
    } catch (err) {
      throw fromFsError(err, target);
    }
    return "OK";
  }

  private async createFile(resolved: string, target: string, content: string): Promise<string> {
    try {
      await fs.mkdir(path.dirname(resolved), { recursive: true });
      await fs.writeFile(resolved, content, "utf8");
    } catch (err) {
      throw fromFsError(err, target);
    }
    return `Successfully created file ${target}`;
  }
}
