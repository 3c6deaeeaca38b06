import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import type { FunctionTool } from "../../adapters/tools/FunctionToolRegistry";
import type { JsonObjectSchema } from "../../shared/contracts";
import { ToolError, fromFsError } from "../../shared/errors";
import { resolveInWorkdir } from "../workspace";

const ListFilesArgs = z.object({
  path: z.string().optional(),
});

export type ListFilesArgs = z.infer<typeof ListFilesArgs>;

function byCodeUnit(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export class ListFilesTool implements FunctionTool<ListFilesArgs> {
  readonly name = "list_files";
  readonly description =
    "List files and directories at a given path. If no path is provided, lists files in the current directory.";

  readonly schema: JsonObjectSchema = {
    type: "object",
    properties: {
      path: {
        type: "string",
        description:
          "Optional relative path to list files from. Defaults to current directory if not provided.",
      },
    },
    required: [],
    additionalProperties: false,
  };

  readonly input = ListFilesArgs;

  constructor(private readonly workdir: string) {}

  async exec(args: ListFilesArgs): Promise<string> {
    const target = args.path || ".";
    const root = resolveInWorkdir(this.workdir, target);

    const stats = await fs.stat(root).catch((err: unknown) => {
      throw fromFsError(err, target);
    });
    if (!stats.isDirectory()) {
      throw new ToolError("NotADirectory", `${target} is not a directory`);
    }

    const entries: string[] = [];
    await this.walk(root, "", entries);
    return JSON.stringify(entries);
  }

  // Depth first, each level sorted, so the same tree always lists the same way.
  private async walk(dir: string, prefix: string, out: string[]): Promise<void> {
    const children = await fs.readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
      throw fromFsError(err, prefix || dir);
    });
    children.sort((a, b) => byCodeUnit(a.name, b.name));

    for (const child of children) {
      const relative = prefix ? path.join(prefix, child.name) : child.name;
      if (child.isDirectory()) {
        out.push(relative + path.sep);
        await this.walk(path.join(dir, child.name), relative, out);
      } else {
        out.push(relative);
      }
    }
  }
}
