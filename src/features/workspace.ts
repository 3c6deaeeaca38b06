import path from "path";

/** Resolves a path the model supplied against the agent's working directory. */
export function resolveInWorkdir(workdir: string, target: string): string {
  return path.resolve(workdir, target);
}
