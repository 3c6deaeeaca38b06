export type ToolErrorCode =
  | "InvalidArguments"
  | "DecodeError"
  | "NotFound"
  | "IsADirectory"
  | "NotADirectory"
  | "NotEmpty"
  | "AlreadyExists"
  | "NoMatch"
  | "PermissionDenied"
  | "FileSystem";

/**
 * Failure raised inside a tool. The dispatcher turns it into an error
 * tool_result; it never reaches the conversation loop.
 */
export class ToolError extends Error {
  constructor(
    readonly code: ToolErrorCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ToolError";
  }
}

/** The model API could not be reached or returned something unusable. */
export class ModelTransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ModelTransportError";
  }
}

export class DuplicateToolError extends Error {
  constructor(readonly toolName: string) {
    super(`Tool "${toolName}" is registered more than once.`);
    this.name = "DuplicateToolError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function isNotFound(err: unknown): boolean {
  return errnoCode(err) === "ENOENT";
}

/** Maps a Node file-system error onto the tool error taxonomy. */
export function fromFsError(err: unknown, path: string): ToolError {
  if (err instanceof ToolError) return err;
  const cause = err instanceof Error ? { cause: err } : undefined;

  switch (errnoCode(err)) {
    case "ENOENT":
      return new ToolError("NotFound", `no such file or directory: ${path}`, cause);
    case "EISDIR":
      return new ToolError("IsADirectory", `${path} is a directory`, cause);
    case "ENOTDIR":
      return new ToolError("NotADirectory", `${path} is not a directory`, cause);
    case "ENOTEMPTY":
      return new ToolError("NotEmpty", `directory not empty: ${path}`, cause);
    case "EEXIST":
      return new ToolError("AlreadyExists", `${path} already exists`, cause);
    case "EACCES":
    case "EPERM":
      return new ToolError("PermissionDenied", `permission denied: ${path}`, cause);
    default:
      return new ToolError("FileSystem", errorMessage(err), cause);
  }
}
