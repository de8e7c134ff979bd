/**
 * Typed errors surfaced to the orchestrator as `{ kind, message }` payloads.
 */

export type ToolErrorKind =
  | "NotFoundError"
  | "MalformedReportError"
  | "ProtectedBranchError"
  | "NothingToCommitError"
  | "NoUpstreamError"
  | "PushRejectedError"
  | "GitCommandError"
  | "AuthenticationError"
  | "NoChangesError"
  | "PullRequestExistsError"
  | "HostingCliError"
  | "FileExistsError"
  | "UnknownToolError"
  | "InvalidArgumentError"
  | "InternalError";

export type ToolErrorPayload = {
  kind: ToolErrorKind;
  message: string;
  details?: Record<string, unknown>;
};

export class ToolError extends Error {
  public readonly kind: ToolErrorKind;
  public readonly details?: Record<string, unknown>;

  constructor(kind: ToolErrorKind, message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = kind;
    this.kind = kind;
    this.details = options?.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toPayload(): ToolErrorPayload {
    return this.details ? { kind: this.kind, message: this.message, details: this.details } : { kind: this.kind, message: this.message };
  }
}

export class NotFoundError extends ToolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("NotFoundError", message, { details });
  }
}

export class MalformedReportError extends ToolError {
  constructor(message: string, cause?: unknown) {
    super("MalformedReportError", message, { cause });
  }
}

export class ProtectedBranchError extends ToolError {
  constructor(public readonly branch: string) {
    super("ProtectedBranchError", `Direct commits to '${branch}' are blocked. Switch to a working branch first.`, {
      details: { branch },
    });
  }
}

export class NothingToCommitError extends ToolError {
  constructor(branch: string) {
    super("NothingToCommitError", `Nothing is staged on '${branch}'. Stage changes with git_add_all before committing.`, {
      details: { branch },
    });
  }
}

export class NoUpstreamError extends ToolError {
  constructor(branch: string) {
    super("NoUpstreamError", `Branch '${branch}' has no upstream and no remote was given.`, { details: { branch } });
  }
}

export class PushRejectedError extends ToolError {
  constructor(remote: string, branch: string, cause?: unknown) {
    super("PushRejectedError", `Push of '${branch}' to '${remote}' was rejected by the remote.`, {
      details: { remote, branch },
      cause,
    });
  }
}

export class GitCommandError extends ToolError {
  constructor(operation: string, message: string, cause?: unknown) {
    super("GitCommandError", `git ${operation} failed: ${message}`, { details: { operation }, cause });
  }
}

export class AuthenticationError extends ToolError {
  constructor(cli: string, detail: string) {
    super("AuthenticationError", `${cli} is not authenticated. Run '${cli} auth login' and retry. (${detail})`, {
      details: { cli },
    });
  }
}

export class NoChangesError extends ToolError {
  constructor(base: string, head: string) {
    super("NoChangesError", `Nothing to propose: '${head}' has no changes against '${base}'.`, { details: { base, head } });
  }
}

export class PullRequestExistsError extends ToolError {
  constructor(head: string, detail: string) {
    super("PullRequestExistsError", `A pull request for '${head}' already exists. (${detail})`, { details: { head } });
  }
}

export class HostingCliError extends ToolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("HostingCliError", message, { details });
  }
}

export class FileExistsError extends ToolError {
  constructor(filePath: string) {
    super("FileExistsError", `File already exists: ${filePath}. Pass overwrite=true to replace it.`, {
      details: { path: filePath },
    });
  }
}

export class UnknownToolError extends ToolError {
  constructor(name: string, suggestions: string[]) {
    const hint = suggestions.length > 0 ? ` Did you mean: ${suggestions.join(", ")}?` : "";
    super("UnknownToolError", `Unknown tool: ${name}.${hint}`, { details: { did_you_mean: suggestions } });
  }
}

export class InvalidArgumentError extends ToolError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("InvalidArgumentError", message, { details });
  }
}

export class InternalError extends ToolError {
  constructor(message: string, cause?: unknown) {
    super("InternalError", message, { cause });
  }
}

/** Convert any thrown value into a wire payload. */
export function toErrorPayload(err: unknown): ToolErrorPayload {
  if (err instanceof ToolError) return err.toPayload();
  const message = err instanceof Error ? err.message : String(err);
  return { kind: "InternalError", message };
}

/** Extract a readable message from an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
