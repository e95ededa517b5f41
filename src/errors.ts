export type PagepressErrorCode =
  | "description"
  | "resolution"
  | "validation"
  | "archive"
  | "invariant";

export interface PagepressErrorMetadata {
  cause?: unknown;
}

export class PagepressError extends Error {
  readonly code: PagepressErrorCode;

  constructor(
    message: string,
    code: PagepressErrorCode,
    metadata: PagepressErrorMetadata = {},
  ) {
    super(message, { cause: metadata.cause });
    this.name = "PagepressError";
    this.code = code;
  }
}

export interface DescriptionIssue {
  /** Dotted path of the offending field, e.g. `metadata.title.0.type`. Empty for the root. */
  path: string;

  message: string;
}

/** The book description does not have the expected shape. */
export class DescriptionError extends PagepressError {
  readonly issues: DescriptionIssue[];

  constructor(issues: DescriptionIssue[], metadata: PagepressErrorMetadata = {}) {
    super(
      `invalid book description: ${issues
        .map(({ path, message }) => (path ? `${path}: ${message}` : message))
        .join("; ")}`,
      "description",
      metadata,
    );
    this.name = "DescriptionError";
    this.issues = issues;
  }
}

/** A page image could not be read or has an unsupported format. */
export class ResolutionError extends PagepressError {
  readonly path: string;

  constructor(path: string, reason: string, metadata: PagepressErrorMetadata = {}) {
    super(`cannot use page image '${path}': ${reason}`, "resolution", metadata);
    this.name = "ResolutionError";
    this.path = path;
  }
}

/** The book is well-formed but cannot be packaged, e.g. it has two covers. */
export class ValidationError extends PagepressError {
  constructor(message: string, metadata: PagepressErrorMetadata = {}) {
    super(message, "validation", metadata);
    this.name = "ValidationError";
  }
}

export class ArchiveError extends PagepressError {
  readonly destination: string;

  constructor(destination: string, metadata: PagepressErrorMetadata = {}) {
    const reason =
      metadata.cause instanceof Error ? `: ${metadata.cause.message}` : "";
    super(`failed to write '${destination}'${reason}`, "archive", metadata);
    this.name = "ArchiveError";
    this.destination = destination;
  }
}

/** A broken internal invariant. Seeing one of these is a bug. */
export class InvariantError extends PagepressError {
  constructor(message: string, metadata: PagepressErrorMetadata = {}) {
    super(message, "invariant", metadata);
    this.name = "InvariantError";
  }
}

export function isPagepressError(input: unknown): input is PagepressError {
  return input instanceof PagepressError;
}
