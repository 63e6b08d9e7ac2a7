/**
 * Error types raised by the build engine.
 *
 * Every error carries a stable `code` so callers (and the CLI) can tell
 * configuration problems apart from per-file build failures.
 */

export type ErrorCode =
  | "CONFIG"
  | "OUTSIDE_SOURCE_TREE"
  | "MISSING_PAGE_FILE"
  | "NO_LAYOUT"
  | "NO_MENU_PAGE"
  | "LINK_COLLISION"
  | "DUPLICATE_PERMALINK"
  | "FRONT_MATTER"
  | "MISSING_LINK"
  | "TOO_MANY_REDIRECTS"
  | "CYCLIC_REDIRECT"
  | "REDIRECT_FILE_EXISTS"
  | "RENDER"
  | "IO"
  | "HOOK"
  | "BUILD";

export class QuireError extends Error {
  readonly code: ErrorCode;
  /** File the error relates to, when there is one */
  readonly file?: string;

  constructor(code: ErrorCode, message: string, file?: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.file = file;
  }
}

export class ConfigError extends QuireError {
  constructor(message: string, file?: string) {
    super("CONFIG", message, file);
  }
}

export class OutsideSourceTreeError extends QuireError {
  constructor(file: string, source: string) {
    super(
      "OUTSIDE_SOURCE_TREE",
      `Path ${file} is outside the source directory ${source}`,
      file,
    );
  }
}

export class MissingPageFileError extends QuireError {
  constructor(file: string, key: string) {
    super(
      "MISSING_PAGE_FILE",
      `File ${file} for page data with key ${key} does not exist`,
      file,
    );
  }
}

export class NoLayoutError extends QuireError {
  constructor(layout: string, file: string) {
    super("NO_LAYOUT", `Layout ${layout} for ${file} does not exist`, file);
  }
}

export class NoMenuPageError extends QuireError {
  constructor(menu: string, file: string) {
    super("NO_MENU_PAGE", `Menu '${menu}' references missing page ${file}`, file);
  }
}

export class LinkCollisionError extends QuireError {
  constructor(href: string, existing: string, file: string) {
    super(
      "LINK_COLLISION",
      `Collision detected on ${href} (${existing} <-> ${file})`,
      file,
    );
  }
}

export class DuplicatePermalinkError extends QuireError {
  constructor(permalink: string, file: string) {
    super(
      "DUPLICATE_PERMALINK",
      `Duplicate permalink for path '${permalink}', ensure permalinks are unique`,
      file,
    );
  }
}

export class FrontMatterError extends QuireError {
  constructor(message: string, file: string) {
    super("FRONT_MATTER", `Front matter error in ${file} (${message})`, file);
  }
}

export class MissingLinkError extends QuireError {
  constructor(href: string, file?: string) {
    super(
      "MISSING_LINK",
      file ? `Missing link ${href} in ${file}` : `Missing link ${href}`,
      file,
    );
  }
}

export class TooManyRedirectsError extends QuireError {
  readonly limit: number;

  constructor(limit: number) {
    super("TOO_MANY_REDIRECTS", `Too many redirects, limit is ${limit}`);
    this.limit = limit;
  }
}

export class CyclicRedirectError extends QuireError {
  readonly stack: string[];

  constructor(stack: string[], key: string) {
    super("CYCLIC_REDIRECT", `Cyclic redirect: ${stack.join(" <-> ")} <-> ${key}`);
    this.stack = [...stack, key];
  }
}

export class RedirectFileExistsError extends QuireError {
  constructor(file: string) {
    super("REDIRECT_FILE_EXISTS", `Redirect file '${file}' exists`, file);
  }
}

export class RenderError extends QuireError {
  constructor(message: string, file: string) {
    super("RENDER", `Failed to render ${file}: ${message}`, file);
  }
}

export class IoError extends QuireError {
  constructor(operation: string, file: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("IO", `Failed to ${operation} ${file}: ${detail}`, file);
    this.cause = cause;
  }
}

export class HookError extends QuireError {
  constructor(command: string, status: number | null) {
    super(
      "HOOK",
      status === null
        ? `Hook '${command}' was terminated`
        : `Hook '${command}' exited with status ${status}`,
    );
  }
}

/**
 * Every error collected by a non fail-fast build pass.
 */
export class BuildErrors extends QuireError {
  readonly errors: Error[];

  constructor(errors: Error[]) {
    super(
      "BUILD",
      `Build failed with ${errors.length} error(s):\n` +
        errors.map((e) => `  ${e.message}`).join("\n"),
    );
    this.errors = errors;
  }
}

/**
 * Wrap a low-level error so the path travels with it.
 */
export function toIoError(
  operation: string,
  file: string,
  err: unknown,
): QuireError {
  if (err instanceof QuireError) return err;
  return new IoError(operation, file, err);
}

/** Codes raised while loading a site, before anything is built */
const DATA_ERROR_CODES: readonly ErrorCode[] = [
  "CONFIG",
  "OUTSIDE_SOURCE_TREE",
  "MISSING_PAGE_FILE",
  "NO_LAYOUT",
  "NO_MENU_PAGE",
  "LINK_COLLISION",
  "DUPLICATE_PERMALINK",
  "TOO_MANY_REDIRECTS",
  "CYCLIC_REDIRECT",
];

/**
 * Whether an error means the site itself is invalid rather than a
 * build step failing.
 */
export function isDataError(err: unknown): boolean {
  return err instanceof QuireError && DATA_ERROR_CODES.includes(err.code);
}
