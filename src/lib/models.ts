/**
 * Core data models for the Quire build engine.
 *
 * Resources are the entries discovered while walking a site source tree;
 * pages are the subset of resources that render through the template engine.
 */

/**
 * Resource kinds:
 * - directory: a directory encountered whilst walking the tree
 * - file: nothing more is known about the file
 * - page: a file that renders to an output page
 * - asset: layout support files (images, fonts, styles)
 * - locale: translation resources
 * - partial: part of a template render
 * - include: documents embedded by pages (code samples etc.)
 * - datasource: a file inside a data source directory
 */
export type ResourceKind =
  | "directory"
  | "file"
  | "page"
  | "asset"
  | "locale"
  | "partial"
  | "include"
  | "datasource";

/**
 * What the scheduler does with the source file.
 */
export type ResourceOperation = "noop" | "render" | "copy" | "link";

/**
 * A discovered filesystem entry.
 */
export interface Resource {
  kind: ResourceKind;
  operation: ResourceOperation;
  /** Output path relative to the collation root */
  destination: string;
}

/**
 * Default operation for a resource kind.
 */
export function defaultOperation(kind: ResourceKind): ResourceOperation {
  switch (kind) {
    case "directory":
      return "noop";
    case "page":
      return "render";
    default:
      return "copy";
  }
}

/**
 * Create a resource, enforcing that directories never carry an operation.
 */
export function createResource(
  kind: ResourceKind,
  destination: string,
  operation: ResourceOperation = defaultOperation(kind),
): Resource {
  return {
    kind,
    operation: kind === "directory" ? "noop" : operation,
    destination,
  };
}

/**
 * Page data as merged from defaults, the page table and front matter.
 * Unknown keys are kept so templates can reach them.
 */
export interface PageData {
  title?: string;
  description?: string;
  layout?: string;
  /** Render without a wrapping layout */
  standalone?: boolean;
  /** Suppressed in release builds */
  draft?: boolean;
  /** When false the file is copied verbatim */
  render?: boolean;
  /** Per-page override of the clean URL policy */
  rewriteIndex?: boolean;
  /** Alternative URL that redirects to this page */
  permalink?: string;
  [key: string]: unknown;
}

/**
 * File context assigned to a page once its paths are known.
 */
export interface PageFile {
  /** Absolute source path */
  source: string;
  /** Absolute template path (usually the source itself) */
  template: string;
  /** Output path relative to the collation root */
  destination: string;
  /** Source modification time in milliseconds */
  modified: number;
}

/**
 * A page resource with its merged data.
 */
export interface Page {
  data: PageData;
  /** Site-root-relative URL */
  href: string;
  file: PageFile;
  /** Whether the destination was clean-URL rewritten */
  clean: boolean;
  /** Body with any front matter removed */
  body: string;
}

/**
 * Output information tracked by the collation for each source path.
 */
export interface CollatedEntry {
  source: string;
  resource: Resource;
}

/**
 * A destination the scheduler may build.
 */
export interface BuildTarget {
  source: string;
  /** Absolute output path */
  destination: string;
  resource: Resource;
}

/**
 * Build profile names.
 */
export const PROFILES = ["debug", "release"] as const;

export type ProfileName = (typeof PROFILES)[number];

/**
 * Exit codes for the command line.
 */
export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE_ERROR: 2,
  DATA_ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];
