/**
 * Page loading.
 *
 * Page data is merged from the global `[page]` defaults, the path keyed
 * page table and the file's own front matter, in that order.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { INDEX_STEM } from "./config.js";
import { MissingPageFileError, toIoError } from "./errors.js";
import { delimitersFor, parseFrontMatter } from "./frontmatter.js";
import { Page, PageData } from "./models.js";
import {
  PathConfig,
  computeAbsoluteHref,
  computeDestination,
  fileType,
  isClean,
  stemOf,
} from "./paths.js";

/**
 * Resolved page table: absolute source path to page data.
 */
export type PageTable = Map<string, PageData>;

export interface PageContext {
  paths: PathConfig;
  /** Global page defaults */
  defaults: PageData;
  table: PageTable;
}

/**
 * Convert a name such as `my-first_post` to `My First Post`.
 */
export function titleCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .split(/[\s_\-.]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

/**
 * Title derived from a file name; index files take the directory name.
 */
export function autoTitle(file: string): string {
  const stem = stemOf(file);
  if (stem === INDEX_STEM) {
    return titleCase(path.basename(path.dirname(file)));
  }
  return titleCase(stem);
}

/**
 * Find the file a page table key refers to.
 *
 * Keys are source relative: `/` is the home index, a trailing slash names
 * a directory index and a key without an extension tries each render
 * extension.
 */
export function findFileForKey(
  key: string,
  paths: PathConfig,
): string | undefined {
  let rel = key.replace(/^\/+/, "");
  if (rel === "" || rel.endsWith("/")) rel += INDEX_STEM;

  const candidate = path.join(paths.source, ...rel.split("/"));
  if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
    return candidate;
  }
  for (const ext of paths.extension.render) {
    const withExt = `${candidate}.${ext}`;
    if (fs.existsSync(withExt)) return withExt;
  }
  return undefined;
}

/**
 * Resolve every page table key to an existing file.
 */
export function resolvePageTable(
  pages: Record<string, PageData>,
  paths: PathConfig,
): PageTable {
  const table: PageTable = new Map();
  for (const [key, data] of Object.entries(pages)) {
    const file = findFileForKey(key, paths);
    if (!file) {
      throw new MissingPageFileError(path.join(paths.source, key), key);
    }
    table.set(file, data);
  }
  return table;
}

/**
 * Merge page data for a file without reading it.
 */
export function mergePageData(
  source: string,
  context: PageContext,
  frontMatter: PageData = {},
  logical: string = source,
): PageData {
  const data: PageData = {
    ...context.defaults,
    ...(context.table.get(source) ?? context.table.get(logical) ?? {}),
    ...frontMatter,
  };
  if (data.title === undefined) {
    data.title = autoTitle(logical);
  }
  return data;
}

/**
 * Load a page from disk.
 *
 * `logical` is the path used for output locations; locale variants such
 * as `about.fr.md` are placed as `about.md`.
 */
export function loadPage(
  source: string,
  context: PageContext,
  logical: string = source,
): Page {
  const markdown = fileType(source, context.paths.extension) === "markdown";

  let content: string;
  let modified: number;
  try {
    content = fs.readFileSync(source, "utf-8");
    modified = fs.statSync(source).mtimeMs;
  } catch (err) {
    throw toIoError("read", source, err);
  }

  const { body, frontMatter } = parseFrontMatter(
    content,
    delimitersFor(markdown),
    source,
  );
  const data = mergePageData(source, context, frontMatter, logical);

  const rewrite = data.rewriteIndex;
  return {
    data,
    href: computeAbsoluteHref(logical, context.paths, { rewriteIndex: rewrite }),
    file: {
      source,
      template: source,
      destination: computeDestination(logical, context.paths, rewrite),
      modified,
    },
    clean: isClean(logical, context.paths, rewrite),
    body,
  };
}
