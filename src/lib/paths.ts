/**
 * Path and href resolution.
 *
 * Every output path and URL is derived from the source path here so the
 * collation, the renderer and templates agree on where a file lands.
 * Destinations use the platform separator; hrefs always use `/`.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  ExtensionConfig,
  INDEX_HTML,
  INDEX_STEM,
} from "./config.js";
import { MissingLinkError, OutsideSourceTreeError } from "./errors.js";

/**
 * The subset of configuration that path resolution depends on.
 */
export interface PathConfig {
  /** Absolute source root */
  source: string;
  extension: ExtensionConfig;
  cleanUrl: boolean;
  includeIndex: boolean;
  /** Prefix stripped from source relative paths */
  baseHref?: string;
  /** Rewrite root-relative links to relative ones */
  relativeLinks: boolean;
}

export type FileType = "markdown" | "template" | "unknown";

/** Extension without the leading dot */
export function extensionOf(file: string): string {
  return path.extname(file).slice(1);
}

export function stemOf(file: string): string {
  return path.basename(file, path.extname(file));
}

export function fileType(file: string, extension: ExtensionConfig): FileType {
  const ext = extensionOf(file);
  if (!extension.render.includes(ext)) return "unknown";
  return extension.markdown.includes(ext) ? "markdown" : "template";
}

export function isPage(file: string, extension: ExtensionConfig): boolean {
  return fileType(file, extension) !== "unknown";
}

export function isIndex(file: string): boolean {
  return stemOf(file) === INDEX_STEM;
}

/** Convert a platform path to `/` separators */
export function toSlashes(file: string): string {
  return file.split(path.sep).join("/");
}

/**
 * Path of a file relative to the source root, with the base-href prefix
 * removed. Throws OutsideSourceTreeError for paths outside the root.
 */
export function relativeToSource(file: string, config: PathConfig): string {
  const rel = path.relative(config.source, path.resolve(config.source, file));
  if (rel === ".." || rel.startsWith(".." + path.sep) || path.isAbsolute(rel)) {
    throw new OutsideSourceTreeError(file, config.source);
  }
  const base = config.baseHref?.replace(/^\/+|\/+$/g, "");
  if (base) {
    const prefix = base.split("/").join(path.sep) + path.sep;
    if (rel.startsWith(prefix)) return rel.slice(prefix.length);
  }
  return rel;
}

function swapExtension(file: string, ext: string): string {
  const current = path.extname(file);
  const base = current ? file.slice(0, -current.length) : file;
  return ext ? `${base}.${ext}` : base;
}

/** Output extension for a source extension */
export function outputExtension(ext: string, extension: ExtensionConfig): string {
  return extension.map[ext] ?? ext;
}

/**
 * Whether `parent/stem/index.<ext>` exists for any render extension.
 */
export function hasSiblingIndex(file: string, config: PathConfig): boolean {
  const absolute = path.resolve(config.source, file);
  const dir = path.join(path.dirname(absolute), stemOf(absolute));
  return config.extension.render.some((ext) =>
    fs.existsSync(path.join(dir, `${INDEX_STEM}.${ext}`)),
  );
}

/**
 * Whether a page's destination is rewritten to `name/index.html`.
 *
 * `rewriteIndex` is the per-page override of the clean URL policy.
 */
export function isClean(
  file: string,
  config: PathConfig,
  rewriteIndex?: boolean,
): boolean {
  const enabled = rewriteIndex ?? config.cleanUrl;
  return (
    enabled &&
    isPage(file, config.extension) &&
    !isIndex(file) &&
    !hasSiblingIndex(file, config)
  );
}

/**
 * Output path relative to the target root.
 */
export function computeDestination(
  file: string,
  config: PathConfig,
  rewriteIndex?: boolean,
): string {
  let rel = relativeToSource(file, config);
  if (!isPage(rel, config.extension)) return rel;

  if (isClean(file, config, rewriteIndex)) {
    return path.join(path.dirname(rel), stemOf(rel), INDEX_HTML);
  }

  const ext = extensionOf(rel);
  rel = swapExtension(rel, outputExtension(ext, config.extension));
  return rel;
}

export interface HrefOptions {
  /** Override of `includeIndex` (the href index always includes it) */
  includeIndex?: boolean;
  rewriteIndex?: boolean;
}

/**
 * Site-root-relative URL for a source file.
 */
export function computeAbsoluteHref(
  file: string,
  config: PathConfig,
  options: HrefOptions = {},
): string {
  const rel = toSlashes(relativeToSource(file, config));
  const includeIndex = options.includeIndex ?? config.includeIndex;

  if (!rel.includes("/") && isIndex(rel)) return "/";

  const dir = path.posix.dirname(rel);
  const prefix = dir === "." ? "/" : `/${dir}/`;
  const stem = stemOf(rel);
  const rewrite = options.rewriteIndex ?? config.cleanUrl;

  if (isPage(rel, config.extension) && rewrite) {
    if (isIndex(rel)) {
      return includeIndex ? `${prefix}${INDEX_HTML}` : prefix;
    }
    if (isClean(file, config, options.rewriteIndex)) {
      return includeIndex
        ? `${prefix}${stem}/${INDEX_HTML}`
        : `${prefix}${stem}/`;
    }
  }

  const ext = extensionOf(rel);
  const mapped = isPage(rel, config.extension)
    ? outputExtension(ext, config.extension)
    : ext;
  const href = `${prefix}${swapExtension(path.posix.basename(rel), mapped)}`;
  return mapped ? href : `${href}/`;
}

/**
 * Key used by the collation href index.
 */
export function hrefKey(
  file: string,
  config: PathConfig,
  rewriteIndex?: boolean,
): string {
  return computeAbsoluteHref(file, config, { includeIndex: true, rewriteIndex });
}

/**
 * Normalize a partial href to the form stored in the href index.
 * Directory hrefs, the site root included, end in `index.html`.
 */
export function normalizeHref(href: string): string {
  let key = href.startsWith("/") ? href : `/${href}`;
  if (key.endsWith("/")) key += INDEX_HTML;
  return key;
}

/** True for hrefs that are never rewritten */
export function isPassthrough(href: string, config: PathConfig): boolean {
  return (
    !config.relativeLinks ||
    !href.startsWith("/") ||
    href.startsWith("http:") ||
    href.startsWith("https:")
  );
}

/**
 * Make a root-relative href relative to the page being rendered.
 *
 * `currentClean` marks a current page whose destination was rewritten
 * to `name/index.html`, which adds one directory level.
 */
export function computeRelativeHref(
  href: string,
  currentFile: string,
  config: PathConfig,
  currentClean = isClean(currentFile, config),
): string {
  if (isPassthrough(href, config)) return href;

  const rel = toSlashes(relativeToSource(currentFile, config));
  const depth = rel.split("/").length - 1 + (currentClean ? 1 : 0);

  let value = "../".repeat(depth) + href.replace(/^\/+/, "");
  if (config.includeIndex && (value === "" || value.endsWith("/"))) {
    value += INDEX_HTML;
  }
  if (value === "") value = "../";
  return value;
}

/**
 * Look up an href against the href index, throwing MissingLinkError
 * when it does not resolve.
 */
export function verifyLink(
  href: string,
  lookup: (key: string) => boolean,
  file?: string,
): void {
  if (href.startsWith("http:") || href.startsWith("https:")) return;
  const base = href.split(/[?#]/)[0];
  if (base === "") return;
  const key = normalizeHref(base);
  if (lookup(key)) return;
  if (!path.posix.extname(key)) {
    if (lookup(`${key}/${INDEX_HTML}`)) return;
  }
  throw new MissingLinkError(href, file);
}

export interface LocaleVariant {
  lang: string;
  /** Path with the language segment removed */
  logical: string;
}

/**
 * Detect a locale variant such as `about.fr.md`.
 */
export function localeVariant(
  file: string,
  languages: readonly string[],
): LocaleVariant | undefined {
  const ext = path.extname(file);
  const stem = stemOf(file);
  const lang = path.extname(stem).slice(1);
  if (!lang || !languages.includes(lang)) return undefined;
  return {
    lang,
    logical: path.join(path.dirname(file), path.basename(stem, `.${lang}`) + ext),
  };
}
