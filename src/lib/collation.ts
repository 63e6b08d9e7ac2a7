/**
 * The collation: an in-memory graph of everything a build produces.
 *
 * Every walked source file lands in exactly one of two maps: `pages`
 * (rendered, with merged page data) or `targets` (copied or linked).
 * An href index maps each output URL back to its source so templates
 * and link verification can resolve links without touching the disk.
 *
 * A collation is built in full and then treated as read-only while a
 * build pass runs; `upsert` and `remove` are for use between passes.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  ASSETS,
  INDEX_HTML,
  LAYOUTS,
  MAIN_LAYOUT,
} from "./config.js";
import {
  LinkCollisionError,
  NoLayoutError,
  NoMenuPageError,
  toIoError,
} from "./errors.js";
import { Manifest } from "./manifest.js";
import {
  BuildTarget,
  CollatedEntry,
  Page,
  PageData,
  Resource,
  createResource,
} from "./models.js";
import { PageTable, findFileForKey, loadPage } from "./page.js";
import {
  PathConfig,
  isPage,
  localeVariant,
  normalizeHref,
  relativeToSource,
  stemOf,
  toSlashes,
} from "./paths.js";
import { Walker } from "./walk.js";

export interface CollationContext {
  paths: PathConfig;
  /** Absolute output root for this collation */
  target: string;
  /** Language of this collation */
  lang: string;
  /** Every configured language, used to recognise locale variants */
  languages: string[];
  /** Whether `lang` reads `name.<lang>.ext` variants */
  localized: boolean;
  defaults: PageData;
  table: PageTable;
  menus: Record<string, string[]>;
  /** Extra hrefs accepted by link lookups */
  allow: string[];
  /** Paths the walker never enters */
  exclude: string[];
}

export class Collation {
  readonly pages = new Map<string, Page>();
  readonly targets = new Map<string, Resource>();
  readonly menus = new Map<string, string[]>();
  /** Layout name to layout file */
  readonly layouts = new Map<string, string>();
  defaultLayout?: string;
  manifest?: Manifest;

  /** Href index key to source path */
  private readonly links = new Map<string, string>();
  private readonly allowed = new Set<string>();

  constructor(readonly context: CollationContext) {
    for (const href of context.allow) {
      this.allowed.add(normalizeHref(href));
    }
  }

  get source(): string {
    return this.context.paths.source;
  }

  get target(): string {
    return this.context.target;
  }

  get lang(): string {
    return this.context.lang;
  }

  /**
   * Entry for a source path, whether page or target.
   */
  resolve(source: string): CollatedEntry | undefined {
    const page = this.pages.get(source);
    if (page) {
      return { source, resource: pageResource(page) };
    }
    const resource = this.targets.get(source);
    if (resource) {
      return { source, resource };
    }
    return undefined;
  }

  /** Source path for an exact href index key */
  getLink(href: string): string | undefined {
    return this.links.get(href);
  }

  /**
   * Find the source for a partial href.
   *
   * A missing leading slash is added, a trailing slash gets `index.html`
   * and a bare directory href is retried with `/index.html`.
   */
  findLink(href: string): string | undefined {
    const key = normalizeHref(href);
    return this.links.get(key) ?? this.links.get(`${key}/${INDEX_HTML}`);
  }

  /** Whether an href resolves, including allow-listed hrefs */
  hasLink(href: string): boolean {
    const key = normalizeHref(href);
    return (
      this.findLink(href) !== undefined ||
      this.allowed.has(key) ||
      this.allowed.has(`${key}/${INDEX_HTML}`)
    );
  }

  /** Every href index key, sorted */
  hrefs(): string[] {
    return [...this.links.keys()].sort();
  }

  getPage(source: string): Page | undefined {
    return this.pages.get(source);
  }

  /** Page for an href, if the href belongs to a page */
  getPageByHref(href: string): Page | undefined {
    const source = this.findLink(href);
    return source ? this.pages.get(source) : undefined;
  }

  /**
   * Register a layout under a name. Plugin layouts use `<plugin>::<stem>`.
   */
  addLayout(name: string, file: string): void {
    this.layouts.set(name, file);
  }

  /**
   * Layout file for a page; undefined means render standalone.
   */
  getLayout(page: Page): string | undefined {
    if (page.data.standalone) return undefined;
    const name = page.data.layout;
    if (name === undefined || name === MAIN_LAYOUT) {
      return this.defaultLayout;
    }
    const file = this.layouts.get(name);
    if (!file) throw new NoLayoutError(name, page.file.source);
    return file;
  }

  /**
   * Add a page, registering its href.
   */
  addPage(page: Page): void {
    this.link(normalizeHref(page.href), page.file.source);
    this.pages.set(page.file.source, page);
  }

  /**
   * Add a copy target, registering its href.
   */
  addTarget(source: string, resource: Resource): void {
    if (resource.kind !== "directory") {
      this.link(`/${toSlashes(resource.destination)}`, source);
    }
    this.targets.set(source, resource);
  }

  /**
   * Classify and add a single file or directory.
   */
  add(file: string, isFile = true): void {
    const rel = relativeToSource(file, this.context.paths);
    const segments = rel.split(path.sep);

    if (segments[0] === LAYOUTS) {
      if (isFile) this.addLayoutFile(file);
      return;
    }

    if (!isFile) {
      this.addTarget(file, createResource("directory", rel));
      return;
    }

    const variant = localeVariant(file, this.context.languages);
    let logical = file;
    if (variant) {
      if (!this.context.localized || variant.lang !== this.lang) return;
      logical = variant.logical;
      // The variant replaces the shared file for this language
      if (this.resolve(logical)) this.forget(logical);
    } else if (this.context.localized && this.hasVariant(file)) {
      return;
    }

    if (segments[0] === ASSETS) {
      this.addTarget(file, createResource("asset", rel));
      return;
    }

    if (isPage(file, this.context.paths.extension)) {
      const page = loadPage(file, this.context, logical);
      this.addPage(page);
      return;
    }

    const destination = relativeToSource(logical, this.context.paths);
    this.addTarget(file, createResource("file", destination));
  }

  /**
   * Re-classify one file after it changed on disk.
   */
  upsert(source: string): void {
    this.forget(source);
    if (!fs.existsSync(source)) return;
    this.add(source, fs.statSync(source).isFile());
    const page = this.pages.get(source);
    if (page) this.getLayout(page);
  }

  /**
   * Remove a source and its stale build artifact. Removing a directory
   * removes everything collated below it.
   *
   * When a locale variant goes away the shared file it replaced is
   * collated again; the returned sources need building.
   */
  remove(source: string): string[] {
    const prefix = source + path.sep;
    const below = new Set<string>();
    for (const file of [
      ...this.pages.keys(),
      ...this.targets.keys(),
      ...this.layouts.values(),
    ]) {
      if (file.startsWith(prefix)) below.add(file);
    }
    // Deepest first so directories are emptied before they are removed
    for (const file of [...below].sort((a, b) => b.length - a.length)) {
      this.removeEntry(file);
    }
    this.removeEntry(source);

    const variant = localeVariant(source, this.context.languages);
    if (
      this.context.localized &&
      variant?.lang === this.lang &&
      fs.existsSync(variant.logical)
    ) {
      this.add(variant.logical);
      return [variant.logical];
    }
    return [];
  }

  private removeEntry(source: string): void {
    const entry = this.resolve(source);
    this.forget(source);
    this.manifest?.touch(source);
    if (!entry) return;

    const artifact = path.join(this.target, entry.resource.destination);
    if (entry.resource.kind === "directory") {
      removeEmptyDir(artifact);
      return;
    }
    try {
      fs.rmSync(artifact, { force: true });
    } catch (err) {
      throw toIoError("remove", artifact, err);
    }
    if (path.basename(artifact) === INDEX_HTML) {
      removeEmptyDir(path.dirname(artifact));
    }
  }

  /**
   * Every buildable entry with its absolute destination.
   */
  destinations(): BuildTarget[] {
    const out: BuildTarget[] = [];
    for (const [source, page] of this.pages) {
      out.push({
        source,
        destination: path.join(this.target, page.file.destination),
        resource: pageResource(page),
      });
    }
    for (const [source, resource] of this.targets) {
      out.push({
        source,
        destination: path.join(this.target, resource.destination),
        resource,
      });
    }
    return out;
  }

  /**
   * Check page layouts and resolve menus once the walk is complete.
   */
  finish(): void {
    for (const page of this.pages.values()) {
      this.getLayout(page);
    }

    this.menus.clear();
    for (const [name, entries] of Object.entries(this.context.menus)) {
      const hrefs: string[] = [];
      for (const entry of entries) {
        const file = findFileForKey(entry, this.context.paths);
        const page = file ? this.findPage(file) : undefined;
        if (!page) throw new NoMenuPageError(name, entry);
        hrefs.push(page.href);
      }
      this.menus.set(name, hrefs);
    }
  }

  private addLayoutFile(file: string): void {
    const stem = stemOf(file);
    if (stem === MAIN_LAYOUT) {
      this.defaultLayout = file;
    }
    this.layouts.set(stem, file);
  }

  private findPage(file: string): Page | undefined {
    const page = this.pages.get(file);
    if (page) return page;
    for (const candidate of this.pages.values()) {
      const variant = localeVariant(candidate.file.source, this.context.languages);
      if (variant?.logical === file) return candidate;
    }
    return undefined;
  }

  private hasVariant(file: string): boolean {
    const ext = path.extname(file);
    const base = file.slice(0, file.length - ext.length);
    return fs.existsSync(`${base}.${this.lang}${ext}`);
  }

  private link(key: string, source: string): void {
    const existing = this.links.get(key);
    if (existing !== undefined && existing !== source) {
      throw new LinkCollisionError(key, existing, source);
    }
    this.links.set(key, source);
  }

  private forget(source: string): void {
    this.pages.delete(source);
    this.targets.delete(source);
    for (const [key, value] of this.links) {
      if (value === source) this.links.delete(key);
    }
    for (const [name, file] of this.layouts) {
      if (file === source) this.layouts.delete(name);
    }
    if (this.defaultLayout === source) this.defaultLayout = undefined;
  }
}

/**
 * Resource view of a page.
 */
export function pageResource(page: Page): Resource {
  return createResource(
    "page",
    page.file.destination,
    page.data.render === false ? "copy" : "render",
  );
}

function removeEmptyDir(dir: string): void {
  try {
    fs.rmdirSync(dir);
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOTEMPTY" || code === "ENOENT" || code === "EEXIST") return;
    throw toIoError("remove", dir, err);
  }
}

/**
 * Walk the source tree and build a collation.
 *
 * `setup` runs after the walk and before layouts and menus are checked,
 * so entries it adds (plugin layouts and assets) take part in the checks.
 */
export function collate(
  context: CollationContext,
  walker: Walker,
  setup?: (collation: Collation) => void,
): Collation {
  const collation = new Collation(context);
  for (const entry of walker.walk(context.paths.source, context.exclude)) {
    collation.add(entry.path, entry.isFile);
  }
  setup?.(collation);
  collation.finish();
  return collation;
}
