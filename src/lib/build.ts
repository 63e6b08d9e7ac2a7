/**
 * Build orchestration.
 *
 * A Workspace owns the collations of a site (one per language) between
 * build passes. A pass runs the before hooks, builds every collation
 * through the scheduler, compiles books, writes redirects and search
 * indexes, then runs the after hooks. Configuration and redirect errors
 * are raised while loading, before any output is written.
 */

import * as path from "node:path";
import {
  BuildOptions,
  LAYOUTS,
  SiteConfig,
  exclusionRoots,
} from "./config.js";
import { BookCompiler, buildBooks, CopyBookCompiler } from "./books.js";
import { Collation } from "./collation.js";
import {
  Highlighter,
  JsonSearchIndexer,
  MarkdownEngine,
  PlainHighlighter,
  SearchIndexer,
  TemplateEngine,
} from "./engine.js";
import { runHooks } from "./hooks.js";
import { collateLocales, siteLanguages } from "./locales.js";
import { Logger, silentLogger } from "./logger.js";
import { Manifest } from "./manifest.js";
import { resolvePageTable } from "./page.js";
import { PathConfig } from "./paths.js";
import { injectPlugin, resolvePlugins } from "./plugins.js";
import {
  RedirectMap,
  collectPermalinks,
  validateRedirects,
  writeRedirectManifest,
  writeRedirects,
} from "./redirects.js";
import { Renderer } from "./renderer.js";
import { Scheduler } from "./scheduler.js";
import { FsWalker, Walker } from "./walk.js";

export interface BuildServices {
  engine?: TemplateEngine;
  highlighter?: Highlighter;
  /** Indexer for a collation's search file */
  createIndexer?: (file: string) => SearchIndexer;
  walker?: Walker;
  bookCompiler?: BookCompiler;
  logger?: Logger;
  /** Let hook output through to the terminal */
  inheritHookOutput?: boolean;
}

export interface CollationSummary {
  lang: string;
  target: string;
  dispatched: number;
  fresh: number;
}

export interface BuildSummary {
  profile: string;
  collations: CollationSummary[];
  redirects: number;
  books: number;
  hooks: number;
}

/**
 * Path configuration from site configuration and build options.
 */
export function pathConfig(config: SiteConfig, options: BuildOptions): PathConfig {
  return {
    source: options.source,
    extension: config.extension,
    cleanUrl: options.cleanUrl,
    includeIndex: options.includeIndex,
    baseHref: options.baseHref,
    relativeLinks: config.link.relative,
  };
}

export class Workspace {
  collations: Collation[] = [];
  private redirectMap: RedirectMap = {};
  private readonly walker: Walker;
  private readonly logger: Logger;

  constructor(
    readonly config: SiteConfig,
    readonly options: BuildOptions,
    private readonly services: BuildServices = {},
  ) {
    this.walker = services.walker ?? new FsWalker(config.build.followLinks);
    this.logger = services.logger ?? silentLogger;
  }

  get loaded(): boolean {
    return this.collations.length > 0;
  }

  /** Redirects from configuration merged with page permalinks */
  get redirects(): RedirectMap {
    return this.redirectMap;
  }

  /**
   * Collate the site and validate everything that must hold before
   * output is written.
   */
  load(): Collation[] {
    const { config, options } = this;
    const paths = pathConfig(config, options);
    const table = resolvePageTable(config.pages, paths);
    const plugins = resolvePlugins(config.plugin, options.project);

    const exclude = [
      ...exclusionRoots(options),
      ...config.book.map((book) => path.resolve(options.source, book.path)),
    ];

    const collations = collateLocales(
      {
        paths,
        defaults: config.page,
        table,
        menus: config.menu,
        allow: config.link.allow,
        exclude,
      },
      options.target,
      config.lang,
      config.languages,
      this.walker,
      (collation) => {
        for (const plugin of plugins) {
          injectPlugin(collation, plugin, this.walker);
        }
      },
    );

    for (const collation of collations) {
      collation.manifest = Manifest.forTarget(collation.target, options.incremental);
      collation.manifest.load();
    }

    const primary = collations[0];
    const redirects = collectPermalinks(
      config.redirect,
      primary ? primary.pages.values() : [],
    );
    validateRedirects(redirects);

    this.collations = collations;
    this.redirectMap = redirects;
    this.logger.debug(
      `Collated ${collations.length} language(s): ${siteLanguages(config.lang, config.languages).join(", ")}`,
    );
    return collations;
  }

  /**
   * Run a build pass. A scope limits the pass to those paths and skips
   * the site-wide outputs (redirects, search indexes, books).
   */
  async build(scope?: string[]): Promise<BuildSummary> {
    const { config, options } = this;
    const full = scope === undefined || scope.length === 0;
    const hookEnv = {
      cwd: options.project,
      source: options.source,
      target: options.target,
      profile: options.profile,
    };
    const inherit = this.services.inheritHookOutput ?? false;

    if (!this.loaded) this.load();
    let hooks = runHooks(config.hook, "before", hookEnv, inherit);

    const summary: BuildSummary = {
      profile: options.profile,
      collations: [],
      redirects: 0,
      books: 0,
      hooks: 0,
    };

    for (const collation of this.collations) {
      summary.collations.push(await this.buildCollation(collation, full ? undefined : scope));
      if (full && config.book.length > 0) {
        const books = await buildBooks(config.book, {
          source: options.source,
          target: collation.target,
          profile: options.profile,
          compiler: this.services.bookCompiler ?? new CopyBookCompiler(),
        });
        summary.books += books.length;
      }
    }

    if (full && Object.keys(this.redirectMap).length > 0) {
      if (config.build.writeRedirectFiles) {
        summary.redirects = writeRedirects(this.redirectMap, options.target).length;
      }
      writeRedirectManifest(this.redirectMap, options.target);
    }

    hooks += runHooks(config.hook, "after", hookEnv, inherit);
    summary.hooks = hooks;
    return summary;
  }

  private async buildCollation(
    collation: Collation,
    scope: string[] | undefined,
  ): Promise<CollationSummary> {
    const { config, options } = this;
    const indexer =
      config.search && scope === undefined
        ? this.createIndexer(path.join(collation.target, config.search.file))
        : undefined;

    const renderer = new Renderer(collation, {
      config,
      profile: options.profile,
      engine: this.services.engine ?? new MarkdownEngine(),
      highlighter: this.services.highlighter ?? new PlainHighlighter(),
      indexer,
    });
    const scheduler = new Scheduler(renderer, {
      jobs: options.jobs,
      failFast: options.failFast,
      force: options.force,
      scope,
      manifest: collation.manifest,
      onBuilt: (target, outcome) =>
        this.logger.debug(`${outcome} ${path.relative(options.project, target.destination)}`),
    });

    this.logger.info(`Building ${collation.lang} into ${collation.target}`);
    try {
      const result = await scheduler.run(collation.destinations());
      await indexer?.finish();
      return {
        lang: collation.lang,
        target: collation.target,
        dispatched: result.dispatched,
        fresh: result.fresh,
      };
    } finally {
      if (collation.manifest && !collation.manifest.save()) {
        this.logger.warn(`Could not write ${collation.manifest.file}`);
      }
    }
  }

  private createIndexer(file: string): SearchIndexer {
    return this.services.createIndexer?.(file) ?? new JsonSearchIndexer(file, this.options.incremental);
  }

  /**
   * Refresh changed files and rebuild them. A changed layout rebuilds
   * every page.
   */
  async update(paths: string[]): Promise<BuildSummary> {
    if (!this.loaded) return this.build();

    const files = paths.map((p) => path.resolve(this.options.source, p));
    for (const collation of this.collations) {
      for (const file of files) collation.upsert(file);
    }
    const layouts = path.join(this.options.source, LAYOUTS);
    const layoutChanged = files.some(
      (file) => file === layouts || file.startsWith(layouts + path.sep),
    );
    return this.build(layoutChanged ? undefined : files);
  }

  /**
   * Drop deleted files and their build artifacts. Shared files uncovered
   * by a removed locale variant are built again.
   */
  async remove(paths: string[]): Promise<BuildSummary | undefined> {
    const files = paths.map((p) => path.resolve(this.options.source, p));
    const restored = new Set<string>();
    for (const collation of this.collations) {
      for (const file of files) {
        for (const source of collation.remove(file)) restored.add(source);
      }
      collation.manifest?.save();
    }
    return restored.size > 0 ? this.build([...restored]) : undefined;
  }
}

/**
 * Build a whole site, or part of it, in one call.
 */
export async function buildSite(
  config: SiteConfig,
  options: BuildOptions,
  services: BuildServices = {},
  scope?: string[],
): Promise<BuildSummary> {
  const workspace = new Workspace(config, options, services);
  return workspace.build(scope);
}
