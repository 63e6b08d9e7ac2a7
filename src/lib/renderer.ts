/**
 * Per-file rendering.
 *
 * Decides what happens to one collated entry: pages go through the
 * template engine and the HTML pipeline, everything else is copied or
 * linked into place.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { HTML, SiteConfig } from "./config.js";
import { Collation } from "./collation.js";
import {
  Highlighter,
  SearchIndexer,
  TemplateData,
  TemplateEngine,
} from "./engine.js";
import { QuireError, RenderError, toIoError } from "./errors.js";
import { minifyHtml } from "./minify.js";
import { BuildTarget, Page, ProfileName } from "./models.js";
import {
  computeRelativeHref,
  extensionOf,
  fileType,
  verifyLink,
} from "./paths.js";
import { needsTransform, transformHtml } from "./transform.js";

export interface RendererOptions {
  config: SiteConfig;
  profile: ProfileName;
  engine: TemplateEngine;
  highlighter?: Highlighter;
  indexer?: SearchIndexer;
}

/** What happened to a build target */
export type RenderOutcome = "rendered" | "copied" | "linked" | "skipped";

async function writeOutput(file: string, content: string): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.writeFile(file, content);
  } catch (err) {
    throw toIoError("write", file, err);
  }
}

async function copyOutput(source: string, file: string): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.copyFile(source, file);
  } catch (err) {
    throw toIoError("copy", file, err);
  }
}

async function linkOutput(source: string, file: string): Promise<RenderOutcome> {
  if (fs.existsSync(file)) return "skipped";
  try {
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.symlink(source, file);
  } catch (err) {
    throw toIoError("link", file, err);
  }
  return "linked";
}

export class Renderer {
  constructor(
    private readonly collation: Collation,
    private readonly options: RendererOptions,
  ) {}

  get release(): boolean {
    return this.options.profile === "release";
  }

  /**
   * Build one target.
   */
  async render(target: BuildTarget): Promise<RenderOutcome> {
    const page = this.collation.getPage(target.source);
    if (page) {
      return this.renderPage(page, target.destination);
    }

    switch (target.resource.operation) {
      case "copy":
        await copyOutput(target.source, target.destination);
        return "copied";
      case "link":
        return linkOutput(target.source, target.destination);
      case "render":
      case "noop":
        return "skipped";
    }
  }

  private async renderPage(page: Page, destination: string): Promise<RenderOutcome> {
    if (page.data.render === false) {
      await copyOutput(page.file.source, destination);
      return "copied";
    }
    if (this.release && page.data.draft === true) {
      return "skipped";
    }

    let content = await this.invokeEngine(page);

    if (extensionOf(destination) === HTML) {
      content = this.postProcess(page, content);
    }

    await writeOutput(destination, content);
    return "rendered";
  }

  private async invokeEngine(page: Page): Promise<string> {
    const { config } = this.options;
    const paths = this.collation.context.paths;
    const source = page.file.source;

    const data: TemplateData = {
      page: page.data,
      href: page.href,
      lang: this.collation.lang,
      menus: Object.fromEntries(this.collation.menus),
    };

    const link = (href: string): string => {
      if (config.link.verify && href.startsWith("/")) {
        verifyLink(href, (key) => this.collation.hasLink(key), source);
      }
      return computeRelativeHref(href, source, paths, page.clean);
    };

    try {
      return await this.options.engine.render({
        template: page.file.template,
        layout: this.collation.getLayout(page),
        body: page.body,
        markdown: fileType(source, paths.extension) === "markdown",
        data,
        link,
      });
    } catch (err) {
      if (err instanceof QuireError) throw err;
      throw new RenderError(err instanceof Error ? err.message : String(err), source);
    }
  }

  private postProcess(page: Page, html: string): string {
    const { config, highlighter, indexer } = this.options;
    let content = html;

    const minifyProfiles = config.minify.html ?? ["release"];
    if (minifyProfiles.includes(this.options.profile)) {
      content = minifyHtml(content);
    }

    const search = indexer !== undefined;
    if (!needsTransform(config.transform, search)) return content;

    const result = transformHtml(content, {
      ...config.transform,
      highlighter,
      search,
    });
    if (indexer && result.document) {
      indexer.add({ href: page.href, ...result.document });
    }
    return result.html;
  }
}
