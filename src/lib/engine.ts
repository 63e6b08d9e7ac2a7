/**
 * Collaborators the renderer calls into, with the default adapters.
 *
 * The template engine, the syntax highlighter and the search indexer are
 * interfaces so a site can plug in its own. The defaults keep the
 * command line useful on their own: markdown through `marked` wrapped in
 * a layout with `{{ ... }}` placeholders, escaped code blocks and a
 * `search.json` index.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { marked } from "marked";
import { RenderError, toIoError } from "./errors.js";
import { PageData } from "./models.js";
import { escapeHtml } from "./toc.js";

export interface TemplateData {
  page: PageData;
  /** Site-root-relative href of the page */
  href: string;
  lang: string;
  /** Menu name to page hrefs */
  menus: Record<string, string[]>;
  [key: string]: unknown;
}

export interface RenderRequest {
  /** Absolute template path (the page source) */
  template: string;
  /** Absolute layout path; absent renders the template alone */
  layout?: string;
  /** Template content with front matter removed */
  body: string;
  /** Whether the template is markdown */
  markdown: boolean;
  data: TemplateData;
  /** Resolve a root-relative href for the page being rendered */
  link(href: string): string;
}

export interface TemplateEngine {
  render(request: RenderRequest): Promise<string>;
}

export interface Highlighter {
  /** Markup for the code; `language` is the resolved language name */
  highlight(code: string, language: string): string;
}

export interface SearchDocument {
  href: string;
  title: string;
  text: string;
}

export interface SearchIndexer {
  add(document: SearchDocument): void;
  finish(): Promise<void>;
}

const PLACEHOLDER = /\{\{\s*(?:link\s+"([^"]*)"|([A-Za-z_][\w.]*))\s*\}\}/g;

function lookup(scope: Record<string, unknown>, name: string): unknown {
  let value: unknown = scope;
  for (const part of name.split(".")) {
    if (typeof value !== "object" || value === null) return undefined;
    value = Object.entries(value).find(([key]) => key === part)?.[1];
  }
  return value;
}

function stringify(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Substitute `{{ name }}`, `{{ page.title }}` and `{{ link "/x" }}`.
 * Values are escaped except `content`, which is already markup.
 */
export function substitute(
  template: string,
  scope: Record<string, unknown>,
  link: (href: string) => string,
): string {
  return template.replace(
    PLACEHOLDER,
    (_, href: string | undefined, name: string | undefined) => {
      if (href !== undefined) return escapeHtml(link(href));
      const key = name ?? "";
      const value = stringify(lookup(scope, key));
      return key === "content" ? value : escapeHtml(value);
    },
  );
}

/**
 * Default engine: markdown to HTML with marked, then placeholder
 * substitution in the page and its layout.
 */
export class MarkdownEngine implements TemplateEngine {
  async render(request: RenderRequest): Promise<string> {
    const scope: Record<string, unknown> = { ...request.data, ...request.data.page };

    let content = substitute(request.body, scope, request.link);
    if (request.markdown) {
      content = await marked.parse(content);
    }
    if (!request.layout) return content;

    let layout: string;
    try {
      layout = fs.readFileSync(request.layout, "utf-8");
    } catch (err) {
      throw new RenderError(
        `cannot read layout ${request.layout}: ${err instanceof Error ? err.message : String(err)}`,
        request.template,
      );
    }
    return substitute(layout, { ...scope, content }, request.link);
  }
}

/**
 * Highlighter that only escapes code.
 */
export class PlainHighlighter implements Highlighter {
  highlight(code: string): string {
    return escapeHtml(code);
  }
}

function isSearchDocument(value: unknown): value is SearchDocument {
  return (
    typeof value === "object" &&
    value !== null &&
    "href" in value &&
    typeof value.href === "string" &&
    "title" in value &&
    typeof value.title === "string" &&
    "text" in value &&
    typeof value.text === "string"
  );
}

/**
 * Indexer that writes every document to one JSON file.
 *
 * With `merge` the documents already in the file are kept unless a page
 * with the same href was indexed again, so incremental builds that skip
 * fresh pages do not shrink the index.
 */
export class JsonSearchIndexer implements SearchIndexer {
  readonly documents: SearchDocument[] = [];

  constructor(
    readonly file: string,
    private readonly merge = false,
  ) {}

  add(document: SearchDocument): void {
    this.documents.push(document);
  }

  private async existing(): Promise<SearchDocument[]> {
    if (!this.merge || !fs.existsSync(this.file)) return [];
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.promises.readFile(this.file, "utf-8"));
    } catch {
      // Unreadable index, start over
      return [];
    }
    return Array.isArray(parsed) ? parsed.filter(isSearchDocument) : [];
  }

  async finish(): Promise<void> {
    const byHref = new Map<string, SearchDocument>();
    for (const doc of await this.existing()) byHref.set(doc.href, doc);
    for (const doc of this.documents) byHref.set(doc.href, doc);

    const sorted = [...byHref.values()].sort((a, b) =>
      a.href.localeCompare(b.href),
    );
    try {
      await fs.promises.mkdir(path.dirname(this.file), { recursive: true });
      await fs.promises.writeFile(
        this.file,
        JSON.stringify(sorted, null, 2) + "\n",
      );
    } catch (err) {
      throw toIoError("write", this.file, err);
    }
  }
}
