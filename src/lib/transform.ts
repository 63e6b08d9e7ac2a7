/**
 * HTML rewrite pipeline.
 *
 * Runs over rendered HTML after the template engine: assigns heading ids,
 * collects the table of contents, highlights code blocks, strips
 * comments, fills word count placeholders and extracts text for search.
 * The document is parsed once with cheerio; every step works on that DOM.
 */

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { HtmlTransformFlags } from "./config.js";
import { Highlighter, SearchDocument } from "./engine.js";
import { TableOfContents, parseTocTag, TOC_PATTERN } from "./toc.js";

const LANGUAGE_ALIASES: Record<string, string> = {
  js: "javascript",
  ts: "typescript",
  sh: "bash",
  shell: "bash",
  yml: "yaml",
  rs: "rust",
  py: "python",
  rb: "ruby",
  md: "markdown",
};

const HEADINGS = "h1, h2, h3, h4, h5, h6";
const CODE_BLOCKS = "pre > code[class]";
const LANGUAGE_CLASS = /language-([^\s]+)/;
const WORDS_PATTERN = /<words(?: data-avg="(\d+)")? \/>/g;
const COMMENT_NODE = 8;
const TOC_ELEMENT = "quire-toc";
const WORDS_ELEMENT = "quire-words";

export interface TransformOptions extends HtmlTransformFlags {
  highlighter?: Highlighter;
  /** Extract title and text for the search index */
  search: boolean;
}

export interface TransformResult {
  html: string;
  /** Present when text extraction was requested */
  document?: Omit<SearchDocument, "href">;
}

/**
 * Whether any rewrite step is enabled.
 */
export function needsTransform(flags: HtmlTransformFlags, search: boolean): boolean {
  return (
    flags.autoId ||
    flags.syntaxHighlight ||
    flags.stripComments ||
    flags.toc ||
    flags.words ||
    search
  );
}

/**
 * URL-safe id from heading text.
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-|-$/g, "")
    .slice(0, 50);
}

export function resolveLanguage(name: string): string {
  return LANGUAGE_ALIASES[name] ?? name;
}

function uniqueId(base: string, used: Set<string>): string {
  if (!used.has(base)) return base;
  let n = 1;
  while (used.has(`${base}-${n}`)) n++;
  return `${base}-${n}`;
}

function assignHeadingIds(
  $: CheerioAPI,
  autoId: boolean,
  toc: TableOfContents | undefined,
): void {
  const headings = $(HEADINGS).toArray();

  const used = new Set<string>();
  for (const el of headings) {
    const id = $(el).attr("id");
    if (id) used.add(id);
  }

  for (const el of headings) {
    const heading = $(el);
    const text = heading.text().trim();
    let id = heading.attr("id");
    if (!id && autoId) {
      id = uniqueId(slugify(text) || "section", used);
      used.add(id);
      heading.attr("id", id);
    }
    if (id && toc) {
      toc.add(Number(el.tagName.slice(1)), id, text);
    }
  }
}

function highlightCode($: CheerioAPI, highlighter: Highlighter): void {
  $(CODE_BLOCKS).each((_, el) => {
    const code = $(el);
    const className = code.attr("class") ?? "";
    const match = LANGUAGE_CLASS.exec(className);
    if (!match) return;

    code.html(highlighter.highlight(code.text(), resolveLanguage(match[1])));
    code.attr("class", `${className} code`);
  });
}

function stripComments($: CheerioAPI): void {
  $.root()
    .find("*")
    .addBack()
    .contents()
    .filter((_, node) => node.nodeType === COMMENT_NODE)
    .remove();
}

function extractText($: CheerioAPI): Omit<SearchDocument, "href"> {
  const title = $("title").first().text().trim() || $("h1").first().text().trim();
  const chunks: string[] = [];
  $("p").each((_, el) => {
    const text = $(el).text().replace(/\s+/g, " ").trim();
    if (text) chunks.push(text);
  });
  return { title, text: chunks.join(" ") };
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

function fillWords($: CheerioAPI, text: string): void {
  const count = countWords(text);
  $(WORDS_ELEMENT).each((_, el) => {
    const placeholder = $(el);
    const avg = Number(placeholder.attr("data-avg") ?? "0");
    const value = avg > 0 ? Math.max(Math.floor(count / avg), 2) : count;
    placeholder.replaceWith(String(value));
  });
}

/**
 * Run the enabled rewrite steps over a rendered page.
 */
export function transformHtml(html: string, options: TransformOptions): TransformResult {
  let source = html;

  const tocOptions = options.toc ? parseTocTag(source) : undefined;
  if (tocOptions) {
    source = source.replace(TOC_PATTERN, `<${TOC_ELEMENT}></${TOC_ELEMENT}>`);
  }
  if (options.words) {
    source = source.replace(WORDS_PATTERN, (_, avg: string | undefined) =>
      avg
        ? `<${WORDS_ELEMENT} data-avg="${avg}"></${WORDS_ELEMENT}>`
        : `<${WORDS_ELEMENT}></${WORDS_ELEMENT}>`,
    );
  }

  const isDocument = /<html[\s>]/i.test(source);
  const $ = isDocument ? cheerio.load(source) : cheerio.load(source, null, false);

  if (options.stripComments) stripComments($);

  const toc = tocOptions ? new TableOfContents(tocOptions) : undefined;
  if (options.autoId || toc) assignHeadingIds($, options.autoId, toc);

  if (options.syntaxHighlight && options.highlighter) {
    highlightCode($, options.highlighter);
  }

  const extracted = options.search || options.words ? extractText($) : undefined;
  if (options.words && extracted) fillWords($, extracted.text);

  let out = $.html();
  if (toc) {
    out = out.replace(`<${TOC_ELEMENT}></${TOC_ELEMENT}>`, toc.render());
  }

  return {
    html: out,
    document: options.search ? extracted : undefined,
  };
}
