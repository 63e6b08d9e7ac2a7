/**
 * Front matter loading.
 *
 * Markdown files open front matter with `+++`, HTML templates wrap it in
 * an HTML comment. Both carry TOML, split out with gray-matter.
 */

import matter from "gray-matter";
import * as toml from "toml";
import { PageDataSchema, formatIssues } from "./config.js";
import { FrontMatterError } from "./errors.js";
import { PageData } from "./models.js";

export interface Delimiters {
  open: string;
  close: string;
}

export const MARKDOWN_DELIMITERS: Delimiters = { open: "+++", close: "+++" };
export const HTML_DELIMITERS: Delimiters = { open: "<!--", close: "-->" };

export interface FrontMatterResult {
  /** Content with the front matter removed */
  body: string;
  hasFrontMatter: boolean;
  frontMatter: PageData;
}

function parseToml(input: string): object {
  const parsed = toml.parse(input);
  if (typeof parsed !== "object" || parsed === null) return {};
  return parsed;
}

/**
 * Split and parse front matter.
 *
 * Front matter opens on a first line that is exactly the opening
 * delimiter, surrounding whitespace aside, and closes on the first later
 * line that is exactly the closing one. Content that opens a block
 * without closing it is an error, as is front matter that is not valid
 * TOML.
 */
export function parseFrontMatter(
  content: string,
  delimiters: Delimiters,
  file: string,
): FrontMatterResult {
  const lines = content.replace(/^\uFEFF/, "").split("\n");
  if (lines[0].trim() !== delimiters.open) {
    return { body: content, hasFrontMatter: false, frontMatter: {} };
  }

  const end = lines.findIndex(
    (line, i) => i > 0 && line.trim() === delimiters.close,
  );
  if (end === -1) {
    throw new FrontMatterError("front matter is not terminated", file);
  }

  const text = [
    delimiters.open,
    ...lines.slice(1, end),
    delimiters.close,
    ...lines.slice(end + 1),
  ].join("\n");

  let data: Record<string, unknown>;
  let body: string;
  try {
    const parsed = matter(text, {
      delimiters: [delimiters.open, delimiters.close],
      language: "toml",
      engines: { toml: parseToml },
    });
    data = parsed.data;
    body = parsed.content;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FrontMatterError(message, file);
  }

  const result = PageDataSchema.safeParse(data);
  if (!result.success) {
    throw new FrontMatterError(formatIssues(result.error), file);
  }
  return { body, hasFrontMatter: true, frontMatter: result.data };
}

/**
 * Delimiters for a file type, markdown or template.
 */
export function delimitersFor(markdown: boolean): Delimiters {
  return markdown ? MARKDOWN_DELIMITERS : HTML_DELIMITERS;
}
