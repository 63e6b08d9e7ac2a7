/**
 * Table of contents.
 *
 * Pages ask for a table of contents with a placeholder tag such as
 * `<toc data-tag="ol" data-class="toc" data-from="h2" data-to="h3" />`;
 * headings in range are collected while ids are assigned and rendered
 * as a nested list in place of the tag.
 */

export type ListTag = "ol" | "ul";

export interface TocOptions {
  tag: ListTag;
  className: string;
  /** Lowest heading level included */
  from: number;
  /** Highest heading level included */
  to: number;
}

export interface TocEntry {
  level: number;
  id: string;
  text: string;
}

export const TOC_PATTERN =
  /<toc data-tag="(ol|ul)" data-class="([^"]*)" data-from="h([1-6])" data-to="h([1-6])" \/>/;

/**
 * Options from the first table of contents tag in the document.
 */
export function parseTocTag(html: string): TocOptions | undefined {
  const match = TOC_PATTERN.exec(html);
  if (!match) return undefined;
  const tag: ListTag = match[1] === "ul" ? "ul" : "ol";
  return {
    tag,
    className: match[2],
    from: Number(match[3]),
    to: Number(match[4]),
  };
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export class TableOfContents {
  readonly entries: TocEntry[] = [];

  constructor(readonly options: TocOptions) {}

  add(level: number, id: string, text: string): void {
    if (level < this.options.from || level > this.options.to) return;
    this.entries.push({ level, id, text });
  }

  render(): string {
    const { tag, className } = this.options;
    const stack: number[] = [];
    let html = "";

    for (const entry of this.entries) {
      const top = stack[stack.length - 1];
      if (top === undefined) {
        html += className ? `<${tag} class="${escapeHtml(className)}">` : `<${tag}>`;
        stack.push(entry.level);
      } else if (entry.level > top) {
        html += `<${tag}>`;
        stack.push(entry.level);
      } else {
        while (stack.length > 1 && entry.level < stack[stack.length - 1]) {
          html += `</li></${tag}>`;
          stack.pop();
        }
        html += "</li>";
      }
      html += `<li><a href="#${escapeHtml(entry.id)}">${escapeHtml(entry.text)}</a>`;
    }

    while (stack.length > 0) {
      html += `</li></${tag}>`;
      stack.pop();
    }
    return html;
  }
}
