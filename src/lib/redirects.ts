/**
 * Redirects.
 *
 * The redirect map goes from a short URL to a destination. Chains are
 * followed to make sure they terminate; the whole map is validated and
 * every stub checked for a clash before anything is written.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { INDEX_HTML } from "./config.js";
import {
  CyclicRedirectError,
  DuplicatePermalinkError,
  RedirectFileExistsError,
  TooManyRedirectsError,
  toIoError,
} from "./errors.js";
import { Page } from "./models.js";
import { escapeHtml } from "./toc.js";

export const MAX_REDIRECTS = 4;

export const REDIRECTS_FILE = "redirects.json";

export type RedirectMap = Record<string, string>;

function trimSlash(value: string): string {
  return value.replace(/\/+$/, "");
}

function follow(
  map: RedirectMap,
  key: string,
  stack: string[],
): void {
  if (stack.length >= MAX_REDIRECTS) {
    throw new TooManyRedirectsError(MAX_REDIRECTS);
  }

  const normalized = trimSlash(key);
  if (stack.includes(normalized)) {
    throw new CyclicRedirectError(stack, normalized);
  }
  stack.push(normalized);

  const next = map[key] ?? map[normalized];
  if (next === undefined) return;

  if (map[next] !== undefined) {
    follow(map, next, stack);
  } else if (map[trimSlash(next)] !== undefined) {
    follow(map, trimSlash(next), stack);
  }
}

/**
 * Validate every redirect chain in the map.
 */
export function validateRedirects(map: RedirectMap): void {
  for (const key of Object.keys(map)) {
    follow(map, key, []);
  }
}

/**
 * Stub page that sends the browser on to `location`.
 */
export function redirectStub(location: string): string {
  const href = escapeHtml(location);
  const script = escapeHtml(
    `document.location.replace(${JSON.stringify(location)});`,
  );
  return (
    `<!doctype html><html><head>` +
    `<link rel="canonical" href="${href}">` +
    `<noscript><meta http-equiv="refresh" content="0; ${href}"></noscript>` +
    `</head><body onload="${script}"></body></html>`
  );
}

/**
 * Output file for a redirect key; `/docs/` writes `docs/index.html`.
 */
export function redirectFile(key: string, outputRoot: string): string {
  let rel = key.replace(/^\/+/, "");
  if (rel === "" || rel.endsWith("/")) rel += INDEX_HTML;
  return path.join(outputRoot, ...rel.split("/"));
}

/**
 * Write a stub for every redirect. Existing files are never overwritten;
 * every target is checked before the first stub is written.
 * Returns the files written.
 */
export function writeRedirects(map: RedirectMap, outputRoot: string): string[] {
  const files = Object.entries(map).map(([key, location]) => ({
    file: redirectFile(key, outputRoot),
    location,
  }));

  const pending = files.filter(({ file, location }) => {
    if (!fs.existsSync(file)) return true;
    // A stub from an earlier build of the same map is not a clash
    if (fs.readFileSync(file, "utf-8") === redirectStub(location)) return false;
    throw new RedirectFileExistsError(file);
  });

  for (const { file, location } of pending) {
    try {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, redirectStub(location));
    } catch (err) {
      throw toIoError("write", file, err);
    }
  }
  return pending.map((f) => f.file);
}

/**
 * Write the redirect map as `redirects.json` at the output root.
 */
export function writeRedirectManifest(map: RedirectMap, outputRoot: string): string {
  const file = path.join(outputRoot, REDIRECTS_FILE);
  try {
    fs.mkdirSync(outputRoot, { recursive: true });
    fs.writeFileSync(file, JSON.stringify(map, null, 2) + "\n");
  } catch (err) {
    throw toIoError("write", file, err);
  }
  return file;
}

/**
 * Merge page permalinks into the redirect map.
 *
 * Each permalink redirects to its page's href. A permalink that is
 * already a redirect key, or claimed by another page, is an error.
 */
export function collectPermalinks(
  redirects: RedirectMap,
  pages: Iterable<Page>,
): RedirectMap {
  const merged: RedirectMap = { ...redirects };
  for (const page of pages) {
    const permalink = page.data.permalink;
    if (permalink === undefined) continue;
    const key = permalink.startsWith("/") ? permalink : `/${permalink}`;
    if (merged[key] !== undefined) {
      throw new DuplicatePermalinkError(key, page.file.source);
    }
    merged[key] = page.href;
  }
  return merged;
}
