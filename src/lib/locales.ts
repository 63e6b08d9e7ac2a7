/**
 * Locale variants.
 *
 * A multi-lingual site gets one collation per language, each written to
 * `<target>/<lang>`. Files named `name.<lang>.ext` belong to that
 * language only and replace `name.ext`; every other file is shared.
 */

import * as path from "node:path";
import { Collation, CollationContext, collate } from "./collation.js";
import { Walker } from "./walk.js";

export type SharedContext = Omit<
  CollationContext,
  "lang" | "target" | "languages" | "localized"
>;

/**
 * Every language of the site, the primary one first.
 */
export function siteLanguages(lang: string, languages: string[]): string[] {
  const out = [lang];
  for (const l of languages) {
    if (!out.includes(l)) out.push(l);
  }
  return out;
}

/**
 * Output root for a language.
 */
export function localeTarget(
  target: string,
  lang: string,
  multilingual: boolean,
): string {
  return multilingual ? path.join(target, lang) : target;
}

/**
 * Build the collation for every language.
 */
export function collateLocales(
  shared: SharedContext,
  target: string,
  lang: string,
  languages: string[],
  walker: Walker,
  setup?: (collation: Collation) => void,
): Collation[] {
  const all = siteLanguages(lang, languages);
  const multilingual = all.length > 1;

  return all.map((l) =>
    collate(
      {
        ...shared,
        lang: l,
        target: localeTarget(target, l, multilingual),
        languages: multilingual ? all : [],
        localized: multilingual,
      },
      walker,
      setup,
    ),
  );
}
