/**
 * HTML whitespace minifier.
 *
 * Drops whitespace-only runs between tags and passes everything else
 * through. Text inside `<script>` and `<pre>` is not treated specially.
 */

type ScanState = "none" | "inside" | "between";

const WHITESPACE = /\s/;

export function minifyHtml(html: string): string {
  let out = "";
  let pending = "";
  let empty = true;
  let state: ScanState = "none";

  for (const c of html) {
    if (c === "<") {
      if (!empty) out += pending;
      pending = "";
      empty = true;
      state = "inside";
    } else if (c === ">" && state === "inside") {
      state = "between";
      empty = true;
      out += c;
      continue;
    }

    if (state === "between") {
      empty = empty && WHITESPACE.test(c);
      pending += c;
    } else {
      out += c;
    }
  }

  if (!empty) out += pending;
  return out;
}
