/**
 * New project scaffolding for `quire init`.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  CONFIG_FILE,
  DEFAULT_CONFIG,
  LAYOUTS,
  MAIN_LAYOUT,
} from "./config.js";
import { toIoError } from "./errors.js";

export interface ScaffoldResult {
  root: string;
  configPath: string;
  /** Files written, relative to the root */
  created: string[];
}

const INDEX_PAGE = `+++
title = "Home"
+++

# Welcome

Edit \`site/index.md\` and run \`quire build\`.
`;

const MAIN_TEMPLATE = `<!doctype html>
<html lang="{{ lang }}">
<head>
<meta charset="utf-8">
<title>{{ title }}</title>
</head>
<body>
{{ content }}
</body>
</html>
`;

function configContent(): string {
  const { build, lang } = DEFAULT_CONFIG;
  return `# Quire site configuration
lang = "${lang}"

[build]
source = "${build.source}"
target = "${build.target}"
clean-url = ${build.cleanUrl}

[redirect]
`;
}

/**
 * Create a project in `root`. Existing files are left alone.
 *
 * With `gitignore` the build target and its manifest are added to the
 * project's .gitignore.
 */
export function initSite(
  root: string,
  options: { gitignore?: boolean } = {},
): ScaffoldResult {
  const { build } = DEFAULT_CONFIG;
  const source = path.join(root, build.source);
  const files: Array<[string, string]> = [
    [CONFIG_FILE, configContent()],
    [path.join(build.source, "index.md"), INDEX_PAGE],
    [path.join(build.source, LAYOUTS, `${MAIN_LAYOUT}.html`), MAIN_TEMPLATE],
  ];

  const created: string[] = [];
  try {
    fs.mkdirSync(source, { recursive: true });
    for (const [rel, content] of files) {
      const file = path.join(root, rel);
      if (fs.existsSync(file)) continue;
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, content);
      created.push(rel);
    }

    if (options.gitignore) {
      const ignore = path.join(root, ".gitignore");
      const entries = [`/${build.target}/`, `/${build.target}.json`];
      const existing = fs.existsSync(ignore) ? fs.readFileSync(ignore, "utf-8") : "";
      const missing = entries.filter((e) => !existing.split("\n").includes(e));
      if (missing.length > 0) {
        const prefix = existing && !existing.endsWith("\n") ? "\n" : "";
        fs.appendFileSync(ignore, prefix + missing.join("\n") + "\n");
      }
    }
  } catch (err) {
    throw toIoError("write", root, err);
  }

  return { root, configPath: path.join(root, CONFIG_FILE), created };
}
