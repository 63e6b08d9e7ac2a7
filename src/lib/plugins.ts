/**
 * Plugin injection.
 *
 * A plugin is a directory with optional `assets/` and `layouts/`
 * subdirectories. Assets are added to each collation as copy targets
 * and layouts are registered as `<plugin>::<stem>`.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { ASSETS, LAYOUTS, PluginConfig } from "./config.js";
import { Collation } from "./collation.js";
import { ConfigError } from "./errors.js";
import { createResource } from "./models.js";
import { stemOf } from "./paths.js";
import { Walker } from "./walk.js";

export interface ResolvedPlugin {
  name: string;
  /** Absolute plugin directory */
  path: string;
}

/**
 * Resolve plugin directories against the project root.
 */
export function resolvePlugins(
  plugins: PluginConfig[],
  project: string,
): ResolvedPlugin[] {
  return plugins.map((plugin) => {
    if (!plugin.name) {
      throw new ConfigError("Plugin is missing a name");
    }
    const dir = path.resolve(project, plugin.path || plugin.name);
    if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
      throw new ConfigError(`Plugin '${plugin.name}' not found at ${dir}`);
    }
    return { name: plugin.name, path: dir };
  });
}

/** Layout name for a plugin layout */
export function pluginLayoutName(plugin: string, file: string): string {
  return `${plugin}::${stemOf(file)}`;
}

/**
 * Add a plugin's assets and layouts to a collation.
 */
export function injectPlugin(
  collation: Collation,
  plugin: ResolvedPlugin,
  walker: Walker,
): void {
  const assets = path.join(plugin.path, ASSETS);
  if (fs.existsSync(assets)) {
    for (const entry of walker.walk(assets, [])) {
      if (!entry.isFile) continue;
      const rel = path.relative(plugin.path, entry.path);
      collation.addTarget(entry.path, createResource("asset", rel));
    }
  }

  const layouts = path.join(plugin.path, LAYOUTS);
  if (fs.existsSync(layouts)) {
    for (const entry of walker.walk(layouts, [])) {
      if (!entry.isFile) continue;
      collation.addLayout(pluginLayoutName(plugin.name, entry.path), entry.path);
    }
  }
}
