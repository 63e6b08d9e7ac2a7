/**
 * quire check - Validate a site without writing output.
 *
 * Loads the configuration, resolves the page table, collates every
 * language and validates redirects: everything a build does before its
 * first write.
 */

import { Command } from "commander";
import { Workspace } from "../lib/build.js";
import { loadConfig, resolveOptions, resolveProject } from "../lib/config.js";
import { isDataError } from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";
import { ExitCodes } from "../lib/models.js";

export const checkCommand = new Command("check")
  .description("Validate configuration, pages, layouts and redirects")
  .action((_options: Record<string, unknown>, command: Command) => {
    const globalOpts = command.parent?.opts() || {};

    const project = resolveProject({
      root: globalOpts.root,
      config: globalOpts.config,
    });

    if (!project) {
      const message = 'No site.toml found. Run "quire init" first.';
      if (globalOpts.json) {
        console.log(JSON.stringify({ status: "error", error: message }));
      } else {
        console.error(`Error: ${message}`);
      }
      process.exit(ExitCodes.DATA_ERROR);
    }

    try {
      const config = loadConfig(project.configPath);
      const workspace = new Workspace(config, resolveOptions(project.root, config), {
        logger: createLogger(globalOpts),
      });
      const collations = workspace.load().map((c) => ({
        lang: c.lang,
        pages: c.pages.size,
        files: [...c.targets.values()].filter((r) => r.kind !== "directory").length,
        layouts: c.layouts.size,
      }));
      const redirects = Object.keys(workspace.redirects).length;

      if (globalOpts.json) {
        console.log(JSON.stringify({ status: "ok", collations, redirects }));
      } else if (!globalOpts.quiet) {
        for (const c of collations) {
          console.log(
            `${c.lang}: ${c.pages} page(s), ${c.files} file(s), ${c.layouts} layout(s)`,
          );
        }
        console.log(`Redirects: ${redirects}`);
        console.log("Site is valid");
      }

      process.exit(ExitCodes.SUCCESS);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);

      if (globalOpts.json) {
        console.log(JSON.stringify({ status: "error", error: message }));
      } else {
        console.error(`Error: ${message}`);
      }

      process.exit(isDataError(err) ? ExitCodes.DATA_ERROR : ExitCodes.FAILURE);
    }
  });
