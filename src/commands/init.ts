/**
 * quire init - Scaffold a new site.
 */

import { Command } from "commander";
import * as path from "node:path";
import { discoverProject } from "../lib/config.js";
import { ExitCodes } from "../lib/models.js";
import { initSite } from "../lib/scaffold.js";

export const initCommand = new Command("init")
  .description("Create a new site with a config, a home page and a layout")
  .argument("[dir]", "directory to create the site in")
  .option("--gitignore", "add the build output to .gitignore")
  .action((dir: string | undefined, options: { gitignore?: boolean }, command: Command) => {
    const globalOpts = command.parent?.opts() || {};
    const base = globalOpts.root ? path.resolve(globalOpts.root) : process.cwd();
    const root = dir ? path.resolve(base, dir) : base;

    const existing = discoverProject(root);
    if (existing && existing.root === root) {
      if (globalOpts.json) {
        console.log(
          JSON.stringify({
            status: "exists",
            root: existing.root,
            config: existing.configPath,
          }),
        );
      } else if (!globalOpts.quiet) {
        console.log(`Site already exists at ${existing.root}`);
      }
      process.exit(ExitCodes.SUCCESS);
    }

    try {
      const result = initSite(root, { gitignore: options.gitignore });

      if (globalOpts.json) {
        console.log(
          JSON.stringify({
            status: "created",
            root: result.root,
            config: result.configPath,
            files: result.created,
          }),
        );
      } else if (!globalOpts.quiet) {
        console.log(`Initialized site at ${result.root}`);
        for (const file of result.created) {
          console.log(`  ${file}`);
        }
      }

      process.exit(ExitCodes.SUCCESS);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);

      if (globalOpts.json) {
        console.log(JSON.stringify({ status: "error", error: message }));
      } else {
        console.error(`Error: ${message}`);
      }

      process.exit(ExitCodes.FAILURE);
    }
  });
