/**
 * quire build - Build the whole site, or only the given paths.
 *
 * Scoped builds render the listed files and directories and leave the
 * site-wide outputs (redirects, search index, books) untouched.
 */

import { Command, InvalidArgumentError } from "commander";
import * as path from "node:path";
import { Workspace } from "../lib/build.js";
import {
  BuildOverrides,
  loadConfig,
  resolveOptions,
  resolveProject,
} from "../lib/config.js";
import { BuildErrors, isDataError } from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";
import { ExitCodes } from "../lib/models.js";

export interface BuildCommandOptions {
  release?: boolean;
  profile?: string;
  force?: boolean;
  incremental?: boolean;
  jobs?: number;
  failFast?: boolean;
  cleanUrl?: boolean;
}

/**
 * Parse `--jobs`; zero means one worker per available core.
 */
export function parseJobs(value: string): number {
  const jobs = Number(value);
  if (!Number.isInteger(jobs) || jobs < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return jobs;
}

/**
 * Overrides from command options. Commander sets negated flags to
 * true by default, so only an explicit `--no-*` overrides the config.
 */
export function toOverrides(options: BuildCommandOptions): BuildOverrides {
  return {
    profile: options.profile,
    release: options.release,
    force: options.force,
    incremental: options.incremental,
    jobs: options.jobs,
    failFast: options.failFast === false ? false : undefined,
    cleanUrl: options.cleanUrl === false ? false : undefined,
  };
}

export const buildCommand = new Command("build")
  .description("Build the site into its target directory")
  .argument("[paths...]", "limit the build to these files or directories")
  .option("--release", "use the release profile")
  .option("--profile <name>", "build profile (debug, release)")
  .option("--force", "rebuild files the manifest reports as fresh")
  .option("--incremental", "skip files that have not changed since the last build")
  .option("-j, --jobs <n>", "number of parallel workers, 0 for one per core", parseJobs)
  .option("--no-fail-fast", "build every file and report all errors")
  .option("--no-clean-url", "write pages as name.html instead of name/index.html")
  .action(async (paths: string[], options: BuildCommandOptions, command: Command) => {
    const globalOpts = command.parent?.opts() || {};
    const logger = createLogger(globalOpts);

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

    const started = Date.now();
    try {
      const config = loadConfig(project.configPath);
      const buildOptions = resolveOptions(project.root, config, toOverrides(options));
      const workspace = new Workspace(config, buildOptions, {
        logger,
        inheritHookOutput: !globalOpts.json,
      });

      const scope = paths.map((p) => path.resolve(p));
      const summary = await workspace.build(scope);
      const elapsed = Date.now() - started;

      if (globalOpts.json) {
        console.log(JSON.stringify({ status: "ok", elapsed, ...summary }));
      } else if (!globalOpts.quiet) {
        for (const c of summary.collations) {
          console.log(
            `${c.lang}: built ${c.dispatched} file(s), ${c.fresh} fresh -> ${path.relative(project.root, c.target) || "."}`,
          );
        }
        if (summary.redirects > 0) {
          console.log(`Wrote ${summary.redirects} redirect(s)`);
        }
        if (summary.books > 0) {
          console.log(`Compiled ${summary.books} book(s)`);
        }
        console.log(`Finished ${summary.profile} build in ${elapsed}ms`);
      }

      process.exit(ExitCodes.SUCCESS);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);

      if (globalOpts.json) {
        const errors =
          err instanceof BuildErrors ? err.errors.map((e) => e.message) : [message];
        console.log(JSON.stringify({ status: "error", error: message, errors }));
      } else {
        console.error(`Error: ${message}`);
        if (process.env.DEBUG && err instanceof Error) {
          console.error(err.stack);
        }
      }

      process.exit(isDataError(err) ? ExitCodes.DATA_ERROR : ExitCodes.FAILURE);
    }
  });
