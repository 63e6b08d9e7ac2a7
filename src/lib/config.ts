/**
 * Project configuration.
 *
 * A project is a directory holding `site.toml`; the file is parsed with
 * the `toml` package and validated with zod, which fills in the
 * defaults. TOML keys are kebab-case, the in-memory configuration is
 * camelCase.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as toml from "toml";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { PageData, PROFILES, ProfileName } from "./models.js";

/** Configuration file name */
export const CONFIG_FILE = "site.toml";

/** Conventional directories inside the source root */
export const LAYOUTS = "layouts";
export const PARTIALS = "partials";
export const INCLUDES = "includes";
export const DATASOURCES = "collections";
export const THEMES = "themes";
export const LOCALES = "locales";
export const HOOKS = "hooks";
export const ASSETS = "assets";

/** Default layout stem inside the layouts directory */
export const MAIN_LAYOUT = "main";

export const INDEX_STEM = "index";
export const HTML = "html";
export const INDEX_HTML = "index.html";

export interface ExtensionConfig {
  /** Extensions that render through the template engine */
  render: string[];
  /** Subset of `render` that is markdown */
  markdown: string[];
  /** Source to output extension mapping */
  map: Record<string, string>;
}

export interface BuildSettings {
  source: string;
  target: string;
  /** Rewrite `name.ext` to `name/index.html` */
  cleanUrl: boolean;
  /** Keep `index.html` in generated hrefs */
  includeIndex: boolean;
  incremental: boolean;
  baseHref?: string;
  /** Worker pool size, 0 means available parallelism */
  jobs: number;
  failFast: boolean;
  followLinks: boolean;
  writeRedirectFiles: boolean;
}

export interface LinkConfig {
  /** Rewrite root-relative links to relative ones */
  relative: boolean;
  /** Fail when a link does not resolve to a known page */
  verify: boolean;
  /** Extra paths accepted by link verification */
  allow: string[];
}

export interface HtmlTransformFlags {
  autoId: boolean;
  syntaxHighlight: boolean;
  stripComments: boolean;
  toc: boolean;
  words: boolean;
}

export interface MinifyConfig {
  /** Profiles that minify HTML; release only when absent */
  html?: ProfileName[];
}

export interface SearchConfig {
  /** Output file for the default indexer */
  file: string;
}

export type HookPhase = "before" | "after";

export interface HookConfig {
  command: string;
  args: string[];
  phase: HookPhase;
  /** Profiles the hook runs for; all when absent */
  profiles?: ProfileName[];
}

export interface BookConfig {
  path: string;
  draft: boolean;
}

export interface PluginConfig {
  name: string;
  path: string;
}

export interface SiteConfig {
  lang: string;
  host: string;
  build: BuildSettings;
  extension: ExtensionConfig;
  link: LinkConfig;
  minify: MinifyConfig;
  transform: HtmlTransformFlags;
  search?: SearchConfig;
  redirect: Record<string, string>;
  /** Global page defaults */
  page: PageData;
  /** Path keyed page data overrides */
  pages: Record<string, PageData>;
  menu: Record<string, string[]>;
  hook: HookConfig[];
  languages: string[];
  book: BookConfig[];
  plugin: PluginConfig[];
}

/**
 * Runtime options for one build, resolved from the configuration
 * and command line overrides.
 */
export interface BuildOptions {
  /** Absolute project directory */
  project: string;
  /** Absolute source root */
  source: string;
  /** Absolute build target */
  target: string;
  profile: ProfileName;
  force: boolean;
  incremental: boolean;
  failFast: boolean;
  jobs: number;
  cleanUrl: boolean;
  includeIndex: boolean;
  baseHref?: string;
}

export interface BuildOverrides {
  profile?: string;
  release?: boolean;
  force?: boolean;
  incremental?: boolean;
  failFast?: boolean;
  jobs?: number;
  cleanUrl?: boolean;
}

/**
 * Result of project discovery.
 */
export interface ProjectLocation {
  /** Absolute path to the project directory */
  root: string;
  /** Absolute path to site.toml (may not exist) */
  configPath: string;
}

/**
 * Walk up from the given directory looking for site.toml.
 * Returns null if not found.
 */
export function discoverProject(startDir: string): ProjectLocation | null {
  let current = path.resolve(startDir);

  for (;;) {
    const candidate = path.join(current, CONFIG_FILE);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return { root: current, configPath: candidate };
    }
    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

/**
 * Resolve the project from command options.
 *
 * An explicit --config wins; otherwise walk up from --root (or cwd).
 */
export function resolveProject(options: {
  root?: string;
  config?: string;
}): ProjectLocation | null {
  const rootDir = options.root ? path.resolve(options.root) : process.cwd();

  if (options.config) {
    const configPath = path.resolve(rootDir, options.config);
    if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
      return { root: path.dirname(configPath), configPath };
    }
    return null;
  }

  return discoverProject(rootDir);
}

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Convert kebab-case keys to camelCase.
 */
export function camelCase(key: string): string {
  return key.replace(/-([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

/** Camel-case the keys of a table; anything else passes through */
function camelizeKeys(value: unknown): unknown {
  if (!isTable(value)) return value;
  return Object.fromEntries(
    Object.entries(value).map(([key, v]) => [camelCase(key), v]),
  );
}

/**
 * One line per issue, each prefixed with the path of the offending key.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `'${issue.path.join(".")}': ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

const ProfileSchema = z.enum(PROFILES, {
  errorMap: (_issue, ctx) => ({
    message: `Unknown profile '${String(ctx.data)}', expected one of ${PROFILES.join(", ")}`,
  }),
});

const HookPhaseSchema = z.enum(["before", "after"], {
  errorMap: (_issue, ctx) => ({
    message: `Unknown hook phase '${String(ctx.data)}'`,
  }),
});

/**
 * Page data from front matter or a page table entry. Known keys are
 * type checked; unknown keys are kept as-is.
 */
export const PageDataSchema = z.preprocess(
  camelizeKeys,
  z
    .object({
      title: z.string().optional(),
      description: z.string().optional(),
      layout: z.string().optional(),
      permalink: z.string().optional(),
      standalone: z.boolean().optional(),
      draft: z.boolean().optional(),
      render: z.boolean().optional(),
      rewriteIndex: z.boolean().optional(),
    })
    .passthrough(),
);

const BuildSchema = z.object({
  source: z.string().default("site"),
  target: z.string().default("build"),
  cleanUrl: z.boolean().default(true),
  includeIndex: z.boolean().default(false),
  incremental: z.boolean().default(false),
  baseHref: z.string().optional(),
  jobs: z
    .number()
    .int("Expected a non-negative integer")
    .nonnegative("Expected a non-negative integer")
    .default(0),
  failFast: z.boolean().default(true),
  followLinks: z.boolean().default(true),
  writeRedirectFiles: z.boolean().default(true),
});

const OutputExtensionSchema = z
  .string()
  .refine(
    (ext) => ext !== "" && !ext.includes(".") && !ext.includes("/"),
    (ext) => ({ message: `Invalid output extension '${ext}'` }),
  );

const ExtensionSchema = z.object({
  render: z.array(z.string()).default(["md", "html"]),
  markdown: z.array(z.string()).default(["md"]),
  map: z.record(OutputExtensionSchema).default({ md: "html" }),
});

const LinkSchema = z.object({
  relative: z.boolean().default(true),
  verify: z.boolean().default(false),
  allow: z.array(z.string()).default([]),
});

const TransformSchema = z.object({
  autoId: z.boolean().default(false),
  syntaxHighlight: z.boolean().default(false),
  stripComments: z.boolean().default(false),
  toc: z.boolean().default(false),
  words: z.boolean().default(false),
});

const HookSchema = z.object({
  command: z.string().min(1, "Hook is missing a command"),
  args: z.array(z.string()).default([]),
  phase: HookPhaseSchema.default("before"),
  profiles: z.array(ProfileSchema).optional(),
});

/**
 * site.toml, kebab-case keys and all, to the in-memory configuration.
 */
export const SiteConfigSchema: z.ZodType<SiteConfig, z.ZodTypeDef, unknown> = z
  .object({
    lang: z.string().default("en"),
    host: z.string().default("localhost"),
    build: z.preprocess(camelizeKeys, BuildSchema).default({}),
    extension: ExtensionSchema.default({}),
    link: LinkSchema.default({}),
    minify: z
      .object({
        html: z
          .object({ profiles: z.array(ProfileSchema).optional() })
          .optional(),
      })
      .default({}),
    transform: z
      .object({ html: z.preprocess(camelizeKeys, TransformSchema).default({}) })
      .default({}),
    search: z.object({ file: z.string().default("search.json") }).optional(),
    redirect: z.record(z.string()).default({}),
    page: PageDataSchema.default({}),
    pages: z.record(PageDataSchema).default({}),
    menu: z.record(z.array(z.string())).default({}),
    hook: z.array(HookSchema).default([]),
    locales: z
      .object({ languages: z.array(z.string()).default([]) })
      .default({}),
    book: z
      .array(
        z.object({
          path: z.string().default(""),
          draft: z.boolean().default(false),
        }),
      )
      .default([]),
    plugin: z
      .array(
        z.object({
          name: z.string().default(""),
          path: z.string().default(""),
        }),
      )
      .default([]),
  })
  .transform(({ minify, transform, page, locales, ...rest }) => ({
    ...rest,
    minify: { html: minify.html?.profiles },
    transform: transform.html,
    page: { render: true, ...page },
    languages: locales.languages,
  }));

export const DEFAULT_CONFIG: SiteConfig = SiteConfigSchema.parse({});

/**
 * Parse a profile name, rejecting unknown names.
 */
export function parseProfile(name: string): ProfileName {
  const result = ProfileSchema.safeParse(name);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Normalize a parsed site.toml into a full configuration.
 */
export function normalizeConfig(raw: unknown, file?: string): SiteConfig {
  const result = SiteConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error), file);
  }
  return result.data;
}

/**
 * Load the project configuration.
 *
 * A missing file yields the defaults; a malformed one is a ConfigError.
 */
export function loadConfig(configPath: string): SiteConfig {
  if (!fs.existsSync(configPath)) {
    return normalizeConfig({});
  }

  const content = fs.readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = toml.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse ${configPath}: ${message}`, configPath);
  }
  return normalizeConfig(parsed, configPath);
}

/**
 * Resolve runtime options for a build.
 */
export function resolveOptions(
  project: string,
  config: SiteConfig,
  overrides: BuildOverrides = {},
): BuildOptions {
  let profile: ProfileName = "debug";
  if (overrides.profile) {
    profile = parseProfile(overrides.profile);
  }
  if (overrides.release) {
    profile = "release";
  }

  const jobs = overrides.jobs ?? config.build.jobs;

  return {
    project,
    source: path.resolve(project, config.build.source),
    target: path.resolve(project, config.build.target),
    profile,
    force: overrides.force ?? false,
    incremental: overrides.incremental ?? config.build.incremental,
    failFast: overrides.failFast ?? config.build.failFast,
    jobs: jobs > 0 ? jobs : os.availableParallelism(),
    cleanUrl: overrides.cleanUrl ?? config.build.cleanUrl,
    includeIndex: config.build.includeIndex,
    baseHref: config.build.baseHref,
  };
}

/**
 * Directories inside the source root that are never walked.
 */
export function exclusionRoots(options: BuildOptions): string[] {
  const roots = [PARTIALS, INCLUDES, DATASOURCES, THEMES, LOCALES, HOOKS].map(
    (dir) => path.join(options.source, dir),
  );
  roots.push(options.target);
  return roots;
}
