/**
 * Quire - static site build engine.
 *
 * This is the library entry point for programmatic usage.
 * For CLI usage, see cli.ts.
 */

// Re-export models and errors
export * from "./lib/models.js";
export * from "./lib/errors.js";

// Re-export configuration
export {
  CONFIG_FILE,
  DEFAULT_CONFIG,
  discoverProject,
  resolveProject,
  loadConfig,
  normalizeConfig,
  resolveOptions,
  parseProfile,
  SiteConfigSchema,
  PageDataSchema,
} from "./lib/config.js";
export type {
  SiteConfig,
  BuildOptions,
  BuildOverrides,
  ProjectLocation,
} from "./lib/config.js";

// Re-export path resolution
export {
  computeDestination,
  computeAbsoluteHref,
  computeRelativeHref,
  verifyLink,
} from "./lib/paths.js";
export type { PathConfig } from "./lib/paths.js";

// Re-export the build pipeline
export { Collation, collate } from "./lib/collation.js";
export { collateLocales } from "./lib/locales.js";
export { Manifest } from "./lib/manifest.js";
export { Scheduler } from "./lib/scheduler.js";
export { Renderer } from "./lib/renderer.js";
export { validateRedirects, writeRedirects } from "./lib/redirects.js";
export { Workspace, buildSite } from "./lib/build.js";
export type { BuildServices, BuildSummary } from "./lib/build.js";
export { initSite } from "./lib/scaffold.js";

// Re-export extension points
export {
  MarkdownEngine,
  PlainHighlighter,
  JsonSearchIndexer,
} from "./lib/engine.js";
export type {
  TemplateEngine,
  RenderRequest,
  Highlighter,
  SearchIndexer,
  SearchDocument,
} from "./lib/engine.js";
export type { BookCompiler } from "./lib/books.js";
export type { Walker } from "./lib/walk.js";
export { Logger, createLogger } from "./lib/logger.js";
