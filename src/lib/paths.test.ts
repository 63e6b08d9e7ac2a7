/**
 * Tests for path and href resolution.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  PathConfig,
  computeAbsoluteHref,
  computeDestination,
  computeRelativeHref,
  hrefKey,
  isClean,
  normalizeHref,
  verifyLink,
} from "./paths.js";
import { MissingLinkError, OutsideSourceTreeError } from "./errors.js";

describe("paths", () => {
  let tempDir: string;
  let config: PathConfig;

  function touch(rel: string): string {
    const file = path.join(tempDir, rel);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, "");
    return file;
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "quire-paths-test-"));
    config = {
      source: tempDir,
      extension: { render: ["md", "html"], markdown: ["md"], map: { md: "html" } },
      cleanUrl: true,
      includeIndex: false,
      relativeLinks: true,
    };
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("computeDestination", () => {
    it("should rewrite pages to clean directories", () => {
      const file = touch("posts/article.md");
      expect(computeDestination(file, config)).toBe(
        path.join("posts", "article", "index.html"),
      );
    });

    it("should map extensions without clean urls", () => {
      const file = touch("posts/article.md");
      config.cleanUrl = false;
      expect(computeDestination(file, config)).toBe(
        path.join("posts", "article.html"),
      );
    });

    it("should keep index files in place", () => {
      const file = touch("posts/index.md");
      expect(computeDestination(file, config)).toBe(
        path.join("posts", "index.html"),
      );
    });

    it("should not rewrite when a sibling index exists", () => {
      const file = touch("docs.md");
      touch("docs/index.html");
      expect(computeDestination(file, config)).toBe("docs.html");
    });

    it("should copy non-page files verbatim", () => {
      const file = touch("assets/style.css");
      expect(computeDestination(file, config)).toBe(
        path.join("assets", "style.css"),
      );
    });

    it("should honour the per-page rewrite override", () => {
      const file = touch("about.md");
      expect(computeDestination(file, config, false)).toBe("about.html");
    });

    it("should strip the base href prefix", () => {
      const file = touch("docs/guide.html");
      config.baseHref = "/docs/";
      config.cleanUrl = false;
      expect(computeDestination(file, config)).toBe("guide.html");
    });

    it("should be deterministic", () => {
      const file = touch("a/b.md");
      expect(computeDestination(file, config)).toBe(
        computeDestination(file, config),
      );
    });

    it("should reject paths outside the source root", () => {
      const outside = path.join(os.tmpdir(), "elsewhere.md");
      expect(() => computeDestination(outside, config)).toThrow(
        OutsideSourceTreeError,
      );
    });
  });

  describe("computeAbsoluteHref", () => {
    it("should produce a clean href", () => {
      const file = touch("posts/article.md");
      expect(computeAbsoluteHref(file, config)).toBe("/posts/article/");
    });

    it("should produce an html href without clean urls", () => {
      const file = touch("posts/article.md");
      config.cleanUrl = false;
      expect(computeAbsoluteHref(file, config)).toBe("/posts/article.html");
    });

    it("should collapse the home index", () => {
      const file = touch("index.md");
      expect(computeAbsoluteHref(file, config)).toBe("/");
    });

    it("should drop index.html from directory indexes", () => {
      const file = touch("posts/index.md");
      expect(computeAbsoluteHref(file, config)).toBe("/posts/");
    });

    it("should keep index.html when include index is on", () => {
      const file = touch("posts/article.md");
      config.includeIndex = true;
      expect(computeAbsoluteHref(file, config)).toBe(
        "/posts/article/index.html",
      );
    });

    it("should keep asset extensions", () => {
      const file = touch("assets/site.css");
      expect(computeAbsoluteHref(file, config)).toBe("/assets/site.css");
    });

    it("should build index keys with index.html", () => {
      const file = touch("posts/article.md");
      expect(hrefKey(file, config)).toBe("/posts/article/index.html");
    });
  });

  describe("computeRelativeHref", () => {
    it("should climb one level per directory", () => {
      const file = touch("a/b/c.html");
      config.cleanUrl = false;
      expect(computeRelativeHref("/x.css", file, config)).toBe("../../x.css");
    });

    it("should add a level for clean pages", () => {
      const file = touch("a/b/c.html");
      expect(isClean(file, config)).toBe(true);
      expect(computeRelativeHref("/x.css", file, config)).toBe(
        "../../../x.css",
      );
    });

    it("should resolve an empty result to the parent", () => {
      const file = touch("index.md");
      expect(computeRelativeHref("/", file, config)).toBe("../");
    });

    it("should append index.html when include index is on", () => {
      const file = touch("index.md");
      config.includeIndex = true;
      expect(computeRelativeHref("/posts/", file, config)).toBe(
        "posts/index.html",
      );
    });

    it("should pass through external and relative links", () => {
      const file = touch("a/page.html");
      expect(computeRelativeHref("https://example.com/", file, config)).toBe(
        "https://example.com/",
      );
      expect(computeRelativeHref("sibling.html", file, config)).toBe(
        "sibling.html",
      );
    });

    it("should pass through everything when relative links are off", () => {
      const file = touch("a/page.html");
      config.relativeLinks = false;
      expect(computeRelativeHref("/x.css", file, config)).toBe("/x.css");
    });
  });

  describe("normalizeHref", () => {
    it("should add a leading slash and index.html", () => {
      expect(normalizeHref("posts/")).toBe("/posts/index.html");
      expect(normalizeHref("/")).toBe("/index.html");
      expect(normalizeHref("/index.html")).toBe("/index.html");
      expect(normalizeHref("/a.css")).toBe("/a.css");
    });
  });

  describe("verifyLink", () => {
    const known = new Set(["/index.html", "/posts/index.html", "/a.css"]);
    const lookup = (key: string) => known.has(key);

    it("should accept known and directory hrefs", () => {
      expect(() => verifyLink("/posts/", lookup)).not.toThrow();
      expect(() => verifyLink("/posts", lookup)).not.toThrow();
      expect(() => verifyLink("/a.css#top", lookup)).not.toThrow();
      expect(() => verifyLink("/", lookup)).not.toThrow();
      expect(() => verifyLink("/index.html", lookup)).not.toThrow();
    });

    it("should reject unknown hrefs naming the href", () => {
      expect(() => verifyLink("/missing/", lookup, "page.md")).toThrow(
        "Missing link /missing/ in page.md",
      );
      expect(() => verifyLink("/missing/", lookup)).toThrow(MissingLinkError);
    });
  });
});
