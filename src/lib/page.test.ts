import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  PageContext,
  autoTitle,
  findFileForKey,
  loadPage,
  resolvePageTable,
  titleCase,
} from "./page.js";
import { PathConfig } from "./paths.js";
import { MissingPageFileError } from "./errors.js";

describe("page", () => {
  let tempDir: string;
  let paths: PathConfig;

  function write(rel: string, content = ""): string {
    const file = path.join(tempDir, rel);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
    return file;
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "quire-page-test-"));
    paths = {
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

  describe("titleCase", () => {
    it("should split separators and camel case", () => {
      expect(titleCase("my-first_post")).toBe("My First Post");
      expect(titleCase("gettingStarted")).toBe("Getting Started");
    });
  });

  describe("autoTitle", () => {
    it("should use the parent directory for index files", () => {
      expect(autoTitle(path.join("docs", "user-guide", "index.md"))).toBe(
        "User Guide",
      );
      expect(autoTitle(path.join("docs", "faq.md"))).toBe("Faq");
    });
  });

  describe("resolvePageTable", () => {
    it("should resolve keys with and without extensions", () => {
      const about = write("about.md");
      const home = write("index.html");
      const docs = write("docs/index.md");

      expect(findFileForKey("about", paths)).toBe(about);
      expect(findFileForKey("/", paths)).toBe(home);
      expect(findFileForKey("docs/", paths)).toBe(docs);
    });

    it("should reject keys without a file", () => {
      expect(() =>
        resolvePageTable({ "missing.md": { title: "Gone" } }, paths),
      ).toThrow(MissingPageFileError);
    });
  });

  describe("loadPage", () => {
    it("should let front matter win over the page table and defaults", () => {
      const file = write(
        "posts/article.md",
        '+++\ntitle = "From File"\n+++\nHello',
      );
      const context: PageContext = {
        paths,
        defaults: { render: true, layout: "main", author: "default" },
        table: new Map([[file, { title: "From Table", author: "table" }]]),
      };

      const page = loadPage(file, context);

      expect(page.data.title).toBe("From File");
      expect(page.data.author).toBe("table");
      expect(page.data.layout).toBe("main");
      expect(page.body).toBe("Hello");
      expect(page.href).toBe("/posts/article/");
      expect(page.clean).toBe(true);
      expect(page.file.destination).toBe(
        path.join("posts", "article", "index.html"),
      );
    });

    it("should derive a title when none is given", () => {
      const file = write("getting-started.md", "Hello");
      const page = loadPage(file, { paths, defaults: {}, table: new Map() });

      expect(page.data.title).toBe("Getting Started");
    });

    it("should place locale variants at their logical path", () => {
      const file = write("about.fr.md", "Bonjour");
      const logical = path.join(tempDir, "about.md");
      const page = loadPage(file, { paths, defaults: {}, table: new Map() }, logical);

      expect(page.file.source).toBe(file);
      expect(page.href).toBe("/about/");
      expect(page.data.title).toBe("About");
    });

    it("should honour rewrite-index from front matter", () => {
      const file = write("raw.md", "+++\nrewrite-index = false\n+++\nx");
      const page = loadPage(file, { paths, defaults: {}, table: new Map() });

      expect(page.file.destination).toBe("raw.html");
      expect(page.href).toBe("/raw.html");
      expect(page.clean).toBe(false);
    });
  });
});
