import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  collectPermalinks,
  redirectStub,
  validateRedirects,
  writeRedirectManifest,
  writeRedirects,
} from "./redirects.js";
import {
  CyclicRedirectError,
  DuplicatePermalinkError,
  RedirectFileExistsError,
  TooManyRedirectsError,
} from "./errors.js";
import { Page } from "./models.js";

function page(source: string, href: string, permalink?: string): Page {
  return {
    data: permalink ? { permalink } : {},
    href,
    file: { source, template: source, destination: "", modified: 0 },
    clean: true,
    body: "",
  };
}

describe("redirects", () => {
  describe("validateRedirects", () => {
    it("should accept a two hop chain", () => {
      expect(() =>
        validateRedirects({ "/a": "/b", "/b": "/c" }),
      ).not.toThrow();
    });

    it("should accept a chain of four hops", () => {
      expect(() =>
        validateRedirects({ "/a": "/b", "/b": "/c", "/c": "/d", "/d": "/e" }),
      ).not.toThrow();
    });

    it("should reject a five hop chain", () => {
      expect(() =>
        validateRedirects({
          "/a": "/b",
          "/b": "/c",
          "/c": "/d",
          "/d": "/e",
          "/e": "/f",
        }),
      ).toThrow(TooManyRedirectsError);
    });

    it("should reject a cycle through a trailing slash", () => {
      let error: unknown;
      try {
        validateRedirects({ "/a": "/b/", "/b": "/a" });
      } catch (err) {
        error = err;
      }

      expect(error).toBeInstanceOf(CyclicRedirectError);
      expect(error instanceof CyclicRedirectError && error.message).toBe(
        "Cyclic redirect: /a <-> /b <-> /a",
      );
    });

    it("should reject a self redirect", () => {
      expect(() => validateRedirects({ "/a": "/a/" })).toThrow(
        CyclicRedirectError,
      );
    });
  });

  describe("writeRedirects", () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "quire-redirect-test-"));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should write stubs with canonical, refresh and script", () => {
      writeRedirects({ "/old.html": "/new/", "/docs/": "/guide/" }, tempDir);

      const stub = fs.readFileSync(path.join(tempDir, "old.html"), "utf-8");
      expect(stub).toBe(redirectStub("/new/"));
      expect(stub).toContain('<link rel="canonical" href="/new/">');
      expect(stub).toContain('<meta http-equiv="refresh" content="0; /new/">');
      expect(stub).toContain(
        '<body onload="document.location.replace(&quot;/new/&quot;);">',
      );
      expect(
        fs.existsSync(path.join(tempDir, "docs", "index.html")),
      ).toBe(true);
    });

    it("should escape the location in every attribute", () => {
      const stub = redirectStub('/x?a=1&b="2"');

      expect(stub).toContain(
        '<link rel="canonical" href="/x?a=1&amp;b=&quot;2&quot;">',
      );
      expect(stub).toContain(
        '<meta http-equiv="refresh" content="0; /x?a=1&amp;b=&quot;2&quot;">',
      );
      expect(stub).toContain(
        '<body onload="document.location.replace(&quot;/x?a=1&amp;b=\\&quot;2\\&quot;&quot;);">',
      );
    });

    it("should refuse to overwrite and write nothing", () => {
      fs.writeFileSync(path.join(tempDir, "taken.html"), "mine");

      expect(() =>
        writeRedirects({ "/a.html": "/x/", "/taken.html": "/y/" }, tempDir),
      ).toThrow(RedirectFileExistsError);
      expect(fs.existsSync(path.join(tempDir, "a.html"))).toBe(false);
      expect(fs.readFileSync(path.join(tempDir, "taken.html"), "utf-8")).toBe(
        "mine",
      );
    });

    it("should accept stubs left by an earlier build", () => {
      writeRedirects({ "/old.html": "/new/" }, tempDir);

      expect(writeRedirects({ "/old.html": "/new/" }, tempDir)).toEqual([]);
    });

    it("should write the redirect manifest", () => {
      const file = writeRedirectManifest({ "/a": "/b" }, tempDir);

      expect(JSON.parse(fs.readFileSync(file, "utf-8"))).toEqual({ "/a": "/b" });
      expect(path.basename(file)).toBe("redirects.json");
    });
  });

  describe("collectPermalinks", () => {
    it("should redirect permalinks to page hrefs", () => {
      const merged = collectPermalinks({ "/x": "/y" }, [
        page("a.md", "/posts/a/", "p/1"),
        page("b.md", "/b/"),
      ]);

      expect(merged).toEqual({ "/x": "/y", "/p/1": "/posts/a/" });
    });

    it("should reject duplicate permalinks", () => {
      expect(() =>
        collectPermalinks({}, [
          page("a.md", "/a/", "/p"),
          page("b.md", "/b/", "/p"),
        ]),
      ).toThrow(DuplicatePermalinkError);
    });
  });
});
