import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { Workspace, buildSite } from "./build.js";
import { BuildOverrides, normalizeConfig, resolveOptions } from "./config.js";
import { CyclicRedirectError } from "./errors.js";
import { redirectStub } from "./redirects.js";

const LAYOUT =
  "<html><head><title>{{ title }}</title>" +
  '<link rel="stylesheet" href="{{ link "/assets/site.css" }}">' +
  "</head><body>{{ content }}</body></html>";

describe("build", () => {
  let tempDir: string;
  let target: string;

  function write(rel: string, content = ""): string {
    const file = path.join(tempDir, "site", rel);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
    return file;
  }

  function read(rel: string): string {
    return fs.readFileSync(path.join(target, rel), "utf-8");
  }

  function setup(overrides: BuildOverrides = {}) {
    const config = normalizeConfig({
      redirect: { "/old/": "/posts/article/" },
      search: {},
    });
    const options = resolveOptions(tempDir, config, { jobs: 1, ...overrides });
    return { config, options };
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "quire-build-test-"));
    target = path.join(tempDir, "build");

    write("layouts/main.html", LAYOUT);
    write("index.md", "# Welcome\n");
    write("posts/article.md", "Some text\n");
    write("posts/draft.md", "+++\ndraft = true\n+++\nHidden\n");
    write("assets/site.css", "body {}\n");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should render pages through the layout", async () => {
    const { config, options } = setup();
    const summary = await buildSite(config, options);

    expect(summary.profile).toBe("debug");
    expect(summary.collations).toEqual([
      { lang: "en", target, dispatched: 4, fresh: 0 },
    ]);
    expect(read("index.html")).toContain('href="assets/site.css"');
    expect(read("index.html")).toContain("<h1>Welcome</h1>");
    expect(read(path.join("posts", "article", "index.html"))).toContain(
      'href="../../assets/site.css"',
    );
    expect(read(path.join("assets", "site.css"))).toBe("body {}\n");
  });

  it("should write redirects and the search index", async () => {
    const { config, options } = setup();
    const summary = await buildSite(config, options);

    expect(summary.redirects).toBe(1);
    expect(read(path.join("old", "index.html"))).toBe(
      redirectStub("/posts/article/"),
    );
    expect(JSON.parse(read("redirects.json"))).toEqual({
      "/old/": "/posts/article/",
    });
    expect(JSON.parse(read("search.json"))).toEqual([
      { href: "/", title: "Site", text: "" },
      { href: "/posts/article/", title: "Article", text: "Some text" },
      { href: "/posts/draft/", title: "Draft", text: "Hidden" },
    ]);
  });

  it("should leave drafts out of release builds", async () => {
    const { config, options } = setup({ release: true, jobs: 2 });
    await buildSite(config, options);

    expect(options.profile).toBe("release");
    expect(fs.existsSync(path.join(target, "posts", "draft", "index.html"))).toBe(
      false,
    );
    expect(fs.existsSync(path.join(target, "posts", "article", "index.html"))).toBe(
      true,
    );
  });

  it("should skip fresh files on an incremental rebuild", async () => {
    const { config, options } = setup({ incremental: true });
    await buildSite(config, options);
    expect(fs.existsSync(path.join(tempDir, "build.json"))).toBe(true);

    const summary = await buildSite(config, options);

    expect(summary.collations[0]).toMatchObject({ dispatched: 0, fresh: 4 });
    expect(summary.redirects).toBe(0);
    expect(JSON.parse(read("search.json"))).toHaveLength(3);
  });

  it("should rebuild only the changed file on update", async () => {
    const { config, options } = setup();
    const workspace = new Workspace(config, options);
    await workspace.build();

    write("posts/article.md", "Changed text\n");
    const summary = await workspace.update(["posts/article.md"]);

    expect(summary.collations[0].dispatched).toBe(1);
    expect(summary.redirects).toBe(0);
    expect(read(path.join("posts", "article", "index.html"))).toContain(
      "<p>Changed text</p>",
    );
  });

  it("should delete the artifact of a removed page", async () => {
    const { config, options } = setup();
    const workspace = new Workspace(config, options);
    await workspace.build();

    fs.rmSync(path.join(tempDir, "site", "posts", "article.md"));
    await workspace.remove(["posts/article.md"]);

    expect(fs.existsSync(path.join(target, "posts", "article"))).toBe(false);
    expect(workspace.collations[0].getPage(path.join(tempDir, "site", "posts", "article.md"))).toBeUndefined();
  });

  it("should remove everything below a deleted directory", async () => {
    write("docs/a.md", "A\n");
    write("docs/b.css", "b {}\n");
    const { config, options } = setup();
    const workspace = new Workspace(config, options);
    await workspace.build();
    expect(fs.existsSync(path.join(target, "docs", "a", "index.html"))).toBe(true);

    fs.rmSync(path.join(tempDir, "site", "docs"), { recursive: true });
    await workspace.remove(["docs"]);

    const collation = workspace.collations[0];
    expect(fs.existsSync(path.join(target, "docs"))).toBe(false);
    expect(collation.getPage(path.join(tempDir, "site", "docs", "a.md"))).toBeUndefined();
    expect(collation.resolve(path.join(tempDir, "site", "docs", "b.css"))).toBeUndefined();
    expect(collation.findLink("/docs/b.css")).toBeUndefined();
  });

  it("should render pages with plugin layouts and copy plugin assets", async () => {
    const theme = path.join(tempDir, "theme");
    fs.mkdirSync(path.join(theme, "layouts"), { recursive: true });
    fs.mkdirSync(path.join(theme, "assets"), { recursive: true });
    fs.writeFileSync(
      path.join(theme, "layouts", "main.html"),
      '<div class="theme">{{ content }}</div>',
    );
    fs.writeFileSync(path.join(theme, "assets", "theme.css"), "p {}\n");
    write("themed.md", '+++\nlayout = "theme::main"\n+++\nThemed\n');

    const config = normalizeConfig({ plugin: [{ name: "theme", path: "theme" }] });
    const options = resolveOptions(tempDir, config, { jobs: 1 });
    await buildSite(config, options);

    expect(read(path.join("themed", "index.html"))).toContain(
      '<div class="theme"><p>Themed</p>',
    );
    expect(read(path.join("assets", "theme.css"))).toBe("p {}\n");
  });

  it("should swap locale variants in and out on update and remove", async () => {
    write("about.md", "About\n");
    const config = normalizeConfig({ locales: { languages: ["fr"] } });
    const options = resolveOptions(tempDir, config, { jobs: 1 });
    const workspace = new Workspace(config, options);
    await workspace.build();
    const french = path.join("fr", "about", "index.html");
    expect(read(french)).toContain("<p>About</p>");

    write("about.fr.md", "Bonjour\n");
    await workspace.update(["about.fr.md"]);

    expect(read(french)).toContain("<p>Bonjour</p>");
    expect(read(path.join("en", "about", "index.html"))).toContain("<p>About</p>");

    fs.rmSync(path.join(tempDir, "site", "about.fr.md"));
    await workspace.remove(["about.fr.md"]);

    const base = path.join(tempDir, "site", "about.md");
    expect(workspace.collations[1].getPage(base)?.file.source).toBe(base);
    expect(workspace.collations[1].findLink("/about/")).toBe(base);
    expect(read(french)).toContain("<p>About</p>");
  });

  it("should reject a redirect cycle before running any hook", async () => {
    const config = normalizeConfig({
      redirect: { "/a/": "/b/", "/b/": "/a/" },
      hook: [
        {
          command: process.execPath,
          args: ["-e", "require('fs').writeFileSync('marker', '')"],
        },
      ],
    });
    const options = resolveOptions(tempDir, config, { jobs: 1 });

    await expect(new Workspace(config, options).build()).rejects.toThrow(
      CyclicRedirectError,
    );
    expect(fs.existsSync(path.join(tempDir, "marker"))).toBe(false);
  });
});
