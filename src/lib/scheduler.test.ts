/**
 * Tests for the build scheduler.
 *
 * The renderer is a fake whose renders wait on gates the test opens, so
 * the fail-fast and aggregate policies can be observed with work still
 * in flight.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { Scheduler, TargetRenderer, inScope, selectTargets } from "./scheduler.js";
import { BuildErrors, RenderError } from "./errors.js";
import { BuildTarget, createResource } from "./models.js";
import { Manifest } from "./manifest.js";
import { RenderOutcome } from "./renderer.js";

function target(source: string, operation: "copy" | "noop" = "copy"): BuildTarget {
  return {
    source,
    destination: `${source}.out`,
    resource: createResource(operation === "noop" ? "directory" : "file", source),
  };
}

interface Gate {
  open(): void;
  promise: Promise<void>;
}

function gate(): Gate {
  let open = (): void => {};
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { open, promise };
}

class GatedRenderer implements TargetRenderer {
  readonly gates = new Map<string, Gate>();
  readonly started: string[] = [];
  readonly finished: string[] = [];

  constructor(private readonly failing: Set<string>) {}

  gateFor(source: string): Gate {
    let g = this.gates.get(source);
    if (!g) {
      g = gate();
      this.gates.set(source, g);
    }
    return g;
  }

  async render(t: BuildTarget): Promise<RenderOutcome> {
    this.started.push(t.source);
    if (this.failing.has(t.source)) {
      throw new RenderError("boom", t.source);
    }
    await this.gateFor(t.source).promise;
    this.finished.push(t.source);
    return "copied";
  }
}

describe("Scheduler", () => {
  const files = ["one", "two", "three"];

  it("should settle fail-fast on the first error with work in flight", async () => {
    const renderer = new GatedRenderer(new Set(["two"]));
    const scheduler = new Scheduler(renderer, { jobs: 3, failFast: true, force: false });

    await expect(scheduler.run(files.map((f) => target(f)))).rejects.toThrow(
      "Failed to render two: boom",
    );
    expect(renderer.started).toEqual(["one", "two", "three"]);
    expect(renderer.finished).toEqual([]);

    renderer.gateFor("one").open();
    renderer.gateFor("three").open();
  });

  it("should aggregate every error when not failing fast", async () => {
    const renderer = new GatedRenderer(new Set(["two"]));
    const scheduler = new Scheduler(renderer, { jobs: 3, failFast: false, force: false });

    const run = scheduler.run(files.map((f) => target(f)));
    renderer.gateFor("one").open();
    renderer.gateFor("three").open();

    let error: unknown;
    try {
      await run;
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(BuildErrors);
    expect(error instanceof BuildErrors && error.errors).toHaveLength(1);
    expect(renderer.finished.sort()).toEqual(["one", "three"]);
  });

  it("should stop at the first error when sequential", async () => {
    const renderer = new GatedRenderer(new Set(["two"]));
    files.forEach((f) => renderer.gateFor(f).open());
    const scheduler = new Scheduler(renderer, { jobs: 1, failFast: false, force: false });

    await expect(scheduler.run(files.map((f) => target(f)))).rejects.toThrow(
      RenderError,
    );
    expect(renderer.started).toEqual(["one", "two"]);
  });

  it("should report outcomes and skip noop entries", async () => {
    const renderer = new GatedRenderer(new Set());
    files.forEach((f) => renderer.gateFor(f).open());
    const built: string[] = [];
    const scheduler = new Scheduler(renderer, {
      jobs: 2,
      failFast: true,
      force: false,
      onBuilt: (t) => built.push(t.source),
    });

    const result = await scheduler.run([
      ...files.map((f) => target(f)),
      target("dir", "noop"),
    ]);

    expect(result.dispatched).toBe(3);
    expect(result.outcomes.get("one")).toBe("copied");
    expect(built.sort()).toEqual(["one", "three", "two"]);
  });
});

describe("selectTargets", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "quire-scheduler-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should limit to the scope", () => {
    const a = path.join(tempDir, "docs", "a.md");
    const b = path.join(tempDir, "blog", "b.md");

    const { selected } = selectTargets([target(a), target(b)], {
      scope: [path.join(tempDir, "docs")],
      force: false,
    });
    expect(selected.map((t) => t.source)).toEqual([a]);
  });

  it("should prune entries the manifest reports as fresh", () => {
    const source = path.join(tempDir, "a.md");
    fs.writeFileSync(source, "a");
    fs.writeFileSync(`${source}.out`, "out");
    const manifest = Manifest.forTarget(path.join(tempDir, "build"), true);
    manifest.touch(source);

    const pruned = selectTargets([target(source)], { manifest, force: false });
    expect(pruned.selected).toHaveLength(0);
    expect(pruned.fresh).toBe(1);

    const forced = selectTargets([target(source)], { manifest, force: true });
    expect(forced.selected).toHaveLength(1);
  });
});

describe("inScope", () => {
  it("should match files and directories", () => {
    const root = path.join(path.sep, "site");
    expect(inScope(path.join(root, "a", "b.md"), [path.join(root, "a")])).toBe(true);
    expect(inScope(path.join(root, "a.md"), [path.join(root, "a.md")])).toBe(true);
    expect(inScope(path.join(root, "ab.md"), [path.join(root, "a")])).toBe(false);
    expect(inScope(path.join(root, "x.md"), undefined)).toBe(true);
  });
});
