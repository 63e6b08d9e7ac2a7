/**
 * Build manifest for incremental builds.
 *
 * A flat map from source path to the source modification time recorded
 * when its output was last written, persisted as `<target>.json` beside
 * the target directory. It is a cache: a missing or unreadable file
 * only means everything is rebuilt.
 */

import * as fs from "node:fs";
import * as path from "node:path";

export interface ManifestEntry {
  /** Source mtime in milliseconds */
  modified: number;
}

export type ManifestData = Record<string, ManifestEntry>;

/**
 * Manifest location for a build target.
 */
export function getManifestPath(target: string): string {
  const resolved = path.resolve(target);
  return path.join(path.dirname(resolved), `${path.basename(resolved)}.json`);
}

function isEntry(value: unknown): value is ManifestEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "modified" in value &&
    typeof value.modified === "number"
  );
}

export class Manifest {
  private entries = new Map<string, ManifestEntry>();

  constructor(
    readonly file: string,
    readonly incremental: boolean,
  ) {}

  static forTarget(target: string, incremental: boolean): Manifest {
    return new Manifest(getManifestPath(target), incremental);
  }

  get size(): number {
    return this.entries.size;
  }

  get(source: string): ManifestEntry | undefined {
    return this.entries.get(source);
  }

  /**
   * Load the manifest from disk. A missing or corrupt file leaves the
   * manifest empty.
   */
  load(): void {
    this.entries = new Map();
    if (!fs.existsSync(this.file)) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.file, "utf-8"));
    } catch {
      // Corrupt cache, rebuild everything
      return;
    }
    if (typeof parsed !== "object" || parsed === null) return;

    for (const [source, entry] of Object.entries(parsed)) {
      if (isEntry(entry)) {
        this.entries.set(source, { modified: entry.modified });
      }
    }
  }

  /**
   * Persist the manifest. Returns false when the file could not be written.
   */
  save(): boolean {
    if (!this.incremental) return true;

    const data: ManifestData = {};
    for (const [source, entry] of this.entries) {
      data[source] = entry;
    }
    try {
      fs.mkdirSync(path.dirname(this.file), { recursive: true });
      fs.writeFileSync(this.file, JSON.stringify(data, null, 2) + "\n");
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Whether the output for `source` must be rebuilt.
   */
  isDirty(source: string, dest: string, force = false): boolean {
    if (!this.incremental || force || !fs.existsSync(dest)) return true;

    const entry = this.entries.get(source);
    if (!entry) return true;

    let modified: number;
    try {
      modified = fs.statSync(source).mtimeMs;
    } catch {
      return true;
    }
    return modified > entry.modified;
  }

  /**
   * Record the current mtime of `source`; forget it when it is gone.
   */
  touch(source: string): void {
    let modified: number;
    try {
      modified = fs.statSync(source).mtimeMs;
    } catch {
      this.entries.delete(source);
      return;
    }
    this.entries.set(source, { modified });
  }
}
