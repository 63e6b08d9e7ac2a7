/**
 * Source tree walking.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { toIoError } from "./errors.js";

export interface WalkEntry {
  path: string;
  isFile: boolean;
}

export interface Walker {
  /** Entries below `root`, never entering an excluded path */
  walk(root: string, exclude: string[]): WalkEntry[];
}

/**
 * Filesystem walker. Hidden entries are skipped and entries are
 * returned in a stable, sorted order.
 */
export class FsWalker implements Walker {
  constructor(private readonly followLinks = true) {}

  walk(root: string, exclude: string[]): WalkEntry[] {
    const entries: WalkEntry[] = [];
    const excluded = new Set(exclude.map((p) => path.resolve(p)));
    this.visit(path.resolve(root), excluded, entries);
    return entries;
  }

  private visit(dir: string, excluded: Set<string>, out: WalkEntry[]): void {
    let names: string[];
    try {
      names = fs.readdirSync(dir).sort();
    } catch (err) {
      throw toIoError("read directory", dir, err);
    }

    for (const name of names) {
      if (name.startsWith(".")) continue;
      const full = path.join(dir, name);
      if (excluded.has(full)) continue;

      const stat = this.followLinks ? fs.statSync(full) : fs.lstatSync(full);
      if (stat.isDirectory()) {
        out.push({ path: full, isFile: false });
        this.visit(full, excluded, out);
      } else if (stat.isFile()) {
        out.push({ path: full, isFile: true });
      }
    }
  }
}
