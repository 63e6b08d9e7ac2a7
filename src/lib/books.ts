/**
 * Books: directories compiled by a separate compiler and copied into
 * the output tree at the same relative path.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { BookConfig } from "./config.js";
import { ConfigError, toIoError } from "./errors.js";
import { ProfileName } from "./models.js";

export interface BookCompiler {
  /** Compile the book at `source` into the empty directory `output` */
  compile(source: string, output: string): Promise<void>;
}

/**
 * Compiler that copies the book directory as-is.
 */
export class CopyBookCompiler implements BookCompiler {
  async compile(source: string, output: string): Promise<void> {
    await fs.promises.cp(source, output, { recursive: true });
  }
}

export interface BookContext {
  /** Absolute source root books are relative to */
  source: string;
  /** Absolute output root of the locale */
  target: string;
  profile: ProfileName;
  compiler: BookCompiler;
}

/**
 * Compile each book through a staging directory and copy the result
 * into place. Draft books are skipped in release builds.
 */
export async function buildBooks(
  books: BookConfig[],
  context: BookContext,
): Promise<string[]> {
  const built: string[] = [];
  for (const book of books) {
    if (book.draft && context.profile === "release") continue;
    if (!book.path) throw new ConfigError("Book is missing a path");

    const source = path.resolve(context.source, book.path);
    if (!fs.existsSync(source)) {
      throw new ConfigError(`Book not found at ${source}`);
    }
    const rel = path.relative(context.source, source);
    const dest = path.join(context.target, rel);

    const staging = await fs.promises.mkdtemp(path.join(os.tmpdir(), "quire-book-"));
    try {
      await context.compiler.compile(source, staging);
      await fs.promises.mkdir(dest, { recursive: true });
      await fs.promises.cp(staging, dest, { recursive: true });
    } catch (err) {
      throw toIoError("build book", source, err);
    } finally {
      await fs.promises.rm(staging, { recursive: true, force: true });
    }
    built.push(dest);
  }
  return built;
}
