import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { SourceError } from "./errors";
import { formatFor, supportedExtensions } from "./formats";
import type { Document } from "./types";

/**
 * Options for {@link SourceLoader}. `allowedExt` narrows the formats the
 * loader accepts; extensions no variant can parse are ignored.
 */
export interface SourceLoaderOptions {
  allowedExt?: readonly string[];
  excludedFolders?: readonly string[];
  verbose?: boolean;
  /** Invoked for every file skipped because it could not be read or parsed. */
  onSkip?: (error: SourceError) => void;
}

/**
 * Walks a source directory and turns every supported file into a
 * {@link Document}. Output order is the lexicographic order of the relative
 * paths so repeated loads of an unchanged tree are identical.
 */
export class SourceLoader {
  private readonly extensions: string[];
  private readonly excludedFolders: readonly string[];
  private readonly verbose: boolean;
  private readonly onSkip?: (error: SourceError) => void;

  public constructor(opts: SourceLoaderOptions = {}) {
    const supported = supportedExtensions();
    this.extensions = opts.allowedExt
      ? opts.allowedExt.map((e) => e.toLowerCase()).filter((e) => supported.includes(e))
      : supported;
    this.excludedFolders = opts.excludedFolders ?? [];
    this.verbose = !!opts.verbose;
    this.onSkip = opts.onSkip;
  }

  /**
   * Discover candidate files under `root`, relative paths with forward slashes,
   * sorted by code unit order (locale independent).
   */
  public async discover(root: string): Promise<string[]> {
    if (!this.extensions.length) return [];
    const patterns = this.extensions.map((ext) => `**/*.${ext}`);
    const files = await fg(patterns, {
      cwd: root,
      dot: false,
      onlyFiles: true,
      caseSensitiveMatch: false,
      ignore: this.excludedFolders.map((f) => `**/${f}/**`),
    });
    return [...new Set(files)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  /**
   * Load every supported document under `root`.
   *
   * @throws {SourceError} only when `root` itself is missing or not a directory;
   *         individual files that fail are logged, reported to `onSkip` and left out.
   */
  public async load(root: string): Promise<Document[]> {
    const { documents } = await this.loadWithReport(root);
    return documents;
  }

  /** Like {@link load}, also returning the structured error of every skipped file. */
  public async loadWithReport(root: string): Promise<{ documents: Document[]; skipped: SourceError[] }> {
    const stat = await fs.stat(root).catch((e: unknown) => {
      throw new SourceError(root, "source directory does not exist", { cause: e });
    });
    if (!stat.isDirectory()) throw new SourceError(root, "source path is not a directory");

    const rels = await this.discover(root);
    if (this.verbose) console.error(`[RAG][verbose] Discovered ${rels.length} candidate files under ${root}`);

    const documents: Document[] = [];
    const skipped: SourceError[] = [];
    for (const rel of rels) {
      const result = await this.loadFile(root, rel);
      if (result instanceof SourceError) skipped.push(result);
      else documents.push(result);
    }
    console.error(`[RAG] Loaded ${documents.length} documents from ${root} (${skipped.length} skipped)`);
    return { documents, skipped };
  }

  private async loadFile(root: string, rel: string): Promise<Document | SourceError> {
    const format = formatFor(rel);
    if (!format) return new SourceError(rel, "unsupported file type");
    try {
      const bytes = await fs.readFile(path.join(root, rel));
      const { text, metadata } = await format.parse(bytes, rel);
      return {
        path: rel,
        text,
        fileType: format.fileType,
        metadata: {
          source: rel,
          filename: path.posix.basename(rel),
          filetype: format.fileType,
          ...metadata,
        },
      };
    } catch (e) {
      const err = new SourceError(rel, e instanceof Error ? e.message : String(e), { cause: e });
      console.error(`[RAG] Skipping unreadable file ${err.message}`);
      this.onSkip?.(err);
      return err;
    }
  }
}
