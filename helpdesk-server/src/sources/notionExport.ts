import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

import { IOError, describeError } from "../errors";
import type { SourceDocument } from "../types/records";
import type { DocumentSource } from "./types";

const ALLOWED_EXTENSIONS = new Set([".md", ".markdown", ".txt"]);

// Notion appends a 32-character hex id to exported file names.
const NOTION_ID_SUFFIX = /\s+[0-9a-f]{32}$/i;

export type NotionExportOptions = {
  path: string;
  id: string;
};

const titleFromFileName = (filePath: string) =>
  path.basename(filePath, path.extname(filePath)).replace(NOTION_ID_SUFFIX, "");

export const extractMarkdownTitle = (text: string): string | null => {
  const match = /^#\s+(.+?)\s*#*\s*$/m.exec(text);
  return match ? match[1].trim() : null;
};

/** Markdown / text files from a Notion export, one document per file. */
export class NotionExportSource implements DocumentSource {
  readonly kind = "notion" as const;
  private readonly root: string;

  constructor(private readonly options: NotionExportOptions) {
    this.root = path.resolve(options.path);
  }

  get label() {
    return this.root;
  }

  async *documents(): AsyncGenerator<SourceDocument> {
    let stats: Stats;
    try {
      stats = await fs.stat(this.root);
    } catch (error) {
      throw new IOError(
        `Notion export not found: ${describeError(error)}`,
        this.root,
        { cause: error }
      );
    }

    const baseDir = stats.isDirectory() ? this.root : path.dirname(this.root);
    const files = stats.isDirectory()
      ? await this.findEligibleFiles(this.root)
      : [this.root];

    for (const filePath of files) {
      const [text, fileStats] = await Promise.all([
        fs.readFile(filePath, "utf8"),
        fs.stat(filePath),
      ]);
      const relative = path
        .relative(baseDir, filePath)
        .split(path.sep)
        .join("/")
        .replace(/\.[^./]+$/, "");

      yield {
        id: `${this.options.id}:${relative}`,
        sourceKind: "notion",
        origin: filePath,
        title: extractMarkdownTitle(text) ?? titleFromFileName(filePath),
        fetchedAt: fileStats.mtime.toISOString(),
        text,
      };
    }
  }

  private async findEligibleFiles(dir: string): Promise<string[]> {
    const results: string[] = [];
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (entry.name.startsWith(".")) {
        continue;
      }

      const resolved = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        results.push(...(await this.findEligibleFiles(resolved)));
      } else if (entry.isFile() && this.isAllowedFile(entry.name)) {
        results.push(resolved);
      }
    }

    return results;
  }

  private isAllowedFile(fileName: string): boolean {
    return ALLOWED_EXTENSIONS.has(path.extname(fileName).toLowerCase());
  }
}
