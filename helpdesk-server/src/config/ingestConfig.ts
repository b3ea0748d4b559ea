import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { ConfigError, IOError, describeError } from "../errors";
import { NotionExportSource } from "../sources/notionExport";
import type { DocumentSource } from "../sources/types";
import { WebCrawler } from "../sources/webCrawler";
import { formatIssues } from "./env";

const webSourceSchema = z
  .object({
    url: z.string().url(),
    maxPages: z.number().int().positive().default(50),
    delay: z.number().min(0).default(0.5),
    allowedPaths: z.array(z.string().startsWith("/")).optional(),
  })
  .strict();

const notionSourceSchema = z
  .object({
    path: z.string().min(1),
    id: z.string().min(1).default("notion"),
  })
  .strict();

export const ingestConfigSchema = z
  .object({
    chunkSize: z.number().int().positive().optional(),
    chunkOverlap: z.number().int().min(0).optional(),
    web: z.array(webSourceSchema).default([]),
    notion: z.array(notionSourceSchema).default([]),
  })
  .strict();

export type IngestConfig = z.infer<typeof ingestConfigSchema>;
export type WebSourceConfig = z.infer<typeof webSourceSchema>;
export type NotionSourceConfig = z.infer<typeof notionSourceSchema>;

/**
 * Validates a parsed ingest config. Relative Notion paths resolve against
 * `baseDir`; chunk settings fall back to `defaults` before the overlap check.
 */
export const parseIngestConfig = (
  raw: unknown,
  defaults: { chunkSize: number; chunkOverlap: number },
  baseDir = process.cwd()
): IngestConfig & { chunkSize: number; chunkOverlap: number } => {
  const parsed = ingestConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError("Invalid ingest config", formatIssues(parsed.error));
  }

  const chunkSize = parsed.data.chunkSize ?? defaults.chunkSize;
  const chunkOverlap = parsed.data.chunkOverlap ?? defaults.chunkOverlap;
  if (chunkOverlap >= chunkSize) {
    throw new ConfigError("Invalid ingest config", [
      `chunkOverlap: ${chunkOverlap} must be smaller than chunkSize ${chunkSize}`,
    ]);
  }

  return {
    ...parsed.data,
    chunkSize,
    chunkOverlap,
    notion: parsed.data.notion.map((source) => ({
      ...source,
      path: path.resolve(baseDir, source.path),
    })),
  };
};

export const loadIngestConfig = async (
  configPath: string,
  defaults: { chunkSize: number; chunkOverlap: number }
) => {
  const resolved = path.resolve(configPath);
  let content: string;
  try {
    content = await fs.readFile(resolved, "utf8");
  } catch (error) {
    throw new IOError(
      `Cannot read ingest config: ${describeError(error)}`,
      resolved,
      { cause: error }
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError("Invalid ingest config", [
      `${resolved}: ${describeError(error)}`,
    ]);
  }

  return parseIngestConfig(raw, defaults, path.dirname(resolved));
};

export const buildSources = ({
  web,
  notion,
}: Pick<IngestConfig, "web" | "notion">): DocumentSource[] => [
  ...web.map((source) => new WebCrawler(source)),
  ...notion.map((source) => new NotionExportSource(source)),
];
