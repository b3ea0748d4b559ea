import { ConfigError } from "../errors";
import type { Chunk } from "../types/records";

export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_CHUNK_OVERLAP = 100;

export const normalizeText = (raw: string) =>
  raw.replace(/\r\n/g, "\n").replace(/\s+/g, " ").trim();

export const validateChunking = (chunkSize: number, chunkOverlap: number) => {
  const issues: string[] = [];

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    issues.push(`chunkSize must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    issues.push(
      `chunkOverlap must be a non-negative integer (got ${chunkOverlap})`
    );
  }
  if (issues.length === 0 && chunkOverlap >= chunkSize) {
    issues.push(
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`
    );
  }

  if (issues.length) {
    throw new ConfigError("Invalid chunking configuration", issues);
  }
};

const chunkIdWidth = (count: number) =>
  Math.max(4, String(count).length);

export const formatChunkId = (documentId: string, index: number, count: number) =>
  `${documentId}-${String(index + 1).padStart(chunkIdWidth(count), "0")}`;

/**
 * Slides a `chunkSize` window over `text` with stride
 * `chunkSize - chunkOverlap`. Offsets are UTF-16 code units, end exclusive.
 * The final window may be shorter; it is never empty.
 */
export function chunkText(
  text: string,
  chunkSize: number,
  chunkOverlap: number,
  documentId: string
): Chunk[] {
  validateChunking(chunkSize, chunkOverlap);

  if (!text) {
    return [];
  }

  const stride = chunkSize - chunkOverlap;
  const windows: Array<{ start: number; end: number }> = [];
  let start = 0;

  while (start < text.length) {
    const end = Math.min(text.length, start + chunkSize);
    windows.push({ start, end });

    if (end === text.length) {
      break;
    }

    start += stride;
  }

  return windows.map(({ start: startOffset, end: endOffset }, index) => ({
    chunkId: formatChunkId(documentId, index, windows.length),
    documentId,
    text: text.slice(startOffset, endOffset),
    startOffset,
    endOffset,
    overlapWithPrevious:
      index === 0 ? 0 : windows[index - 1].end - startOffset,
  }));
}

export const reconstructText = (chunks: readonly Chunk[]) =>
  chunks.map((chunk) => chunk.text.slice(chunk.overlapWithPrevious)).join("");

export const expectedChunkCount = (
  length: number,
  chunkSize: number,
  chunkOverlap: number
) => {
  if (length === 0) {
    return 0;
  }
  if (length <= chunkSize) {
    return 1;
  }
  return Math.ceil((length - chunkOverlap) / (chunkSize - chunkOverlap));
};
