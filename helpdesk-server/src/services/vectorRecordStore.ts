import { createReadStream } from "node:fs";
import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";
import readline from "node:readline";
import { z } from "zod";

import {
  CorruptStoreError,
  DimensionMismatchError,
  IOError,
  describeError,
} from "../errors";
import type { PendingRecord, StoreRecord } from "../types/records";
import { createLogger } from "../utils/logger";
import { RWLock } from "../utils/rwlock";
import { isFiniteVector } from "../utils/vector";

const RECORD_FILE = "records.jsonl";
const METADATA_FILE = "store.json";

const logger = createLogger("store");

const chunkSchema = z.object({
  chunkId: z.string().min(1),
  documentId: z.string().min(1),
  text: z.string(),
  startOffset: z.number().int().nonnegative(),
  endOffset: z.number().int().nonnegative(),
  overlapWithPrevious: z.number().int().nonnegative(),
});

const documentSchema = z.object({
  id: z.string().min(1),
  sourceKind: z.enum(["web", "notion"]),
  origin: z.string(),
  title: z.string(),
  fetchedAt: z.string(),
});

const recordSchema = z.object({
  seq: z.number().int().nonnegative(),
  chunk: chunkSchema,
  vector: z.array(z.number()).min(1),
  document: documentSchema,
});

const metadataSchema = z.object({
  embeddingModel: z.string().min(1),
});

export type StoreContext = {
  storeDir: string;
  /** Model the caller embeds with; recorded on first write, compared on open. */
  embeddingModel?: string;
};

export type StoreStats = {
  storeDir: string;
  records: number;
  documents: number;
  dimension: number | null;
  embeddingModel: string | null;
};

type ScanState = {
  dimension: number | null;
  nextSeq: number;
  documentCounts: Map<string, number>;
};

const isMissingFile = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const serialize = (record: StoreRecord) =>
  JSON.stringify({
    seq: record.seq,
    chunk: record.chunk,
    vector: record.vector,
    document: record.document,
  });

/**
 * Append-friendly persistence of chunk + vector records under one directory.
 * Each line of `records.jsonl` is one self-describing record.
 */
export class VectorRecordStore {
  private readonly lock = new RWLock();
  private readonly filePath: string;
  private readonly metadataPath: string;
  private embeddingModel: string | null = null;
  private dimension: number | null = null;
  private nextSeq = 0;
  private documentCounts = new Map<string, number>();
  private corruption: CorruptStoreError | null = null;

  private constructor(private readonly context: StoreContext) {
    this.filePath = path.join(context.storeDir, RECORD_FILE);
    this.metadataPath = path.join(context.storeDir, METADATA_FILE);
  }

  static async open(context: StoreContext): Promise<VectorRecordStore> {
    const store = new VectorRecordStore(context);
    await store.initialize();
    return store;
  }

  get recordFile(): string {
    return this.filePath;
  }

  private async initialize() {
    try {
      await fs.mkdir(this.context.storeDir, { recursive: true });
    } catch (error) {
      throw new IOError(
        `Cannot create store directory: ${describeError(error)}`,
        this.context.storeDir,
        { cause: error }
      );
    }

    await this.lock.withWrite(async () => {
      const state: ScanState = {
        dimension: null,
        nextSeq: 0,
        documentCounts: new Map(),
      };
      try {
        for await (const record of this.readRecords()) {
          state.dimension ??= record.vector.length;
          state.nextSeq = record.seq + 1;
          this.bump(state.documentCounts, record.document.id, 1);
        }
      } catch (error) {
        if (!(error instanceof CorruptStoreError)) {
          throw error;
        }
        // Reads and writes report it; clear() is still allowed.
        this.corruption = error;
        logger.warn("Store is corrupt", {
          path: this.filePath,
          line: error.line,
          error: error.message,
        });
      }
      this.applyState(state);
      await this.loadMetadata();
    });

    logger.debug("Store opened", {
      storeDir: this.context.storeDir,
      records: this.countRecords(),
      dimension: this.dimension,
    });
  }

  async append(records: readonly PendingRecord[]): Promise<StoreRecord[]> {
    if (records.length === 0) {
      return [];
    }

    return this.lock.withWrite(async () => {
      if (this.corruption) {
        throw this.corruption;
      }
      const dimension = this.checkDimensions(records, this.dimension);
      const committed = records.map((record, index) => ({
        ...record,
        seq: this.nextSeq + index,
      }));
      const payload = committed.map(serialize).join("\n") + "\n";

      await this.ensureDirectory();
      await this.recordEmbeddingModel();
      const previousSize = await this.fileSize();

      try {
        await fs.appendFile(this.filePath, payload, "utf8");
      } catch (error) {
        await this.rollback(previousSize);
        throw new IOError(
          `Failed to append ${records.length} records: ${describeError(error)}`,
          this.filePath,
          { cause: error }
        );
      }

      this.dimension = dimension;
      this.nextSeq += committed.length;
      for (const record of committed) {
        this.bump(this.documentCounts, record.document.id, 1);
      }

      return committed;
    });
  }

  async loadAll(): Promise<StoreRecord[]> {
    return this.lock.withRead(async () => {
      const records: StoreRecord[] = [];
      for await (const record of this.readRecords(records)) {
        records.push(record);
      }
      return records;
    });
  }

  /**
   * Removes every record of `documentId` and, when given, appends
   * `replacement` in the same atomic file swap. Readers observe either the
   * previous file or the new one.
   */
  async replaceDocument(
    documentId: string,
    replacement: readonly PendingRecord[] = []
  ): Promise<number> {
    return this.lock.withWrite(async () => {
      const removedCount = this.documentCounts.get(documentId) ?? 0;

      if (removedCount === 0 && replacement.length === 0) {
        return 0;
      }

      const remainingCount = this.countRecords() - removedCount;
      const dimension = this.checkDimensions(
        replacement,
        remainingCount > 0 ? this.dimension : null
      );

      await this.ensureDirectory();
      if (replacement.length > 0) {
        await this.recordEmbeddingModel();
      }
      const tempPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;
      const state: ScanState = {
        dimension: remainingCount > 0 ? this.dimension : dimension,
        nextSeq: this.nextSeq,
        documentCounts: new Map(this.documentCounts),
      };
      state.documentCounts.delete(documentId);

      let handle: FileHandle | null = null;
      try {
        handle = await fs.open(tempPath, "w");
        for await (const record of this.readRecords()) {
          if (record.document.id !== documentId) {
            await handle.write(serialize(record) + "\n");
          }
        }
        for (const record of replacement) {
          const committed = { ...record, seq: state.nextSeq };
          state.nextSeq += 1;
          this.bump(state.documentCounts, record.document.id, 1);
          await handle.write(serialize(committed) + "\n");
        }
        await handle.sync();
        await handle.close();
        handle = null;
        await fs.rename(tempPath, this.filePath);
      } catch (error) {
        await handle?.close().catch((closeError: unknown) => {
          logger.warn("Failed to close temp file", {
            path: tempPath,
            error: describeError(closeError),
          });
        });
        await fs.rm(tempPath, { force: true });
        if (error instanceof CorruptStoreError) {
          throw error;
        }
        throw new IOError(
          `Failed to replace document ${documentId}: ${describeError(error)}`,
          this.filePath,
          { cause: error }
        );
      }

      this.applyState(state);
      return removedCount;
    });
  }

  async clear(): Promise<void> {
    await this.lock.withWrite(async () => {
      try {
        await fs.rm(this.filePath, { force: true });
        await fs.rm(this.metadataPath, { force: true });
      } catch (error) {
        throw new IOError(
          `Failed to clear store: ${describeError(error)}`,
          this.filePath,
          { cause: error }
        );
      }
      this.applyState({ dimension: null, nextSeq: 0, documentCounts: new Map() });
      this.corruption = null;
      this.embeddingModel = null;
    });
  }

  stats(): StoreStats {
    return {
      storeDir: this.context.storeDir,
      records: this.countRecords(),
      documents: this.documentCounts.size,
      dimension: this.dimension,
      embeddingModel: this.embeddingModel,
    };
  }

  private async loadMetadata() {
    let content: string;
    try {
      content = await fs.readFile(this.metadataPath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw new IOError(
        `Cannot read store metadata: ${describeError(error)}`,
        this.metadataPath,
        { cause: error }
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      logger.warn("Ignoring unreadable store metadata", {
        path: this.metadataPath,
        error: describeError(error),
      });
      return;
    }
    const parsed = metadataSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn("Ignoring malformed store metadata", { path: this.metadataPath });
      return;
    }

    this.embeddingModel = parsed.data.embeddingModel;
    const configured = this.context.embeddingModel;
    if (configured && configured !== this.embeddingModel) {
      logger.warn(
        `Store was built with embedding model ${this.embeddingModel}, not ${configured}`,
        { storeDir: this.context.storeDir, stored: this.embeddingModel, configured }
      );
    }
  }

  private async recordEmbeddingModel() {
    const model = this.context.embeddingModel;
    if (!model || this.embeddingModel !== null) {
      return;
    }
    try {
      await fs.writeFile(
        this.metadataPath,
        JSON.stringify({ embeddingModel: model }, null, 2) + "\n",
        "utf8"
      );
    } catch (error) {
      throw new IOError(
        `Cannot write store metadata: ${describeError(error)}`,
        this.metadataPath,
        { cause: error }
      );
    }
    this.embeddingModel = model;
  }

  private async *readRecords(
    partial: StoreRecord[] = []
  ): AsyncGenerator<StoreRecord> {
    let input: ReturnType<typeof createReadStream>;
    try {
      await fs.access(this.filePath);
      input = createReadStream(this.filePath, { encoding: "utf8" });
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw new IOError(
        `Cannot read store: ${describeError(error)}`,
        this.filePath,
        { cause: error }
      );
    }

    const lines = readline.createInterface({ input, crlfDelay: Infinity });
    let lineNumber = 0;
    let dimension: number | null = null;
    let lastSeq = -1;

    try {
      for await (const line of lines) {
        lineNumber += 1;
        if (!line.trim()) {
          continue;
        }

        const record = this.parseLine(line, lineNumber, partial);

        if (dimension === null) {
          dimension = record.vector.length;
        } else if (record.vector.length !== dimension) {
          throw new CorruptStoreError(
            `Record on line ${lineNumber} has dimension ${record.vector.length}, expected ${dimension}`,
            lineNumber,
            partial
          );
        }
        if (record.seq <= lastSeq) {
          throw new CorruptStoreError(
            `Record on line ${lineNumber} has out-of-order seq ${record.seq}`,
            lineNumber,
            partial
          );
        }
        lastSeq = record.seq;

        yield record;
      }
    } catch (error) {
      if (error instanceof CorruptStoreError) {
        throw error;
      }
      throw new IOError(
        `Failed while reading store: ${describeError(error)}`,
        this.filePath,
        { cause: error }
      );
    } finally {
      lines.close();
      input.destroy();
    }
  }

  private parseLine(
    line: string,
    lineNumber: number,
    partial: StoreRecord[]
  ): StoreRecord {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      throw new CorruptStoreError(
        `Line ${lineNumber} is not valid JSON`,
        lineNumber,
        partial,
        { cause: error }
      );
    }

    const parsed = recordSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      throw new CorruptStoreError(
        `Line ${lineNumber} is malformed: ${issues}`,
        lineNumber,
        partial
      );
    }

    return parsed.data;
  }

  private checkDimensions(
    records: readonly PendingRecord[],
    established: number | null
  ): number | null {
    let dimension = established;
    for (const record of records) {
      const length = record.vector.length;
      if (length === 0 || !isFiniteVector(record.vector)) {
        throw new DimensionMismatchError(
          dimension ?? 0,
          length,
          `chunk ${record.chunk.chunkId} (empty or non-finite vector)`
        );
      }
      if (dimension === null) {
        dimension = length;
      } else if (length !== dimension) {
        throw new DimensionMismatchError(
          dimension,
          length,
          `chunk ${record.chunk.chunkId}`
        );
      }
    }
    return dimension;
  }

  private async ensureDirectory() {
    try {
      await fs.mkdir(this.context.storeDir, { recursive: true });
    } catch (error) {
      throw new IOError(
        `Cannot create store directory: ${describeError(error)}`,
        this.context.storeDir,
        { cause: error }
      );
    }
  }

  private async fileSize(): Promise<number> {
    try {
      const stats = await fs.stat(this.filePath);
      return stats.size;
    } catch (error) {
      if (isMissingFile(error)) {
        return 0;
      }
      throw new IOError(
        `Cannot stat store: ${describeError(error)}`,
        this.filePath,
        { cause: error }
      );
    }
  }

  private async rollback(previousSize: number) {
    try {
      await fs.truncate(this.filePath, previousSize);
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.error("Rollback after failed append did not complete", {
          path: this.filePath,
          previousSize,
          error: describeError(error),
        });
      }
    }
  }

  private applyState(state: ScanState) {
    this.dimension = state.dimension;
    this.nextSeq = state.nextSeq;
    this.documentCounts = state.documentCounts;
  }

  private countRecords() {
    let total = 0;
    for (const count of this.documentCounts.values()) {
      total += count;
    }
    return total;
  }

  private bump(counts: Map<string, number>, documentId: string, delta: number) {
    counts.set(documentId, (counts.get(documentId) ?? 0) + delta);
  }
}
