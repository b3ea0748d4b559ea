export type SourceKind = "web" | "notion";

export type DocumentMeta = {
  id: string;
  sourceKind: SourceKind;
  origin: string;
  title: string;
  fetchedAt: string;
};

/** A document as yielded by a source, before normalization and chunking. */
export type SourceDocument = DocumentMeta & {
  text: string;
};

export type Chunk = {
  chunkId: string;
  documentId: string;
  text: string;
  startOffset: number;
  endOffset: number;
  overlapWithPrevious: number;
};

export type EmbeddingVector = number[];

/** A record handed to the store; the store assigns `seq` on commit. */
export type PendingRecord = {
  chunk: Chunk;
  vector: EmbeddingVector;
  document: DocumentMeta;
};

export type StoreRecord = PendingRecord & {
  seq: number;
};

export type RetrievalResult = {
  record: StoreRecord;
  score: number;
  rank: number;
};

export type Citation = {
  chunkId: string;
  documentId: string;
  sourceKind: SourceKind;
  title: string;
  origin: string;
  startOffset: number;
  endOffset: number;
  score: number;
  text: string;
};

export type ContextPassage = {
  text: string;
  citation: Omit<Citation, "text">;
};
