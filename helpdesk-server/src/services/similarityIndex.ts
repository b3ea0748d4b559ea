import { DimensionMismatchError } from "../errors";
import type { RetrievalResult, StoreRecord } from "../types/records";
import { dot, norm } from "../utils/vector";

/**
 * Brute-force cosine index. Vectors live row-major in one Float64Array with
 * their norms precomputed, so a query is a single linear scan.
 */
export class SimilarityIndex {
  private constructor(
    private readonly records: readonly StoreRecord[],
    private readonly matrix: Float64Array,
    private readonly norms: Float64Array,
    readonly dimension: number | null
  ) {}

  static build(records: readonly StoreRecord[]): SimilarityIndex {
    if (records.length === 0) {
      return new SimilarityIndex([], new Float64Array(0), new Float64Array(0), null);
    }

    const dimension = records[0].vector.length;
    const matrix = new Float64Array(records.length * dimension);
    const norms = new Float64Array(records.length);

    records.forEach((record, row) => {
      if (record.vector.length !== dimension) {
        throw new DimensionMismatchError(
          dimension,
          record.vector.length,
          `record ${record.chunk.chunkId}`
        );
      }
      matrix.set(record.vector, row * dimension);
      norms[row] = norm(record.vector);
    });

    return new SimilarityIndex([...records], matrix, norms, dimension);
  }

  static empty(): SimilarityIndex {
    return SimilarityIndex.build([]);
  }

  get size(): number {
    return this.records.length;
  }

  search(
    queryVector: readonly number[],
    k: number,
    minScore = 0
  ): RetrievalResult[] {
    if (k <= 0 || this.dimension === null) {
      return [];
    }
    if (queryVector.length !== this.dimension) {
      throw new DimensionMismatchError(
        this.dimension,
        queryVector.length,
        "query vector"
      );
    }

    const dimension = this.dimension;
    const queryNorm = norm(queryVector);

    const scored: Array<{ row: number; score: number }> = [];
    for (let row = 0; row < this.records.length; row += 1) {
      const denominator = this.norms[row] * queryNorm;
      let score = 0;
      if (denominator !== 0) {
        const offset = row * dimension;
        score = dot(this.matrix.subarray(offset, offset + dimension), queryVector) / denominator;
      }
      if (score >= minScore) {
        scored.push({ row, score });
      }
    }

    // Rows are in insertion order, so the row breaks ties.
    scored.sort((a, b) => b.score - a.score || a.row - b.row);

    return scored.slice(0, k).map(({ row, score }, rank) => ({
      record: this.records[row],
      score,
      rank,
    }));
  }
}
