import { ALL_DOCUMENTS, DocumentScope, DocumentStore, RetrievedChunk, Vector } from '../types';
import { InvalidCandidateSetError, InvalidRequestError } from '../utils/errors';
import { assertDimension, compareRetrieved } from '../utils/vector';

export class RetrievalService {
  constructor(
    private readonly store: DocumentStore,
    private readonly dimension: number
  ) {}

  /**
   * Returns up to `k` chunks from the documents in `scope`, nearest first by
   * cosine distance. An empty result is not an error.
   */
  async retrieve(queryVector: Vector, scope: DocumentScope, k: number): Promise<RetrievedChunk[]> {
    if (scope !== ALL_DOCUMENTS && scope.length === 0) {
      throw new InvalidCandidateSetError();
    }
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidRequestError(`k must be an integer >= 1, got ${k}`);
    }
    assertDimension(queryVector, this.dimension, 'query vector');

    const candidates: DocumentScope = scope === ALL_DOCUMENTS ? ALL_DOCUMENTS : [...new Set(scope)];
    const matches = await this.store.nearestNeighbors(queryVector, candidates, k);

    // Stores may order exact ties differently
    const ranked = [...matches].sort(compareRetrieved).slice(0, k);

    console.log(
      `[RetrievalService] Retrieved ${ranked.length} chunk(s) from ${
        candidates === ALL_DOCUMENTS ? 'all documents' : `${candidates.length} document(s)`
      }`
    );
    return ranked;
  }
}
