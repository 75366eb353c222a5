import { RetrievedChunk, Vector } from '../types';
import { DimensionMismatchError } from './errors';

export function assertDimension(vector: Vector, dimension: number, context: string): void {
  if (vector.length !== dimension) {
    throw new DimensionMismatchError(dimension, vector.length, context);
  }
}

/**
 * Cosine distance (1 - cosine similarity), in [0, 2].
 * A zero-magnitude vector is treated as orthogonal to everything.
 */
export function cosineDistance(a: Vector, b: Vector): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length, 'cosine distance');
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 1;
  }
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function normalize(vector: Vector): Vector {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (norm === 0) {
    return [...vector];
  }
  return vector.map(v => v / norm);
}

/**
 * Nearest first; exact distance ties fall back to ascending
 * (documentId, sequenceIndex) so equal scores always rank the same way.
 */
export function compareRetrieved(a: RetrievedChunk, b: RetrievedChunk): number {
  if (a.distance !== b.distance) {
    return a.distance - b.distance;
  }
  if (a.documentId !== b.documentId) {
    return a.documentId < b.documentId ? -1 : 1;
  }
  return a.sequenceIndex - b.sequenceIndex;
}
