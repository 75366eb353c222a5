import { InMemoryVectorStore } from '../services/InMemoryVectorStore';
import { RetrievalService } from '../services/RetrievalService';
import { ALL_DOCUMENTS } from '../types';
import { DimensionMismatchError, InvalidCandidateSetError, InvalidRequestError } from '../utils/errors';
import { unitVector } from './helpers/fakes';
import { seedDocument } from './helpers/seed';

const DIMENSION = 4;

describe('RetrievalService', () => {
  let store: InMemoryVectorStore;
  let retrievalService: RetrievalService;

  beforeEach(async () => {
    store = new InMemoryVectorStore(DIMENSION);
    retrievalService = new RetrievalService(store, DIMENSION);

    await seedDocument(store, { id: 'doc-a', title: 'Handbook' }, [
      { id: 'a0', text: 'axis zero', embedding: unitVector(DIMENSION, 0) },
      { id: 'a1', text: 'axis one', embedding: unitVector(DIMENSION, 1) },
      { id: 'a2', text: 'mostly zero', embedding: [0.9, 0.1, 0, 0] }
    ]);
    await seedDocument(store, { id: 'doc-b', title: 'Policy' }, [
      { id: 'b0', text: 'also axis zero', embedding: unitVector(DIMENSION, 0) },
      { id: 'b1', text: 'axis two', embedding: unitVector(DIMENSION, 2) }
    ]);
  });

  it('should rank an identical vector first at distance 0', async () => {
    const ranked = await retrievalService.retrieve([0.9, 0.1, 0, 0], ['doc-a'], 3);

    expect(ranked[0].id).toBe('a2');
    expect(ranked[0].distance).toBeCloseTo(0, 10);
    expect(ranked.map(chunk => chunk.id)).toEqual(['a2', 'a0', 'a1']);
  });

  it('should order by distance and break ties by document id then sequence', async () => {
    const ranked = await retrievalService.retrieve(unitVector(DIMENSION, 0), ['doc-b', 'doc-a'], 5);

    expect(ranked.map(chunk => chunk.id)).toEqual(['a0', 'b0', 'a2', 'a1', 'b1']);
    for (let i = 1; i < ranked.length; i++) {
      expect(ranked[i].distance).toBeGreaterThanOrEqual(ranked[i - 1].distance);
    }
  });

  it('should only return chunks from the candidate documents', async () => {
    const ranked = await retrievalService.retrieve(unitVector(DIMENSION, 2), ['doc-a'], 5);

    expect(ranked).toHaveLength(3);
    expect(ranked.every(chunk => chunk.documentId === 'doc-a')).toBe(true);
  });

  it('should search every document for ALL_DOCUMENTS', async () => {
    const ranked = await retrievalService.retrieve(unitVector(DIMENSION, 2), ALL_DOCUMENTS, 1);

    expect(ranked.map(chunk => chunk.id)).toEqual(['b1']);
  });

  it('should return at most k chunks', async () => {
    const ranked = await retrievalService.retrieve(unitVector(DIMENSION, 0), ALL_DOCUMENTS, 2);

    expect(ranked).toHaveLength(2);
  });

  it('should return an empty list when the candidates have no chunks', async () => {
    await expect(retrievalService.retrieve(unitVector(DIMENSION, 0), ['doc-999'], 5)).resolves.toEqual([]);
  });

  it('should treat duplicate candidate ids as one document', async () => {
    const ranked = await retrievalService.retrieve(unitVector(DIMENSION, 1), ['doc-a', 'doc-a'], 10);

    expect(ranked).toHaveLength(3);
  });

  it('should reject an empty candidate list', async () => {
    await expect(retrievalService.retrieve(unitVector(DIMENSION, 0), [], 5)).rejects.toBeInstanceOf(
      InvalidCandidateSetError
    );
  });

  it('should reject k below 1', async () => {
    await expect(retrievalService.retrieve(unitVector(DIMENSION, 0), ['doc-a'], 0)).rejects.toBeInstanceOf(
      InvalidRequestError
    );
  });

  it('should reject a query vector of the wrong dimension', async () => {
    await expect(retrievalService.retrieve([1, 0], ['doc-a'], 5)).rejects.toBeInstanceOf(DimensionMismatchError);
  });
});
