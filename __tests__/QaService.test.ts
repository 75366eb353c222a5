import { AnswerGenerationService } from '../services/AnswerGenerationService';
import { ContextAssemblyService } from '../services/ContextAssemblyService';
import { EmbeddingService } from '../services/EmbeddingService';
import { InMemoryVectorStore } from '../services/InMemoryVectorStore';
import { NO_RELEVANT_CONTENT_ANSWER, QaService, QaState } from '../services/QaService';
import { RetrievalService } from '../services/RetrievalService';
import { ALL_DOCUMENTS } from '../types';
import {
  GenerationBackendError,
  InvalidCandidateSetError,
  InvalidRequestError,
  RequestCancelledError
} from '../utils/errors';
import { DeterministicEmbeddingBackend, FakeGenerationBackend, unitVector } from './helpers/fakes';
import { seedDocument } from './helpers/seed';

const DIMENSION = 4;

describe('QaService', () => {
  let store: InMemoryVectorStore;
  let embeddingBackend: DeterministicEmbeddingBackend;
  let generationBackend: FakeGenerationBackend;
  let qaService: QaService;

  beforeEach(async () => {
    store = new InMemoryVectorStore(DIMENSION);
    embeddingBackend = new DeterministicEmbeddingBackend(DIMENSION);
    generationBackend = new FakeGenerationBackend();
    qaService = new QaService(
      new EmbeddingService(embeddingBackend, {
        model: 'test-model',
        dimension: DIMENSION,
        batchSize: 8,
        maxRetries: 0,
        retryDelayMs: 0
      }),
      new RetrievalService(store, DIMENSION),
      new ContextAssemblyService(),
      new AnswerGenerationService(generationBackend, { model: 'test-model', temperature: 0.2, timeoutMs: 1000 }),
      store,
      3
    );

    await seedDocument(store, { id: 'doc-1', title: 'Employee Handbook' }, [
      { id: 'leave', text: 'Annual leave is 20 days.', embedding: unitVector(DIMENSION, 0), pageStart: 2 },
      { id: 'travel', text: 'Travel is booked in economy.', embedding: unitVector(DIMENSION, 1), pageStart: 5 },
      { id: 'remote', text: 'Remote work needs approval.', embedding: [0.8, 0.6, 0, 0], pageStart: 7, pageEnd: 8 },
      { id: 'badges', text: 'Badges are collected at reception.', embedding: unitVector(DIMENSION, 3), pageStart: 9 }
    ]);
    embeddingBackend.pin('How many days of leave do I get?', unitVector(DIMENSION, 0));
  });

  it('should answer from the top-k chunks with one citation per chunk in context order', async () => {
    generationBackend.answer = 'You get 20 days of annual leave.';

    const result = await qaService.answer({ question: 'How many days of leave do I get?', documentIds: ['doc-1'] });

    expect(result.answer).toBe('You get 20 days of annual leave.');
    expect(result.citations).toEqual([
      { chunkId: 'leave', documentTitle: 'Employee Handbook', pageStart: 2, pageEnd: 2 },
      { chunkId: 'remote', documentTitle: 'Employee Handbook', pageStart: 7, pageEnd: 8 },
      { chunkId: 'travel', documentTitle: 'Employee Handbook', pageStart: 5, pageEnd: 5 }
    ]);

    const { userPrompt } = generationBackend.requests[0];
    expect(userPrompt.indexOf('--- Source 1: Employee Handbook (pages 3-3) ---')).toBeGreaterThan(-1);
    expect(userPrompt.indexOf('--- Source 2: Employee Handbook (pages 8-9) ---')).toBeGreaterThan(
      userPrompt.indexOf('--- Source 1:')
    );
    expect(userPrompt.indexOf('--- Source 3: Employee Handbook (pages 6-6) ---')).toBeGreaterThan(
      userPrompt.indexOf('--- Source 2:')
    );
    expect(userPrompt).not.toContain('Badges are collected');
  });

  it('should return the fixed answer without calling the model when nothing matches', async () => {
    const result = await qaService.answer({ question: 'What is the refund policy?', documentIds: ['999'] });

    expect(result).toEqual({ answer: NO_RELEVANT_CONTENT_ANSWER, citations: [] });
    expect(result.answer).toBe('No relevant content found in the specified documents.');
    expect(generationBackend.requests).toHaveLength(0);
  });

  it('should search every document for ALL_DOCUMENTS', async () => {
    await seedDocument(store, { id: 'doc-2', title: 'Security Guide' }, [
      { id: 'door', text: 'Doors lock at 8pm.', embedding: unitVector(DIMENSION, 3) }
    ]);
    embeddingBackend.pin('When do doors lock?', unitVector(DIMENSION, 3));

    const result = await qaService.answer({ question: 'When do doors lock?', documentIds: ALL_DOCUMENTS });

    expect(result.citations[0]).toEqual({ chunkId: 'badges', documentTitle: 'Employee Handbook', pageStart: 9, pageEnd: 9 });
    expect(result.citations[1]).toEqual({ chunkId: 'door', documentTitle: 'Security Guide', pageStart: 0, pageEnd: 0 });
  });

  it('should walk the states in order', async () => {
    const states: QaState[] = [];

    await qaService.answer({
      question: 'How many days of leave do I get?',
      documentIds: ['doc-1'],
      onStateChange: state => states.push(state)
    });

    expect(states).toEqual(['EMBEDDING_QUERY', 'RETRIEVING', 'ASSEMBLING_CONTEXT', 'GENERATING', 'DONE']);
  });

  it('should pass through EMPTY_RESULT when nothing matches', async () => {
    const states: QaState[] = [];

    await qaService.answer({ question: 'Anything?', documentIds: ['999'], onStateChange: state => states.push(state) });

    expect(states).toEqual(['EMBEDDING_QUERY', 'RETRIEVING', 'EMPTY_RESULT', 'DONE']);
  });

  it('should end in FAILED and rethrow when generation fails', async () => {
    generationBackend.failure = new Error('model overloaded');
    const states: QaState[] = [];

    await expect(
      qaService.answer({
        question: 'How many days of leave do I get?',
        documentIds: ['doc-1'],
        onStateChange: state => states.push(state)
      })
    ).rejects.toBeInstanceOf(GenerationBackendError);
    expect(states).toEqual(['EMBEDDING_QUERY', 'RETRIEVING', 'ASSEMBLING_CONTEXT', 'GENERATING', 'FAILED']);
  });

  it('should reject a blank question', async () => {
    await expect(qaService.answer({ question: '  ', documentIds: ['doc-1'] })).rejects.toBeInstanceOf(
      InvalidRequestError
    );
    expect(embeddingBackend.calls).toHaveLength(0);
  });

  it('should reject an empty document list before embedding the question', async () => {
    await expect(qaService.answer({ question: 'Anything?', documentIds: [] })).rejects.toBeInstanceOf(
      InvalidCandidateSetError
    );
    expect(embeddingBackend.calls).toHaveLength(0);
  });

  it('should stop before retrieval when the caller has gone away', async () => {
    const caller = new AbortController();
    caller.abort();

    await expect(
      qaService.answer({ question: 'Anything?', documentIds: ['doc-1'], signal: caller.signal })
    ).rejects.toBeInstanceOf(RequestCancelledError);
    expect(generationBackend.requests).toHaveLength(0);
  });
});
