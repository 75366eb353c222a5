import { AnswerGenerationService, SYSTEM_PROMPT, buildUserPrompt } from '../services/AnswerGenerationService';
import { GenerationBackendError, RequestCancelledError } from '../utils/errors';
import { FakeGenerationBackend } from './helpers/fakes';

const CONFIG = { model: 'test-model', temperature: 0.2, timeoutMs: 1000 };

describe('AnswerGenerationService', () => {
  it('should return the model text verbatim', async () => {
    const backend = new FakeGenerationBackend();
    backend.answer = '  The leave allowance is 20 days [Source 1].\n';
    const generator = new AnswerGenerationService(backend, CONFIG);

    await expect(generator.generate('How much leave?', 'ctx')).resolves.toBe(
      '  The leave allowance is 20 days [Source 1].\n'
    );
  });

  it('should send the fixed instructions and the question with its context', async () => {
    const backend = new FakeGenerationBackend();
    const generator = new AnswerGenerationService(backend, CONFIG);

    await generator.generate('How much leave?', '--- Source 1: H (pages 1-1) ---\nLeave is 20 days.\n\n');

    expect(backend.requests).toHaveLength(1);
    expect(backend.requests[0].systemPrompt).toBe(SYSTEM_PROMPT);
    expect(backend.requests[0].userPrompt).toBe(
      'Context:\n--- Source 1: H (pages 1-1) ---\nLeave is 20 days.\n\n\nQuestion: How much leave?\n\n' +
        'Please answer the question based only on the context provided above.'
    );
  });

  it('should tell the model to answer only from the context', () => {
    expect(SYSTEM_PROMPT).toContain('ONLY the context');
    expect(SYSTEM_PROMPT).toContain("I don't have enough information in the provided documents to answer this question.");
    expect(buildUserPrompt('q', 'c')).toBe(
      'Context:\nc\nQuestion: q\n\nPlease answer the question based only on the context provided above.'
    );
  });

  it('should not retry a failed call', async () => {
    const backend = new FakeGenerationBackend();
    backend.failure = new Error('quota exceeded');
    const generator = new AnswerGenerationService(backend, CONFIG);

    await expect(generator.generate('q', 'c')).rejects.toThrow('Failed to generate answer: quota exceeded');
    expect(backend.requests).toHaveLength(1);
  });

  it('should raise GenerationBackendError when the call times out', async () => {
    const backend = new FakeGenerationBackend();
    backend.hangUntilAborted = true;
    const generator = new AnswerGenerationService(backend, { ...CONFIG, timeoutMs: 20 });

    const outcome = generator.generate('q', 'c');

    await expect(outcome).rejects.toBeInstanceOf(GenerationBackendError);
    await expect(outcome).rejects.toThrow('Generation timed out after 20ms');
    expect(backend.requests[0].signal.aborted).toBe(true);
  });

  it('should raise RequestCancelledError when the caller aborts', async () => {
    const backend = new FakeGenerationBackend();
    backend.hangUntilAborted = true;
    const generator = new AnswerGenerationService(backend, CONFIG);
    const caller = new AbortController();

    const outcome = generator.generate('q', 'c', { signal: caller.signal });
    caller.abort();

    await expect(outcome).rejects.toBeInstanceOf(RequestCancelledError);
  });

  it('should not call the backend when the caller has already aborted', async () => {
    const backend = new FakeGenerationBackend();
    const generator = new AnswerGenerationService(backend, CONFIG);
    const caller = new AbortController();
    caller.abort();

    await expect(generator.generate('q', 'c', { signal: caller.signal })).rejects.toBeInstanceOf(
      RequestCancelledError
    );
    expect(backend.requests).toHaveLength(0);
  });
});
