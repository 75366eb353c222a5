import { ALL_DOCUMENTS, DocumentScope, DocumentStore, QaResult } from '../types';
import {
  InvalidCandidateSetError,
  InvalidRequestError,
  RequestCancelledError,
  errorMessage
} from '../utils/errors';
import { AnswerGenerationService } from './AnswerGenerationService';
import { ContextAssemblyService } from './ContextAssemblyService';
import { EmbeddingService } from './EmbeddingService';
import { RetrievalService } from './RetrievalService';

export const NO_RELEVANT_CONTENT_ANSWER = 'No relevant content found in the specified documents.';

export type QaState =
  | 'EMBEDDING_QUERY'
  | 'RETRIEVING'
  | 'EMPTY_RESULT'
  | 'ASSEMBLING_CONTEXT'
  | 'GENERATING'
  | 'DONE'
  | 'FAILED';

const TRANSITIONS: Record<QaState, readonly QaState[]> = {
  EMBEDDING_QUERY: ['RETRIEVING', 'FAILED'],
  RETRIEVING: ['EMPTY_RESULT', 'ASSEMBLING_CONTEXT', 'FAILED'],
  EMPTY_RESULT: ['DONE', 'FAILED'],
  ASSEMBLING_CONTEXT: ['GENERATING', 'FAILED'],
  GENERATING: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: []
};

export interface AnswerParams {
  question: string;
  documentIds: DocumentScope;
  signal?: AbortSignal;
  onStateChange?: (state: QaState) => void;
}

class QaRun {
  private current: QaState = 'EMBEDDING_QUERY';

  constructor(private readonly listener?: (state: QaState) => void) {
    listener?.(this.current);
  }

  get state(): QaState {
    return this.current;
  }

  moveTo(next: QaState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid QA state transition ${this.current} -> ${next}`);
    }
    console.log(`[QaService] ${this.current} -> ${next}`);
    this.current = next;
    this.listener?.(next);
  }
}

export class QaService {
  constructor(
    private readonly embeddingService: EmbeddingService,
    private readonly retrievalService: RetrievalService,
    private readonly contextAssembler: ContextAssemblyService,
    private readonly answerGenerator: AnswerGenerationService,
    private readonly store: DocumentStore,
    private readonly topK: number
  ) {}

  async answer(params: AnswerParams): Promise<QaResult> {
    const question = params.question.trim();
    if (!question) {
      throw new InvalidRequestError('A question is required');
    }
    if (params.documentIds !== ALL_DOCUMENTS && params.documentIds.length === 0) {
      throw new InvalidCandidateSetError();
    }

    const run = new QaRun(params.onStateChange);
    try {
      const queryVector = await this.embeddingService.embedQuery(question);
      this.throwIfCancelled(params.signal);

      run.moveTo('RETRIEVING');
      const ranked = await this.retrievalService.retrieve(queryVector, params.documentIds, this.topK);
      this.throwIfCancelled(params.signal);

      if (ranked.length === 0) {
        run.moveTo('EMPTY_RESULT');
        console.log(`[QaService] No chunks matched, skipping generation`);
        run.moveTo('DONE');
        return { answer: NO_RELEVANT_CONTENT_ANSWER, citations: [] };
      }

      run.moveTo('ASSEMBLING_CONTEXT');
      const titles = await this.store.getDocumentTitles([...new Set(ranked.map(chunk => chunk.documentId))]);
      const { context, citations } = this.contextAssembler.assemble(ranked, titles);

      run.moveTo('GENERATING');
      const answer = await this.answerGenerator.generate(question, context, { signal: params.signal });

      run.moveTo('DONE');
      console.log(`[QaService] Answered with ${citations.length} citation(s)`);
      return { answer, citations };
    } catch (error) {
      const failedIn = run.state;
      run.moveTo('FAILED');
      console.error(`[QaService] ERROR: Question failed during ${failedIn}: ${errorMessage(error)}`);
      throw error;
    }
  }

  private throwIfCancelled(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new RequestCancelledError();
    }
  }
}
