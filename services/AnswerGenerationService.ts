import { GoogleGenerativeAI } from '@google/generative-ai';
import { AppConfig } from '../config';
import { GenerationBackend, GenerationRequest } from '../types';
import { GenerationBackendError, RequestCancelledError, errorMessage } from '../utils/errors';

export const SYSTEM_PROMPT = `You are a helpful assistant that answers questions using ONLY the context provided by the user.

Instructions:
- Use only the information in the context to answer the question.
- If the context does not contain the answer, say: "I don't have enough information in the provided documents to answer this question."
- Do not make up information and do not use knowledge from outside the context.
- Be concise and direct.
- If you quote from the context, name the source you are quoting.`;

export function buildUserPrompt(question: string, context: string): string {
  return `Context:
${context}
Question: ${question}

Please answer the question based only on the context provided above.`;
}

export class GeminiGenerationBackend implements GenerationBackend {
  private genAI: GoogleGenerativeAI;

  constructor(
    apiKey: string | undefined,
    private readonly model: string,
    private readonly temperature: number
  ) {
    if (!apiKey) {
      throw new Error('GEMINI_API_KEY is required for answer generation');
    }
    this.genAI = new GoogleGenerativeAI(apiKey);
  }

  async generate({ systemPrompt, userPrompt, signal }: GenerationRequest): Promise<string> {
    const model = this.genAI.getGenerativeModel({
      model: this.model,
      systemInstruction: systemPrompt,
      generationConfig: {
        temperature: this.temperature
      }
    });
    const result = await model.generateContent(
      { contents: [{ role: 'user', parts: [{ text: userPrompt }] }] },
      { signal }
    );
    return result.response.text();
  }
}

export interface GenerateOptions {
  signal?: AbortSignal;
}

export class AnswerGenerationService {
  constructor(
    private readonly backend: GenerationBackend,
    private readonly config: AppConfig['generation']
  ) {}

  /**
   * Makes exactly one backend call and returns the model text untouched.
   * Never retried.
   */
  async generate(question: string, context: string, options: GenerateOptions = {}): Promise<string> {
    const callerSignal = options.signal;
    if (callerSignal?.aborted) {
      throw new RequestCancelledError();
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);
    const onCallerAbort = () => controller.abort();
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    const startedAt = Date.now();
    try {
      const answer = await this.backend.generate({
        systemPrompt: SYSTEM_PROMPT,
        userPrompt: buildUserPrompt(question, context),
        signal: controller.signal
      });
      console.log(`[AnswerGenerationService] Generated ${answer.length} chars in ${Date.now() - startedAt}ms`);
      return answer;
    } catch (error) {
      if (callerSignal?.aborted) {
        throw new RequestCancelledError();
      }
      if (timedOut) {
        console.error(`[AnswerGenerationService] ERROR: Generation timed out after ${this.config.timeoutMs}ms`);
        throw new GenerationBackendError(`Generation timed out after ${this.config.timeoutMs}ms`, { cause: error });
      }
      console.error(`[AnswerGenerationService] ERROR: LLM call failed:`, error);
      throw new GenerationBackendError(`Failed to generate answer: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
