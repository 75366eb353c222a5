import { GoogleGenerativeAI, GenerativeModel } from '@google/generative-ai';
import { AppConfig } from '../config';
import { EmbeddingBackend, Vector } from '../types';
import { DimensionMismatchError, EmbeddingBackendError, errorMessage } from '../utils/errors';
import { withRetry } from '../utils/retry';
import { assertDimension } from '../utils/vector';

export class GeminiEmbeddingBackend implements EmbeddingBackend {
  private readonly modelInstance: GenerativeModel;

  constructor(apiKey: string | undefined, model: string) {
    if (!apiKey) {
      throw new Error('GEMINI_API_KEY is required for embedding generation');
    }
    this.modelInstance = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model });
  }

  async embedBatch(texts: string[]): Promise<Vector[]> {
    try {
      const result = await this.modelInstance.batchEmbedContents({
        requests: texts.map(text => ({
          content: { role: 'user', parts: [{ text }] }
        }))
      });
      return result.embeddings.map(embedding => embedding.values);
    } catch (error) {
      throw new EmbeddingBackendError(`Gemini embedding request failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

export class EmbeddingService {
  private readonly dimension: number;
  private readonly batchSize: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly backend: EmbeddingBackend,
    config: AppConfig['embedding']
  ) {
    this.dimension = config.dimension;
    this.batchSize = config.batchSize;
    this.maxRetries = config.maxRetries;
    this.retryDelayMs = config.retryDelayMs;
  }

  getDimension(): number {
    return this.dimension;
  }

  async embedQuery(text: string): Promise<Vector> {
    const [vector] = await this.embedBatchWithRetry([text], 0);
    return vector;
  }

  /**
   * Embeds all texts, `batchSize` at a time. Batches are sent one after
   * another and the result keeps the input order.
   */
  async embedAll(texts: string[]): Promise<Vector[]> {
    const vectors: Vector[] = [];
    const totalBatches = Math.ceil(texts.length / this.batchSize);

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batchNumber = i / this.batchSize;
      const batch = texts.slice(i, i + this.batchSize);
      const embedded = await this.embedBatchWithRetry(batch, batchNumber);
      vectors.push(...embedded);
    }

    if (totalBatches > 0) {
      console.log(`[EmbeddingService] Embedded ${texts.length} texts in ${totalBatches} batch(es)`);
    }
    return vectors;
  }

  private async embedBatchWithRetry(batch: string[], batchNumber: number): Promise<Vector[]> {
    const vectors = await withRetry(() => this.callBackend(batch), {
      retries: this.maxRetries,
      initialDelayMs: this.retryDelayMs,
      shouldRetry: error => error instanceof EmbeddingBackendError,
      onRetry: (error, attempt, delay) => {
        console.warn(
          `[EmbeddingService] Batch ${batchNumber} failed (retry ${attempt}/${this.maxRetries} in ${delay}ms): ${errorMessage(error)}`
        );
      }
    });

    if (vectors.length !== batch.length) {
      throw new EmbeddingBackendError(
        `Embedding backend returned ${vectors.length} vectors for ${batch.length} texts`
      );
    }
    for (const vector of vectors) {
      assertDimension(vector, this.dimension, `embedding batch ${batchNumber}`);
    }
    return vectors;
  }

  private async callBackend(batch: string[]): Promise<Vector[]> {
    try {
      return await this.backend.embedBatch(batch);
    } catch (error) {
      if (error instanceof EmbeddingBackendError || error instanceof DimensionMismatchError) {
        throw error;
      }
      throw new EmbeddingBackendError(`Embedding backend failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
