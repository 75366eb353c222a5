import {
  ALL_DOCUMENTS,
  ChunkRecord,
  DocumentRecord,
  DocumentScope,
  DocumentStore,
  DocumentSummary,
  RetrievedChunk,
  StoredChunk,
  Vector
} from '../types';
import { DuplicateDocumentError } from '../utils/errors';
import { assertDimension, compareRetrieved, cosineDistance } from '../utils/vector';

function withoutEmbedding({ embedding: _embedding, ...chunk }: ChunkRecord): StoredChunk {
  return chunk;
}

/**
 * Process-local document store with exact (brute-force) cosine search.
 * Used with VECTOR_STORE=memory for local runs without PostgreSQL, and by
 * the tests. Nothing survives a restart.
 */
export class InMemoryVectorStore implements DocumentStore {
  private documents = new Map<string, DocumentRecord>();
  private chunks = new Map<string, ChunkRecord[]>();

  constructor(private readonly dimension: number) {}

  async findDocumentByFilename(filename: string): Promise<DocumentRecord | null> {
    const document = this.documentByFilename(filename);
    return document ? { ...document } : null;
  }

  async insertDocumentWithChunks(document: DocumentRecord, chunks: ChunkRecord[]): Promise<void> {
    for (const chunk of chunks) {
      assertDimension(chunk.embedding, this.dimension, `chunk ${chunk.sequenceIndex}`);
    }
    // No await between this check and the writes below
    if (this.documentByFilename(document.filename)) {
      throw new DuplicateDocumentError(document.filename);
    }
    const sequenceIndexes = new Set(chunks.map(chunk => chunk.sequenceIndex));
    if (sequenceIndexes.size !== chunks.length) {
      throw new Error(`Duplicate sequence index in chunks of document ${document.id}`);
    }

    // Both maps are written together, after every check has passed
    this.documents.set(document.id, { ...document });
    this.chunks.set(
      document.id,
      chunks.map(chunk => ({ ...chunk, embedding: [...chunk.embedding] }))
    );
  }

  async nearestNeighbors(queryVector: Vector, scope: DocumentScope, k: number): Promise<RetrievedChunk[]> {
    assertDimension(queryVector, this.dimension, 'nearest-neighbor query');

    const documentIds = scope === ALL_DOCUMENTS ? [...this.chunks.keys()] : [...new Set(scope)];
    const candidates: RetrievedChunk[] = [];
    for (const documentId of documentIds) {
      for (const chunk of this.chunks.get(documentId) ?? []) {
        candidates.push({
          ...withoutEmbedding(chunk),
          distance: cosineDistance(queryVector, chunk.embedding)
        });
      }
    }

    return candidates.sort(compareRetrieved).slice(0, k);
  }

  async getDocumentTitles(documentIds: readonly string[]): Promise<Map<string, string>> {
    const titles = new Map<string, string>();
    for (const id of documentIds) {
      const document = this.documents.get(id);
      if (document) {
        titles.set(id, document.title);
      }
    }
    return titles;
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    return [...this.documents.values()]
      .map(document => this.summarize(document))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || (a.id < b.id ? -1 : 1));
  }

  async getDocument(documentId: string): Promise<DocumentSummary | null> {
    const document = this.documents.get(documentId);
    return document ? this.summarize(document) : null;
  }

  async listChunks(documentId: string): Promise<StoredChunk[]> {
    return (this.chunks.get(documentId) ?? [])
      .map(withoutEmbedding)
      .sort((a, b) => a.sequenceIndex - b.sequenceIndex);
  }

  async deleteDocument(documentId: string): Promise<boolean> {
    this.chunks.delete(documentId);
    return this.documents.delete(documentId);
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    this.documents.clear();
    this.chunks.clear();
  }

  countChunks(): number {
    let total = 0;
    for (const chunks of this.chunks.values()) {
      total += chunks.length;
    }
    return total;
  }

  private documentByFilename(filename: string): DocumentRecord | undefined {
    for (const document of this.documents.values()) {
      if (document.filename === filename) {
        return document;
      }
    }
    return undefined;
  }

  private summarize(document: DocumentRecord): DocumentSummary {
    return { ...document, chunkCount: this.chunks.get(document.id)?.length ?? 0 };
  }
}
