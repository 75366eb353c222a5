import { v4 as uuidv4 } from 'uuid';
import {
  ChunkRecord,
  DocumentRecord,
  DocumentStore,
  DocumentSummary,
  IngestionResult,
  PdfTextExtractor,
  StoredChunk
} from '../types';
import { DocumentNotFoundError, DuplicateDocumentError, InvalidRequestError, errorMessage } from '../utils/errors';
import { ChunkingService } from './ChunkingService';
import { EmbeddingService } from './EmbeddingService';

export interface IngestParams {
  buffer: Buffer;
  filename: string;
  title?: string;
}

export class IngestionService {
  constructor(
    private readonly extractor: PdfTextExtractor,
    private readonly chunker: ChunkingService,
    private readonly embeddingService: EmbeddingService,
    private readonly store: DocumentStore
  ) {}

  /**
   * Extract → chunk → embed → persist. Nothing is written until every chunk
   * has its vector, and the document row and its chunks are written in one
   * store transaction, so a failure at any step leaves no trace.
   */
  async ingest(params: IngestParams): Promise<IngestionResult> {
    const filename = params.filename.trim();
    if (!filename) {
      throw new InvalidRequestError('A filename is required');
    }
    const title = params.title?.trim() || filename;
    console.log(`[IngestionService] Starting ingestion - filename: ${filename}`);

    if (await this.store.findDocumentByFilename(filename)) {
      console.warn(`[IngestionService] Rejected duplicate filename: ${filename}`);
      throw new DuplicateDocumentError(filename);
    }

    try {
      const pages = await this.extractor.extractPages(params.buffer);
      const drafts = this.chunker.chunkPages(pages);
      const vectors = await this.embeddingService.embedAll(drafts.map(draft => draft.text));

      const createdAt = new Date();
      const document: DocumentRecord = { id: uuidv4(), title, filename, createdAt };
      const chunks: ChunkRecord[] = drafts.map((draft, index) => ({
        id: uuidv4(),
        documentId: document.id,
        text: draft.text,
        pageStart: draft.pageStart,
        pageEnd: draft.pageEnd,
        sequenceIndex: draft.sequenceIndex,
        embedding: vectors[index],
        createdAt
      }));

      await this.store.insertDocumentWithChunks(document, chunks);

      console.log(
        `[IngestionService] Ingestion completed - document ${document.id} (${pages.length} pages, ${chunks.length} chunks)`
      );
      return { documentId: document.id, numChunks: chunks.length, title };
    } catch (error) {
      console.error(`[IngestionService] ERROR: Ingestion of ${filename} failed: ${errorMessage(error)}`);
      throw error;
    }
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    return this.store.listDocuments();
  }

  async getDocument(documentId: string): Promise<DocumentSummary> {
    const document = await this.store.getDocument(documentId);
    if (!document) {
      throw new DocumentNotFoundError(documentId);
    }
    return document;
  }

  async listChunks(documentId: string): Promise<StoredChunk[]> {
    await this.getDocument(documentId);
    return this.store.listChunks(documentId);
  }

  async deleteDocument(documentId: string): Promise<void> {
    const deleted = await this.store.deleteDocument(documentId);
    if (!deleted) {
      throw new DocumentNotFoundError(documentId);
    }
    console.log(`[IngestionService] Deleted document ${documentId} and its chunks`);
  }
}
