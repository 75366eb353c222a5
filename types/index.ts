export type Vector = number[];

export interface DocumentRecord {
  id: string;
  title: string;
  filename: string; // unique across the corpus
  createdAt: Date;
}

export interface DocumentSummary extends DocumentRecord {
  chunkCount: number;
}

export interface ChunkRecord {
  id: string;
  documentId: string;
  text: string;
  pageStart: number; // zero-based
  pageEnd: number;
  sequenceIndex: number;
  embedding: Vector;
  createdAt: Date;
}

export type StoredChunk = Omit<ChunkRecord, 'embedding'>;

export interface RetrievedChunk extends StoredChunk {
  distance: number;
}

export interface ChunkDraft {
  text: string;
  pageStart: number;
  pageEnd: number;
  sequenceIndex: number;
  // Offsets into the concatenated page text
  charStart: number;
  charEnd: number;
}

export interface ChunkingOptions {
  maxChars: number;
  overlapChars: number;
  respectSentenceBoundaries: boolean;
  boundarySearchChars?: number;
}

export interface Citation {
  chunkId: string;
  documentTitle: string;
  pageStart: number;
  pageEnd: number;
}

export interface AssembledContext {
  context: string;
  citations: Citation[];
}

export interface IngestionResult {
  documentId: string;
  numChunks: number;
  title: string;
}

export interface QaResult {
  answer: string;
  citations: Citation[];
}

export const ALL_DOCUMENTS = Symbol('all-documents');

export type DocumentScope = readonly string[] | typeof ALL_DOCUMENTS;

export interface DocumentStore {
  findDocumentByFilename(filename: string): Promise<DocumentRecord | null>;
  insertDocumentWithChunks(document: DocumentRecord, chunks: ChunkRecord[]): Promise<void>;
  nearestNeighbors(queryVector: Vector, scope: DocumentScope, k: number): Promise<RetrievedChunk[]>;
  getDocumentTitles(documentIds: readonly string[]): Promise<Map<string, string>>;
  listDocuments(): Promise<DocumentSummary[]>;
  getDocument(documentId: string): Promise<DocumentSummary | null>;
  listChunks(documentId: string): Promise<StoredChunk[]>;
  deleteDocument(documentId: string): Promise<boolean>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

export interface PdfTextExtractor {
  extractPages(buffer: Buffer): Promise<string[]>;
}

export interface EmbeddingBackend {
  embedBatch(texts: string[]): Promise<Vector[]>;
}

export interface GenerationRequest {
  systemPrompt: string;
  userPrompt: string;
  signal: AbortSignal;
}

export interface GenerationBackend {
  generate(request: GenerationRequest): Promise<string>;
}
