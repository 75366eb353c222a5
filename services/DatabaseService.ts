import { Pool, PoolClient } from 'pg';
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
import {
  DimensionMismatchError,
  DuplicateDocumentError,
  RagError,
  StorageError,
  errorMessage
} from '../utils/errors';
import { assertDimension } from '../utils/vector';

export const FILENAME_CONSTRAINT = 'documents_filename_unique';
const UNIQUE_VIOLATION = '23505';

interface DocumentRow {
  id: string;
  title: string;
  filename: string;
  created_at: Date;
  chunk_count: string;
}

interface ChunkRow {
  id: string;
  document_id: string;
  text: string;
  page_start: number;
  page_end: number;
  chunk_index: number;
  created_at: Date;
}

interface NeighborRow extends ChunkRow {
  distance: number;
}

// pgvector text format: '[0.1,0.2,0.3]'. Only this module knows it.
export function toVectorLiteral(vector: Vector): string {
  for (const value of vector) {
    if (!Number.isFinite(value)) {
      throw new StorageError(`Vector contains a non-finite value: ${value}`);
    }
  }
  return `[${vector.join(',')}]`;
}

export function isUniqueViolation(error: unknown, constraint: string): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  return Reflect.get(error, 'code') === UNIQUE_VIOLATION && Reflect.get(error, 'constraint') === constraint;
}

export function schemaStatements(dimension: number): string[] {
  return [
    'CREATE EXTENSION IF NOT EXISTS vector',
    `CREATE TABLE IF NOT EXISTS documents (
      id TEXT PRIMARY KEY,
      title VARCHAR(500) NOT NULL,
      filename VARCHAR(500) NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      CONSTRAINT ${FILENAME_CONSTRAINT} UNIQUE (filename)
    )`,
    'CREATE INDEX IF NOT EXISTS idx_documents_created_at ON documents (created_at DESC)',
    `CREATE TABLE IF NOT EXISTS chunks (
      id TEXT PRIMARY KEY,
      document_id TEXT NOT NULL REFERENCES documents (id) ON DELETE CASCADE,
      text TEXT NOT NULL,
      page_start INTEGER NOT NULL,
      page_end INTEGER NOT NULL,
      chunk_index INTEGER NOT NULL,
      embedding vector(${dimension}) NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      CONSTRAINT chunks_document_sequence_unique UNIQUE (document_id, chunk_index),
      CONSTRAINT chunks_page_range_check CHECK (page_start <= page_end)
    )`,
    'CREATE INDEX IF NOT EXISTS idx_chunks_document_id ON chunks (document_id)',
    `CREATE INDEX IF NOT EXISTS idx_chunks_embedding_hnsw ON chunks
      USING hnsw (embedding vector_cosine_ops) WITH (m = 16, ef_construction = 64)`
  ];
}

function toSummary(row: DocumentRow): DocumentSummary {
  return {
    id: row.id,
    title: row.title,
    filename: row.filename,
    createdAt: row.created_at,
    chunkCount: parseInt(row.chunk_count, 10)
  };
}

function toStoredChunk(row: ChunkRow): StoredChunk {
  return {
    id: row.id,
    documentId: row.document_id,
    text: row.text,
    pageStart: row.page_start,
    pageEnd: row.page_end,
    sequenceIndex: row.chunk_index,
    createdAt: row.created_at
  };
}

const DOCUMENT_SUMMARY_SELECT = `
  SELECT d.id, d.title, d.filename, d.created_at, COUNT(c.id) AS chunk_count
  FROM documents d
  LEFT JOIN chunks c ON c.document_id = d.id`;

export class DatabaseService implements DocumentStore {
  private readonly pool: Pool;

  constructor(connectionString: string, private readonly dimension: number) {
    this.pool = new Pool({ connectionString });
    this.pool.on('error', err => {
      console.error('[DatabaseService] Idle client error:', err);
    });
  }

  /**
   * Creates the tables when missing and checks that an existing embedding
   * column was created for the configured dimension.
   */
  async ensureSchema(): Promise<void> {
    await this.run('ensure schema', async () => {
      for (const statement of schemaStatements(this.dimension)) {
        await this.pool.query(statement);
      }
    });

    const result = await this.run('read embedding dimension', () =>
      this.pool.query<{ dimension: number }>(
        `SELECT atttypmod AS dimension FROM pg_attribute
         WHERE attrelid = 'chunks'::regclass AND attname = 'embedding'`
      )
    );
    const stored = result.rows[0]?.dimension;
    if (stored !== undefined && stored !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, stored, 'chunks.embedding column');
    }
    console.log(`[DatabaseService] Schema ready (vector dimension ${this.dimension})`);
  }

  async findDocumentByFilename(filename: string): Promise<DocumentRecord | null> {
    const result = await this.run('find document by filename', () =>
      this.pool.query<Omit<DocumentRow, 'chunk_count'>>(
        'SELECT id, title, filename, created_at FROM documents WHERE filename = $1',
        [filename]
      )
    );
    const row = result.rows[0];
    return row ? { id: row.id, title: row.title, filename: row.filename, createdAt: row.created_at } : null;
  }

  async insertDocumentWithChunks(document: DocumentRecord, chunks: ChunkRecord[]): Promise<void> {
    // Reject bad vectors before a single row is written
    for (const chunk of chunks) {
      assertDimension(chunk.embedding, this.dimension, `chunk ${chunk.sequenceIndex}`);
    }

    const client = await this.run('connect', () => this.pool.connect());
    try {
      await client.query('BEGIN');
      await client.query(
        'INSERT INTO documents (id, title, filename, created_at) VALUES ($1, $2, $3, $4)',
        [document.id, document.title, document.filename, document.createdAt]
      );
      for (const chunk of chunks) {
        await client.query(
          `INSERT INTO chunks (id, document_id, text, page_start, page_end, chunk_index, embedding, created_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7::vector, $8)`,
          [
            chunk.id,
            chunk.documentId,
            chunk.text,
            chunk.pageStart,
            chunk.pageEnd,
            chunk.sequenceIndex,
            toVectorLiteral(chunk.embedding),
            chunk.createdAt
          ]
        );
      }
      await client.query('COMMIT');
    } catch (error) {
      await this.rollback(client);
      if (isUniqueViolation(error, FILENAME_CONSTRAINT)) {
        throw new DuplicateDocumentError(document.filename);
      }
      if (error instanceof RagError) {
        throw error;
      }
      console.error(`[DatabaseService] ERROR: Failed to persist document ${document.id}:`, error);
      throw new StorageError(`Failed to persist document: ${errorMessage(error)}`, { cause: error });
    } finally {
      client.release();
    }
  }

  async nearestNeighbors(queryVector: Vector, scope: DocumentScope, k: number): Promise<RetrievedChunk[]> {
    assertDimension(queryVector, this.dimension, 'nearest-neighbor query');

    const values: unknown[] = [toVectorLiteral(queryVector)];
    let where = '';
    if (scope !== ALL_DOCUMENTS) {
      values.push([...scope]);
      where = 'WHERE c.document_id = ANY($2::text[])';
    }
    values.push(k);

    const result = await this.run('nearest neighbors', () =>
      this.pool.query<NeighborRow>(
        `SELECT c.id, c.document_id, c.text, c.page_start, c.page_end, c.chunk_index, c.created_at,
                c.embedding <=> $1::vector AS distance
         FROM chunks c
         ${where}
         ORDER BY distance ASC, c.document_id ASC, c.chunk_index ASC
         LIMIT $${values.length}`,
        values
      )
    );
    return result.rows.map(row => ({ ...toStoredChunk(row), distance: Number(row.distance) }));
  }

  async getDocumentTitles(documentIds: readonly string[]): Promise<Map<string, string>> {
    if (documentIds.length === 0) {
      return new Map();
    }
    const result = await this.run('get document titles', () =>
      this.pool.query<{ id: string; title: string }>(
        'SELECT id, title FROM documents WHERE id = ANY($1::text[])',
        [[...documentIds]]
      )
    );
    return new Map(result.rows.map(row => [row.id, row.title]));
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    const result = await this.run('list documents', () =>
      this.pool.query<DocumentRow>(
        `${DOCUMENT_SUMMARY_SELECT}
         GROUP BY d.id
         ORDER BY d.created_at DESC, d.id ASC`
      )
    );
    return result.rows.map(toSummary);
  }

  async getDocument(documentId: string): Promise<DocumentSummary | null> {
    const result = await this.run('get document', () =>
      this.pool.query<DocumentRow>(
        `${DOCUMENT_SUMMARY_SELECT}
         WHERE d.id = $1
         GROUP BY d.id`,
        [documentId]
      )
    );
    const row = result.rows[0];
    return row ? toSummary(row) : null;
  }

  async listChunks(documentId: string): Promise<StoredChunk[]> {
    const result = await this.run('list chunks', () =>
      this.pool.query<ChunkRow>(
        `SELECT id, document_id, text, page_start, page_end, chunk_index, created_at
         FROM chunks WHERE document_id = $1
         ORDER BY chunk_index ASC`,
        [documentId]
      )
    );
    return result.rows.map(toStoredChunk);
  }

  async deleteDocument(documentId: string): Promise<boolean> {
    const result = await this.run('delete document', () =>
      this.pool.query('DELETE FROM documents WHERE id = $1', [documentId])
    );
    return (result.rowCount ?? 0) > 0;
  }

  async ping(): Promise<void> {
    await this.run('ping', () => this.pool.query('SELECT 1'));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async rollback(client: PoolClient): Promise<void> {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      console.error('[DatabaseService] ERROR: Rollback failed:', rollbackError);
    }
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof RagError) {
        throw error;
      }
      console.error(`[DatabaseService] ERROR: ${operation} failed:`, error);
      throw new StorageError(`Database ${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
