import dotenv from 'dotenv';
import { createApp } from './app';
import { AppConfig, loadConfig } from './config';
import { AnswerGenerationService, GeminiGenerationBackend } from './services/AnswerGenerationService';
import { ChunkingService } from './services/ChunkingService';
import { ContextAssemblyService } from './services/ContextAssemblyService';
import { DatabaseService } from './services/DatabaseService';
import { EmbeddingService, GeminiEmbeddingBackend } from './services/EmbeddingService';
import { GCStorageService } from './services/GCStorageService';
import { InMemoryVectorStore } from './services/InMemoryVectorStore';
import { IngestionService } from './services/IngestionService';
import { QaService } from './services/QaService';
import { RetrievalService } from './services/RetrievalService';
import { TextExtractionService } from './services/TextExtractionService';
import { DocumentStore } from './types';

dotenv.config();

async function createStore(config: AppConfig): Promise<DocumentStore> {
  if (config.store === 'memory') {
    console.warn('[Server] Using in-memory vector store; documents are lost on restart');
    return new InMemoryVectorStore(config.embedding.dimension);
  }
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL environment variable is not set');
  }
  const database = new DatabaseService(config.databaseUrl, config.embedding.dimension);
  await database.ensureSchema();
  return database;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const store = await createStore(config);
  const embeddingService = new EmbeddingService(
    new GeminiEmbeddingBackend(config.geminiApiKey, config.embedding.model),
    config.embedding
  );
  const answerGenerator = new AnswerGenerationService(
    new GeminiGenerationBackend(config.geminiApiKey, config.generation.model, config.generation.temperature),
    config.generation
  );

  const ingestion = new IngestionService(
    new TextExtractionService(),
    new ChunkingService(config.chunking),
    embeddingService,
    store
  );
  const qa = new QaService(
    embeddingService,
    new RetrievalService(store, config.embedding.dimension),
    new ContextAssemblyService(),
    answerGenerator,
    store,
    config.retrieval.topK
  );

  let archive: GCStorageService | undefined;
  if (config.archive) {
    try {
      archive = new GCStorageService(config.archive);
    } catch (error) {
      console.error('[Server] GCS service initialization failed:', error);
    }
  }

  const app = createApp({ ingestion, qa, store, archive }, config);

  const server = app.listen(config.port, () => {
    console.log(`[Server] Server started on port ${config.port}`);
    console.log(`[Server] Health check available at http://localhost:${config.port}/health`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close(() => {
      store
        .close()
        .then(() => process.exit(0))
        .catch(error => {
          console.error('[Server] ERROR: Failed to close store:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(error => {
  console.error('[Server] ERROR: Startup failed:', error);
  process.exit(1);
});
