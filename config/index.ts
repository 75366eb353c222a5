import { ChunkingOptions } from '../types';

export type StoreKind = 'postgres' | 'memory';

export interface AppConfig {
  readonly port: number;
  readonly corsOrigins: readonly string[];
  readonly store: StoreKind;
  readonly databaseUrl?: string;
  readonly geminiApiKey: string;
  readonly embedding: {
    readonly model: string;
    readonly dimension: number;
    readonly batchSize: number;
    readonly maxRetries: number;
    readonly retryDelayMs: number;
  };
  readonly generation: {
    readonly model: string;
    readonly temperature: number;
    readonly timeoutMs: number;
  };
  readonly chunking: Readonly<ChunkingOptions>;
  readonly retrieval: {
    readonly topK: number;
  };
  readonly upload: {
    readonly maxBytes: number;
  };
  readonly archive?: {
    readonly bucket: string;
    readonly projectId?: string;
    readonly credentialsPath?: string;
  };
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

function readFloat(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got '${raw}'`);
  }
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new Error(`${name} must be true or false, got '${raw}'`);
}

function readList(env: Env, name: string): string[] {
  return (env[name] ?? '')
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

function readStore(env: Env): StoreKind {
  const raw = env.VECTOR_STORE?.trim() || 'postgres';
  if (raw !== 'postgres' && raw !== 'memory') {
    throw new Error(`VECTOR_STORE must be 'postgres' or 'memory', got '${raw}'`);
  }
  return raw;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child !== null && typeof child === 'object') {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Reads the process configuration once. The resulting object is frozen and
 * handed to every service constructor, so the embedding dimension used at
 * ingestion time is the same one the retriever and the store check against.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const store = readStore(env);
  const overlapChars = readInt(env, 'CHUNK_OVERLAP_CHARS', 200, 0);
  const bucket = env.GCS_BUCKET?.trim();

  if (store === 'postgres' && !env.DATABASE_URL) {
    throw new Error('DATABASE_URL environment variable is not set');
  }
  const geminiApiKey = env.GEMINI_API_KEY?.trim();
  if (!geminiApiKey) {
    throw new Error('GEMINI_API_KEY environment variable is not set');
  }

  const config: AppConfig = {
    port: readInt(env, 'PORT', 5003, 1),
    corsOrigins: readList(env, 'CORS_ORIGINS'),
    store,
    databaseUrl: env.DATABASE_URL,
    geminiApiKey,
    embedding: {
      model: env.EMBEDDING_MODEL || 'text-embedding-004',
      dimension: readInt(env, 'EMBEDDING_DIMENSION', 768, 1),
      batchSize: readInt(env, 'EMBEDDING_BATCH_SIZE', 32, 1),
      maxRetries: readInt(env, 'EMBEDDING_MAX_RETRIES', 2, 0),
      retryDelayMs: readInt(env, 'EMBEDDING_RETRY_DELAY_MS', 1000, 0)
    },
    generation: {
      model: env.GENERATION_MODEL || 'gemini-1.5-flash',
      temperature: readFloat(env, 'GENERATION_TEMPERATURE', 0.2),
      timeoutMs: readInt(env, 'GENERATION_TIMEOUT_MS', 60000, 1)
    },
    chunking: {
      maxChars: readInt(env, 'CHUNK_MAX_CHARS', 1500, 1),
      overlapChars,
      respectSentenceBoundaries: readBool(env, 'CHUNK_RESPECT_SENTENCES', true),
      boundarySearchChars: readInt(env, 'CHUNK_BOUNDARY_SEARCH_CHARS', overlapChars, 0)
    },
    retrieval: {
      topK: readInt(env, 'RETRIEVAL_TOP_K', 5, 1)
    },
    upload: {
      maxBytes: readInt(env, 'MAX_UPLOAD_MB', 10, 1) * 1024 * 1024
    },
    archive: bucket
      ? {
          bucket,
          projectId: env.GOOGLE_CLOUD_PROJECT_ID || undefined,
          credentialsPath: env.GOOGLE_APPLICATION_CREDENTIALS || undefined
        }
      : undefined
  };

  return deepFreeze(config);
}
