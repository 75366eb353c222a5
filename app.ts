import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import multer, { FileFilterCallback } from 'multer';
import cors from 'cors';
import { AppConfig } from './config';
import { PdfArchive } from './services/GCStorageService';
import { IngestionService } from './services/IngestionService';
import { QaService } from './services/QaService';
import { ALL_DOCUMENTS, DocumentScope, DocumentStore } from './types';
import { InvalidRequestError, errorMessage, toHttpError } from './utils/errors';

export interface AppServices {
  ingestion: IngestionService;
  qa: QaService;
  store: DocumentStore;
  archive?: PdfArchive;
}

export type AppOptions = Pick<AppConfig, 'upload' | 'corsOrigins'>;

export interface QaRequest {
  question: string;
  documentIds: DocumentScope;
}

export function parseQaRequest(body: unknown): QaRequest {
  if (typeof body !== 'object' || body === null) {
    throw new InvalidRequestError('Request body must be a JSON object');
  }
  const question = 'question' in body ? body.question : undefined;
  if (typeof question !== 'string' || question.trim() === '') {
    throw new InvalidRequestError('Please provide a question in the request body');
  }

  const documentIds = 'documentIds' in body ? body.documentIds : undefined;
  if (documentIds === 'all') {
    return { question, documentIds: ALL_DOCUMENTS };
  }
  if (!Array.isArray(documentIds)) {
    throw new InvalidRequestError('documentIds must be an array of document ids or "all"');
  }
  const ids: string[] = [];
  for (const id of documentIds) {
    if (typeof id !== 'string' || id.trim() === '') {
      throw new InvalidRequestError('documentIds must contain non-empty strings');
    }
    ids.push(id);
  }
  return { question, documentIds: ids };
}

function isPdf(file: Express.Multer.File): boolean {
  return file.mimetype === 'application/pdf' || file.originalname.toLowerCase().endsWith('.pdf');
}

// busboy decodes multipart header parameters as latin1
function uploadedFilename(file: Express.Multer.File): string {
  return Buffer.from(file.originalname, 'latin1').toString('utf8');
}

function asyncRoute(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function createApp(services: AppServices, options: AppOptions): express.Express {
  const app = express();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: options.upload.maxBytes
    },
    fileFilter: (_req: Request, file: Express.Multer.File, cb: FileFilterCallback) => {
      if (isPdf(file)) {
        cb(null, true);
      } else {
        cb(new InvalidRequestError('Invalid file type. Only PDF files are allowed.'));
      }
    }
  });

  app.use(
    cors({
      origin: options.corsOrigins.length > 0 ? [...options.corsOrigins] : true,
      credentials: true
    })
  );
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get(
    '/health',
    asyncRoute(async (_req, res) => {
      const timestamp = new Date().toISOString();
      try {
        await services.store.ping();
        res.status(200).json({ status: 'healthy', timestamp, database: 'connected' });
      } catch (error) {
        console.warn(`[Server] Health check failed: ${errorMessage(error)}`);
        res.status(503).json({ status: 'unhealthy', timestamp, database: 'unreachable' });
      }
    })
  );

  app.post(
    '/api/documents',
    (req: Request, res: Response, next: NextFunction) => {
      upload.single('file')(req, res, (err: unknown) => {
        if (err instanceof multer.MulterError) {
          next(new InvalidRequestError(`Upload error: ${err.message}`, { cause: err }));
          return;
        }
        next(err);
      });
    },
    asyncRoute(async (req, res) => {
      const file = req.file;
      if (!file) {
        console.warn(`[Server] Upload request rejected: No file provided`);
        throw new InvalidRequestError('Please provide a PDF in the "file" field');
      }
      const rawTitle: unknown = req.body?.title;
      const title = typeof rawTitle === 'string' ? rawTitle : undefined;
      const filename = uploadedFilename(file);

      const result = await services.ingestion.ingest({
        buffer: file.buffer,
        filename,
        title
      });

      if (services.archive) {
        try {
          await services.archive.archivePdf(file.buffer, filename, result.documentId);
        } catch (archiveError) {
          console.warn(`[Server] GCS archive failed (document stays indexed): ${errorMessage(archiveError)}`);
        }
      }

      res.status(201).json(result);
    })
  );

  app.get(
    '/api/documents',
    asyncRoute(async (_req, res) => {
      res.json({ documents: await services.ingestion.listDocuments() });
    })
  );

  app.get(
    '/api/documents/:id',
    asyncRoute(async (req, res) => {
      res.json(await services.ingestion.getDocument(req.params.id));
    })
  );

  app.get(
    '/api/documents/:id/chunks',
    asyncRoute(async (req, res) => {
      res.json({ chunks: await services.ingestion.listChunks(req.params.id) });
    })
  );

  app.delete(
    '/api/documents/:id',
    asyncRoute(async (req, res) => {
      await services.ingestion.deleteDocument(req.params.id);
      res.status(204).end();
    })
  );

  app.post(
    '/api/qa',
    asyncRoute(async (req, res) => {
      const { question, documentIds } = parseQaRequest(req.body);

      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) {
          controller.abort();
        }
      });

      const result = await services.qa.answer({ question, documentIds, signal: controller.signal });
      res.json(result);
    })
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (Reflect.get(Object(err), 'type') === 'entity.parse.failed') {
      res.status(400).json({ error: 'Bad request', message: 'Malformed JSON body' });
      return;
    }

    const mapped = toHttpError(err);
    if (mapped.status === 499) {
      console.warn(`[Server] Request cancelled by client`);
      res.status(499).end();
      return;
    }
    if (mapped.status >= 500) {
      console.error(`[Server] ERROR: ${mapped.error}:`, err);
    } else {
      console.warn(`[Server] Request rejected: ${errorMessage(err)}`);
    }
    if (mapped.retryAfterSeconds !== undefined) {
      res.setHeader('Retry-After', String(mapped.retryAfterSeconds));
    }
    res.status(mapped.status).json({ error: mapped.error, message: errorMessage(err) });
  });

  return app;
}
