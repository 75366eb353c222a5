import { Bucket, Storage } from '@google-cloud/storage';
import { AppConfig } from '../config';
import { StorageError, errorMessage } from '../utils/errors';

export interface ArchiveResult {
  objectName: string;
  size: number;
}

export interface PdfArchive {
  archivePdf(buffer: Buffer, filename: string, documentId: string): Promise<ArchiveResult>;
}

export function archiveObjectName(documentId: string, filename: string): string {
  return `documents/${documentId}/${filename.replace(/\s+/g, '_')}`;
}

export class GCStorageService implements PdfArchive {
  private bucket: Bucket;

  constructor(config: NonNullable<AppConfig['archive']>) {
    const storage = new Storage({
      projectId: config.projectId,
      keyFilename: config.credentialsPath
    });
    this.bucket = storage.bucket(config.bucket);
  }

  async archivePdf(buffer: Buffer, filename: string, documentId: string): Promise<ArchiveResult> {
    const objectName = archiveObjectName(documentId, filename);
    try {
      await this.bucket.file(objectName).save(buffer, {
        contentType: 'application/pdf',
        resumable: false
      });
    } catch (error) {
      throw new StorageError(`GCS upload failed: ${errorMessage(error)}`, { cause: error });
    }
    console.log(`[GCStorageService] Archived ${objectName} (${buffer.length} bytes)`);
    return { objectName, size: buffer.length };
  }
}
