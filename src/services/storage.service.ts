import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { errorMessage } from '../utils/errors';
import { CleanupWarning } from '../types/guide.types';

export interface StoredFile {
  id: string;
  path: string;
  size: number;
}

/**
 * Transient file storage for uploads and rendered summaries. Nothing written
 * here outlives the process: uploads are removed as soon as they are parsed and
 * summaries are removed when superseded or when their session expires.
 */
export class StorageService {
  private readonly baseDir: string;

  constructor(baseDir: string = path.join(os.tmpdir(), 'visit-guide')) {
    this.baseDir = baseDir;
  }

  get directory(): string {
    return this.baseDir;
  }

  /**
   * Writes `bytes` to a fresh temp file, hands its path to `use`, and deletes
   * the file afterwards whether or not `use` succeeded.
   */
  async withTempFile<T>(
    bytes: Buffer,
    extension: string,
    use: (filePath: string) => Promise<T>,
    onWarning?: (warning: CleanupWarning) => void
  ): Promise<T> {
    await fs.mkdir(this.baseDir, { recursive: true });
    const filePath = this.uniquePath('upload', extension);

    try {
      await fs.writeFile(filePath, bytes);
      return await use(filePath);
    } finally {
      const warning = await this.deleteFile(filePath);
      if (warning && onWarning) {
        onWarning(warning);
      }
    }
  }

  async saveArtifact(bytes: Buffer, extension: string = '.pdf'): Promise<StoredFile> {
    await fs.mkdir(this.baseDir, { recursive: true });
    const id = randomUUID();
    const filePath = path.join(this.baseDir, `summary-${id}${extension}`);

    await fs.writeFile(filePath, bytes, { flag: 'wx' });

    return { id, path: filePath, size: bytes.length };
  }

  async readFile(filePath: string): Promise<Buffer> {
    return fs.readFile(filePath);
  }

  /** Returns a warning instead of throwing when the file cannot be removed. */
  async deleteFile(filePath: string): Promise<CleanupWarning | null> {
    try {
      await fs.rm(filePath, { force: true });
      return null;
    } catch (error) {
      const warning: CleanupWarning = {
        path: filePath,
        message: `Couldn't delete temp file: ${errorMessage(error)}`,
      };
      console.warn('⚠️ ', warning.message);
      return warning;
    }
  }

  getContentType(filename: string): string {
    const ext = filename.split('.').pop()?.toLowerCase();
    const contentTypes: Record<string, string> = {
      pdf: 'application/pdf',
      docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
      txt: 'text/plain',
    };

    return contentTypes[ext || ''] || 'application/octet-stream';
  }

  private uniquePath(prefix: string, extension: string): string {
    return path.join(this.baseDir, `${prefix}-${Date.now()}-${randomUUID()}${extension}`);
  }
}
