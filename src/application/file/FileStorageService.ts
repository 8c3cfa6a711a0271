// Application: File Storage Service
// Stores uploaded cover images on local disk, one folder per user

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { storageLogger, errorMessage } from '@/utils/logger.js';

const EXTENSIONS_BY_TYPE: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/jpg': 'jpg',
  'image/png': 'png',
  'image/gif': 'gif',
  'image/webp': 'webp',
};

export const MAX_COVER_SIZE = 5 * 1024 * 1024; // 5MB

export interface UploadedFile {
  bytes: Buffer;
  mimeType: string;
}

export function fileExtensionFor(mimeType: string): string | null {
  return EXTENSIONS_BY_TYPE[mimeType.toLowerCase()] ?? null;
}

export function validateUpload(file: UploadedFile): { valid: boolean; error?: string } {
  if (file.bytes.length === 0) {
    return { valid: false, error: 'Uploaded file is empty' };
  }

  if (file.bytes.length > MAX_COVER_SIZE) {
    return {
      valid: false,
      error: `File size exceeds maximum allowed size (${MAX_COVER_SIZE / 1024 / 1024}MB)`,
    };
  }

  if (!fileExtensionFor(file.mimeType)) {
    return {
      valid: false,
      error: `Invalid image type. Allowed: ${Object.keys(EXTENSIONS_BY_TYPE).join(', ')}`,
    };
  }

  return { valid: true };
}

export class FileStorageService {
  constructor(private readonly uploadsDir: string) {}

  /**
   * Save a file under users/<userId>/ and return its path
   */
  async saveFile(file: UploadedFile, userId: string): Promise<string> {
    const extension = fileExtensionFor(file.mimeType) ?? 'bin';
    const targetDir = path.join(this.uploadsDir, 'users', userId);
    await mkdir(targetDir, { recursive: true });

    const targetPath = path.join(targetDir, `${Date.now()}.${extension}`);
    await writeFile(targetPath, file.bytes);

    storageLogger.info('File saved', { path: targetPath, size: file.bytes.length });
    return targetPath;
  }

  /**
   * Read a stored file; a missing file is not an error for callers
   */
  async readFile(filePath: string | null): Promise<Buffer | null> {
    if (!filePath) return null;

    try {
      return await readFile(filePath);
    } catch (error) {
      storageLogger.warn('No file found in the path', { path: filePath, error: errorMessage(error) });
      return null;
    }
  }
}
