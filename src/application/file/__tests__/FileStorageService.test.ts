import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  FileStorageService,
  MAX_COVER_SIZE,
  fileExtensionFor,
  validateUpload,
} from '../FileStorageService.js';

describe('FileStorageService', () => {
  let uploadsDir: string;
  let storage: FileStorageService;

  beforeEach(async () => {
    uploadsDir = await mkdtemp(join(tmpdir(), 'cover-storage-test-'));
    storage = new FileStorageService(uploadsDir);
  });

  afterEach(async () => {
    await rm(uploadsDir, { recursive: true, force: true });
  });

  it('writes files under the uploader folder with an extension from the type', async () => {
    const bytes = Buffer.from('fake-jpeg-bytes');

    const saved = await storage.saveFile({ bytes, mimeType: 'image/jpeg' }, 'user-1');

    expect(saved.startsWith(join(uploadsDir, 'users', 'user-1'))).toBe(true);
    expect(saved.endsWith('.jpg')).toBe(true);
    expect(await readFile(saved)).toEqual(bytes);
  });

  it('reads a stored file back', async () => {
    const bytes = Buffer.from('fake-png-bytes');
    const saved = await storage.saveFile({ bytes, mimeType: 'image/png' }, 'user-1');

    expect(await storage.readFile(saved)).toEqual(bytes);
  });

  it('returns null for a missing path or file', async () => {
    expect(await storage.readFile(null)).toBeNull();
    expect(await storage.readFile(join(uploadsDir, 'nope.png'))).toBeNull();
  });
});

describe('validateUpload', () => {
  it('accepts supported image types', () => {
    expect(validateUpload({ bytes: Buffer.from('x'), mimeType: 'image/webp' })).toEqual({ valid: true });
    expect(fileExtensionFor('IMAGE/PNG')).toBe('png');
  });

  it('rejects empty files', () => {
    expect(validateUpload({ bytes: Buffer.alloc(0), mimeType: 'image/png' })).toEqual({
      valid: false,
      error: 'Uploaded file is empty',
    });
  });

  it('rejects oversized files', () => {
    const result = validateUpload({ bytes: Buffer.alloc(MAX_COVER_SIZE + 1), mimeType: 'image/png' });
    expect(result).toEqual({ valid: false, error: 'File size exceeds maximum allowed size (5MB)' });
  });

  it('rejects other content types', () => {
    const result = validateUpload({ bytes: Buffer.from('x'), mimeType: 'application/pdf' });
    expect(result.valid).toBe(false);
    expect(result.error).toBe(
      'Invalid image type. Allowed: image/jpeg, image/jpg, image/png, image/gif, image/webp'
    );
  });
});
