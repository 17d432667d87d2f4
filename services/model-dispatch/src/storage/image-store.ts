import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { ValidationError } from '../errors.js';

const IMAGE_REF_PATTERN = /^[a-f0-9]{32}(\.[a-z0-9]{1,5})?$/;

const EXTENSIONS_BY_MIME: Record<string, string> = {
  'image/png': '.png',
  'image/jpeg': '.jpg',
  'image/gif': '.gif',
  'image/webp': '.webp',
  'image/bmp': '.bmp',
  'image/tiff': '.tiff'
};

export interface StoredImage {
  imageRef: string;
  hashMd5: string;
  created: boolean;
}

export function extensionFor(contentType: string | undefined, filename?: string): string {
  const fromName = filename ? path.extname(filename).toLowerCase() : '';
  if (/^\.[a-z0-9]{1,5}$/.test(fromName)) {
    return fromName;
  }
  const mime = (contentType ?? '').split(';')[0].trim().toLowerCase();
  return EXTENSIONS_BY_MIME[mime] ?? '';
}

export function isImageRef(value: string): boolean {
  return IMAGE_REF_PATTERN.test(value);
}

/**
 * Uploaded images, stored once under their md5 hash on the volume shared with
 * the prediction backends. Payloads carry the returned `image_ref`.
 */
export class ImageStore {
  constructor(private readonly directory: string) {}

  async put(bytes: Buffer, extension: string = ''): Promise<StoredImage> {
    if (bytes.length === 0) {
      throw new ValidationError('Image upload is empty');
    }
    const hashMd5 = crypto.createHash('md5').update(bytes).digest('hex');
    const imageRef = `${hashMd5}${extension}`;
    if (!isImageRef(imageRef)) {
      throw new ValidationError(`Unsupported image extension: ${extension}`);
    }

    await fs.mkdir(this.directory, { recursive: true });
    try {
      await fs.writeFile(this.pathFor(imageRef), bytes, { flag: 'wx' });
      return { imageRef, hashMd5, created: true };
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
        return { imageRef, hashMd5, created: false };
      }
      throw error;
    }
  }

  async get(imageRef: string): Promise<Buffer | null> {
    if (!isImageRef(imageRef)) {
      return null;
    }
    try {
      return await fs.readFile(this.pathFor(imageRef));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  private pathFor(imageRef: string): string {
    return path.join(this.directory, imageRef);
  }
}
