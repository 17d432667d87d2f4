import crypto from 'crypto';
import { z } from 'zod';
import { InvalidPayloadError } from '../errors.js';
import type { ImageStore } from '../storage/image-store.js';
import type { BackendModule } from '../types/index.js';

const ImageHashPayload = z.object({
  image_ref: z.string().min(1)
});

export type ImageHashResult = {
  image_ref: string;
  size_bytes: number;
  hash_md5: string;
  hash_sha1: string;
  hash_sha256: string;
};

export function parseImagePayload(payload: unknown): string {
  const parsed = ImageHashPayload.safeParse(payload);
  if (!parsed.success) {
    throw new InvalidPayloadError('Payload must contain a non-empty "image_ref" string', {
      issues: parsed.error.issues.map(issue => issue.message)
    });
  }
  return parsed.data.image_ref;
}

export function hashImage(imageRef: string, bytes: Buffer): ImageHashResult {
  const digest = (algorithm: string): string => crypto.createHash(algorithm).update(bytes).digest('hex');
  return {
    image_ref: imageRef,
    size_bytes: bytes.length,
    hash_md5: digest('md5'),
    hash_sha1: digest('sha1'),
    hash_sha256: digest('sha256')
  };
}

export function createImageHashBackend(imageStore: ImageStore): BackendModule {
  return {
    name: 'image_hash',
    capability: 'predict',
    async process(payload, context) {
      const imageRef = parseImagePayload(payload);
      const bytes = await imageStore.get(imageRef);
      if (!bytes) {
        throw new InvalidPayloadError(`Image ${imageRef} not found`, { image_ref: imageRef });
      }
      await context.checkpoint();
      return hashImage(imageRef, bytes);
    }
  };
}
