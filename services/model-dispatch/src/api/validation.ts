import { z } from 'zod';
import { ValidationError } from '../errors.js';

const payloadSchema = z.record(z.unknown());

export const jobPayloadSchema = payloadSchema;

export const fanOutRequestSchema = z.object({
  services: z.array(z.string().min(1)).min(1),
  payload: payloadSchema
});

export const batchStatusRequestSchema = z.object({
  job_ids: z.array(z.string().min(1)).min(1).max(500)
});

export const dispatchRequestSchema = z.object({
  kind: z.enum(['predict', 'train']).default('predict'),
  payload: payloadSchema
});

/**
 * Parse a request body, turning zod issues into a 400 ValidationError.
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ValidationError('Invalid request body', {
      issues: result.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message
      }))
    });
  }
  return result.data;
}
