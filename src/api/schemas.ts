/**
 * Request body schemas for the JSON API
 */

import { z } from 'zod';
import { BadRequestError } from '../domain/errors';

const SessionIdField = z
  .string({ required_error: 'Missing sessionId', invalid_type_error: 'sessionId must be a string' })
  .min(1, 'Missing sessionId');

export const FrameInputSchema = z.object({
  imageData: z.string({
    required_error: 'Each frame needs imageData',
    invalid_type_error: 'imageData must be a string'
  }),
  timestamp: z.string({
    required_error: 'Each frame needs a timestamp',
    invalid_type_error: 'timestamp must be a string'
  })
});

export const UploadFramesSchema = z.object({
  sessionId: SessionIdField,
  frames: z
    .array(FrameInputSchema, { required_error: 'Missing frames', invalid_type_error: 'frames must be an array' })
    .min(1, 'Missing frames')
});

export const AnalyzeEmotionsSchema = z.object({
  sessionId: SessionIdField
});

export const RecommendationsSchema = z.object({
  dominantEmotion: z.string().default('neutral'),
  emotions: z.record(z.string(), z.number()).default({})
});

/**
 * Validate a request body, raising BadRequestError with the first problem
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  if (body === undefined || body === null) {
    throw new BadRequestError('No data received');
  }
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new BadRequestError(result.error.issues[0]?.message ?? 'Invalid request body');
  }
  return result.data;
}
