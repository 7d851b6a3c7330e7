import { z } from 'zod';
import type { MediaJobPayload, TextJobPayload, JobQueueMessage } from './types';

export const MAX_MEDIA_PER_MESSAGE = 10;

export const mediaJobPayloadSchema = z.object({
  mediaUrls: z.array(z.string().url()).max(MAX_MEDIA_PER_MESSAGE),
  caption: z.string().optional(),
}) satisfies z.ZodType<MediaJobPayload>;

export const textJobPayloadSchema = z.object({
  text: z.string(),
}) satisfies z.ZodType<TextJobPayload>;

export const jobQueueMessageSchema = z.object({
  jobId: z.string().min(1),
  enqueuedAt: z.string(),
}) satisfies z.ZodType<JobQueueMessage>;

/** Flattens zod issues into one line suitable for a job's error column. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
