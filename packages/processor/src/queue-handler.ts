import type { SQSEvent } from 'aws-lambda';
import { jobQueueMessageSchema, logger } from '@keepsake/shared';
import type { JobQueueMessage } from '@keepsake/shared';
import type { JobProcessor } from './job-processor';

export type ProcessorProvider = () => Promise<Pick<JobProcessor, 'process'>>;

export function parseQueueMessage(body: string): JobQueueMessage | null {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return null;
  }
  const parsed = jobQueueMessageSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * SQS consumer. Each job gets exactly one processing attempt: outcomes are logged,
 * never thrown, so SQS does not redeliver a job the processor already settled.
 */
export function createQueueHandler(getProcessor: ProcessorProvider) {
  return async (event: SQSEvent): Promise<void> => {
    const processor = await getProcessor();

    for (const record of event.Records) {
      const message = parseQueueMessage(record.body);
      if (!message) {
        logger.error('Invalid SQS message body', { messageId: record.messageId });
        continue;
      }

      const outcome = await processor.process(message.jobId);
      if (outcome.success) {
        logger.jobLifecycle(outcome.jobId, 'SETTLED', 'Job settled', { delivered: outcome.delivered });
      } else {
        logger.jobLifecycle(outcome.jobId, 'SETTLED', 'Job failed', { code: outcome.code, error: outcome.error });
      }
    }
  };
}
