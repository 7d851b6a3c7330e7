import type { SQSHandler } from 'aws-lambda';
import { S3Client } from '@aws-sdk/client-s3';
import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { loadConfig } from '@keepsake/shared';
import type { JobProcessor } from './job-processor';
import { createQueueHandler } from './queue-handler';
import { createJobProcessor } from './services';

const secrets = new SecretsManagerClient({});
const s3 = new S3Client({});

let processor: Promise<JobProcessor> | undefined;

function getProcessor(): Promise<JobProcessor> {
  if (!processor) {
    processor = createJobProcessor(loadConfig(), { secrets, s3 }).catch((err: unknown) => {
      processor = undefined;
      throw err;
    });
  }
  return processor;
}

export const handler: SQSHandler = createQueueHandler(getProcessor);

export { JobProcessor } from './job-processor';
export type { ProcessOutcome } from './job-processor';
