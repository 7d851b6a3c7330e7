import type { APIGatewayProxyHandlerV2 } from 'aws-lambda';
import { SQSClient } from '@aws-sdk/client-sqs';
import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { PgRecordStore, openDatabase } from '@keepsake/database';
import { isSecretConfigured, loadConfig, requireSetting, resolveSecret } from '@keepsake/shared';
import type { AppConfig } from '@keepsake/shared';
import { SqsJobQueue } from './job-queue';
import { createWebhookHandler, requestFromEvent } from './webhook';
import type { WebhookRequest, WebhookResponse } from './webhook';

const secrets = new SecretsManagerClient({});
const sqs = new SQSClient({});

type Webhook = (req: WebhookRequest) => Promise<WebhookResponse>;

let webhook: Promise<Webhook> | undefined;

async function buildWebhook(config: AppConfig): Promise<Webhook> {
  const [database, authToken] = await Promise.all([
    openDatabase(config.database, secrets),
    isSecretConfigured(config.twilio.authToken)
      ? resolveSecret(secrets, config.twilio.authToken)
      : Promise.resolve(undefined),
  ]);
  return createWebhookHandler({
    store: new PgRecordStore(database.db),
    queue: new SqsJobQueue(sqs, requireSetting(config.processingQueueUrl, 'PROCESSING_QUEUE_URL')),
    authToken,
  });
}

function getWebhook(config: AppConfig): Promise<Webhook> {
  if (!webhook) {
    webhook = buildWebhook(config).catch((err: unknown) => {
      webhook = undefined;
      throw err;
    });
  }
  return webhook;
}

export const handler: APIGatewayProxyHandlerV2 = async (event) => {
  const config = loadConfig();
  const handle = await getWebhook(config);
  return handle(requestFromEvent(event, config.twilio.webhookUrl));
};

export { createWebhookHandler } from './webhook';
export type { WebhookDeps, WebhookRequest, WebhookResponse } from './webhook';
