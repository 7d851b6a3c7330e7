import type { S3Client } from '@aws-sdk/client-s3';
import type { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { PgRecordStore, S3BlobStore, openDatabase } from '@keepsake/database';
import type { AppConfig } from '@keepsake/shared';
import { requireSetting, resolveSecret } from '@keepsake/shared';
import { RetrievalAgent } from './agent/retrieval-agent';
import { HttpMediaFetcher } from './clients/http-fetcher';
import { MistralTextExtractor } from './clients/mistral-extractor';
import { OpenAiChatModel, OpenAiEmbedder, createOpenAiClient } from './clients/openai-models';
import { TwilioReplySender } from './clients/twilio-sender';
import { IntentClassifier } from './intent';
import { JobProcessor } from './job-processor';
import { MediaIngestion } from './media-ingestion';
import { NoteIngestion } from './note-ingestion';

export interface AwsClients {
  secrets: SecretsManagerClient;
  s3: S3Client;
}

/** Build the job processor and its collaborators once per container. */
export async function createJobProcessor(config: AppConfig, aws: AwsClients): Promise<JobProcessor> {
  const [database, openAiKey, mistralKey, twilioSid, twilioToken, twilioFrom] = await Promise.all([
    openDatabase(config.database, aws.secrets),
    resolveSecret(aws.secrets, config.openai.apiKey),
    resolveSecret(aws.secrets, config.mistral.apiKey),
    resolveSecret(aws.secrets, config.twilio.accountSid),
    resolveSecret(aws.secrets, config.twilio.authToken),
    resolveSecret(aws.secrets, config.twilio.whatsappNumber),
  ]);

  const blobs = new S3BlobStore(aws.s3, requireSetting(config.mediaBucketName, 'MEDIA_BUCKET_NAME'));
  const store = new PgRecordStore(database.db, blobs);

  const openai = createOpenAiClient({
    apiKey: openAiKey,
    baseUrl: config.openai.baseUrl,
    timeoutMs: config.openai.timeoutMs,
  });
  const mistral = createOpenAiClient({
    apiKey: mistralKey,
    baseUrl: config.mistral.baseUrl,
    timeoutMs: config.mistral.timeoutMs,
  });

  const embedder = new OpenAiEmbedder(openai, config.openai.embeddingModel);
  const chat = new OpenAiChatModel(openai, config.openai.chatModel);
  const extractor = new MistralTextExtractor(mistral, {
    visionModel: config.mistral.visionModel,
    ocrModel: config.mistral.ocrModel,
  });
  const fetcher = new HttpMediaFetcher({
    timeoutMs: config.mediaFetchTimeoutMs,
    basicAuth: { username: twilioSid, password: twilioToken },
  });

  return new JobProcessor({
    store,
    mediaIngestion: new MediaIngestion(fetcher, store, extractor, embedder),
    noteIngestion: new NoteIngestion(store, embedder),
    intentClassifier: new IntentClassifier(chat),
    retrievalAgent: new RetrievalAgent(chat, embedder, store, { maxSteps: config.agentMaxSteps }),
    replySender: TwilioReplySender.fromCredentials(twilioSid, twilioToken),
    replyFrom: twilioFrom,
    historyLimit: config.historyLimit,
  });
}
