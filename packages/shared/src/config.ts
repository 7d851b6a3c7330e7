import { z } from 'zod';
import { ConfigError } from './errors';
import { describeIssues } from './schemas';

/**
 * A credential that may live in a Secrets Manager JSON secret (under `key`) or
 * directly in the environment. The secret wins when both are present.
 */
export interface SecretSource {
  key: string;
  secretArn?: string;
  fallback?: string;
}

export interface AppConfig {
  database: {
    url?: string;
    secretArn?: string;
    host?: string;
    name: string;
  };
  openai: {
    apiKey: SecretSource;
    baseUrl?: string;
    chatModel: string;
    embeddingModel: string;
    timeoutMs: number;
  };
  mistral: {
    apiKey: SecretSource;
    baseUrl: string;
    visionModel: string;
    ocrModel: string;
    timeoutMs: number;
  };
  twilio: {
    accountSid: SecretSource;
    authToken: SecretSource;
    whatsappNumber: SecretSource;
    /** Public webhook URL Twilio signs; derived from the request when unset. */
    webhookUrl?: string;
  };
  mediaBucketName?: string;
  processingQueueUrl?: string;
  historyLimit: number;
  agentMaxSteps: number;
  mediaFetchTimeoutMs: number;
}

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional()
);

const envSchema = z.object({
  DATABASE_URL: optionalString,
  DB_SECRET_ARN: optionalString,
  DB_HOST: optionalString,
  DB_NAME: z.string().default('keepsake'),

  OPENAI_API_KEY: optionalString,
  OPENAI_SECRET_ARN: optionalString,
  OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
  OPENAI_CHAT_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  MISTRAL_API_KEY: optionalString,
  MISTRAL_SECRET_ARN: optionalString,
  MISTRAL_BASE_URL: z.string().url().default('https://api.mistral.ai/v1'),
  MISTRAL_MODEL: z.string().default('pixtral-12b-2409'),
  MISTRAL_OCR_MODEL: z.string().default('mistral-ocr-latest'),
  MISTRAL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_WHATSAPP_NUMBER: optionalString,
  TWILIO_SECRET_ARN: optionalString,
  TWILIO_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),

  MEDIA_BUCKET_NAME: optionalString,
  PROCESSING_QUEUE_URL: optionalString,

  HISTORY_LIMIT: z.coerce.number().int().min(1).max(50).default(10),
  AGENT_MAX_STEPS: z.coerce.number().int().min(1).max(10).default(4),
  MEDIA_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type RawEnv = Record<string, string | undefined>;

export function loadConfig(env: RawEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${describeIssues(parsed.error)}`);
  }
  const e = parsed.data;

  return {
    database: {
      url: e.DATABASE_URL,
      secretArn: e.DB_SECRET_ARN,
      host: e.DB_HOST,
      name: e.DB_NAME,
    },
    openai: {
      apiKey: { key: 'OPENAI_API_KEY', secretArn: e.OPENAI_SECRET_ARN, fallback: e.OPENAI_API_KEY },
      baseUrl: e.OPENAI_BASE_URL,
      chatModel: e.OPENAI_CHAT_MODEL,
      embeddingModel: e.OPENAI_EMBEDDING_MODEL,
      timeoutMs: e.OPENAI_TIMEOUT_MS,
    },
    mistral: {
      apiKey: { key: 'MISTRAL_API_KEY', secretArn: e.MISTRAL_SECRET_ARN, fallback: e.MISTRAL_API_KEY },
      baseUrl: e.MISTRAL_BASE_URL,
      visionModel: e.MISTRAL_MODEL,
      ocrModel: e.MISTRAL_OCR_MODEL,
      timeoutMs: e.MISTRAL_TIMEOUT_MS,
    },
    twilio: {
      accountSid: { key: 'TWILIO_ACCOUNT_SID', secretArn: e.TWILIO_SECRET_ARN, fallback: e.TWILIO_ACCOUNT_SID },
      authToken: { key: 'TWILIO_AUTH_TOKEN', secretArn: e.TWILIO_SECRET_ARN, fallback: e.TWILIO_AUTH_TOKEN },
      whatsappNumber: {
        key: 'TWILIO_WHATSAPP_NUMBER',
        secretArn: e.TWILIO_SECRET_ARN,
        fallback: e.TWILIO_WHATSAPP_NUMBER,
      },
      webhookUrl: e.TWILIO_WEBHOOK_URL,
    },
    mediaBucketName: e.MEDIA_BUCKET_NAME,
    processingQueueUrl: e.PROCESSING_QUEUE_URL,
    historyLimit: e.HISTORY_LIMIT,
    agentMaxSteps: e.AGENT_MAX_STEPS,
    mediaFetchTimeoutMs: e.MEDIA_FETCH_TIMEOUT_MS,
  };
}

export function requireSetting(value: string | undefined, name: string): string {
  if (!value) throw new ConfigError(`${name} must be set`);
  return value;
}
