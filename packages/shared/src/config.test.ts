import { describe, it, expect } from 'vitest';
import { loadConfig, requireSetting } from './config';
import { ConfigError } from './errors';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.database.name).toBe('keepsake');
    expect(config.openai.chatModel).toBe('gpt-4o-mini');
    expect(config.openai.embeddingModel).toBe('text-embedding-3-small');
    expect(config.mistral.visionModel).toBe('pixtral-12b-2409');
    expect(config.mistral.baseUrl).toBe('https://api.mistral.ai/v1');
    expect(config.historyLimit).toBe(10);
    expect(config.agentMaxSteps).toBe(4);
    expect(config.mediaFetchTimeoutMs).toBe(30_000);
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ OPENAI_BASE_URL: '  ', MEDIA_BUCKET_NAME: '' });

    expect(config.openai.baseUrl).toBeUndefined();
    expect(config.mediaBucketName).toBeUndefined();
  });

  it('coerces numeric settings', () => {
    const config = loadConfig({ HISTORY_LIMIT: '6', AGENT_MAX_STEPS: '2' });

    expect(config.historyLimit).toBe(6);
    expect(config.agentMaxSteps).toBe(2);
  });

  it('wires secret sources with env fallbacks', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-openai-key',
      TWILIO_SECRET_ARN: 'arn:aws:secretsmanager:us-east-1:000000000000:secret:twilio',
    });

    expect(config.openai.apiKey).toEqual({
      key: 'OPENAI_API_KEY',
      secretArn: undefined,
      fallback: 'test-openai-key',
    });
    expect(config.twilio.authToken.secretArn).toBe(
      'arn:aws:secretsmanager:us-east-1:000000000000:secret:twilio'
    );
    expect(config.twilio.authToken.key).toBe('TWILIO_AUTH_TOKEN');
  });

  it('rejects invalid values with a ConfigError', () => {
    expect(() => loadConfig({ AGENT_MAX_STEPS: 'many' })).toThrow(ConfigError);
    expect(() => loadConfig({ OPENAI_BASE_URL: 'not a url' })).toThrow(/OPENAI_BASE_URL/);
  });
});

describe('requireSetting', () => {
  it('returns present values', () => {
    expect(requireSetting('bucket', 'MEDIA_BUCKET_NAME')).toBe('bucket');
  });

  it('throws for missing values', () => {
    expect(() => requireSetting(undefined, 'MEDIA_BUCKET_NAME')).toThrow('MEDIA_BUCKET_NAME must be set');
  });
});
