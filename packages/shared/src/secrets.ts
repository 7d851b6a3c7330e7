import { GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import type { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { ConfigError } from './errors';
import type { SecretSource } from './config';

type SecretJson = Record<string, unknown>;

const cache = new Map<string, Promise<SecretJson>>();

async function fetchSecretJson(client: SecretsManagerClient, secretArn: string): Promise<SecretJson> {
  const res = await client.send(new GetSecretValueCommand({ SecretId: secretArn }));
  const parsed: unknown = JSON.parse(res.SecretString ?? '{}');
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Secret ${secretArn} is not a JSON object`);
  }
  return { ...parsed };
}

/**
 * Read a JSON secret once per container. A failed read is evicted so the next
 * invocation tries again.
 */
export function getSecretJson(client: SecretsManagerClient, secretArn: string): Promise<SecretJson> {
  const cached = cache.get(secretArn);
  if (cached) return cached;

  const pending = fetchSecretJson(client, secretArn);
  cache.set(secretArn, pending);
  void pending.catch(() => cache.delete(secretArn));
  return pending;
}

export async function resolveSecret(client: SecretsManagerClient, source: SecretSource): Promise<string> {
  if (source.secretArn) {
    const secret = await getSecretJson(client, source.secretArn);
    const value = secret[source.key];
    if (typeof value === 'string' && value) return value;
  }
  if (source.fallback) return source.fallback;
  throw new ConfigError(`${source.key} not found in secret or env`);
}

/** Whether the source names anywhere to read the value from. */
export function isSecretConfigured(source: SecretSource): boolean {
  return Boolean(source.secretArn || source.fallback);
}

export function clearSecretCache(): void {
  cache.clear();
}
