import type { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { z } from 'zod';
import { ConfigError, describeIssues, getSecretJson, requireSetting } from '@keepsake/shared';
import type { AppConfig } from '@keepsake/shared';
import { createDatabase } from './client';
import type { DatabaseHandle } from './client';
import { buildDatabaseUrl } from './url';
import type { SslMode } from './url';

export interface GetDatabaseFromSecretOverrides {
  host?: string;
  database?: string;
  sslmode?: SslMode;
}

/** Shape of the secret RDS generates for instance credentials. */
const rdsSecretSchema = z.object({
  username: z.string(),
  password: z.string(),
  host: z.string().optional(),
  port: z.coerce.number().int().positive().optional(),
  dbname: z.string().optional(),
});

const cache = new Map<string, DatabaseHandle>();

function cacheKey(secretArn: string, overrides?: GetDatabaseFromSecretOverrides): string {
  const host = overrides?.host ?? '';
  const database = overrides?.database ?? '';
  return `${secretArn}:${host}:${database}`;
}

/**
 * Get a database handle using credentials from AWS Secrets Manager.
 * Caches the handle by (secretArn, host, database) so the same Lambda container reuses one pool.
 */
export async function getDatabaseFromSecret(
  secretsClient: SecretsManagerClient,
  secretArn: string,
  overrides?: GetDatabaseFromSecretOverrides
): Promise<DatabaseHandle> {
  const key = cacheKey(secretArn, overrides);
  const cached = cache.get(key);
  if (cached) return cached;

  const parsed = rdsSecretSchema.safeParse(await getSecretJson(secretsClient, secretArn));
  if (!parsed.success) {
    throw new ConfigError(`Database secret is malformed: ${describeIssues(parsed.error)}`);
  }
  const secret = parsed.data;

  const url = buildDatabaseUrl({
    host: overrides?.host ?? secret.host ?? '',
    port: secret.port ?? 5432,
    username: secret.username,
    password: secret.password,
    database: overrides?.database ?? secret.dbname ?? 'keepsake',
    sslmode: overrides?.sslmode ?? 'no-verify',
  });

  const handle = createDatabase(url);
  cache.set(key, handle);
  return handle;
}

/** DATABASE_URL when set (local runs), otherwise the RDS secret. */
export async function openDatabase(
  config: AppConfig['database'],
  secretsClient: SecretsManagerClient
): Promise<DatabaseHandle> {
  if (config.url) return createDatabase(config.url);
  return getDatabaseFromSecret(secretsClient, requireSetting(config.secretArn, 'DB_SECRET_ARN'), {
    host: config.host,
    database: config.name,
  });
}
