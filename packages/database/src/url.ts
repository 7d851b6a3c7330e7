/**
 * Build a PostgreSQL connection URL from config.
 * Use this with credentials from env, Secrets Manager, or similar.
 */

export type SslMode = 'disable' | 'require' | 'no-verify';

export interface DatabaseUrlConfig {
  host: string;
  port?: number;
  username: string;
  password: string;
  database: string;
  sslmode?: SslMode;
}

/**
 * Build a `postgresql://` URL from config. Username and password are URI-encoded.
 */
export function buildDatabaseUrl(config: DatabaseUrlConfig): string {
  const port = config.port ?? 5432;
  const username = encodeURIComponent(config.username);
  const password = encodeURIComponent(config.password);
  const base = `postgresql://${username}:${password}@${config.host}:${port}/${config.database}`;
  return config.sslmode ? `${base}?sslmode=${config.sslmode}` : base;
}
