/**
 * @keepsake/database
 * drizzle-orm schema, pg client and the record store gateway (PostgreSQL + pgvector, S3).
 *
 * Usage:
 *   const { db } = await openDatabase(config.database, secrets);
 *   const store = new PgRecordStore(db, new S3BlobStore(s3, bucket));
 */

export { createDatabase } from './client';
export type { Database, DatabaseHandle, CreateDatabaseOptions } from './client';
export { getDatabaseFromSecret, openDatabase } from './secret-client';
export type { GetDatabaseFromSecretOverrides } from './secret-client';
export { buildDatabaseUrl } from './url';
export type { DatabaseUrlConfig, SslMode } from './url';
export { PgRecordStore } from './store';
export { S3BlobStore, fileExtension } from './blob-store';
export type { BlobStore, S3BlobStoreOptions } from './blob-store';
export * as schema from './schema';
