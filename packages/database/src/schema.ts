import { jsonb, pgTable, text, timestamp, uuid, vector } from 'drizzle-orm/pg-core';
import type { JobResult, RecordMetadata } from '@keepsake/shared';

/** Mirrors sql/0001_init.sql. */

export const EMBEDDING_DIMENSIONS = 1536;

export const records = pgTable('records', {
  id: uuid('id').defaultRandom().primaryKey(),
  sender: text('sender').notNull(),
  correlationId: text('correlation_id').notNull().default(''),
  recordType: text('record_type', { enum: ['media', 'note'] }).notNull(),
  ocrText: text('ocr_text'),
  userText: text('user_text'),
  embedding: vector('embedding', { dimensions: EMBEDDING_DIMENSIONS }),
  storageUrls: jsonb('storage_urls').$type<string[]>().notNull().default([]),
  metadata: jsonb('metadata').$type<RecordMetadata>().notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const messages = pgTable('messages', {
  id: uuid('id').defaultRandom().primaryKey(),
  sender: text('sender').notNull(),
  direction: text('direction', { enum: ['in', 'out'] }).notNull(),
  role: text('role', { enum: ['user', 'assistant', 'system'] }).notNull(),
  correlationId: text('correlation_id').notNull().default(''),
  content: text('content').notNull(),
  metadata: jsonb('metadata').$type<Record<string, unknown>>().notNull().default({}),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const jobs = pgTable('jobs', {
  id: uuid('id').defaultRandom().primaryKey(),
  sender: text('sender').notNull(),
  correlationId: text('correlation_id').notNull().default(''),
  jobType: text('job_type').notNull(),
  payload: jsonb('payload').$type<Record<string, unknown>>().notNull(),
  status: text('status', { enum: ['pending', 'processing', 'completed', 'failed'] })
    .notNull()
    .default('pending'),
  result: jsonb('result').$type<JobResult>(),
  error: text('error'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export type RecordRow = typeof records.$inferSelect;
export type MessageRow = typeof messages.$inferSelect;
export type JobRow = typeof jobs.$inferSelect;
