import { and, cosineDistance, desc, eq, getTableColumns, isNotNull, sql } from 'drizzle-orm';
import { JOB_STATUS, StorageError } from '@keepsake/shared';
import type {
  Job,
  JobUpdate,
  Message,
  NewJob,
  NewMessage,
  NewRecord,
  RecordMatch,
  RecordStoreGateway,
  StoredRecord,
} from '@keepsake/shared';
import type { BlobStore } from './blob-store';
import type { Database } from './client';
import { toJob, toMessage, toRecord, toRecordMatch } from './mappers';
import { jobs, messages, records } from './schema';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function columnsForUpdate(update: JobUpdate) {
  switch (update.status) {
    case JOB_STATUS.PROCESSING:
      return { status: update.status };
    case JOB_STATUS.COMPLETED:
      return { status: update.status, result: update.result, error: null };
    case JOB_STATUS.FAILED:
      return { status: update.status, error: update.error, result: null };
  }
}

/** Record store gateway over Postgres (pgvector) for rows and a blob store for media. */
export class PgRecordStore implements RecordStoreGateway {
  constructor(
    private readonly db: Database,
    /** Omitted where only jobs and messages are written, e.g. the webhook. */
    private readonly blobs?: BlobStore
  ) {}

  async createJob(job: NewJob): Promise<Job> {
    const [row] = await this.db
      .insert(jobs)
      .values({
        sender: job.sender,
        correlationId: job.correlationId,
        jobType: job.jobType,
        payload: { ...job.payload },
      })
      .returning();
    if (!row) throw new StorageError('Failed to create job');
    return toJob(row);
  }

  async getJob(id: string): Promise<Job | null> {
    // ids are uuids; anything else cannot exist and would make Postgres reject the cast
    if (!UUID_PATTERN.test(id)) return null;
    const [row] = await this.db.select().from(jobs).where(eq(jobs.id, id)).limit(1);
    return row ? toJob(row) : null;
  }

  async updateJob(id: string, update: JobUpdate): Promise<Job | null> {
    if (!UUID_PATTERN.test(id)) return null;
    const [row] = await this.db
      .update(jobs)
      .set({ ...columnsForUpdate(update), updatedAt: new Date() })
      .where(eq(jobs.id, id))
      .returning();
    return row ? toJob(row) : null;
  }

  async saveRecord(record: NewRecord): Promise<StoredRecord> {
    const [row] = await this.db
      .insert(records)
      .values({
        sender: record.sender,
        correlationId: record.correlationId,
        recordType: record.recordType,
        ocrText: record.ocrText ?? null,
        userText: record.userText ?? null,
        embedding: record.embedding,
        storageUrls: record.storageUrls ?? [],
        metadata: record.metadata,
      })
      .returning();
    if (!row) throw new StorageError('Failed to save record to database');
    return toRecord(row);
  }

  async saveMessage(message: NewMessage): Promise<Message> {
    const [row] = await this.db
      .insert(messages)
      .values({
        sender: message.sender,
        direction: message.direction,
        role: message.role,
        correlationId: message.correlationId,
        content: message.content,
        metadata: message.metadata ?? {},
      })
      .returning();
    if (!row) throw new StorageError('Failed to save message to database');
    return toMessage(row);
  }

  async getRecentMessages(sender: string, limit: number): Promise<Message[]> {
    const rows = await this.db
      .select()
      .from(messages)
      .where(eq(messages.sender, sender))
      .orderBy(desc(messages.createdAt))
      .limit(limit);
    return rows.map(toMessage);
  }

  async getRecentRecords(sender: string, limit: number): Promise<StoredRecord[]> {
    const rows = await this.db
      .select()
      .from(records)
      .where(eq(records.sender, sender))
      .orderBy(desc(records.createdAt))
      .limit(limit);
    return rows.map(toRecord);
  }

  async matchRecords(sender: string, embedding: number[], topK: number): Promise<RecordMatch[]> {
    if (embedding.length === 0) return [];

    const distance = cosineDistance(records.embedding, embedding);
    const rows = await this.db
      .select({
        ...getTableColumns(records),
        similarity: sql<number>`1 - (${distance})`.mapWith(Number),
      })
      .from(records)
      .where(and(eq(records.sender, sender), isNotNull(records.embedding)))
      .orderBy(distance)
      .limit(topK);
    return rows.map(toRecordMatch);
  }

  async uploadBlob(bytes: Uint8Array, fileName: string, contentType: string): Promise<string> {
    if (!this.blobs) throw new StorageError('No blob store configured');
    return this.blobs.upload(bytes, fileName, contentType);
  }
}
