import type { Job, Message, RecordMatch, StoredRecord } from '@keepsake/shared';
import type { JobRow, MessageRow, RecordRow } from './schema';

export function toJob(row: JobRow): Job {
  return {
    id: row.id,
    sender: row.sender,
    correlationId: row.correlationId,
    jobType: row.jobType,
    payload: row.payload,
    status: row.status,
    result: row.result ?? null,
    error: row.error ?? null,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

export function toRecord(row: RecordRow): StoredRecord {
  return {
    id: row.id,
    sender: row.sender,
    correlationId: row.correlationId,
    recordType: row.recordType,
    ocrText: row.ocrText ?? null,
    userText: row.userText ?? null,
    embedding: row.embedding && row.embedding.length > 0 ? row.embedding : null,
    storageUrls: row.storageUrls,
    metadata: row.metadata,
    createdAt: row.createdAt.toISOString(),
  };
}

export function toRecordMatch(row: RecordRow & { similarity: number }): RecordMatch {
  return { ...toRecord(row), similarity: row.similarity };
}

export function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    sender: row.sender,
    direction: row.direction,
    role: row.role,
    correlationId: row.correlationId,
    content: row.content,
    metadata: row.metadata,
    createdAt: row.createdAt.toISOString(),
  };
}
