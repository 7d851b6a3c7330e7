/**
 * Shared types for the Keepsake capture pipeline.
 */

export type JobType = 'media' | 'text';

export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed';

export const JOB_STATUS = {
  PENDING: 'pending' as const,
  PROCESSING: 'processing' as const,
  COMPLETED: 'completed' as const,
  FAILED: 'failed' as const,
};

export interface MediaJobPayload {
  mediaUrls: string[];
  caption?: string;
}

export interface TextJobPayload {
  text: string;
}

export type JobPayload = MediaJobPayload | TextJobPayload;

export interface JobResult {
  replyText: string;
  recordId?: string;
  mediaCount?: number;
}

export interface Job {
  id: string;
  sender: string;
  correlationId: string;
  /** Stored as free text; only `media` and `text` are dispatched. */
  jobType: string;
  payload: Record<string, unknown>;
  status: JobStatus;
  result: JobResult | null;
  error: string | null;
  createdAt: string; // ISO
  updatedAt: string; // ISO
}

export interface NewJob {
  sender: string;
  correlationId: string;
  jobType: JobType;
  payload: JobPayload;
}

export type JobUpdate =
  | { status: typeof JOB_STATUS.PROCESSING }
  | { status: typeof JOB_STATUS.COMPLETED; result: JobResult }
  | { status: typeof JOB_STATUS.FAILED; error: string };

export type RecordType = 'media' | 'note';

export interface RecordMetadata {
  source: string;
  mediaCount?: number;
  caption?: string;
  [key: string]: unknown;
}

export interface StoredRecord {
  id: string;
  sender: string;
  correlationId: string;
  recordType: RecordType;
  ocrText: string | null;
  userText: string | null;
  embedding: number[] | null;
  storageUrls: string[];
  metadata: RecordMetadata;
  createdAt: string;
}

export interface NewRecord {
  sender: string;
  correlationId: string;
  recordType: RecordType;
  ocrText?: string;
  userText?: string;
  embedding: number[] | null;
  storageUrls?: string[];
  metadata: RecordMetadata;
}

export interface RecordMatch extends StoredRecord {
  similarity: number;
}

export type MessageDirection = 'in' | 'out';

export type MessageRole = 'user' | 'assistant' | 'system';

export interface Message {
  id: string;
  sender: string;
  direction: MessageDirection;
  role: MessageRole;
  correlationId: string;
  content: string;
  metadata: Record<string, unknown>;
  createdAt: string;
}

export interface NewMessage {
  sender: string;
  direction: MessageDirection;
  role: MessageRole;
  correlationId: string;
  content: string;
  metadata?: Record<string, unknown>;
}

/** Body of the message placed on the processing queue. */
export interface JobQueueMessage {
  jobId: string;
  enqueuedAt: string;
}

/**
 * Narrow persistence surface used by the pipeline. Implemented over Postgres and S3
 * in `@keepsake/database`, and in memory for tests.
 */
export interface RecordStoreGateway {
  createJob(job: NewJob): Promise<Job>;
  getJob(id: string): Promise<Job | null>;
  updateJob(id: string, update: JobUpdate): Promise<Job | null>;
  saveRecord(record: NewRecord): Promise<StoredRecord>;
  saveMessage(message: NewMessage): Promise<Message>;
  /** Most recent first. */
  getRecentMessages(sender: string, limit: number): Promise<Message[]>;
  /** Most recent first. */
  getRecentRecords(sender: string, limit: number): Promise<StoredRecord[]>;
  /** Ordered by descending similarity; records without an embedding never match. */
  matchRecords(sender: string, embedding: number[], topK: number): Promise<RecordMatch[]>;
  /** Stores the bytes and returns a time-limited URL to read them back. */
  uploadBlob(bytes: Uint8Array, fileName: string, contentType: string): Promise<string>;
}

/** The text a record carries, whichever column it lives in. */
export function recordText(record: Pick<StoredRecord, 'ocrText' | 'userText'>): string {
  return record.ocrText || record.userText || '';
}
