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
import type {
  AssistantReply,
  ChatModel,
  CompletionRequest,
  Embedder,
  FetchedMedia,
  MediaFetcher,
  OutboundMessage,
  ReplySender,
  TextExtractor,
  ToolCompletionRequest,
} from '../ports';

/**
 * In-process stand-ins for the pipeline's collaborators. Each records what it was
 * asked to do so tests can assert on calls as well as results.
 */

const BASE_TIME = Date.parse('2026-01-01T00:00:00.000Z');

type StoreMethod = keyof RecordStoreGateway;

export class InMemoryRecordStore implements RecordStoreGateway {
  readonly jobs = new Map<string, Job>();
  readonly records: StoredRecord[] = [];
  readonly messages: Message[] = [];
  readonly blobs: { url: string; fileName: string; contentType: string; size: number }[] = [];
  readonly jobUpdates: { id: string; update: JobUpdate }[] = [];
  /** Make a method reject with the given error. */
  readonly failures: Partial<Record<StoreMethod, Error>> = {};

  private sequence = 0;

  private next(prefix: string): { id: string; at: string } {
    this.sequence += 1;
    return { id: `${prefix}-${this.sequence}`, at: new Date(BASE_TIME + this.sequence * 1000).toISOString() };
  }

  private check(method: StoreMethod): void {
    const failure = this.failures[method];
    if (failure) throw failure;
  }

  /** Insert a job in any shape, including ones the receiver would never create. */
  seedJob(fields: Partial<Job> & Pick<Job, 'jobType' | 'payload'>): Job {
    const { id, at } = this.next('job');
    const job: Job = {
      id,
      sender: 'whatsapp:+15550001111',
      correlationId: `SM-${id}`,
      status: 'pending',
      result: null,
      error: null,
      createdAt: at,
      updatedAt: at,
      ...fields,
    };
    this.jobs.set(job.id, job);
    return job;
  }

  async createJob(job: NewJob): Promise<Job> {
    this.check('createJob');
    return this.seedJob({ ...job, payload: { ...job.payload } });
  }

  async getJob(id: string): Promise<Job | null> {
    this.check('getJob');
    return this.jobs.get(id) ?? null;
  }

  async updateJob(id: string, update: JobUpdate): Promise<Job | null> {
    this.check('updateJob');
    const job = this.jobs.get(id);
    if (!job) return null;
    this.jobUpdates.push({ id, update });

    const updated: Job = { ...job, status: update.status, updatedAt: this.next('tick').at };
    if (update.status === 'completed') {
      updated.result = update.result;
      updated.error = null;
    } else if (update.status === 'failed') {
      updated.error = update.error;
      updated.result = null;
    }
    this.jobs.set(id, updated);
    return updated;
  }

  async saveRecord(record: NewRecord): Promise<StoredRecord> {
    this.check('saveRecord');
    const { id, at } = this.next('rec');
    const stored: StoredRecord = {
      id,
      sender: record.sender,
      correlationId: record.correlationId,
      recordType: record.recordType,
      ocrText: record.ocrText ?? null,
      userText: record.userText ?? null,
      embedding: record.embedding,
      storageUrls: record.storageUrls ?? [],
      metadata: record.metadata,
      createdAt: at,
    };
    this.records.push(stored);
    return stored;
  }

  async saveMessage(message: NewMessage): Promise<Message> {
    this.check('saveMessage');
    const { id, at } = this.next('msg');
    const stored: Message = { id, metadata: {}, createdAt: at, ...message };
    this.messages.push(stored);
    return stored;
  }

  async getRecentMessages(sender: string, limit: number): Promise<Message[]> {
    this.check('getRecentMessages');
    return this.messages
      .filter((m) => m.sender === sender)
      .reverse()
      .slice(0, limit);
  }

  async getRecentRecords(sender: string, limit: number): Promise<StoredRecord[]> {
    this.check('getRecentRecords');
    return this.records
      .filter((r) => r.sender === sender)
      .reverse()
      .slice(0, limit);
  }

  async matchRecords(sender: string, embedding: number[], topK: number): Promise<RecordMatch[]> {
    this.check('matchRecords');
    if (embedding.length === 0) return [];
    const matches: RecordMatch[] = [];
    for (const record of this.records) {
      if (record.sender !== sender || !record.embedding) continue;
      matches.push({ ...record, similarity: cosineSimilarity(record.embedding, embedding) });
    }
    return matches.sort((a, b) => b.similarity - a.similarity).slice(0, topK);
  }

  async uploadBlob(bytes: Uint8Array, fileName: string, contentType: string): Promise<string> {
    this.check('uploadBlob');
    const url = `https://blobs.test/${this.blobs.length + 1}/${fileName}?signature=test`;
    this.blobs.push({ url, fileName, contentType, size: bytes.byteLength });
    return url;
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  return normA === 0 || normB === 0 ? 0 : dot / Math.sqrt(normA * normB);
}

/** Hashed bag-of-words vectors: texts sharing words score as similar. */
export class FakeEmbedder implements Embedder {
  readonly inputs: string[] = [];
  failWith?: Error;

  constructor(private readonly dimensions = 16) {}

  async embed(text: string): Promise<number[]> {
    if (this.failWith) throw this.failWith;
    const input = text.trim();
    if (!input) return [];
    this.inputs.push(input);

    const vector = new Array<number>(this.dimensions).fill(0);
    for (const word of input.toLowerCase().split(/\W+/).filter(Boolean)) {
      let hash = 0;
      for (const ch of word) hash = (hash * 31 + ch.charCodeAt(0)) % this.dimensions;
      vector[hash] = (vector[hash] ?? 0) + 1;
    }
    return vector;
  }
}

/**
 * Chat model driven by scripted outputs. `complete` pops from `completions`;
 * `completeWithTools` pops from `replies`, then repeats `fallbackReply` if set.
 */
export class ScriptedChatModel implements ChatModel {
  readonly completeRequests: CompletionRequest[] = [];
  readonly toolRequests: ToolCompletionRequest[] = [];
  readonly completions: string[] = [];
  readonly replies: AssistantReply[] = [];
  fallbackReply?: AssistantReply;
  failWith?: Error;

  async complete(request: CompletionRequest): Promise<string> {
    this.completeRequests.push(request);
    if (this.failWith) throw this.failWith;
    const output = this.completions.shift();
    if (output === undefined) throw new Error('No scripted completion left');
    return output;
  }

  async completeWithTools(request: ToolCompletionRequest): Promise<AssistantReply> {
    // snapshot the transcript; the agent keeps appending to the same array
    this.toolRequests.push({ ...request, messages: [...request.messages] });
    if (this.failWith) throw this.failWith;
    const reply = this.replies.shift() ?? this.fallbackReply;
    if (!reply) throw new Error('No scripted reply left');
    return reply;
  }
}

export class FakeMediaFetcher implements MediaFetcher {
  readonly fetched: string[] = [];
  readonly failures = new Map<string, Error>();

  constructor(private readonly contentType = 'image/jpeg') {}

  async fetch(url: string): Promise<FetchedMedia> {
    this.fetched.push(url);
    const failure = this.failures.get(url);
    if (failure) throw failure;
    return { bytes: new TextEncoder().encode(url), contentType: this.contentType };
  }
}

/** Returns `texts` in call order; '' once they run out. */
export class FakeTextExtractor implements TextExtractor {
  readonly calls: { url: string; contentType?: string }[] = [];
  failWith?: Error;

  constructor(private readonly texts: string[] = []) {}

  async extract(url: string, contentType?: string): Promise<string> {
    this.calls.push({ url, contentType });
    if (this.failWith) throw this.failWith;
    return this.texts[this.calls.length - 1] ?? '';
  }
}

export class RecordingReplySender implements ReplySender {
  readonly sent: OutboundMessage[] = [];
  failWith?: Error;

  async send(message: OutboundMessage): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.sent.push(message);
  }
}
