import type { Job, JobResult, RecordStoreGateway } from '@keepsake/shared';
import {
  InvalidPayloadError,
  JOB_STATUS,
  JobNotFoundError,
  StorageError,
  UnsupportedJobTypeError,
  describeIssues,
  errorCode,
  errorMessage,
  logger,
  mediaJobPayloadSchema,
  textJobPayloadSchema,
} from '@keepsake/shared';
import type { ErrorCode } from '@keepsake/shared';
import type { RetrievalAgent } from './agent/retrieval-agent';
import type { IntentClassifier } from './intent';
import type { MediaIngestion } from './media-ingestion';
import type { NoteIngestion } from './note-ingestion';
import type { ReplySender } from './ports';

export const APOLOGY_TEXT = 'Sorry, your request could not be processed. Please try again later.';
export const EMPTY_ANSWER_TEXT = "I couldn't generate an answer.";

export type ProcessOutcome =
  | { success: true; jobId: string; result: JobResult; delivered: boolean }
  | { success: false; jobId: string; code: ErrorCode; error: string };

export interface JobProcessorDeps {
  store: RecordStoreGateway;
  mediaIngestion: MediaIngestion;
  noteIngestion: NoteIngestion;
  intentClassifier: IntentClassifier;
  retrievalAgent: RetrievalAgent;
  replySender: ReplySender;
  /** Address replies are sent from. */
  replyFrom: string;
  historyLimit?: number;
}

export function mediaReplyText(mediaCount: number, recordId: string): string {
  return `✅ Saved ${mediaCount} file(s) as a record.\nRecord ID: ${recordId}`;
}

export function noteReplyText(recordId: string): string {
  return `✅ Saved your note.\nRecord ID: ${recordId}`;
}

/**
 * Drives one job through pending → processing → completed | failed and replies to
 * the sender. `process` never throws: every failure ends in a failed outcome, and
 * every job it finds is left in a terminal status.
 */
export class JobProcessor {
  private readonly historyLimit: number;

  constructor(private readonly deps: JobProcessorDeps) {
    this.historyLimit = deps.historyLimit ?? 10;
  }

  async process(jobId: string): Promise<ProcessOutcome> {
    const start = Date.now();

    let job: Job | null;
    try {
      job = await this.deps.store.getJob(jobId);
    } catch (err) {
      logger.error('Failed to load job', { jobId, error: errorMessage(err) });
      return { success: false, jobId, code: 'STORE_ERROR', error: errorMessage(err) };
    }
    if (!job) {
      const notFound = new JobNotFoundError(jobId);
      logger.warn(notFound.message, { jobId });
      return { success: false, jobId, code: notFound.code, error: notFound.message };
    }

    logger.jobLifecycle(jobId, 'PROCESSING', 'Starting processing', {
      sender: job.sender,
      jobType: job.jobType,
    });

    let result: JobResult;
    try {
      await this.deps.store.updateJob(jobId, { status: JOB_STATUS.PROCESSING });
      result = await this.dispatch(job);
      await this.deps.store.updateJob(jobId, { status: JOB_STATUS.COMPLETED, result });
    } catch (err) {
      return this.fail(job, err, start);
    }

    logger.jobLifecycle(jobId, 'COMPLETED', 'Processing completed', { durationMs: Date.now() - start });
    const delivered = await this.deliverReply(job, result.replyText);
    return { success: true, jobId, result, delivered };
  }

  private async dispatch(job: Job): Promise<JobResult> {
    switch (job.jobType) {
      case 'media':
        return this.handleMedia(job);
      case 'text':
        return this.handleText(job);
      default:
        throw new UnsupportedJobTypeError(job.jobType);
    }
  }

  private async handleMedia(job: Job): Promise<JobResult> {
    const parsed = mediaJobPayloadSchema.safeParse(job.payload);
    if (!parsed.success) {
      throw new InvalidPayloadError(`Invalid media payload: ${describeIssues(parsed.error)}`);
    }

    const { recordId, mediaCount } = await this.deps.mediaIngestion.ingest({
      mediaUrls: parsed.data.mediaUrls,
      sender: job.sender,
      correlationId: job.correlationId,
      caption: parsed.data.caption,
    });
    return { replyText: mediaReplyText(mediaCount, recordId), recordId, mediaCount };
  }

  private async handleText(job: Job): Promise<JobResult> {
    const parsed = textJobPayloadSchema.safeParse(job.payload);
    if (!parsed.success) {
      throw new InvalidPayloadError(`Invalid text payload: ${describeIssues(parsed.error)}`);
    }
    const text = parsed.data.text;

    const history = await this.deps.store.getRecentMessages(job.sender, this.historyLimit).catch((err: unknown) => {
      throw new StorageError(`Failed to load history: ${errorMessage(err)}`, { cause: err });
    });
    const intent = await this.deps.intentClassifier.classify(text, history);
    logger.jobLifecycle(job.id, 'INTENT', 'Intent detected', { intent });

    if (intent === 'save_record') {
      const { recordId } = await this.deps.noteIngestion.ingest({
        text,
        sender: job.sender,
        correlationId: job.correlationId,
      });
      return { replyText: noteReplyText(recordId), recordId };
    }

    const answer = await this.deps.retrievalAgent.answer({ sender: job.sender, question: text, history });
    return { replyText: answer || EMPTY_ANSWER_TEXT };
  }

  private async fail(job: Job, err: unknown, start: number): Promise<ProcessOutcome> {
    const error = errorMessage(err);
    const code = errorCode(err);
    logger.error('Processing failed', {
      jobId: job.id,
      sender: job.sender,
      code,
      durationMs: Date.now() - start,
      error,
    });

    try {
      await this.deps.store.updateJob(job.id, { status: JOB_STATUS.FAILED, error });
    } catch (updateErr) {
      logger.error('Failed to record job failure', { jobId: job.id, error: errorMessage(updateErr) });
    }

    try {
      await this.deps.replySender.send({ to: job.sender, from: this.deps.replyFrom, body: APOLOGY_TEXT });
    } catch (sendErr) {
      logger.warn('Failed to deliver apology', { jobId: job.id, error: errorMessage(sendErr) });
    }

    return { success: false, jobId: job.id, code, error };
  }

  /** Sends the reply and records it as an outbound message; neither step can undo completion. */
  private async deliverReply(job: Job, replyText: string): Promise<boolean> {
    let delivered = false;
    try {
      await this.deps.replySender.send({ to: job.sender, from: this.deps.replyFrom, body: replyText });
      delivered = true;
    } catch (err) {
      logger.warn('Reply delivery failed', { jobId: job.id, sender: job.sender, error: errorMessage(err) });
    }

    try {
      await this.deps.store.saveMessage({
        sender: job.sender,
        direction: 'out',
        role: 'assistant',
        correlationId: job.correlationId,
        content: replyText,
        metadata: { jobId: job.id, delivered },
      });
    } catch (err) {
      logger.warn('Failed to save outbound message', { jobId: job.id, error: errorMessage(err) });
    }
    return delivered;
  }
}
