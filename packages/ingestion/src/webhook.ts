import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from 'aws-lambda';
import twilio from 'twilio';
import { errorMessage, logger } from '@keepsake/shared';
import type { JobPayload, JobType, RecordStoreGateway } from '@keepsake/shared';
import type { JobQueue } from './job-queue';
import { decodeBody, parseForm, parseInboundMessage } from './twilio-form';
import type { InboundMessage } from './twilio-form';

export const HELP_TEXT = 'Please send a receipt image or PDF, or ask a question about your receipts.';
export const ENQUEUE_FAILED_TEXT = "❌ Sorry, I couldn't start processing your message. Please try again later.";
export const WEBHOOK_ERROR_TEXT = 'Sorry, an error occurred processing your request. Please try again.';

export interface WebhookRequest {
  method: string;
  path: string;
  /** Lower-cased header names. */
  headers: Record<string, string | undefined>;
  body: string;
  /** Full URL Twilio posted to, as used for signing. */
  url: string;
}

export type WebhookResponse = Required<Pick<APIGatewayProxyStructuredResultV2, 'statusCode' | 'headers' | 'body'>>;

export interface WebhookDeps {
  store: Pick<RecordStoreGateway, 'saveMessage' | 'createJob'>;
  queue: JobQueue;
  /** When set, every post must carry a valid X-Twilio-Signature. */
  authToken?: string;
  now?: () => Date;
}

export function requestFromEvent(event: APIGatewayProxyEventV2, publicUrl?: string): WebhookRequest {
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(event.headers ?? {})) {
    headers[name.toLowerCase()] = value;
  }
  const query = event.rawQueryString ? `?${event.rawQueryString}` : '';
  return {
    method: event.requestContext.http.method.toUpperCase(),
    path: event.rawPath,
    headers,
    body: decodeBody(event.body, event.isBase64Encoded),
    url: publicUrl ?? `https://${event.requestContext.domainName}${event.rawPath}${query}`,
  };
}

export function twimlResponse(message?: string, statusCode = 200): WebhookResponse {
  const twiml = new twilio.twiml.MessagingResponse();
  if (message) twiml.message(message);
  return { statusCode, headers: { 'Content-Type': 'text/xml' }, body: twiml.toString() };
}

function jsonResponse(statusCode: number, body: unknown): WebhookResponse {
  return { statusCode, headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) };
}

function plainResponse(statusCode: number, body: string): WebhookResponse {
  return { statusCode, headers: { 'Content-Type': 'text/plain' }, body };
}

/** Media wins over text; a post with neither yields no job. */
export function jobFromMessage(message: InboundMessage): { jobType: JobType; payload: JobPayload } | null {
  if (message.media.length > 0) {
    return {
      jobType: 'media',
      payload: {
        mediaUrls: message.media.map((m) => m.url),
        ...(message.body ? { caption: message.body } : {}),
      },
    };
  }
  if (message.body) {
    return { jobType: 'text', payload: { text: message.body } };
  }
  return null;
}

/**
 * Twilio WhatsApp webhook: record the inbound message, create a pending job and
 * queue it. The reply itself is sent later by the processor, so a successful post
 * answers with an empty TwiML document.
 */
export function createWebhookHandler(deps: WebhookDeps) {
  const now = deps.now ?? (() => new Date());

  async function accept(message: InboundMessage): Promise<WebhookResponse> {
    const job = jobFromMessage(message);
    if (!job) return twimlResponse(HELP_TEXT);

    const mediaUrls = message.media.map((m) => m.url);
    try {
      await deps.store.saveMessage({
        sender: message.from,
        direction: 'in',
        role: 'user',
        correlationId: message.messageSid,
        content: message.body || `[media] ${mediaUrls.join(', ')}`,
        metadata: mediaUrls.length > 0 ? { mediaUrls } : {},
      });
    } catch (err) {
      logger.error('Failed to save incoming message', { sender: message.from, error: errorMessage(err) });
    }

    const created = await deps.store.createJob({
      sender: message.from,
      correlationId: message.messageSid,
      jobType: job.jobType,
      payload: job.payload,
    });
    logger.jobLifecycle(created.id, 'INGESTION', 'Job created', {
      sender: message.from,
      jobType: job.jobType,
      mediaCount: mediaUrls.length,
    });

    try {
      await deps.queue.enqueue({ jobId: created.id, enqueuedAt: now().toISOString() });
      logger.jobLifecycle(created.id, 'INGESTION', 'Job enqueued');
    } catch (err) {
      logger.error('Failed to enqueue job', { jobId: created.id, error: errorMessage(err) });
      return twimlResponse(ENQUEUE_FAILED_TEXT);
    }
    return twimlResponse();
  }

  return async (req: WebhookRequest): Promise<WebhookResponse> => {
    if (req.method === 'GET' && req.path === '/health') {
      return jsonResponse(200, { status: 'healthy' });
    }
    if (req.method !== 'POST' || req.path !== '/webhook') {
      return plainResponse(404, 'Not Found');
    }

    const params = parseForm(req.body);
    if (deps.authToken) {
      const signature = req.headers['x-twilio-signature'];
      if (!signature || !twilio.validateRequest(deps.authToken, signature, req.url, params)) {
        logger.warn('Rejected webhook with invalid signature', { url: req.url });
        return plainResponse(403, 'Forbidden');
      }
    }

    try {
      return await accept(parseInboundMessage(params));
    } catch (err) {
      logger.error('Webhook error', { error: errorMessage(err) });
      return twimlResponse(WEBHOOK_ERROR_TEXT, 500);
    }
  };
}
