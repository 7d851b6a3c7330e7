import { MAX_MEDIA_PER_MESSAGE } from '@keepsake/shared';

export interface InboundMedia {
  url: string;
  contentType?: string;
}

/** The fields of a Twilio WhatsApp webhook post the pipeline uses. */
export interface InboundMessage {
  from: string;
  messageSid: string;
  body: string;
  media: InboundMedia[];
}

export type FormParams = Record<string, string>;

export function decodeBody(body: string | undefined, isBase64Encoded: boolean): string {
  if (!body) return '';
  return isBase64Encoded ? Buffer.from(body, 'base64').toString('utf8') : body;
}

/** application/x-www-form-urlencoded → flat params; the last value wins for repeated keys. */
export function parseForm(body: string): FormParams {
  return Object.fromEntries(new URLSearchParams(body));
}

function declaredMediaCount(params: FormParams): number {
  const declared = Number.parseInt(params.NumMedia ?? '', 10);
  if (!Number.isFinite(declared)) return MAX_MEDIA_PER_MESSAGE;
  return Math.min(Math.max(declared, 0), MAX_MEDIA_PER_MESSAGE);
}

/**
 * Media comes as MediaUrl0..N with matching MediaContentTypeN. Only the first
 * `NumMedia` slots are read, and never more than the per-message cap.
 */
export function parseInboundMessage(params: FormParams): InboundMessage {
  const media: InboundMedia[] = [];
  const count = declaredMediaCount(params);
  for (let i = 0; i < count; i++) {
    const url = params[`MediaUrl${i}`]?.trim();
    if (!url) continue;
    const contentType = params[`MediaContentType${i}`]?.trim();
    media.push(contentType ? { url, contentType } : { url });
  }

  return {
    from: params.From?.trim() ?? '',
    messageSid: params.MessageSid?.trim() ?? '',
    body: params.Body?.trim() ?? '',
    media,
  };
}
