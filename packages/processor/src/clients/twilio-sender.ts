import twilio from 'twilio';
import type { OutboundMessage, ReplySender } from '../ports';

/** WhatsApp caps a single message body at 1600 characters. */
export const MAX_BODY_CHARS = 1600;

/** Normalise a number to the `whatsapp:+<digits>` form Twilio's WhatsApp channel expects. */
export function toWhatsAppAddress(number: string): string {
  const trimmed = number.trim();
  if (trimmed.toLowerCase().startsWith('whatsapp:')) return trimmed;
  return trimmed.startsWith('+') ? `whatsapp:${trimmed}` : `whatsapp:+${trimmed}`;
}

export function clampBody(body: string): string {
  return body.length <= MAX_BODY_CHARS ? body : `${body.slice(0, MAX_BODY_CHARS - 1)}…`;
}

/** The slice of the Twilio REST client this sender uses. */
export interface TwilioMessagesApi {
  messages: {
    create(params: { from: string; to: string; body: string }): Promise<unknown>;
  };
}

export class TwilioReplySender implements ReplySender {
  constructor(private readonly client: TwilioMessagesApi) {}

  static fromCredentials(accountSid: string, authToken: string): TwilioReplySender {
    return new TwilioReplySender(twilio(accountSid, authToken));
  }

  async send({ to, from, body }: OutboundMessage): Promise<void> {
    await this.client.messages.create({
      from: toWhatsAppAddress(from),
      to: toWhatsAppAddress(to),
      body: clampBody(body),
    });
  }
}
