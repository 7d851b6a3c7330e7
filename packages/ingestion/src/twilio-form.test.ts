import { describe, it, expect } from 'vitest';
import { decodeBody, parseForm, parseInboundMessage } from './twilio-form';

describe('decodeBody', () => {
  it('decodes base64 bodies', () => {
    const raw = 'Body=hi&From=whatsapp%3A%2B15550001111';
    expect(decodeBody(Buffer.from(raw).toString('base64'), true)).toBe(raw);
  });

  it('passes plain bodies through and treats a missing body as empty', () => {
    expect(decodeBody('Body=hi', false)).toBe('Body=hi');
    expect(decodeBody(undefined, true)).toBe('');
  });
});

describe('parseForm', () => {
  it('decodes url-encoded fields', () => {
    expect(parseForm('Body=lunch+at+Cafe+X+%2442&From=whatsapp%3A%2B15550001111')).toEqual({
      Body: 'lunch at Cafe X $42',
      From: 'whatsapp:+15550001111',
    });
  });
});

describe('parseInboundMessage', () => {
  it('reads a text message', () => {
    expect(
      parseInboundMessage({ From: 'whatsapp:+15550001111', MessageSid: 'SM1', Body: '  hello  ', NumMedia: '0' })
    ).toEqual({ from: 'whatsapp:+15550001111', messageSid: 'SM1', body: 'hello', media: [] });
  });

  it('reads media in slot order', () => {
    const message = parseInboundMessage({
      From: 'whatsapp:+15550001111',
      MessageSid: 'SM2',
      NumMedia: '2',
      MediaUrl0: 'https://api.twilio.test/Media/ME0',
      MediaContentType0: 'image/jpeg',
      MediaUrl1: 'https://api.twilio.test/Media/ME1',
    });

    expect(message.body).toBe('');
    expect(message.media).toEqual([
      { url: 'https://api.twilio.test/Media/ME0', contentType: 'image/jpeg' },
      { url: 'https://api.twilio.test/Media/ME1' },
    ]);
  });

  it('ignores slots beyond NumMedia', () => {
    const message = parseInboundMessage({
      NumMedia: '1',
      MediaUrl0: 'https://api.twilio.test/Media/ME0',
      MediaUrl1: 'https://api.twilio.test/Media/ME1',
    });

    expect(message.media.map((m) => m.url)).toEqual(['https://api.twilio.test/Media/ME0']);
  });

  it('caps media at ten items', () => {
    const params: Record<string, string> = { NumMedia: '12' };
    for (let i = 0; i < 12; i++) params[`MediaUrl${i}`] = `https://api.twilio.test/Media/ME${i}`;

    expect(parseInboundMessage(params).media).toHaveLength(10);
  });

  it('scans every slot when NumMedia is missing', () => {
    const message = parseInboundMessage({ MediaUrl3: 'https://api.twilio.test/Media/ME3' });

    expect(message).toEqual({
      from: '',
      messageSid: '',
      body: '',
      media: [{ url: 'https://api.twilio.test/Media/ME3' }],
    });
  });
});
