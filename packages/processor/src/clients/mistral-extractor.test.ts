import { describe, it, expect, vi } from 'vitest';
import type OpenAI from 'openai';
import { ExtractionError } from '@keepsake/shared';
import { MistralTextExtractor, isPdf } from './mistral-extractor';

const OPTIONS = { visionModel: 'pixtral-12b-2409', ocrModel: 'mistral-ocr-latest' };

function fakeClient() {
  const create = vi.fn();
  const post = vi.fn();
  const client = { chat: { completions: { create } }, post } as unknown as OpenAI;
  return { client, create, post };
}

describe('isPdf', () => {
  it.each([
    ['https://b.test/doc.pdf', undefined, true],
    ['https://b.test/doc.PDF?X-Amz-Signature=abc', undefined, true],
    ['https://b.test/uploads/1', 'application/pdf', true],
    ['https://b.test/uploads/1.jpg', 'image/jpeg', false],
    ['https://b.test/pdf/scan.png', undefined, false],
  ])('%s (%s) -> %s', (url, contentType, expected) => {
    expect(isPdf(url, contentType)).toBe(expected);
  });
});

describe('MistralTextExtractor', () => {
  it('reads images through the vision model', async () => {
    const { client, create, post } = fakeClient();
    create.mockResolvedValue({ choices: [{ message: { content: '  TOTAL 12.50 \n' } }] });

    const text = await new MistralTextExtractor(client, OPTIONS).extract('https://b.test/a.jpg', 'image/jpeg');

    expect(text).toBe('TOTAL 12.50');
    expect(post).not.toHaveBeenCalled();
    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'pixtral-12b-2409', temperature: 0.1, max_tokens: 1000 })
    );
  });

  it('reads PDFs through the OCR endpoint', async () => {
    const { client, create, post } = fakeClient();
    post.mockResolvedValue({ pages: [{ markdown: ' Page one ' }, { markdown: '' }, { markdown: 'Page two' }] });

    const text = await new MistralTextExtractor(client, OPTIONS).extract('https://b.test/a.pdf');

    expect(text).toBe('Page one\n\nPage two');
    expect(create).not.toHaveBeenCalled();
    expect(post).toHaveBeenCalledWith('/ocr', {
      body: {
        model: 'mistral-ocr-latest',
        document: { type: 'document_url', document_url: 'https://b.test/a.pdf' },
      },
    });
  });

  it('rejects an unexpected OCR response', async () => {
    const { client, post } = fakeClient();
    post.mockResolvedValue({ text: 'nope' });

    await expect(
      new MistralTextExtractor(client, OPTIONS).extract('https://b.test/a.pdf')
    ).rejects.toThrow('Unexpected OCR response format: pages: Required');
  });

  it('wraps API failures', async () => {
    const { client, create } = fakeClient();
    create.mockRejectedValue(new Error('401 Unauthorized'));

    const error = await new MistralTextExtractor(client, OPTIONS)
      .extract('https://b.test/a.png')
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({ message: 'Mistral API error: 401 Unauthorized' });
  });
});
