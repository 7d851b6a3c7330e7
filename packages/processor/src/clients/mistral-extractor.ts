import type OpenAI from 'openai';
import { z } from 'zod';
import { ExtractionError, describeIssues, errorMessage, logger } from '@keepsake/shared';
import type { TextExtractor } from '../ports';

const EXTRACTION_PROMPT =
  'Extract ALL visible text from this image. Preserve line breaks where helpful. ' +
  'Return only the extracted text, with no commentary.';

const ocrResponseSchema = z.object({
  pages: z.array(z.object({ markdown: z.string() })),
});

interface OcrRequest {
  model: string;
  document: { type: 'document_url'; document_url: string };
}

export interface MistralExtractorOptions {
  visionModel: string;
  ocrModel: string;
}

export function isPdf(url: string, contentType?: string): boolean {
  if (contentType?.toLowerCase().startsWith('application/pdf')) return true;
  const path = url.split(/[?#]/)[0] ?? '';
  return path.toLowerCase().endsWith('.pdf');
}

/**
 * Text extraction through Mistral's OpenAI-compatible API: vision chat for images,
 * the document OCR endpoint for PDFs.
 */
export class MistralTextExtractor implements TextExtractor {
  constructor(
    private readonly client: OpenAI,
    private readonly options: MistralExtractorOptions
  ) {}

  async extract(url: string, contentType?: string): Promise<string> {
    try {
      const text = isPdf(url, contentType) ? await this.extractDocument(url) : await this.extractImage(url);
      logger.debug('Text extracted', { contentType, textLength: text.length });
      return text;
    } catch (err) {
      if (err instanceof ExtractionError) throw err;
      throw new ExtractionError(`Mistral API error: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async extractImage(url: string): Promise<string> {
    const res = await this.client.chat.completions.create({
      model: this.options.visionModel,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: EXTRACTION_PROMPT },
            { type: 'image_url', image_url: { url } },
          ],
        },
      ],
      temperature: 0.1,
      max_tokens: 1000,
    });
    return (res.choices[0]?.message?.content ?? '').trim();
  }

  private async extractDocument(url: string): Promise<string> {
    const raw = await this.client.post<OcrRequest, unknown>('/ocr', {
      body: {
        model: this.options.ocrModel,
        document: { type: 'document_url', document_url: url },
      },
    });
    const parsed = ocrResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ExtractionError(`Unexpected OCR response format: ${describeIssues(parsed.error)}`);
    }
    return parsed.data.pages
      .map((page) => page.markdown.trim())
      .filter(Boolean)
      .join('\n\n');
  }
}
