import type { RecordStoreGateway } from '@keepsake/shared';
import {
  EmbeddingError,
  ExtractionError,
  FetchError,
  KeepsakeError,
  ProcessingError,
  StorageError,
  errorMessage,
  logger,
} from '@keepsake/shared';
import type { Embedder, MediaFetcher, TextExtractor } from './ports';

export const OCR_SEPARATOR = '\n\n---\n\n';

export interface MediaIngestionInput {
  mediaUrls: string[];
  sender: string;
  correlationId: string;
  caption?: string;
}

export interface MediaIngestionResult {
  recordId: string;
  mediaCount: number;
}

/** Last path segment of a URL, used as the upload's original file name. */
export function fileNameFromUrl(url: string): string {
  let pathname = url;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0] ?? '';
  }
  return pathname.split('/').filter(Boolean).pop() || 'upload';
}

/**
 * Fetch → store → extract for every media item in order, then embed the combined
 * text and save a single record. Any failure aborts the batch without saving.
 */
export class MediaIngestion {
  constructor(
    private readonly fetcher: MediaFetcher,
    private readonly store: RecordStoreGateway,
    private readonly extractor: TextExtractor,
    private readonly embedder: Embedder
  ) {}

  async ingest(input: MediaIngestionInput): Promise<MediaIngestionResult> {
    try {
      return await this.run(input);
    } catch (err) {
      if (err instanceof ProcessingError) throw err;
      const prefix = err instanceof FetchError ? 'Failed to download media' : 'Processing error';
      throw new ProcessingError(`${prefix}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async run({ mediaUrls, sender, correlationId, caption }: MediaIngestionInput): Promise<MediaIngestionResult> {
    if (mediaUrls.length === 0) {
      throw new ProcessingError('No media URLs provided');
    }
    logger.info('Ingesting media', { sender, correlationId, mediaCount: mediaUrls.length });

    const storageUrls: string[] = [];
    const texts: string[] = [];

    for (const url of mediaUrls) {
      const media = await this.step(() => this.fetcher.fetch(url), (msg, cause) => new FetchError(url, msg, { cause }));

      const storageUrl = await this.step(
        () => this.store.uploadBlob(media.bytes, fileNameFromUrl(url), media.contentType),
        (msg, cause) => new StorageError(msg, { cause })
      );
      storageUrls.push(storageUrl);

      const text = await this.step(
        () => this.extractor.extract(storageUrl, media.contentType),
        (msg, cause) => new ExtractionError(msg, { cause })
      );
      if (text) texts.push(text);
    }

    const combinedText = texts.join(OCR_SEPARATOR).trim();
    const embedding = combinedText
      ? await this.step(
          () => this.embedder.embed(combinedText),
          (msg, cause) => new EmbeddingError(msg, { cause })
        )
      : [];
    logger.debug('Media text combined', { sender, textLength: combinedText.length, dims: embedding.length });

    const record = await this.store.saveRecord({
      sender,
      correlationId,
      recordType: 'media',
      ocrText: combinedText,
      embedding: embedding.length > 0 ? embedding : null,
      storageUrls,
      metadata: {
        source: 'whatsapp',
        mediaCount: storageUrls.length,
        ...(caption ? { caption } : {}),
      },
    });
    return { recordId: record.id, mediaCount: storageUrls.length };
  }

  /** Runs one collaborator call, classifying failures that are not already typed. */
  private async step<T>(
    call: () => Promise<T>,
    wrap: (message: string, cause: unknown) => KeepsakeError
  ): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (err instanceof KeepsakeError) throw err;
      throw wrap(errorMessage(err), err);
    }
  }
}
