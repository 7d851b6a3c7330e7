import type { RecordStoreGateway } from '@keepsake/shared';
import { ProcessingError, errorMessage, logger } from '@keepsake/shared';
import type { Embedder } from './ports';

export interface NoteIngestionInput {
  text: string;
  sender: string;
  correlationId: string;
}

export class NoteIngestion {
  constructor(
    private readonly store: RecordStoreGateway,
    private readonly embedder: Embedder
  ) {}

  async ingest({ text, sender, correlationId }: NoteIngestionInput): Promise<{ recordId: string }> {
    try {
      logger.info('Saving note', { sender, correlationId, textLength: text.length });
      const embedding = await this.embedder.embed(text);
      const record = await this.store.saveRecord({
        sender,
        correlationId,
        recordType: 'note',
        userText: text,
        embedding: embedding.length > 0 ? embedding : null,
        metadata: { source: 'whatsapp' },
      });
      return { recordId: record.id };
    } catch (err) {
      throw new ProcessingError(`Failed to save note: ${errorMessage(err)}`, { cause: err });
    }
  }
}
