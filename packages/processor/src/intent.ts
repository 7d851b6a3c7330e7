import type { Message } from '@keepsake/shared';
import { AnswerError, errorMessage, logger } from '@keepsake/shared';
import { renderHistory } from './history';
import type { ChatModel } from './ports';

export type Intent = 'question' | 'save_record';

const HISTORY_LINE_CHARS = 120;

const SYSTEM_PROMPT = [
  'You classify user WhatsApp messages for a personal capture bot.',
  'You will be given the recent conversation and the latest user message.',
  'Return exactly one token: question OR save_record.',
  '- If the user asks anything, requests info, or wants to find something: question.',
  '- If the user is stating something to remember, logging info, or saving a note: save_record.',
].join('\n');

/**
 * Anything that does not mention `save_record` is a question, including empty or
 * garbled output.
 */
export function parseIntent(output: string): Intent {
  return output.toLowerCase().includes('save_record') ? 'save_record' : 'question';
}

export class IntentClassifier {
  constructor(private readonly chat: ChatModel) {}

  async classify(message: string, history: Message[] = []): Promise<Intent> {
    const historyText = renderHistory(history, HISTORY_LINE_CHARS);
    const user = `Recent conversation:\n${historyText || '(none)'}\n\nLatest user message:\n${message}`;

    let output: string;
    try {
      output = await this.chat.complete({
        system: SYSTEM_PROMPT,
        user,
        temperature: 0,
        maxTokens: 5,
      });
    } catch (err) {
      throw new AnswerError(`Failed to classify: ${errorMessage(err)}`, { cause: err });
    }
    const intent = parseIntent(output);
    logger.debug('Intent classified', { intent, output });
    return intent;
  }
}
