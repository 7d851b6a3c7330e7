import type { Message, RecordStoreGateway } from '@keepsake/shared';
import { AnswerError, errorMessage, logger } from '@keepsake/shared';
import { renderHistory } from '../history';
import type { ChatModel, Embedder, ToolCall, TranscriptTurn } from '../ports';
import { TOOL_SPECS, executeToolCall } from './tools';
import type { ToolContext } from './tools';

export const DEFAULT_MAX_STEPS = 4;

const HISTORY_LINE_CHARS = 200;

export const AGENT_SYSTEM_PROMPT = [
  'You are a WhatsApp capture-bot assistant.',
  "You have tools to search the user's saved records.",
  'You are also given recent conversation messages as context.',
  'Use tools and conversation context when needed to answer.',
  'Answer concisely.',
  "If the answer is not in the records, say you don't know and ask what to save.",
  'Do not mention embeddings, vectors, databases, storage, or internal tooling.',
].join('\n');

export interface RetrievalAgentOptions {
  maxSteps?: number;
  temperature?: number;
  maxTokens?: number;
}

export interface AnswerInput {
  sender: string;
  question: string;
  history?: Message[];
}

type LoopState =
  | { phase: 'awaiting_model'; step: number }
  | { phase: 'executing_tools'; step: number; calls: ToolCall[] }
  | { phase: 'done'; answer: string };

type ActiveState = Exclude<LoopState, { phase: 'done' }>;

/**
 * Tool-calling loop over the sender's records. At most `maxSteps` tool-enabled
 * completions run; if the model is still calling tools after that, one last
 * completion with tools disabled produces the answer.
 */
export class RetrievalAgent {
  private readonly maxSteps: number;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(
    private readonly chat: ChatModel,
    private readonly embedder: Embedder,
    private readonly store: RecordStoreGateway,
    options: RetrievalAgentOptions = {}
  ) {
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    this.temperature = options.temperature ?? 0.2;
    this.maxTokens = options.maxTokens ?? 500;
  }

  async answer(input: AnswerInput): Promise<string> {
    try {
      return await this.run(input);
    } catch (err) {
      throw new AnswerError(`Failed to answer: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async run({ sender, question, history = [] }: AnswerInput): Promise<string> {
    const historyText = renderHistory(history, HISTORY_LINE_CHARS);
    const transcript: TranscriptTurn[] = [
      { role: 'system', content: AGENT_SYSTEM_PROMPT },
      { role: 'user', content: `Recent conversation:\n${historyText || '(none)'}\n\nUser question:\n${question}` },
    ];
    const ctx: ToolContext = { sender, store: this.store, embedder: this.embedder };

    let state: LoopState = { phase: 'awaiting_model', step: 0 };
    while (state.phase !== 'done') {
      state = await this.advance(state, transcript, ctx);
    }
    return state.answer;
  }

  private async advance(state: ActiveState, transcript: TranscriptTurn[], ctx: ToolContext): Promise<LoopState> {
    switch (state.phase) {
      case 'awaiting_model': {
        if (state.step >= this.maxSteps) {
          logger.info('Agent step budget exhausted; forcing final answer', { sender: ctx.sender, steps: state.step });
          const forced = await this.chat.completeWithTools({
            messages: transcript,
            tools: TOOL_SPECS,
            toolChoice: 'none',
            temperature: this.temperature,
            maxTokens: this.maxTokens,
          });
          return { phase: 'done', answer: (forced.content ?? '').trim() };
        }

        const reply = await this.chat.completeWithTools({
          messages: transcript,
          tools: TOOL_SPECS,
          toolChoice: 'auto',
          temperature: this.temperature,
          maxTokens: this.maxTokens,
        });
        if (reply.toolCalls.length === 0) {
          return { phase: 'done', answer: (reply.content ?? '').trim() };
        }

        logger.debug('Model requested tools', {
          sender: ctx.sender,
          step: state.step,
          tools: reply.toolCalls.map((c) => c.name),
        });
        transcript.push({ role: 'assistant', content: reply.content ?? '', toolCalls: reply.toolCalls });
        return { phase: 'executing_tools', step: state.step, calls: reply.toolCalls };
      }

      case 'executing_tools': {
        for (const call of state.calls) {
          const payload = await executeToolCall(call, ctx);
          transcript.push({ role: 'tool', toolCallId: call.id, content: JSON.stringify(payload) });
        }
        return { phase: 'awaiting_model', step: state.step + 1 };
      }
    }
  }
}
