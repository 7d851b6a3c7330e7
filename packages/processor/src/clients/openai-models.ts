import OpenAI from 'openai';
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { EmbeddingError, logger } from '@keepsake/shared';
import type {
  AssistantReply,
  ChatModel,
  CompletionRequest,
  Embedder,
  ToolCompletionRequest,
  ToolSpec,
  TranscriptTurn,
} from '../ports';

const MAX_EMBEDDING_INPUT_CHARS = 8000;

export interface OpenAiClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs: number;
  maxRetries?: number;
}

export function createOpenAiClient(options: OpenAiClientOptions): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    maxRetries: options.maxRetries ?? 2,
  });
}

export class OpenAiEmbedder implements Embedder {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async embed(text: string): Promise<number[]> {
    const input = text.trim();
    if (!input) return [];

    const res = await this.client.embeddings.create({
      model: this.model,
      input: input.slice(0, MAX_EMBEDDING_INPUT_CHARS),
    });
    const embedding = res.data[0]?.embedding;
    if (!embedding || !Array.isArray(embedding)) {
      throw new EmbeddingError('Embedding response contained no vector');
    }
    logger.debug('Embedding created', { model: this.model, dims: embedding.length });
    return embedding;
  }
}

export function toOpenAiMessages(transcript: TranscriptTurn[]): ChatCompletionMessageParam[] {
  return transcript.map((turn): ChatCompletionMessageParam => {
    switch (turn.role) {
      case 'system':
        return { role: 'system', content: turn.content };
      case 'user':
        return { role: 'user', content: turn.content };
      case 'assistant':
        if (!turn.toolCalls || turn.toolCalls.length === 0) {
          return { role: 'assistant', content: turn.content };
        }
        return {
          role: 'assistant',
          content: turn.content,
          tool_calls: turn.toolCalls.map((call) => ({
            id: call.id,
            type: 'function' as const,
            function: { name: call.name, arguments: call.arguments },
          })),
        };
      case 'tool':
        return { role: 'tool', tool_call_id: turn.toolCallId, content: turn.content };
    }
  });
}

export function toOpenAiTools(tools: ToolSpec[]): ChatCompletionTool[] {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  }));
}

export class OpenAiChatModel implements ChatModel {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async complete(request: CompletionRequest): Promise<string> {
    const res = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.user },
      ],
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    });
    return res.choices[0]?.message?.content?.trim() ?? '';
  }

  async completeWithTools(request: ToolCompletionRequest): Promise<AssistantReply> {
    const res = await this.client.chat.completions.create({
      model: this.model,
      messages: toOpenAiMessages(request.messages),
      tools: toOpenAiTools(request.tools),
      tool_choice: request.toolChoice,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    });
    const message = res.choices[0]?.message;
    if (!message) throw new Error('Completion returned no choices');

    return {
      content: message.content,
      toolCalls: (message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
      })),
    };
  }
}
