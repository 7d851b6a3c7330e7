/**
 * Collaborators the pipeline calls out to. Production adapters live in ./clients;
 * tests substitute the fakes in ./testing.
 */

export interface FetchedMedia {
  bytes: Uint8Array;
  contentType: string;
}

export interface MediaFetcher {
  fetch(url: string): Promise<FetchedMedia>;
}

export interface TextExtractor {
  /** Returns the visible text of the document at `url`, or '' when there is none. */
  extract(url: string, contentType?: string): Promise<string>;
}

export interface Embedder {
  /** Empty (after trimming) input yields an empty vector rather than an error. */
  embed(text: string): Promise<number[]>;
}

export interface ToolCall {
  id: string;
  name: string;
  /** Raw JSON as produced by the model; may be malformed. */
  arguments: string;
}

export type TranscriptTurn =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCall[] }
  | { role: 'tool'; toolCallId: string; content: string };

export interface ToolSpec {
  name: string;
  description: string;
  /** JSON Schema for the arguments object. */
  parameters: Record<string, unknown>;
}

export interface CompletionRequest {
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
}

export interface ToolCompletionRequest {
  messages: TranscriptTurn[];
  tools: ToolSpec[];
  toolChoice: 'auto' | 'none';
  temperature: number;
  maxTokens: number;
}

export interface AssistantReply {
  content: string | null;
  toolCalls: ToolCall[];
}

export interface ChatModel {
  complete(request: CompletionRequest): Promise<string>;
  completeWithTools(request: ToolCompletionRequest): Promise<AssistantReply>;
}

export interface OutboundMessage {
  to: string;
  from: string;
  body: string;
}

export interface ReplySender {
  send(message: OutboundMessage): Promise<void>;
}
