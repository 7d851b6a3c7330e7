import { z } from 'zod';
import type { RecordStoreGateway } from '@keepsake/shared';
import { logger, recordText } from '@keepsake/shared';
import type { Embedder, ToolCall, ToolSpec } from '../ports';

/**
 * Retrieval tools exposed to the answering model. The set is closed: every call
 * the model makes is parsed into one of the tagged invocations below, and names
 * outside the set become an `unknown_tool` invocation instead of a lookup failure.
 */

export const SEARCH_EXCERPT_CHARS = 3000;
export const RECENT_EXCERPT_CHARS = 1500;
const DEFAULT_LIMIT = 5;
const MAX_LIMIT = 10;

/** Integer in [min, max]; out-of-range values are clamped, anything non-numeric takes the fallback. */
function boundedInt(min: number, max: number, fallback: number) {
  return z.unknown().transform((value): number => {
    if (value === undefined || value === null || value === '') return fallback;
    const n = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(n)) return fallback;
    return Math.min(max, Math.max(min, Math.trunc(n)));
  });
}

const searchRecordsArgs = z.object({
  query: z.unknown().transform((value) => (typeof value === 'string' ? value.trim() : '')),
  top_k: boundedInt(1, MAX_LIMIT, DEFAULT_LIMIT),
});

const getRecentRecordsArgs = z.object({
  limit: boundedInt(1, MAX_LIMIT, DEFAULT_LIMIT),
});

export type SearchRecordsArgs = z.infer<typeof searchRecordsArgs>;
export type GetRecentRecordsArgs = z.infer<typeof getRecentRecordsArgs>;

export type ToolInvocation =
  | { kind: 'search_records'; callId: string; args: SearchRecordsArgs }
  | { kind: 'get_recent_records'; callId: string; args: GetRecentRecordsArgs }
  | { kind: 'unknown_tool'; callId: string; name: string };

export const TOOL_SPECS: ToolSpec[] = [
  {
    name: 'search_records',
    description: "Semantic search over the user's saved records (OCR text + notes).",
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string' },
        top_k: { type: 'integer', minimum: 1, maximum: MAX_LIMIT, default: DEFAULT_LIMIT },
      },
      required: ['query'],
    },
  },
  {
    name: 'get_recent_records',
    description: "Fetch the user's most recent saved records.",
    parameters: {
      type: 'object',
      properties: {
        limit: { type: 'integer', minimum: 1, maximum: MAX_LIMIT, default: DEFAULT_LIMIT },
      },
    },
  },
];

/** Malformed or non-object JSON becomes an empty argument set. */
export function parseArguments(raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw || '{}');
  } catch {
    return {};
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {};
  return { ...parsed };
}

export function parseInvocation(call: ToolCall): ToolInvocation {
  const args = parseArguments(call.arguments);
  switch (call.name) {
    case 'search_records':
      return { kind: 'search_records', callId: call.id, args: searchRecordsArgs.parse(args) };
    case 'get_recent_records':
      return { kind: 'get_recent_records', callId: call.id, args: getRecentRecordsArgs.parse(args) };
    default:
      return { kind: 'unknown_tool', callId: call.id, name: call.name };
  }
}

export interface ToolContext {
  sender: string;
  store: RecordStoreGateway;
  embedder: Embedder;
}

export interface MatchExcerpt {
  id: string;
  record_type: string;
  created_at: string;
  similarity: number;
  text: string;
}

export interface RecordExcerpt {
  id: string;
  record_type: string;
  created_at: string;
  text: string;
}

export type ToolPayload =
  | { matches: MatchExcerpt[] }
  | { records: RecordExcerpt[] }
  | { error: 'unknown_tool'; tool: string };

async function searchRecords(args: SearchRecordsArgs, ctx: ToolContext): Promise<ToolPayload> {
  const embedding = await ctx.embedder.embed(args.query);
  const matches = await ctx.store.matchRecords(ctx.sender, embedding, args.top_k);
  logger.debug('search_records', { sender: ctx.sender, topK: args.top_k, found: matches.length });
  return {
    matches: matches.map((m) => ({
      id: m.id,
      record_type: m.recordType,
      created_at: m.createdAt,
      similarity: m.similarity,
      text: recordText(m).slice(0, SEARCH_EXCERPT_CHARS),
    })),
  };
}

async function getRecentRecords(args: GetRecentRecordsArgs, ctx: ToolContext): Promise<ToolPayload> {
  const records = await ctx.store.getRecentRecords(ctx.sender, args.limit);
  logger.debug('get_recent_records', { sender: ctx.sender, limit: args.limit, found: records.length });
  return {
    records: records.map((r) => ({
      id: r.id,
      record_type: r.recordType,
      created_at: r.createdAt,
      text: recordText(r).slice(0, RECENT_EXCERPT_CHARS),
    })),
  };
}

export async function runInvocation(invocation: ToolInvocation, ctx: ToolContext): Promise<ToolPayload> {
  switch (invocation.kind) {
    case 'search_records':
      return searchRecords(invocation.args, ctx);
    case 'get_recent_records':
      return getRecentRecords(invocation.args, ctx);
    case 'unknown_tool':
      logger.warn('Model requested an unknown tool', { sender: ctx.sender, tool: invocation.name });
      return { error: 'unknown_tool', tool: invocation.name };
  }
}

export function executeToolCall(call: ToolCall, ctx: ToolContext): Promise<ToolPayload> {
  return runInvocation(parseInvocation(call), ctx);
}
