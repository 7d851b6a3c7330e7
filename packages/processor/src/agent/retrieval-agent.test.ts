import { describe, it, expect } from 'vitest';
import { AnswerError } from '@keepsake/shared';
import { AGENT_SYSTEM_PROMPT, RetrievalAgent } from './retrieval-agent';
import { FakeEmbedder, InMemoryRecordStore, ScriptedChatModel } from '../testing/fakes';
import type { AssistantReply } from '../ports';

const SENDER = 'whatsapp:+15550001111';

function setup() {
  const chat = new ScriptedChatModel();
  const embedder = new FakeEmbedder();
  const store = new InMemoryRecordStore();
  return { chat, embedder, store, agent: new RetrievalAgent(chat, embedder, store) };
}

function toolReply(name: string, args: string, id = 'call-1'): AssistantReply {
  return { content: null, toolCalls: [{ id, name, arguments: args }] };
}

describe('RetrievalAgent', () => {
  it('answers directly when the model calls no tools', async () => {
    const { chat, agent } = setup();
    chat.replies.push({ content: '  Hello there.  ', toolCalls: [] });

    const answer = await agent.answer({ sender: SENDER, question: 'hi' });

    expect(answer).toBe('Hello there.');
    expect(chat.toolRequests).toHaveLength(1);
    const [request] = chat.toolRequests;
    expect(request?.toolChoice).toBe('auto');
    expect(request?.temperature).toBe(0.2);
    expect(request?.maxTokens).toBe(500);
    expect(request?.tools.map((t) => t.name)).toEqual(['search_records', 'get_recent_records']);
    expect(request?.messages).toEqual([
      { role: 'system', content: AGENT_SYSTEM_PROMPT },
      { role: 'user', content: 'Recent conversation:\n(none)\n\nUser question:\nhi' },
    ]);
  });

  it('feeds tool results back before answering', async () => {
    const { chat, embedder, store, agent } = setup();
    await store.saveRecord({
      sender: SENDER,
      correlationId: 'SM1',
      recordType: 'note',
      userText: 'wifi password is hunter-test',
      embedding: await embedder.embed('wifi password is hunter-test'),
      metadata: { source: 'whatsapp' },
    });
    chat.replies.push(toolReply('search_records', '{"query":"wifi password"}'));
    chat.replies.push({ content: 'It is hunter-test.', toolCalls: [] });

    const answer = await agent.answer({ sender: SENDER, question: 'what is the wifi password?' });

    expect(answer).toBe('It is hunter-test.');
    expect(embedder.inputs).toContain('wifi password');
    const second = chat.toolRequests[1]?.messages ?? [];
    expect(second).toHaveLength(4);
    expect(second[2]).toEqual({
      role: 'assistant',
      content: '',
      toolCalls: [{ id: 'call-1', name: 'search_records', arguments: '{"query":"wifi password"}' }],
    });
    const toolTurn = second[3];
    expect(toolTurn?.role).toBe('tool');
    expect(toolTurn?.content).toContain('wifi password is hunter-test');
  });

  it('runs every tool call of a turn in order', async () => {
    const { chat, agent } = setup();
    chat.replies.push({
      content: null,
      toolCalls: [
        { id: 'a', name: 'get_recent_records', arguments: '{}' },
        { id: 'b', name: 'search_records', arguments: '{"query":"x"}' },
      ],
    });
    chat.replies.push({ content: 'Nothing saved yet.', toolCalls: [] });

    await agent.answer({ sender: SENDER, question: 'what do I have?' });

    const turns = chat.toolRequests[1]?.messages ?? [];
    expect(turns.slice(3)).toEqual([
      { role: 'tool', toolCallId: 'a', content: '{"records":[]}' },
      { role: 'tool', toolCallId: 'b', content: '{"matches":[]}' },
    ]);
  });

  it('keeps going after an unknown tool', async () => {
    const { chat, agent } = setup();
    chat.replies.push(toolReply('launch_rocket', '{}'));
    chat.replies.push({ content: "I don't know.", toolCalls: [] });

    const answer = await agent.answer({ sender: SENDER, question: 'launch?' });

    expect(answer).toBe("I don't know.");
    expect(chat.toolRequests[1]?.messages[3]).toEqual({
      role: 'tool',
      toolCallId: 'call-1',
      content: '{"error":"unknown_tool","tool":"launch_rocket"}',
    });
  });

  it('forces a final answer once the step budget is spent', async () => {
    const { chat, agent } = setup();
    chat.fallbackReply = toolReply('get_recent_records', '{}');
    chat.replies.push(
      toolReply('get_recent_records', '{}'),
      toolReply('get_recent_records', '{}'),
      toolReply('get_recent_records', '{}'),
      toolReply('get_recent_records', '{}'),
      { content: 'Best guess.', toolCalls: [] }
    );

    const answer = await agent.answer({ sender: SENDER, question: 'loop forever' });

    expect(answer).toBe('Best guess.');
    expect(chat.toolRequests).toHaveLength(5);
    expect(chat.toolRequests.map((r) => r.toolChoice)).toEqual(['auto', 'auto', 'auto', 'auto', 'none']);
  });

  it('never exceeds maxSteps + 1 completions', async () => {
    const chat = new ScriptedChatModel();
    chat.fallbackReply = { content: 'still searching', toolCalls: [{ id: 'x', name: 'search_records', arguments: '{}' }] };
    const agent = new RetrievalAgent(chat, new FakeEmbedder(), new InMemoryRecordStore(), { maxSteps: 2 });

    const answer = await agent.answer({ sender: SENDER, question: 'anything' });

    expect(chat.toolRequests).toHaveLength(3);
    expect(answer).toBe('still searching');
  });

  it('returns an empty string when the model says nothing', async () => {
    const { chat, agent } = setup();
    chat.replies.push({ content: null, toolCalls: [] });

    await expect(agent.answer({ sender: SENDER, question: 'hm' })).resolves.toBe('');
  });

  it('wraps model failures in AnswerError', async () => {
    const { chat, agent } = setup();
    chat.failWith = new Error('rate limited');

    const error = await agent.answer({ sender: SENDER, question: 'hi' }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AnswerError);
    expect(error).toMatchObject({ code: 'ANSWER_ERROR', message: 'Failed to answer: rate limited' });
  });
});
