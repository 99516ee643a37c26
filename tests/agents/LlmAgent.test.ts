import { describe, it, expect } from 'vitest';
import type { BaseMessage } from '@langchain/core/messages';
import { LlmAgent } from '../../src/agents/LlmAgent.js';
import type { ChatModel } from '../../src/core/model/ChatModel.js';
import { contentToText } from '../../src/core/model/ChatModel.js';
import { InMemoryContextStore } from '../../src/memory/ContextStore.js';

describe('LlmAgent', () => {
  it('should send the system prompt and task input to the model', async () => {
    const seen: BaseMessage[][] = [];
    const signals: Array<AbortSignal | undefined> = [];
    const model: ChatModel = {
      invoke: async (messages, options) => {
        seen.push(messages);
        signals.push(options?.signal);
        return { content: 'forty-two' };
      },
    };
    const agent = new LlmAgent({ model, systemPrompt: 'Be brief.' });
    const context = new InMemoryContextStore().createContext('wf', 'answer');
    const signal = new AbortController().signal;

    const result = await agent.run('What is six times seven?', context, signal);

    expect(result).toBe('forty-two');
    expect(seen[0]?.map((m) => m.content)).toEqual(['Be brief.', 'What is six times seven?']);
    expect(signals[0]).toBe(signal);
    expect(context.get('prompt')).toBe('What is six times seven?');
    expect(context.get('response')).toBe('forty-two');
  });

  it('should propagate model errors', async () => {
    const model: ChatModel = { invoke: () => Promise.reject(new Error('rate limited')) };
    const agent = new LlmAgent({ model, name: 'writer' });

    expect(agent.name).toBe('writer');
    await expect(
      agent.run('x', new InMemoryContextStore().createContext('wf', 't'), new AbortController().signal)
    ).rejects.toThrow('rate limited');
  });
});

describe('contentToText', () => {
  it('should join text parts and skip others', () => {
    expect(
      contentToText([
        { type: 'text', text: 'Hello, ' },
        { type: 'image_url', image_url: 'https://example.com/x.png' },
        { type: 'text', text: 'world' },
      ])
    ).toBe('Hello, world');
  });
});
