import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { NamingAgent } from './index';
import type { ChatCompleter, ChatCompletionOptions } from '../llm-client';
import type { Excerpt } from '../../extractors/types';
import { ModelParseError, ModelRequestError } from '../../errors';

class FakeCompleter implements ChatCompleter {
  readonly calls: Array<{ messages: ChatCompletionMessageParam[]; options?: ChatCompletionOptions }> = [];

  constructor(private readonly reply: () => Promise<string>) {}

  chatCompletion(messages: ChatCompletionMessageParam[], options?: ChatCompletionOptions): Promise<string> {
    this.calls.push({ messages, options });
    return this.reply();
  }
}

const excerpt: Excerpt = {
  text: 'ACME Corp Invoice No. 4711 Date 15.03.2024 Office chairs 3 x 120.00',
  pages: 2,
  truncated: false,
  title: 'Invoice 4711',
};

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

describe('NamingAgent', () => {
  it('sends one request with a system and a user message containing the excerpt', async () => {
    const completer = new FakeCompleter(async () => '{"filename": "2024-03-15_Invoice ACME Office Chairs"}');
    const agent = new NamingAgent(completer);

    const suggestion = await agent.suggestName(excerpt);

    expect(suggestion).toEqual({
      baseName: '2024-03-15_Invoice ACME Office Chairs',
      valid: true,
      raw: '{"filename": "2024-03-15_Invoice ACME Office Chairs"}',
    });
    expect(completer.calls).toHaveLength(1);
    const [system, user] = completer.calls[0].messages;
    expect(system.role).toBe('system');
    expect(user.role).toBe('user');
    expect(user.content).toContain(excerpt.text);
    expect(user.content).toContain('PDF title metadata: Invoice 4711');
  });

  it('asks for a date prefix by default and not when disabled', () => {
    const withDate = new NamingAgent(new FakeCompleter(async () => '')).buildMessages(excerpt);
    const withoutDate = new NamingAgent(new FakeCompleter(async () => ''), { datePrefix: false }).buildMessages(excerpt);

    expect(withDate[0].content).toContain('0000-00-00_');
    expect(withoutDate[0].content).not.toContain('0000-00-00_');
  });

  it('throws ModelParseError when the reply holds no usable name', async () => {
    const agent = new NamingAgent(new FakeCompleter(async () => '{"filename": "***"}'));

    const error = await agent.suggestName(excerpt).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelParseError);
    expect(error instanceof ModelParseError ? error.response : '').toBe('{"filename": "***"}');
  });

  it('throws ModelParseError on an empty reply', async () => {
    const agent = new NamingAgent(new FakeCompleter(async () => ''));
    await expect(agent.suggestName(excerpt)).rejects.toThrow('Model returned an empty response');
  });

  it('lets request failures through', async () => {
    const agent = new NamingAgent(
      new FakeCompleter(async () => {
        throw new ModelRequestError('HTTP 503: unavailable', 503);
      })
    );
    await expect(agent.suggestName(excerpt)).rejects.toBeInstanceOf(ModelRequestError);
  });
});
