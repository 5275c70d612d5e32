import { describe, it, expect, vi, afterEach } from 'vitest';
import { AnthropicProvider, toAnthropicRequest } from '../../src/llm/anthropic.js';
import { OpenAIProvider } from '../../src/llm/openai.js';
import { createLLMProvider, resolveEndpoint } from '../../src/llm/provider.js';
import { ConfigurationError, LLMError } from '../../src/core/errors.js';
import type { ChatMessage } from '../../src/core/types.js';

function stubFetch(response: () => Response) {
  const fetchMock = vi.fn<typeof fetch>(async () => response());
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

function sentBody(fetchMock: ReturnType<typeof stubFetch>): unknown {
  const init = fetchMock.mock.calls[0]?.[1];
  return JSON.parse(typeof init?.body === 'string' ? init.body : '{}');
}

const conversation: ChatMessage[] = [
  { role: 'system', content: 'be brief' },
  { role: 'user', content: 'hi' },
  { role: 'system', content: 'summary so far' },
  { role: 'assistant', content: 'hello' }
];

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('resolveEndpoint', () => {
  it('appends the path to a base URL', () => {
    expect(resolveEndpoint('https://api.example.test/v1/', '/messages')).toBe('https://api.example.test/v1/messages');
  });

  it('keeps a URL that already names the endpoint', () => {
    expect(resolveEndpoint('https://api.example.test/anthropic/v1/messages', '/messages')).toBe(
      'https://api.example.test/anthropic/v1/messages'
    );
  });
});

describe('toAnthropicRequest', () => {
  it('lifts every system message into the system field', () => {
    expect(toAnthropicRequest('m', 100, conversation)).toEqual({
      model: 'm',
      max_tokens: 100,
      system: 'be brief\n\nsummary so far',
      messages: [
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' }
      ]
    });
  });

  it('leaves the system field out when there is none', () => {
    expect(toAnthropicRequest('m', 100, [{ role: 'user', content: 'hi' }])).not.toHaveProperty('system');
  });
});

describe('AnthropicProvider', () => {
  it('requires an API key', () => {
    expect(() => new AnthropicProvider({ model: 'm' })).toThrow('Anthropic API key is required');
  });

  it('posts a messages request and joins the text blocks', async () => {
    const fetchMock = stubFetch(() =>
      jsonResponse({ content: [{ type: 'text', text: 'Hello ' }, { type: 'text', text: 'there' }] })
    );
    const provider = new AnthropicProvider({ model: 'claude-test', apiKey: 'test-secret', baseUrl: 'https://api.example.test/v1' });

    await expect(provider.complete(conversation)).resolves.toBe('Hello there');

    expect(fetchMock).toHaveBeenCalledWith('https://api.example.test/v1/messages', expect.objectContaining({
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': 'test-secret',
        'anthropic-version': '2023-06-01'
      }
    }));
    expect(sentBody(fetchMock)).toEqual(toAnthropicRequest('claude-test', 4096, conversation));
  });

  it('wraps thinking blocks ahead of the answer', async () => {
    stubFetch(() =>
      jsonResponse({ content: [{ type: 'thinking', thinking: 'hmm' }, { type: 'text', text: 'answer' }] })
    );
    const provider = new AnthropicProvider({ model: 'm', apiKey: 'test-secret' });

    await expect(provider.complete([{ role: 'user', content: 'q' }])).resolves.toBe(
      '<thinking>\nhmm\n</thinking>\nanswer'
    );
  });

  it('reports HTTP errors with the status', async () => {
    stubFetch(() => new Response('slow down', { status: 429, statusText: 'Too Many Requests' }));
    const provider = new AnthropicProvider({ model: 'm', apiKey: 'test-secret' }, 'minimax');

    const error: unknown = await provider.complete([{ role: 'user', content: 'q' }]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LLMError);
    expect(error).toMatchObject({
      message: 'minimax API error: 429 Too Many Requests - slow down',
      provider: 'minimax',
      status: 429
    });
  });

  it('reports a body that is not JSON', async () => {
    stubFetch(() => new Response('<html>', { status: 200 }));
    const provider = new AnthropicProvider({ model: 'm', apiKey: 'test-secret' });

    await expect(provider.complete([{ role: 'user', content: 'q' }])).rejects.toThrow(
      /^Failed to parse anthropic response: /
    );
  });

  it('reports a request that could not be sent', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });
    vi.stubGlobal('fetch', fetchMock);
    const provider = new AnthropicProvider({ model: 'm', apiKey: 'test-secret' });

    await expect(provider.complete([{ role: 'user', content: 'q' }])).rejects.toThrow(
      'Failed to send request to anthropic: fetch failed'
    );
  });
});

describe('OpenAIProvider', () => {
  it('requires an API key', () => {
    expect(() => new OpenAIProvider({ model: 'm' })).toThrow('OpenAI API key is required');
  });

  it('posts chat completions and returns the first choice', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ choices: [{ message: { content: 'pong' } }] }));
    const provider = new OpenAIProvider({ model: 'gpt-test', apiKey: 'test-secret' });

    await expect(provider.complete([{ role: 'user', content: 'ping' }])).resolves.toBe('pong');

    expect(fetchMock).toHaveBeenCalledWith('https://api.openai.com/v1/chat/completions', expect.objectContaining({
      headers: { 'Content-Type': 'application/json', 'Authorization': 'Bearer test-secret' }
    }));
    expect(sentBody(fetchMock)).toEqual({ model: 'gpt-test', messages: [{ role: 'user', content: 'ping' }] });
  });

  it('returns an empty string for a null message', async () => {
    stubFetch(() => jsonResponse({ choices: [{ message: { content: null } }] }));
    const provider = new OpenAIProvider({ model: 'm', apiKey: 'test-secret' });

    await expect(provider.complete([{ role: 'user', content: 'q' }])).resolves.toBe('');
  });

  it('fails without choices', async () => {
    stubFetch(() => jsonResponse({ choices: [] }));
    const provider = new OpenAIProvider({ model: 'm', apiKey: 'test-secret' });

    await expect(provider.complete([{ role: 'user', content: 'q' }])).rejects.toThrow('No choices in OpenAI response');
  });
});

describe('createLLMProvider', () => {
  it('builds an OpenAI provider', async () => {
    const provider = await createLLMProvider({ provider: 'OpenAI', model: 'm', apiKey: 'test-secret' });

    expect(provider).toBeInstanceOf(OpenAIProvider);
  });

  it('serves minimax through the Anthropic protocol under its own name', async () => {
    const provider = await createLLMProvider({ provider: 'minimax', model: 'MiniMax-M2.1', apiKey: 'test-secret' });

    expect(provider).toBeInstanceOf(AnthropicProvider);
    expect(provider.name).toBe('minimax');
    expect(provider.model).toBe('MiniMax-M2.1');
  });

  it('rejects an unknown provider', async () => {
    await expect(createLLMProvider({ provider: 'gemini', model: 'm', apiKey: 'test-secret' })).rejects.toThrow(
      new ConfigurationError('Unknown LLM provider: gemini')
    );
  });
});
