import { simulateReadableStream } from 'ai';
import { MockLanguageModelV2 } from 'ai/test';
import { blockChat, streamChat } from '@/core/providers/adapter/ai-sdk-adapter';
import { OllamaChatService, normalizeOllamaBaseUrl } from '@/core/providers/base/ollama';
import { ProviderServiceFactory } from '@/core/providers/base/factory';
import type { LLMRequest, LLMStreamEvent } from '@/core/providers/types';
import { ErrorCode } from '@/core/errors';

const USAGE = { inputTokens: 3, outputTokens: 2, totalTokens: 5 };

const REQUEST: LLMRequest = {
	provider: 'ollama',
	model: 'mock-model',
	prompt: 'Say hi',
	outputControl: { temperature: 0.1 },
};

describe('ai-sdk-adapter', () => {
	it('returns the generated text of a blocking call', async () => {
		const model = new MockLanguageModelV2({
			doGenerate: async () => ({
				content: [{ type: 'text', text: 'Hi there' }],
				finishReason: 'stop',
				usage: USAGE,
				warnings: [],
			}),
		});

		const response = await blockChat(model, REQUEST);

		expect(response.text).toBe('Hi there');
		expect(response.finishReason).toBe('stop');
	});

	it('maps stream chunks to text deltas and completion', async () => {
		const model = new MockLanguageModelV2({
			doStream: async () => ({
				stream: simulateReadableStream({
					chunks: [
						{ type: 'text-start', id: 't1' },
						{ type: 'text-delta', id: 't1', delta: 'Hi' },
						{ type: 'text-delta', id: 't1', delta: ' there' },
						{ type: 'text-end', id: 't1' },
						{ type: 'finish', finishReason: 'stop', usage: USAGE },
					],
				}),
			}),
		});

		const events: LLMStreamEvent[] = [];
		for await (const event of streamChat(model, REQUEST)) {
			events.push(event);
		}

		expect(events.filter(e => e.type === 'text-delta')).toEqual([
			{ type: 'text-delta', text: 'Hi' },
			{ type: 'text-delta', text: ' there' },
		]);
		expect(events[events.length - 1].type).toBe('complete');
	});
});

describe('OllamaChatService', () => {
	afterEach(() => {
		vi.unstubAllGlobals();
	});

	it.each([
		['http://localhost:11434', 'http://localhost:11434/api'],
		['http://localhost:11434/', 'http://localhost:11434/api'],
		['http://localhost:11434/v1', 'http://localhost:11434/api'],
		['http://localhost:11434/api', 'http://localhost:11434/api'],
	])('normalizes base URL %s', (input, expected) => {
		expect(normalizeOllamaBaseUrl(input)).toBe(expected);
	});

	it('lists local models from the tags endpoint', async () => {
		const fetchMock = vi.fn(async (_url: string) => new Response(JSON.stringify({
			models: [{ name: 'gemma3:1b' }, { size: 1 }, { name: 'all-minilm:latest' }],
		}), { status: 200 }));
		vi.stubGlobal('fetch', fetchMock);

		const service = new OllamaChatService({ baseUrl: 'http://ollama:11434/' });
		const models = await service.getAvailableModels();

		expect(fetchMock.mock.calls[0][0]).toBe('http://ollama:11434/api/tags');
		expect(models.map(m => m.id)).toEqual(['gemma3:1b', 'all-minilm:latest']);
	});

	it('throws when the server answers with an error status', async () => {
		vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 500, statusText: 'Internal Server Error' })));

		const service = new OllamaChatService({});

		await expect(service.getAvailableModels()).rejects.toThrow('Failed to fetch models: 500 Internal Server Error');
	});
});

describe('ProviderServiceFactory', () => {
	it('creates the built-in providers', () => {
		const factory = new ProviderServiceFactory();

		expect(factory.create('ollama', {}).getProviderId()).toBe('ollama');
		expect(factory.create('openai', { apiKey: 'test-secret' }).getProviderId()).toBe('openai');
	});

	it('rejects unknown, disabled and misconfigured providers', () => {
		const factory = new ProviderServiceFactory();

		expect(() => factory.create('nope', {})).toThrow('Provider nope not found');
		expect(() => factory.create('ollama', { enabled: false })).toThrow('Provider ollama is disabled');
		let error: unknown;
		try {
			factory.create('openai', {});
		} catch (e) {
			error = e;
		}
		expect(error).toMatchObject({ code: ErrorCode.PROVIDER_NOT_FOUND });
	});
});
