import { GenerationGateway } from '@/service/gateway/GenerationGateway';
import type { GenerationStreamEvent } from '@/service/gateway/GenerationGateway';
import { ErrorCode, GenerationServiceError } from '@/core/errors';
import { FakeProvider } from './helpers/fake-provider';

async function collect(stream: AsyncIterable<GenerationStreamEvent>): Promise<GenerationStreamEvent[]> {
	const events: GenerationStreamEvent[] = [];
	for await (const event of stream) {
		events.push(event);
	}
	return events;
}

describe('GenerationGateway', () => {
	it('returns the complete answer and passes the request through', async () => {
		const provider = new FakeProvider({ answer: 'Paris' });
		const gateway = new GenerationGateway(provider, { model: 'test-llm' });

		expect(await gateway.generate('Capital of France?')).toBe('Paris');
		expect(provider.prompts).toEqual(['Capital of France?']);
		expect(gateway.getModel()).toBe('test-llm');
	});

	it('wraps generation failures', async () => {
		const provider = new FakeProvider({ generationError: new Error('model not loaded') });
		const gateway = new GenerationGateway(provider, { model: 'test-llm' });

		const error = await gateway.generate('hi').catch((e: unknown) => e);

		expect(error).toBeInstanceOf(GenerationServiceError);
		expect(error).toMatchObject({
			code: ErrorCode.GENERATION_SERVICE_UNAVAILABLE,
			message: 'Generation service unavailable: model not loaded',
		});
	});

	it('streams fragments followed by one end event', async () => {
		const provider = new FakeProvider({ fragments: ['The ', '', 'answer', '.'] });
		const gateway = new GenerationGateway(provider, { model: 'test-llm' });

		const events = await collect(gateway.generateStream('question'));

		expect(events).toEqual([
			{ type: 'fragment', text: 'The ' },
			{ type: 'fragment', text: 'answer' },
			{ type: 'fragment', text: '.' },
			{ type: 'end' },
		]);
		expect(provider.streamClosed).toBe(true);
		expect(provider.streamAborted).toBe(false);
	});

	it('turns a stream error event into GenerationServiceError', async () => {
		const provider = new FakeProvider({ generationError: new Error('overloaded') });
		const gateway = new GenerationGateway(provider, { model: 'test-llm' });

		await expect(collect(gateway.generateStream('question')))
			.rejects.toThrow('Generation service error: overloaded');
	});

	it('stops the provider stream when the consumer stops iterating', async () => {
		const provider = new FakeProvider({ fragments: ['a', 'b', 'c', 'd', 'e'] });
		const gateway = new GenerationGateway(provider, { model: 'test-llm' });

		const received: string[] = [];
		for await (const event of gateway.generateStream('question')) {
			if (event.type === 'fragment') {
				received.push(event.text);
				break;
			}
		}

		expect(received).toEqual(['a']);
		expect(provider.streamedFragments).toBe(1);
		expect(provider.streamClosed).toBe(true);
		expect(provider.streamAborted).toBe(true);
	});

	it('aborts the provider request when the caller signal fires', async () => {
		const provider = new FakeProvider({ fragments: ['a', 'b', 'c'], fragmentDelayMs: 20 });
		const gateway = new GenerationGateway(provider, { model: 'test-llm' });
		const controller = new AbortController();

		const received: string[] = [];
		const consume = (async () => {
			for await (const event of gateway.generateStream('question', { signal: controller.signal })) {
				if (event.type === 'fragment') {
					received.push(event.text);
					controller.abort();
				}
			}
		})();

		await expect(consume).rejects.toBeInstanceOf(GenerationServiceError);
		expect(received).toEqual(['a']);
		expect(provider.streamAborted).toBe(true);
	});
});
