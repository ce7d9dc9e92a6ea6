import { EmbeddingGateway } from '@/service/gateway/EmbeddingGateway';
import { EmbeddingServiceError, ErrorCode } from '@/core/errors';
import { FakeProvider, fakeEmbedding } from './helpers/fake-provider';

describe('EmbeddingGateway', () => {
	it('returns one vector per text in input order', async () => {
		const provider = new FakeProvider();
		const gateway = new EmbeddingGateway(provider, { model: 'test-embed', batchSize: 16 });

		const vectors = await gateway.embed(['plum plum', 'apple', 'banana cherry']);

		expect(vectors).toEqual([
			[0, 0, 0, 0, 0, 0, 0, 2, 1],
			[1, 0, 0, 0, 0, 0, 0, 0, 1],
			[0, 1, 1, 0, 0, 0, 0, 0, 1],
		]);
		expect(gateway.getModel()).toBe('test-embed');
	});

	it('splits large inputs into ordered batches', async () => {
		const provider = new FakeProvider();
		const gateway = new EmbeddingGateway(provider, { model: 'test-embed', batchSize: 2 });
		const texts = ['apple', 'banana', 'cherry', 'grape', 'lemon'];

		const vectors = await gateway.embed(texts);

		expect(provider.embeddingCalls).toEqual([['apple', 'banana'], ['cherry', 'grape'], ['lemon']]);
		expect(vectors).toEqual(texts.map(fakeEmbedding));
	});

	it('returns an empty list for empty input without calling the service', async () => {
		const provider = new FakeProvider();
		const gateway = new EmbeddingGateway(provider, { model: 'test-embed', batchSize: 4 });

		expect(await gateway.embed([])).toEqual([]);
		expect(provider.embeddingCalls).toEqual([]);
	});

	it('wraps service failures without retrying', async () => {
		const provider = new FakeProvider({ embeddingError: new Error('connect ECONNREFUSED') });
		const gateway = new EmbeddingGateway(provider, { model: 'test-embed', batchSize: 4 });

		const error = await gateway.embed(['apple']).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(EmbeddingServiceError);
		expect(error).toMatchObject({
			code: ErrorCode.EMBEDDING_SERVICE_UNAVAILABLE,
			message: 'Embedding service unavailable: connect ECONNREFUSED',
		});
		expect(provider.embeddingCalls).toHaveLength(1);
	});

	it('rejects a response with the wrong number of vectors', async () => {
		const provider = new FakeProvider({ embed: () => [[1, 2]] });
		const gateway = new EmbeddingGateway(provider, { model: 'test-embed', batchSize: 4 });

		await expect(gateway.embed(['apple', 'banana'])).rejects.toThrow('Embedding service returned 1 vectors for 2 texts');
	});

	it('rejects vectors of inconsistent dimensions across batches', async () => {
		const provider = new FakeProvider({ embed: texts => texts.map(text => (text === 'short' ? [1] : [1, 2])) });
		const gateway = new EmbeddingGateway(provider, { model: 'test-embed', batchSize: 1 });

		await expect(gateway.embed(['long', 'short'])).rejects.toBeInstanceOf(EmbeddingServiceError);
	});

	it('rejects empty or non-finite vectors', async () => {
		const empty = new EmbeddingGateway(new FakeProvider({ embed: () => [[]] }), { model: 'm', batchSize: 4 });
		const nan = new EmbeddingGateway(new FakeProvider({ embed: () => [[Number.NaN]] }), { model: 'm', batchSize: 4 });

		await expect(empty.embed(['apple'])).rejects.toThrow('Embedding service returned an empty or non-numeric vector');
		await expect(nan.embed(['apple'])).rejects.toBeInstanceOf(EmbeddingServiceError);
	});
});
