import { mkdtemp, rm } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { KnowledgeBase } from '@/core/storage/KnowledgeBase';
import type { EmbeddedChunk, SourceRecord } from '@/core/storage/types';
import { DuplicateChunkError, ErrorCode, IndexStorageError } from '@/core/errors';
import { KNOWLEDGE_BASE_DB_FILENAME } from '@/core/constant';

function makeSource(id: string, ingestedAt = 1000): SourceRecord {
	return {
		id,
		origin: 'file',
		locator: `${id}.txt`,
		displayName: `${id}.txt`,
		docType: 'txt',
		contentHash: `hash-${id}`,
		charCount: 100,
		embeddingModel: 'test-embed',
		ingestedAt,
		metadata: {},
	};
}

function makeChunks(sourceId: string, vectors: number[][]): EmbeddedChunk[] {
	return vectors.map((embedding, i) => ({
		id: `${sourceId}:${i}`,
		sourceId,
		sequenceIndex: i,
		text: `${sourceId} chunk ${i}`,
		startOffset: i * 10,
		endOffset: i * 10 + 10,
		embedding,
	}));
}

describe('KnowledgeBase', () => {
	let kb: KnowledgeBase;

	beforeEach(async () => {
		kb = await KnowledgeBase.open({ storageFolder: ':memory:' });
	});

	afterEach(async () => {
		await kb.close();
	});

	it('returns nothing when searching an empty knowledge base', async () => {
		expect(await kb.search([1, 0, 0], 5)).toEqual([]);
	});

	it('inserts a source and reports it with its chunk count', async () => {
		const descriptor = await kb.insert(makeSource('a'), makeChunks('a', [[1, 0], [0, 1]]));

		expect(descriptor.chunkCount).toBe(2);
		expect(await kb.listSources()).toEqual([{ ...makeSource('a'), chunkCount: 2 }]);
		expect(await kb.getSource('a')).toEqual({ ...makeSource('a'), chunkCount: 2 });
		expect(await kb.getSource('missing')).toBeUndefined();
		expect(await kb.getChunks('a')).toEqual([
			{ id: 'a:0', sourceId: 'a', sequenceIndex: 0, text: 'a chunk 0', startOffset: 0, endOffset: 10, ordinal: 1 },
			{ id: 'a:1', sourceId: 'a', sequenceIndex: 1, text: 'a chunk 1', startOffset: 10, endOffset: 20, ordinal: 2 },
		]);
	});

	it('stores the loader metadata with the source', async () => {
		await kb.insert({ ...makeSource('a'), metadata: { pageCount: 3, title: 'Handbook' } }, makeChunks('a', [[1, 0]]));

		expect((await kb.getSource('a'))?.metadata).toEqual({ pageCount: 3, title: 'Handbook' });
		expect((await kb.search([1, 0], 1))[0].source.metadata).toEqual({ pageCount: 3, title: 'Handbook' });
	});

	it('orders search results by descending cosine similarity', async () => {
		await kb.insert(makeSource('a'), makeChunks('a', [[1, 0], [0, 1], [1, 1]]));

		const hits = await kb.search([1, 0], 3);

		expect(hits.map(h => h.chunk.id)).toEqual(['a:0', 'a:2', 'a:1']);
		expect(hits[0].score).toBeCloseTo(1, 6);
		expect(hits[1].score).toBeCloseTo(Math.SQRT1_2, 6);
		expect(hits[2].score).toBeCloseTo(0, 6);
		expect(hits[0].source.displayName).toBe('a.txt');
	});

	it('breaks score ties by insertion order', async () => {
		await kb.insert(makeSource('first'), makeChunks('first', [[2, 0]]));
		await kb.insert(makeSource('second'), makeChunks('second', [[1, 0]]));
		await kb.insert(makeSource('third'), makeChunks('third', [[3, 0]]));

		const hits = await kb.search([1, 0], 3);

		expect(hits.map(h => h.chunk.id)).toEqual(['first:0', 'second:0', 'third:0']);
	});

	it('returns at most topK results and all N when topK >= N', async () => {
		await kb.insert(makeSource('a'), makeChunks('a', [[1, 0], [0.9, 0.1], [0.5, 0.5], [0, 1]]));

		expect(await kb.search([1, 0], 2)).toHaveLength(2);
		const all = await kb.search([1, 0], 10);
		expect(all).toHaveLength(4);
		for (let i = 1; i < all.length; i++) {
			expect(all[i - 1].score).toBeGreaterThanOrEqual(all[i].score);
		}
	});

	it('scores a zero vector as 0', async () => {
		await kb.insert(makeSource('a'), makeChunks('a', [[0, 0], [1, 0]]));

		const hits = await kb.search([1, 0], 2);

		expect(hits.map(h => [h.chunk.id, h.score])).toEqual([['a:1', 1], ['a:0', 0]]);
	});

	it('restricts search to the given sources', async () => {
		await kb.insert(makeSource('a'), makeChunks('a', [[1, 0]]));
		await kb.insert(makeSource('b'), makeChunks('b', [[1, 0]]));

		expect((await kb.search([1, 0], 5, { sourceIds: ['b'] })).map(h => h.chunk.id)).toEqual(['b:0']);
		expect(await kb.search([1, 0], 5, { sourceIds: [] })).toEqual([]);
	});

	it('rejects a chunk id that already exists and writes nothing', async () => {
		await kb.insert(makeSource('a'), makeChunks('a', [[1, 0]]));

		const clash = makeChunks('b', [[1, 0], [0, 1]]);
		clash[1] = { ...clash[1], id: 'a:0' };
		const error = await kb.insert(makeSource('b'), clash).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(DuplicateChunkError);
		expect(error).toMatchObject({ code: ErrorCode.DUPLICATE_CHUNK, chunkIds: ['a:0'] });
		expect(await kb.getSource('b')).toBeUndefined();
		expect((await kb.stats()).totalChunks).toBe(1);
	});

	it('rejects duplicate ids inside one insert', async () => {
		const chunks = makeChunks('a', [[1, 0], [0, 1]]);
		chunks[1] = { ...chunks[1], id: 'a:0' };

		await expect(kb.insert(makeSource('a'), chunks)).rejects.toThrow('Duplicate chunk id(s): a:0');
	});

	it('rejects inserting a source that already exists', async () => {
		await kb.insert(makeSource('a'), makeChunks('a', [[1, 0]]));

		await expect(kb.insert(makeSource('a'), [])).rejects.toBeInstanceOf(DuplicateChunkError);
	});

	it('deletes a source with its chunks, idempotently', async () => {
		await kb.insert(makeSource('a'), makeChunks('a', [[1, 0]]));
		await kb.insert(makeSource('b'), makeChunks('b', [[1, 0]]));

		expect(await kb.deleteBySource('a')).toBe(true);
		expect(await kb.deleteBySource('a')).toBe(false);

		expect((await kb.listSources()).map(s => s.id)).toEqual(['b']);
		expect((await kb.search([1, 0], 5)).map(h => h.source.id)).toEqual(['b']);
		expect(await kb.getChunks('a')).toEqual([]);
	});

	it('replaces a stored source and its chunks in one step', async () => {
		await kb.insert(makeSource('a'), makeChunks('a', [[1, 0], [0, 1]]));
		await kb.insert(makeSource('b'), makeChunks('b', [[1, 1]]));

		const descriptor = await kb.replace({ ...makeSource('a', 2000), contentHash: 'hash-a2' }, makeChunks('a', [[0, 1]]));

		expect(descriptor).toEqual({ ...makeSource('a', 2000), contentHash: 'hash-a2', chunkCount: 1 });
		expect(await kb.getSource('a')).toEqual(descriptor);
		expect((await kb.getChunks('a')).map(c => [c.id, c.ordinal])).toEqual([['a:0', 4]]);
		expect((await kb.stats()).totalChunks).toBe(2);
	});

	it('inserts through replace when nothing is stored yet', async () => {
		await kb.replace(makeSource('a'), makeChunks('a', [[1, 0]]));

		expect((await kb.listSources()).map(s => [s.id, s.chunkCount])).toEqual([['a', 1]]);
	});

	it('keeps the stored version when a replace is rejected', async () => {
		await kb.insert(makeSource('a'), makeChunks('a', [[1, 0]]));
		await kb.insert(makeSource('b'), makeChunks('b', [[0, 1]]));

		const clash = makeChunks('a', [[1, 0]]);
		clash[0] = { ...clash[0], id: 'b:0' };
		await expect(kb.replace(makeSource('a', 2000), clash)).rejects.toBeInstanceOf(DuplicateChunkError);
		await expect(kb.replace(makeSource('a', 2000), makeChunks('a', [[1, 0, 0]])))
			.rejects.toMatchObject({ code: ErrorCode.EMBEDDING_DIMENSION_MISMATCH });

		expect(await kb.getSource('a')).toEqual({ ...makeSource('a'), chunkCount: 1 });
		expect((await kb.getChunks('a')).map(c => c.text)).toEqual(['a chunk 0']);
	});

	it('lists sources by ingestion time, then id', async () => {
		await kb.insert(makeSource('late', 3000), makeChunks('late', [[1, 0]]));
		await kb.insert(makeSource('b-early', 1000), makeChunks('b-early', [[1, 0]]));
		await kb.insert(makeSource('a-early', 1000), makeChunks('a-early', [[1, 0]]));

		expect((await kb.listSources()).map(s => s.id)).toEqual(['a-early', 'b-early', 'late']);
	});

	it('clears everything and returns the number of removed sources', async () => {
		await kb.insert(makeSource('a'), makeChunks('a', [[1, 0]]));
		await kb.insert(makeSource('b'), makeChunks('b', [[0, 1]]));

		expect(await kb.clear()).toBe(2);
		expect(await kb.listSources()).toEqual([]);
		expect(await kb.stats()).toEqual({
			totalSources: 0,
			totalChunks: 0,
			embeddingModel: null,
			embeddingDimension: null,
			location: ':memory:',
		});
		expect(await kb.clear()).toBe(0);
	});

	it('returns the removed sources when clearing', async () => {
		await kb.insert(makeSource('b', 2000), makeChunks('b', [[0, 1]]));
		await kb.insert(makeSource('a', 1000), makeChunks('a', [[1, 0]]));

		expect(await kb.clearSources()).toEqual([
			{ ...makeSource('a', 1000), chunkCount: 1 },
			{ ...makeSource('b', 2000), chunkCount: 1 },
		]);
		expect(await kb.clearSources()).toEqual([]);
	});

	it('records the embedding dimension and rejects other dimensions until cleared', async () => {
		await kb.insert(makeSource('a'), makeChunks('a', [[1, 0]]));

		const insertError = await kb.insert(makeSource('b'), makeChunks('b', [[1, 0, 0]])).catch((e: unknown) => e);
		expect(insertError).toBeInstanceOf(IndexStorageError);
		expect(insertError).toMatchObject({ code: ErrorCode.EMBEDDING_DIMENSION_MISMATCH });

		await expect(kb.search([1, 0, 0], 1)).rejects.toMatchObject({ code: ErrorCode.EMBEDDING_DIMENSION_MISMATCH });

		await kb.clear();
		await kb.insert(makeSource('b'), makeChunks('b', [[1, 0, 0]]));
		expect((await kb.stats()).embeddingDimension).toBe(3);
	});

	it('rejects chunks of mixed dimensions or with non-finite values', async () => {
		await expect(kb.insert(makeSource('a'), makeChunks('a', [[1, 0], [1, 0, 0]])))
			.rejects.toMatchObject({ code: ErrorCode.EMBEDDING_DIMENSION_MISMATCH });
		await expect(kb.insert(makeSource('a'), makeChunks('a', [[Number.NaN, 0]])))
			.rejects.toBeInstanceOf(IndexStorageError);
		expect(await kb.listSources()).toEqual([]);
	});

	it('keeps separate instances independent', async () => {
		const other = await KnowledgeBase.open({ storageFolder: ':memory:' });
		try {
			await kb.insert(makeSource('a'), makeChunks('a', [[1, 0]]));
			expect(await other.listSources()).toEqual([]);
		} finally {
			await other.close();
		}
	});
});

describe('KnowledgeBase persistence', () => {
	let folder: string;

	beforeEach(async () => {
		folder = await mkdtemp(path.join(tmpdir(), 'kb-test-'));
	});

	afterEach(async () => {
		await rm(folder, { recursive: true, force: true });
	});

	it('keeps committed data across close and reopen', async () => {
		const kb = await KnowledgeBase.open({ storageFolder: folder });
		await kb.insert(makeSource('a'), makeChunks('a', [[1, 0], [0, 1]]));
		await kb.insert(makeSource('b'), makeChunks('b', [[1, 1]]));
		await kb.deleteBySource('b');
		await kb.close();

		expect(existsSync(path.join(folder, KNOWLEDGE_BASE_DB_FILENAME))).toBe(true);

		const reopened = await KnowledgeBase.open({ storageFolder: folder });
		try {
			expect((await reopened.listSources()).map(s => [s.id, s.chunkCount])).toEqual([['a', 2]]);
			expect((await reopened.search([0, 1], 1))[0].chunk.id).toBe('a:1');
			expect(reopened.location()).toBe(path.join(folder, KNOWLEDGE_BASE_DB_FILENAME));

			// ordinals keep growing after a restart
			await reopened.insert(makeSource('c'), makeChunks('c', [[1, 0]]));
			expect((await reopened.getChunks('c'))[0].ordinal).toBe(4);
		} finally {
			await reopened.close();
		}
	});

	it('can be closed twice', async () => {
		const kb = await KnowledgeBase.open({ storageFolder: folder });
		await kb.close();
		await expect(kb.close()).resolves.toBeUndefined();
	});
});
