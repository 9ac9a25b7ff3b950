import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  HybridRetriever,
  estimateTokens,
  rerankScore,
  episodicSource,
  semanticSource,
} from '../src/memory/hybrid-retriever.js';
import { EventLog } from '../src/memory/event-log.js';
import { VectorStore } from '../src/memory/vector-store.js';
import { HashingEncoder } from '../src/memory/encoders.js';
import { RetrievalTracer } from '../src/tracing/retrieval-tracer.js';
import { ConfigError } from '../src/utils/errors.js';
import { createLogger } from '../src/utils/logger.js';
import type { RetrievedItem } from '../src/memory/types.js';

const texts = (items: RetrievedItem[]): string[] => items.map(item => item.text);

describe('HybridRetriever', () => {
  let eventLog: EventLog;
  let vectorStore: VectorStore;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
    eventLog = new EventLog();
    vectorStore = new VectorStore({ encoder: new HashingEncoder() });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('Configuration', () => {
    it('should apply defaults and freeze the settings', () => {
      const retriever = new HybridRetriever({ eventLog, vectorStore });

      expect(retriever.settings).toEqual({ kEpi: 4, kSem: 3, tokenBudget: 1600, rerankerEnabled: false });
      expect(Object.isFrozen(retriever.settings)).toBe(true);
    });

    it('should reject invalid settings', () => {
      expect(() => new HybridRetriever({ eventLog, vectorStore, kEpi: -1 })).toThrow(ConfigError);
      expect(() => new HybridRetriever({ eventLog, vectorStore, tokenBudget: 1.5 })).toThrow(ConfigError);
    });
  });

  describe('Merging', () => {
    it('should place the episodic block before the semantic block', () => {
      eventLog.log({ id: 'e1', type: 'chat', text: 'customer asked about shipping' });
      vectorStore.upsert({ id: 'd1', text: 'shipping takes five days', metadata: { source: 'faq.md', section: 'shipping' } });

      const items = new HybridRetriever({ eventLog, vectorStore }).retrieve('shipping');

      expect(items.map(i => [i.kind, i.id])).toEqual([
        ['episodic', 'e1'],
        ['semantic', 'd1'],
      ]);
      expect(items[0].source).toBe('episodic@2024-01-01T00:00:00.000Z#chat');
      expect(items[1].source).toBe('faq.md#shipping');
    });

    it('should take only the most recent kEpi events', () => {
      ['a', 'b', 'c', 'd', 'e'].forEach(text => eventLog.log({ text }));

      const items = new HybridRetriever({ eventLog, vectorStore, kEpi: 2, kSem: 0 }).retrieve('q');

      expect(texts(items)).toEqual(['d', 'e']);
    });

    it('should use the episodic filters as the acceptance predicate', () => {
      eventLog.log({ type: 'chat', text: 'hello' });
      eventLog.log({ type: 'system', text: 'boot' });

      const items = new HybridRetriever({
        eventLog,
        vectorStore,
        kSem: 0,
        episodicFilters: { type: 'chat' },
      }).retrieve('q');

      expect(texts(items)).toEqual(['hello']);
    });

    it('should prefer an explicit predicate over episodic filters', () => {
      eventLog.log({ type: 'chat', text: 'hello' });
      eventLog.log({ type: 'system', text: 'boot' });

      const items = new HybridRetriever({
        eventLog,
        vectorStore,
        kSem: 0,
        episodicFilters: { type: 'chat' },
        episodicPredicate: event => event.type === 'system',
      }).retrieve('q');

      expect(texts(items)).toEqual(['boot']);
    });

    it('should not call the encoder when kSem is zero', () => {
      const embed = vi.fn((_text: string) => [1]);
      const store = new VectorStore({ encoder: { embed } });
      store.upsert({ text: 'doc' });
      embed.mockClear();

      new HybridRetriever({ eventLog, vectorStore: store, kSem: 0 }).retrieve('q');

      expect(embed).not.toHaveBeenCalled();
    });
  });

  describe('Semantic filter fallback', () => {
    it('should keep filtered results when the filter matches', () => {
      vectorStore.upsert({ id: 'p', text: 'refund policy', metadata: { tags: ['policy'] } });
      vectorStore.upsert({ id: 'n', text: 'refund notes', metadata: { tags: ['internal'] } });

      const items = new HybridRetriever({
        eventLog,
        vectorStore,
        semanticFilters: { tags: ['policy'] },
      }).retrieve('refund');

      expect(items.map(i => i.id)).toEqual(['p']);
    });

    it('should retry once without the filter when nothing matches', () => {
      const logger = createLogger({ enableConsole: false });
      vectorStore.upsert({ id: 'n', text: 'refund notes', metadata: { tags: ['internal'] } });

      const items = new HybridRetriever({
        eventLog,
        vectorStore,
        semanticFilters: { tags: ['policy'] },
        logger,
      }).retrieve('refund');

      expect(items.map(i => i.id)).toEqual(['n']);
      expect(logger.getAllLogs().map(entry => [entry.level, entry.message])).toContainEqual([
        'info',
        'Semantic filter matched nothing, retrying unfiltered',
      ]);
    });
  });

  describe('Deduplication', () => {
    it('should keep the first occurrence of a (source, text) pair', () => {
      eventLog.log({ id: 'first', text: 'same words', provenance: 'ticket-1' });
      eventLog.log({ id: 'second', text: 'same words', provenance: 'ticket-1' });
      eventLog.log({ id: 'third', text: 'same words', provenance: 'ticket-2' });

      const items = new HybridRetriever({ eventLog, vectorStore, kSem: 0 }).retrieve('q');

      expect(items.map(i => i.id)).toEqual(['first', 'third']);
    });

    it('should never return duplicate pairs', () => {
      for (let i = 0; i < 6; i++) {
        eventLog.log({ text: `note ${i % 2}`, provenance: 'log' });
      }

      const items = new HybridRetriever({ eventLog, vectorStore, kEpi: 6, kSem: 0 }).retrieve('q');
      const keys = items.map(i => `${i.source}|${i.text}`);

      expect(new Set(keys).size).toBe(keys.length);
      expect(texts(items)).toEqual(['note 0', 'note 1']);
    });
  });

  describe('Token budget', () => {
    beforeEach(() => {
      eventLog.log({ text: 'one two three' });
      eventLog.log({ text: 'a b' });
      eventLog.log({ text: 'x' });
    });

    it('should stop at the first item that does not fit', () => {
      // costs: 4, 3, 1
      const items = new HybridRetriever({ eventLog, vectorStore, kSem: 0, tokenBudget: 5 }).retrieve('q');

      expect(texts(items)).toEqual(['one two three']);
    });

    it('should return a prefix of the untrimmed order', () => {
      const full = new HybridRetriever({ eventLog, vectorStore, kSem: 0 }).retrieve('q');
      const trimmed = new HybridRetriever({ eventLog, vectorStore, kSem: 0, tokenBudget: 7 }).retrieve('q');

      expect(texts(trimmed)).toEqual(texts(full).slice(0, trimmed.length));
      expect(texts(trimmed)).toEqual(['one two three', 'a b']);
    });

    it('should return nothing for a zero budget', () => {
      expect(new HybridRetriever({ eventLog, vectorStore, tokenBudget: 0 }).retrieve('q')).toEqual([]);
    });
  });

  describe('Reranking', () => {
    const seed = (): void => {
      eventLog.log({ id: 'e', text: 'customer wrote in yesterday' });
      vectorStore.upsert({ id: 'd', text: 'refund policy allows returns within thirty days', metadata: { source: 'policy.md' } });
    };

    it('should return the episodic item first when disabled', () => {
      seed();
      const items = new HybridRetriever({ eventLog, vectorStore, kEpi: 1, kSem: 1 }).retrieve('refund policy');

      expect(items.map(i => i.id)).toEqual(['e', 'd']);
    });

    it('should move the matching semantic item first when enabled', () => {
      seed();
      const items = new HybridRetriever({
        eventLog,
        vectorStore,
        kEpi: 1,
        kSem: 1,
        rerankerEnabled: true,
      }).retrieve('refund policy');

      expect(items.map(i => i.id)).toEqual(['d', 'e']);
      expect(items[0].score).toBeCloseTo(1.2);
      expect(items[1].score).toBeCloseTo(0.05);
    });

    it('should keep prior order for equal scores', () => {
      eventLog.log({ id: 'first', text: 'alpha' });
      eventLog.log({ id: 'second', text: 'beta' });

      const items = new HybridRetriever({ eventLog, vectorStore, kSem: 0, rerankerEnabled: true }).retrieve('gamma');

      expect(items.map(i => i.id)).toEqual(['first', 'second']);
    });
  });

  describe('Tracing', () => {
    it('should record a retrieve span with the returned ids', () => {
      const tracer = new RetrievalTracer({ path: null });
      eventLog.log({ id: 'e1', text: 'hello there' });
      vectorStore.upsert({ id: 'd1', text: 'hello world' });

      const items = new HybridRetriever({ eventLog, vectorStore, tracer }).retrieve('hello');
      const [row] = tracer.getTraces();

      expect(items).toHaveLength(2);
      expect(row.span).toBe('retrieve');
      expect(row.inputLen).toBe(5);
      expect(row.retrievedIds).toEqual(['e1', 'd1']);
      expect(row.ctxLen).toBe(2);
      expect(tracer.openSpanCount).toBe(0);
    });

    it('should not record a row when retrieval fails', () => {
      const tracer = new RetrievalTracer({ path: null });
      const failure = new Error('encoder offline');
      let calls = 0;
      const store = new VectorStore({
        encoder: {
          embed: () => {
            calls++;
            if (calls > 1) throw failure;
            return [1, 0];
          },
        },
      });
      store.upsert({ id: 'd1', text: 'stored' });

      const retriever = new HybridRetriever({ eventLog, vectorStore: store, tracer });

      expect(() => retriever.retrieve('query')).toThrow(failure);
      expect(tracer.getTraces()).toEqual([]);
      expect(tracer.openSpanCount).toBe(0);
    });
  });
});

describe('Scoring helpers', () => {
  it('should estimate tokens from the word count', () => {
    expect(estimateTokens('')).toBe(1);
    expect(estimateTokens('   ')).toBe(1);
    expect(estimateTokens('one')).toBe(1);
    expect(estimateTokens('one two')).toBe(3);
    expect(estimateTokens('a b c d e')).toBe(7);
  });

  it('should count each shared word once', () => {
    const item: RetrievedItem = {
      kind: 'semantic',
      source: 's',
      id: 'd',
      text: 'Refund refund POLICY',
      metadata: { tags: [], pii: false },
      embedding: [],
    };

    expect(rerankScore(item, new Set(['refund', 'policy']))).toBeCloseTo(1.2);
  });

  it('should derive sources from provenance or position', () => {
    const event = new EventLog().log({ type: 'chat', timestamp: '2024-02-02T00:00:00Z' });
    expect(episodicSource(event)).toBe('episodic@2024-02-02T00:00:00Z#chat');
    expect(episodicSource({ ...event, provenance: 'crm:42' })).toBe('crm:42');

    const base = { id: 'd7', text: 't', embedding: [], score: 0.5 };
    expect(semanticSource({ ...base, metadata: { tags: [], pii: false } })).toBe('unknown#d7');
    expect(semanticSource({ ...base, metadata: { tags: [], pii: false, source: 'kb', id: 'kb-1' } })).toBe('kb#kb-1');
    expect(semanticSource({ ...base, metadata: { tags: [], pii: false, provenance: 'upload' } })).toBe('upload');
  });

  it('should skip empty source parts', () => {
    const base = { id: 'd7', text: 't', embedding: [], score: 0.5 };

    expect(semanticSource({ ...base, metadata: { tags: [], pii: false, source: 'kb', section: '' } })).toBe('kb#d7');
    expect(semanticSource({ ...base, metadata: { tags: [], pii: false, source: 'kb', section: '', id: 'kb-1' } })).toBe('kb#kb-1');
    expect(semanticSource({ ...base, metadata: { tags: [], pii: false, source: '', provenance: '' } })).toBe('unknown#d7');
  });
});
