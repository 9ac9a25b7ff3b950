/**
 * Hybrid Retriever
 *
 * Merges the episodic window and the semantic top-k into one context list:
 * 1. last kEpi events accepted by the episodic predicate
 * 2. top kSem documents, with one unfiltered retry when the semantic filter matches nothing
 * 3. kind/source annotation
 * 4. optional lexical rerank (stable)
 * 5. dedup on (source, text)
 * 6. greedy prefix trim to the token budget
 */

import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import type { RetrievalTracer } from '../tracing/retrieval-tracer.js';
import type { EventLog } from './event-log.js';
import { buildEventPredicate } from './filters.js';
import type {
  EpisodicItem,
  EventPredicate,
  MemoryEvent,
  MemoryFilters,
  RetrievedItem,
  ScoredDocument,
  SemanticItem,
} from './types.js';
import type { VectorStore } from './vector-store.js';

// ============================================================================
// Configuration
// ============================================================================

export const SEMANTIC_BONUS = 1.0;
export const EPISODIC_BONUS = 0.05;
export const SHARED_WORD_BONUS = 0.1;
export const TOKENS_PER_WORD = 1.3;

const retrieverConfigSchema = z.object({
  kEpi: z.number().int().min(0).default(4),
  kSem: z.number().int().min(0).default(3),
  tokenBudget: z.number().int().min(0).default(1600),
  rerankerEnabled: z.boolean().default(false),
});

export type RetrieverSettings = z.infer<typeof retrieverConfigSchema>;

export interface HybridRetrieverOptions extends Partial<RetrieverSettings> {
  eventLog: EventLog;
  vectorStore: VectorStore;
  /** Takes precedence over episodicFilters */
  episodicPredicate?: EventPredicate;
  episodicFilters?: MemoryFilters | null;
  semanticFilters?: MemoryFilters | null;
  tracer?: RetrievalTracer;
  logger?: Logger;
}

// ============================================================================
// Scoring helpers
// ============================================================================

function words(text: string): string[] {
  return text.split(/\s+/).filter(w => w.length > 0);
}

/**
 * Estimated token cost: max(1, round(wordCount * 1.3))
 */
export function estimateTokens(text: string): number {
  return Math.max(1, Math.round(words(text).length * TOKENS_PER_WORD));
}

export function rerankScore(item: RetrievedItem, queryWords: ReadonlySet<string>): number {
  let score = item.kind === 'semantic' ? SEMANTIC_BONUS : 0;

  let shared = 0;
  for (const word of new Set(words(item.text.toLowerCase()))) {
    if (queryWords.has(word)) shared++;
  }
  score += SHARED_WORD_BONUS * shared;

  if (item.kind === 'episodic') {
    score += EPISODIC_BONUS;
  }
  return score;
}

export function episodicSource(event: MemoryEvent): string {
  return event.provenance ?? `episodic@${event.timestamp}#${event.type}`;
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function semanticSource(doc: ScoredDocument): string {
  const { metadata } = doc;
  const provenance = nonEmpty(metadata.provenance);
  if (provenance) {
    return provenance;
  }
  const section = nonEmpty(metadata.section) ?? nonEmpty(metadata.id) ?? doc.id;
  return `${nonEmpty(metadata.source) ?? 'unknown'}#${section}`;
}

// ============================================================================
// Hybrid Retriever
// ============================================================================

export class HybridRetriever {
  readonly settings: Readonly<RetrieverSettings>;
  private eventLog: EventLog;
  private vectorStore: VectorStore;
  private predicate: EventPredicate;
  private semanticFilters: MemoryFilters | null;
  private tracer?: RetrievalTracer;
  private logger: Logger;

  constructor(options: HybridRetrieverOptions) {
    const parsed = retrieverConfigSchema.safeParse({
      kEpi: options.kEpi,
      kSem: options.kSem,
      tokenBudget: options.tokenBudget,
      rerankerEnabled: options.rerankerEnabled,
    });
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigError(`Invalid retriever setting: ${issue.path.join('.')}: ${issue.message}`, {
        field: issue.path.join('.'),
        details: parsed.error.issues,
      });
    }

    this.settings = Object.freeze(parsed.data);
    this.eventLog = options.eventLog;
    this.vectorStore = options.vectorStore;
    this.predicate = options.episodicPredicate ?? buildEventPredicate(options.episodicFilters);
    this.semanticFilters = options.semanticFilters ? { ...options.semanticFilters } : null;
    this.tracer = options.tracer;
    this.logger = options.logger ?? getLogger('retriever');
  }

  retrieve(query: string): RetrievedItem[] {
    const tracer = this.tracer;
    const spanId = tracer?.startSpan('retrieve', query);

    let items: RetrievedItem[];
    try {
      items = this.run(query);
    } catch (error) {
      // 失败的检索不写追踪行
      if (tracer && spanId !== undefined) tracer.abortSpan(spanId);
      throw error;
    }

    if (tracer && spanId !== undefined) {
      tracer.endSpan(spanId, { retrieved: items });
    }
    return items;
  }

  private run(query: string): RetrievedItem[] {
    const { kEpi, kSem, tokenBudget, rerankerEnabled } = this.settings;

    const events = this.eventLog.topk(kEpi, this.predicate);
    const documents = this.searchSemantic(query, kSem);

    let merged: RetrievedItem[] = [
      ...events.map((event): EpisodicItem => ({ ...event, kind: 'episodic', source: episodicSource(event) })),
      ...documents.map((doc): SemanticItem => ({ ...doc, kind: 'semantic', source: semanticSource(doc) })),
    ];

    if (rerankerEnabled) {
      merged = this.rerank(query, merged);
    }

    const unique = this.dedupe(merged);
    const trimmed = this.trimToBudget(unique, tokenBudget);

    this.logger.debug('Retrieved context', {
      episodic: events.length,
      semantic: documents.length,
      deduped: merged.length - unique.length,
      returned: trimmed.length,
    });

    return trimmed;
  }

  private searchSemantic(query: string, kSem: number): ScoredDocument[] {
    if (!this.semanticFilters) {
      return this.vectorStore.search(query, kSem);
    }

    const filtered = this.vectorStore.search(query, kSem, this.semanticFilters);
    if (filtered.length > 0) {
      return filtered;
    }

    this.logger.info('Semantic filter matched nothing, retrying unfiltered', {
      filters: this.semanticFilters,
    });
    return this.vectorStore.search(query, kSem);
  }

  private rerank(query: string, items: RetrievedItem[]): RetrievedItem[] {
    const queryWords = new Set(words(query.toLowerCase()));
    const scored = items.map((item): RetrievedItem => ({ ...item, score: rerankScore(item, queryWords) }));
    // 稳定排序，同分保持原顺序
    return scored.sort((a, b) => (b.score ?? 0) - (a.score ?? 0));
  }

  private dedupe(items: RetrievedItem[]): RetrievedItem[] {
    const seen = new Set<string>();
    return items.filter(item => {
      const key = `${item.source}\u0000${item.text}`;
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }

  private trimToBudget(items: RetrievedItem[], budget: number): RetrievedItem[] {
    const kept: RetrievedItem[] = [];
    let used = 0;

    for (const item of items) {
      const cost = estimateTokens(item.text);
      if (used + cost > budget) break;
      used += cost;
      kept.push(item);
    }

    return kept;
  }
}
