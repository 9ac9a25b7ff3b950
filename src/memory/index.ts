/**
 * 记忆模块索引
 *
 * 情景记忆（事件日志）、语义记忆（向量存储）与混合检索。
 *
 * @module Memory
 * @version 1.0.0
 */

// ============================================================================
// 情景记忆
// ============================================================================

export { EventLog, DEFAULT_EVENT_CAPACITY, DEFAULT_TTL_DAYS } from './event-log.js';
export type { EventLogOptions, EventLogEvents } from './event-log.js';

// ============================================================================
// 语义记忆
// ============================================================================

export { VectorStore } from './vector-store.js';
export type { VectorStoreOptions, VectorStoreEvents } from './vector-store.js';
export { EmbeddingMatrix, normalize } from './embedding-matrix.js';
export { HashingEncoder, DEFAULT_HASHING_DIMENSION, tokenize } from './encoders.js';
export { scrubPII, containsEmail, EMAIL_REDACTION } from './pii.js';

// ============================================================================
// 检索
// ============================================================================

export {
  HybridRetriever,
  estimateTokens,
  rerankScore,
  episodicSource,
  semanticSource,
  SEMANTIC_BONUS,
  EPISODIC_BONUS,
  SHARED_WORD_BONUS,
  TOKENS_PER_WORD,
} from './hybrid-retriever.js';
export type { HybridRetrieverOptions, RetrieverSettings } from './hybrid-retriever.js';
export { createHybridMemory } from './hybrid-memory.js';
export type { HybridMemory } from './hybrid-memory.js';

// ============================================================================
// 过滤器与类型
// ============================================================================

export { matchesTags, matchesFilters, eventMatches, buildEventPredicate, readEventField } from './filters.js';
export type { FieldReader } from './filters.js';

export type {
  Encoder,
  FilterScalar,
  MemoryFilters,
  MemoryEvent,
  EventInput,
  EventPredicate,
  FetchOptions,
  DocumentMetadata,
  MemoryDocument,
  DocumentInput,
  ScoredDocument,
  RetrievedKind,
  EpisodicItem,
  SemanticItem,
  RetrievedItem,
} from './types.js';
