/**
 * Hybrid Memory Factory
 *
 * 按已加载的配置组装事件日志、向量存储、追踪器与混合检索器。
 */

import { DEFAULT_MEMORY_CONFIG, type MemoryConfig } from '../config/memory-config.js';
import { RetrievalTracer } from '../tracing/retrieval-tracer.js';
import { getGlobalLogger } from '../utils/logger.js';
import { EventLog } from './event-log.js';
import { HybridRetriever } from './hybrid-retriever.js';
import type { Encoder } from './types.js';
import { VectorStore } from './vector-store.js';

export interface HybridMemory {
  eventLog: EventLog;
  vectorStore: VectorStore;
  tracer: RetrievalTracer;
  retriever: HybridRetriever;
}

export function createHybridMemory(encoder: Encoder, config: MemoryConfig = DEFAULT_MEMORY_CONFIG): HybridMemory {
  getGlobalLogger().setLevel(config.logging.level);

  const eventLog = new EventLog({
    capacity: config.episodic.capacity,
    ttlDays: config.episodic.ttlDays,
    defaultTtlDays: config.episodic.defaultTtlDays,
  });

  const vectorStore = new VectorStore({
    encoder,
    piiScrubAtIngest: config.piiScrubAtIngest,
  });

  const tracer = new RetrievalTracer({
    enabled: config.tracing.enabled,
    path: config.tracing.path,
  });

  const retriever = new HybridRetriever({
    eventLog,
    vectorStore,
    kEpi: config.kEpi,
    kSem: config.kSem,
    tokenBudget: config.tokenBudget,
    rerankerEnabled: config.rerankerEnabled,
    episodicFilters: config.episodicFilters,
    semanticFilters: config.semanticFilters,
    tracer,
  });

  return { eventLog, vectorStore, tracer, retriever };
}
