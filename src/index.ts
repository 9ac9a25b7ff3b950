/**
 * Hybrid Memory Engine
 *
 * 情景 + 语义混合记忆，用于为 LLM 组装有界上下文。
 *
 * ```typescript
 * import { MemoryConfigManager, createHybridMemory, HashingEncoder } from 'hybrid-memory-engine';
 *
 * const config = await new MemoryConfigManager().load();
 * const memory = createHybridMemory(new HashingEncoder(), config);
 *
 * memory.eventLog.log({ taskId: 't1', type: 'note', text: 'user prefers email' });
 * memory.vectorStore.upsert({ text: 'Refunds within 30 days', metadata: { tags: ['policy'] } });
 * const context = memory.retriever.retrieve('refund policy');
 * ```
 *
 * @module HybridMemoryEngine
 * @version 1.0.0
 */

export * from './memory/index.js';
export * from './config/index.js';
export * from './tracing/index.js';
export * from './utils/index.js';
