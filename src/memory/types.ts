/**
 * 记忆核心类型定义
 *
 * 情景记忆（事件）与语义记忆（文档）的统一数据结构
 *
 * @module MemoryTypes
 * @version 1.0.0
 */

import type { TimestampInput } from '../utils/time.js';

// ============================================================================
// 编码器
// ============================================================================

/**
 * 文本编码器能力
 *
 * 对相同文本必须返回相同向量；不同调用之间维度可以变化。
 */
export interface Encoder {
  embed(text: string): number[];
}

// ============================================================================
// 过滤器
// ============================================================================

export type FilterScalar = string | number | boolean;

/**
 * 过滤条件
 *
 * 普通键为相等匹配；`tags` 为列表时要求全部包含，为标量时要求成员存在。
 * 值为 null/undefined 的键被忽略。
 */
export interface MemoryFilters {
  [key: string]: FilterScalar | string[] | null | undefined;
}

// ============================================================================
// 情景记忆
// ============================================================================

/**
 * 情景事件
 */
export interface MemoryEvent {
  /** 调用方提供的标识符 */
  readonly id?: string;
  readonly taskId?: string;
  readonly session?: string;
  /** 事件类别，决定 TTL */
  readonly type: string;
  readonly text: string;
  /** ISO-8601 时间戳；调用方提供的字符串原样保留 */
  readonly timestamp: string;
  /** 过期时间；null 表示永不过期 */
  readonly expiresAt: string | null;
  readonly tags: readonly string[];
  readonly provenance?: string;
  /** 调用方自定义字段 */
  readonly extra: Readonly<Record<string, unknown>>;
}

/**
 * log() 的输入
 */
export interface EventInput {
  id?: string;
  taskId?: string;
  session?: string;
  type?: string;
  text?: string;
  timestamp?: TimestampInput;
  expiresAt?: TimestampInput | null;
  tags?: string[];
  provenance?: string;
  [key: string]: unknown;
}

export type EventPredicate = (event: MemoryEvent) => boolean;

export interface FetchOptions {
  taskId?: string;
  lastN?: number;
  sinceMinutes?: number;
  filters?: MemoryFilters;
}

// ============================================================================
// 语义记忆
// ============================================================================

/**
 * 文档元数据
 */
export interface DocumentMetadata {
  source?: string;
  section?: string;
  tags: string[];
  pii: boolean;
  provenance?: string;
  [key: string]: unknown;
}

/**
 * 语义文档
 */
export interface MemoryDocument {
  readonly id: string;
  readonly text: string;
  readonly metadata: Readonly<DocumentMetadata>;
  /** 单位化后的向量 */
  readonly embedding: readonly number[];
}

/**
 * upsert() 的输入
 */
export interface DocumentInput {
  id?: string;
  text?: string;
  metadata?: Partial<DocumentMetadata>;
}

export interface ScoredDocument extends MemoryDocument {
  /** 余弦相似度 */
  readonly score: number;
}

// ============================================================================
// 检索结果
// ============================================================================

export type RetrievedKind = 'episodic' | 'semantic';

export interface EpisodicItem extends MemoryEvent {
  readonly kind: 'episodic';
  readonly source: string;
  readonly score?: number;
}

export interface SemanticItem extends MemoryDocument {
  readonly kind: 'semantic';
  readonly source: string;
  readonly score?: number;
}

export type RetrievedItem = EpisodicItem | SemanticItem;
