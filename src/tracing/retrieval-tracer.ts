/**
 * Retrieval Tracer
 * 检索追踪器 - 记录输入、检索到的条目标识、输出与耗时
 *
 * 特性：
 * 1. 内存限制 - 只保留最近 maxTraces 条记录
 * 2. 可选 JSONL 文件输出，目录按需创建
 * 3. 写入失败只记录警告，不影响调用方
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { getLogger, type Logger } from '../utils/logger.js';
import { RingBuffer } from '../utils/ring-buffer.js';

export const DISABLED_SPAN = 'disabled';

export interface TraceRow {
  ts: string;
  span: string;
  inputLen: number;
  ctxLen: number;
  retrievedIds: string[];
  outputLen: number;
  latencyMs: number;
}

/**
 * 可识别的检索条目形状
 */
export type TraceableItem =
  | string
  | {
      id?: unknown;
      source?: unknown;
      provenance?: unknown;
      metadata?: Readonly<Record<string, unknown>>;
    };

export interface RetrievalTracerOptions {
  /** JSONL 输出路径；null 表示只保留在内存 */
  path?: string | null;
  enabled?: boolean;
  /** 最大追踪数量 */
  maxTraces?: number;
  logger?: Logger;
}

interface OpenSpan {
  name: string;
  startedAt: number;
  inputs?: string;
  ctx?: Iterable<TraceableItem>;
}

function present(value: unknown): value is NonNullable<unknown> {
  return value !== null && value !== undefined;
}

/**
 * 提取条目标识：id → source → provenance → metadata.id/source/section
 */
export function normalizeRetrievedIds(items: Iterable<TraceableItem> | undefined): string[] {
  if (!items) return [];

  const ids: string[] = [];
  for (const item of items) {
    if (typeof item === 'string') {
      ids.push(item);
    } else if (present(item.id)) {
      ids.push(String(item.id));
    } else if (present(item.source)) {
      ids.push(String(item.source));
    } else if (present(item.provenance)) {
      ids.push(String(item.provenance));
    } else {
      const md = item.metadata ?? {};
      const fallback = md.id || md.source || md.section || '?';
      ids.push(String(fallback));
    }
  }
  return ids;
}

export class RetrievalTracer {
  readonly path: string | null;
  readonly enabled: boolean;
  private spans = new Map<string, OpenSpan>();
  private rows: RingBuffer<TraceRow>;
  private logger: Logger;

  constructor(options: RetrievalTracerOptions = {}) {
    this.path = options.path ?? null;
    this.enabled = options.enabled ?? true;
    this.rows = new RingBuffer(options.maxTraces ?? 1000);
    this.logger = options.logger ?? getLogger('tracing');
  }

  startSpan(name: string, inputs?: string, ctx?: Iterable<TraceableItem>): string {
    if (!this.enabled) return DISABLED_SPAN;

    const id = uuidv4();
    this.spans.set(id, { name, startedAt: performance.now(), inputs, ctx });
    return id;
  }

  endSpan(
    spanId: string,
    result: { output?: string | null; retrieved?: Iterable<TraceableItem> } = {}
  ): TraceRow | undefined {
    if (!this.enabled || spanId === DISABLED_SPAN) return undefined;

    const span = this.spans.get(spanId);
    if (!span) return undefined;
    this.spans.delete(spanId);

    const latency = Math.max(0, performance.now() - span.startedAt);
    const retrievedIds = normalizeRetrievedIds(result.retrieved ?? span.ctx);

    const row: TraceRow = {
      ts: new Date().toISOString(),
      span: span.name,
      inputLen: span.inputs?.length ?? 0,
      ctxLen: retrievedIds.length,
      retrievedIds,
      outputLen: result.output?.length ?? 0,
      latencyMs: Math.round(latency * 1000) / 1000,
    };

    this.rows.push(row);
    this.appendRow(row);
    return row;
  }

  /**
   * 丢弃未结束的 span，不产生记录
   */
  abortSpan(spanId: string): boolean {
    return this.spans.delete(spanId);
  }

  /**
   * 单次记录，自带一个 span
   */
  record(entry: {
    inputs?: string;
    retrieved?: Iterable<TraceableItem>;
    output?: string | null;
    span?: string;
  }): TraceRow | undefined {
    const spanId = this.startSpan(entry.span ?? 'run', entry.inputs, entry.retrieved);
    return this.endSpan(spanId, { output: entry.output, retrieved: entry.retrieved });
  }

  getTraces(): TraceRow[] {
    return this.rows.toArray();
  }

  get openSpanCount(): number {
    return this.spans.size;
  }

  clear(): void {
    this.rows.clear();
    this.spans.clear();
  }

  private appendRow(row: TraceRow): void {
    if (!this.path) return;

    try {
      fs.mkdirSync(path.dirname(this.path), { recursive: true });
      fs.appendFileSync(this.path, JSON.stringify(row) + '\n', 'utf-8');
    } catch (error) {
      this.logger.warn(
        'Failed to write trace row',
        { path: this.path, span: row.span },
        error instanceof Error ? error : undefined
      );
    }
  }
}
