/**
 * 情景记忆日志
 *
 * 特点：
 * - 固定容量的环形缓冲区，超出容量时 FIFO 淘汰
 * - 按事件类别配置 TTL（天）
 * - 读取时惰性清理过期事件（fetch 清理，topk 只跳过）
 *
 * @module EventLog
 * @version 1.0.0
 */

import { z } from 'zod';
import { InvalidEventError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { RingBuffer } from '../utils/ring-buffer.js';
import {
  MS_PER_DAY,
  MS_PER_MINUTE,
  parseTimestamp,
  toIsoString,
  toStoredTimestamp,
} from '../utils/time.js';
import { TypedEventEmitter } from '../utils/typed-event-emitter.js';
import { eventMatches } from './filters.js';
import type { EventPredicate, FetchOptions, MemoryEvent } from './types.js';

export const DEFAULT_EVENT_CAPACITY = 2000;
export const DEFAULT_TTL_DAYS = 30;

/**
 * 事件日志配置
 */
export interface EventLogOptions {
  /** 最大事件数 */
  capacity?: number;
  /** 类别 -> TTL 天数；null 表示永不过期 */
  ttlDays?: Record<string, number | null>;
  /** 未配置类别的 TTL 天数；null 表示永不过期 */
  defaultTtlDays?: number | null;
  logger?: Logger;
}

/**
 * 事件日志发出的事件
 */
export interface EventLogEvents {
  'event:logged': { event: MemoryEvent };
  'event:evicted': { event: MemoryEvent };
  'event:expired': { event: MemoryEvent };
}

// 无效 Date 也接受，由时间解析回退到当前时间
const timestampSchema = z.union([z.string(), z.number().finite(), z.instanceof(Date)]);

const eventInputSchema = z
  .object({
    id: z.string().optional(),
    taskId: z.string().optional(),
    session: z.string().optional(),
    type: z.string().optional(),
    text: z.string().optional(),
    timestamp: timestampSchema.optional(),
    expiresAt: timestampSchema.nullable().optional(),
    tags: z.array(z.string()).optional(),
    provenance: z.string().optional(),
  })
  .passthrough();

/**
 * 情景记忆日志
 */
export class EventLog extends TypedEventEmitter<EventLogEvents> {
  private buffer: RingBuffer<MemoryEvent>;
  private ttlDays: Record<string, number | null>;
  private defaultTtlDays: number | null;
  private logger: Logger;

  constructor(options: EventLogOptions = {}) {
    super();
    this.buffer = new RingBuffer(options.capacity ?? DEFAULT_EVENT_CAPACITY);
    this.ttlDays = { ...options.ttlDays };
    this.defaultTtlDays = options.defaultTtlDays === undefined ? DEFAULT_TTL_DAYS : options.defaultTtlDays;
    this.logger = options.logger ?? getLogger('episodic');
  }

  get capacity(): number {
    return this.buffer.capacity;
  }

  get size(): number {
    return this.buffer.size;
  }

  /**
   * 类别对应的 TTL 天数；null 表示永不过期
   */
  ttlFor(type: string): number | null {
    if (Object.prototype.hasOwnProperty.call(this.ttlDays, type)) {
      return this.ttlDays[type] ?? null;
    }
    return this.defaultTtlDays;
  }

  // --------------------------------------------------------------------------
  // 写入
  // --------------------------------------------------------------------------

  /**
   * 记录事件
   *
   * @throws InvalidEventError 输入不是结构化记录
   */
  log(input: unknown): MemoryEvent {
    const parsed = eventInputSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`
      );
      throw new InvalidEventError('Event must be a structured record', issues);
    }

    const {
      id,
      taskId,
      session,
      type = 'event',
      text = '',
      timestamp,
      expiresAt,
      tags = [],
      provenance,
      ...extra
    } = parsed.data;

    const now = Date.now();
    const storedTimestamp = timestamp === undefined
      ? new Date(now).toISOString()
      : toStoredTimestamp(timestamp);

    let storedExpiry: string | null;
    if (expiresAt === null) {
      storedExpiry = null;
    } else if (typeof expiresAt === 'string') {
      storedExpiry = expiresAt;
    } else if (expiresAt !== undefined) {
      // 超出 Date 范围的过期时间视为永不过期
      const ms = parseTimestamp(expiresAt);
      storedExpiry = ms === undefined ? null : new Date(ms).toISOString();
    } else {
      const ttl = this.ttlFor(type);
      // 时间戳无法解析时以当前时间为基准
      const base = parseTimestamp(storedTimestamp) ?? now;
      storedExpiry = ttl === null ? null : toIsoString(base + ttl * MS_PER_DAY) ?? null;
    }

    const event: MemoryEvent = Object.freeze({
      id,
      taskId,
      session,
      type,
      text,
      timestamp: storedTimestamp,
      expiresAt: storedExpiry,
      tags: Object.freeze([...tags]),
      provenance,
      extra: Object.freeze({ ...extra }),
    });

    const evicted = this.buffer.push(event);
    if (evicted) {
      this.logger.debug('Evicted oldest event', { id: evicted.id, capacity: this.capacity });
      this.emit('event:evicted', { event: evicted });
    }

    this.emit('event:logged', { event });
    return event;
  }

  // --------------------------------------------------------------------------
  // 读取
  // --------------------------------------------------------------------------

  /**
   * 按条件获取事件窗口；先清理过期事件
   */
  fetch(options: FetchOptions = {}): MemoryEvent[] {
    const { taskId, lastN, sinceMinutes, filters } = options;
    const now = Date.now();

    this.purgeExpired(now);

    let events = this.buffer.toArray();

    if (taskId !== undefined) {
      events = events.filter(event => event.taskId === taskId);
    }

    if (filters) {
      events = events.filter(event => eventMatches(event, filters));
    }

    if (sinceMinutes !== undefined) {
      const cutoff = now - sinceMinutes * MS_PER_MINUTE;
      events = events.filter(event => (parseTimestamp(event.timestamp) ?? now) >= cutoff);
    }

    if (lastN !== undefined) {
      events = lastN > 0 ? events.slice(-lastN) : [];
    }

    return events;
  }

  /**
   * 最近 k 个满足条件的事件，保持原始顺序
   *
   * 不清理日志，只跳过已过期的事件。
   */
  topk(k: number, predicate: EventPredicate = () => true): MemoryEvent[] {
    if (k <= 0) return [];

    const now = Date.now();
    const survivors = this.buffer
      .toArray()
      .filter(event => !this.isExpired(event, now) && predicate(event));

    return survivors.slice(-k);
  }

  toArray(): MemoryEvent[] {
    return this.buffer.toArray();
  }

  [Symbol.iterator](): IterableIterator<MemoryEvent> {
    return this.buffer[Symbol.iterator]();
  }

  // --------------------------------------------------------------------------
  // 私有方法
  // --------------------------------------------------------------------------

  private isExpired(event: MemoryEvent, now: number): boolean {
    if (event.expiresAt === null) return false;
    const expiresAt = parseTimestamp(event.expiresAt);
    // 无法解析的过期时间视为不过期
    if (expiresAt === undefined) return false;
    return expiresAt <= now;
  }

  private purgeExpired(now: number): void {
    const removed = this.buffer.retain(event => !this.isExpired(event, now));
    if (removed.length === 0) return;

    this.logger.debug('Purged expired events', { count: removed.length });
    for (const event of removed) {
      this.emit('event:expired', { event });
    }
  }
}
