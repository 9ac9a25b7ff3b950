/**
 * Typed Event Emitter - 类型安全的事件发射器
 *
 * 存储层使用的事件系统
 *
 * @utils TypedEventEmitter
 * @version 5.0.0
 */

import { getLogger } from './logger.js';

/**
 * 事件处理器类型
 */
export type EventHandler<T> = (payload: T) => void | Promise<void>;

/**
 * 类型安全的事件发射器
 *
 * 特性：
 * 1. 编译时类型检查
 * 2. 自动推断事件负载类型
 * 3. 错误隔离（单个处理器失败不影响其他）
 */
export class TypedEventEmitter<Events extends object> {
  private handlers = new Map<keyof Events, Set<EventHandler<never>>>();

  /**
   * 注册事件处理器
   *
   * @example
   * log.on('event:evicted', ({ event }) => {
   *   console.log(`Evicted ${event.id}`);
   * });
   */
  on<K extends keyof Events>(
    event: K,
    handler: EventHandler<Events[K]>
  ): () => void {
    let handlers = this.handlers.get(event);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(event, handlers);
    }

    const registered = handlers;
    registered.add(handler);

    // 返回取消订阅函数
    return () => {
      registered.delete(handler);
      if (registered.size === 0) {
        this.handlers.delete(event);
      }
    };
  }

  /**
   * 发射事件
   */
  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const handlers = this.handlers.get(event);
    if (!handlers) return;

    for (const handler of [...handlers] as EventHandler<Events[K]>[]) {
      try {
        const result = handler(payload);
        // 如果是 Promise，捕获错误
        if (result instanceof Promise) {
          result.catch(error => {
            getLogger('system').error(`Event handler error for ${String(event)}`, { error: String(error) });
          });
        }
      } catch (error) {
        getLogger('system').error(`Event handler error for ${String(event)}`, { error: String(error) });
      }
    }
  }
}
