/**
 * 环形缓冲区 - 固定容量
 *
 * 时间复杂度：
 * - 追加: O(1)，满时覆盖最旧元素
 * - 按序遍历: O(n)
 * - 条件保留: O(n)
 */

export class RingBuffer<T> {
  private slots: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  /**
   * 当前元素数量
   */
  get size(): number {
    return this.count;
  }

  /**
   * 追加元素，返回被挤出的最旧元素
   */
  push(item: T): T | undefined {
    if (this.count < this.capacity) {
      this.slots[(this.head + this.count) % this.capacity] = item;
      this.count++;
      return undefined;
    }

    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /**
   * 按插入顺序取第 index 个元素（0 为最旧）
   */
  at(index: number): T | undefined {
    if (index < 0 || index >= this.count) return undefined;
    return this.slots[(this.head + index) % this.capacity];
  }

  /**
   * 仅保留满足条件的元素，顺序不变；返回被移除的元素
   */
  retain(predicate: (item: T) => boolean): T[] {
    const kept: T[] = [];
    const removed: T[] = [];

    for (const item of this) {
      if (predicate(item)) {
        kept.push(item);
      } else {
        removed.push(item);
      }
    }

    if (removed.length === 0) return removed;

    this.slots = new Array<T | undefined>(this.capacity);
    kept.forEach((item, i) => {
      this.slots[i] = item;
    });
    this.head = 0;
    this.count = kept.length;

    return removed;
  }

  toArray(): T[] {
    return [...this];
  }

  clear(): void {
    this.slots = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) {
        yield item;
      }
    }
  }
}
