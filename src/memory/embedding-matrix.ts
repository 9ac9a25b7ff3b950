/**
 * 可扩展的嵌入矩阵
 *
 * 行主序的 Float64Array 平铺存储。宽度不一致时补零对齐：
 * - 新向量更宽：整个矩阵扩列并补零
 * - 新向量更窄：仅对新向量补零
 *
 * 补零对齐是编码器维度漂移时的兼容垫片，不保证语义正确。
 *
 * @module EmbeddingMatrix
 * @version 1.0.0
 */

const INITIAL_ROW_CAPACITY = 16;

/**
 * L2 单位化；零向量按范数 1 处理
 */
export function normalize(vector: readonly number[]): number[] {
  let sum = 0;
  for (const v of vector) {
    sum += v * v;
  }
  const norm = Math.sqrt(sum) || 1;
  return vector.map(v => v / norm);
}

export class EmbeddingMatrix {
  private data: Float64Array;
  private rowCapacity: number;
  private rows = 0;
  private cols = 0;

  constructor() {
    this.rowCapacity = INITIAL_ROW_CAPACITY;
    this.data = new Float64Array(0);
  }

  get rowCount(): number {
    return this.rows;
  }

  get width(): number {
    return this.cols;
  }

  /**
   * 追加一行，返回行号
   */
  appendRow(vector: readonly number[]): number {
    this.reconcile(vector.length);

    if (this.rows === this.rowCapacity) {
      this.reallocate(this.rowCapacity * 2, this.cols);
    }

    const row = this.rows;
    this.rows++;
    this.writeRow(row, vector);
    return row;
  }

  /**
   * 覆盖已有行
   */
  setRow(row: number, vector: readonly number[]): void {
    if (row < 0 || row >= this.rows) {
      throw new RangeError(`Row ${row} out of range (rows=${this.rows})`);
    }
    this.reconcile(vector.length);
    this.writeRow(row, vector);
  }

  getRow(row: number): number[] {
    if (row < 0 || row >= this.rows) {
      throw new RangeError(`Row ${row} out of range (rows=${this.rows})`);
    }
    const start = row * this.cols;
    return Array.from(this.data.subarray(start, start + this.cols));
  }

  /**
   * 行与查询向量的点积；查询向量按补零对齐处理，不修改矩阵
   */
  dot(row: number, query: readonly number[]): number {
    const start = row * this.cols;
    const span = Math.min(this.cols, query.length);
    let sum = 0;
    for (let i = 0; i < span; i++) {
      sum += this.data[start + i] * query[i];
    }
    return sum;
  }

  /**
   * 扩列并补零
   */
  widen(newWidth: number): void {
    if (newWidth <= this.cols) return;
    this.reallocate(this.rowCapacity, newWidth);
  }

  // --------------------------------------------------------------------------
  // 私有方法
  // --------------------------------------------------------------------------

  private reconcile(incomingWidth: number): void {
    if (incomingWidth > this.cols) {
      this.widen(incomingWidth);
    }
  }

  private writeRow(row: number, vector: readonly number[]): void {
    const start = row * this.cols;
    // 较窄的向量在尾部补零
    this.data.fill(0, start, start + this.cols);
    for (let i = 0; i < vector.length; i++) {
      this.data[start + i] = vector[i];
    }
  }

  private reallocate(rowCapacity: number, cols: number): void {
    const next = new Float64Array(rowCapacity * cols);
    for (let r = 0; r < this.rows; r++) {
      const from = r * this.cols;
      next.set(this.data.subarray(from, from + this.cols), r * cols);
    }
    this.data = next;
    this.rowCapacity = rowCapacity;
    this.cols = cols;
  }
}
