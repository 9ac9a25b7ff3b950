/**
 * 语义向量存储
 *
 * 特点：
 * - 按 id upsert，原位替换
 * - 入库前可选 PII 脱敏
 * - 向量单位化后以点积计算余弦相似度
 * - 先按元数据过滤，再排序；同分按插入顺序
 * - 编码器维度漂移时补零对齐
 *
 * @module VectorStore
 * @version 1.0.0
 */

import { EncoderFailureError, MissingTextError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { TypedEventEmitter } from '../utils/typed-event-emitter.js';
import { EmbeddingMatrix, normalize } from './embedding-matrix.js';
import { matchesFilters } from './filters.js';
import { containsEmail, scrubPII } from './pii.js';
import type {
  DocumentInput,
  DocumentMetadata,
  Encoder,
  MemoryDocument,
  MemoryFilters,
  ScoredDocument,
} from './types.js';

/**
 * 向量存储配置
 */
export interface VectorStoreOptions {
  encoder: Encoder;
  /** 入库时脱敏邮箱地址 */
  piiScrubAtIngest?: boolean;
  logger?: Logger;
}

/**
 * 向量存储发出的事件
 */
export interface VectorStoreEvents {
  'document:upserted': { document: MemoryDocument; replaced: boolean };
  'matrix:widened': { from: number; to: number };
}

interface StoredDocument {
  id: string;
  text: string;
  metadata: DocumentMetadata;
}

/**
 * 语义向量存储
 */
export class VectorStore extends TypedEventEmitter<VectorStoreEvents> {
  private encoder: Encoder;
  private piiScrubAtIngest: boolean;
  private logger: Logger;

  private documents: StoredDocument[] = [];
  private rowById = new Map<string, number>();
  private matrix = new EmbeddingMatrix();

  constructor(options: VectorStoreOptions) {
    super();
    this.encoder = options.encoder;
    this.piiScrubAtIngest = options.piiScrubAtIngest ?? false;
    this.logger = options.logger ?? getLogger('semantic');
  }

  get size(): number {
    return this.documents.length;
  }

  /**
   * 当前矩阵宽度
   */
  get dimension(): number {
    return this.matrix.width;
  }

  // --------------------------------------------------------------------------
  // 写入
  // --------------------------------------------------------------------------

  /**
   * 插入或替换文档
   *
   * @throws MissingTextError 文本为空
   * @throws EncoderFailureError 编码器返回非有限数值
   */
  upsert(item: DocumentInput): MemoryDocument {
    const rawText = item.text ?? '';
    if (rawText.trim() === '') {
      throw new MissingTextError(item.id);
    }

    let text = rawText;
    if (this.piiScrubAtIngest && containsEmail(rawText)) {
      text = scrubPII(rawText);
      this.logger.debug('Redacted email addresses at ingest', { id: item.id });
    }

    const embedding = normalize(this.embed(text));
    const { tags, pii, ...rest }: Partial<DocumentMetadata> = item.metadata ?? {};
    const metadata: DocumentMetadata = {
      ...rest,
      tags: [...(tags ?? [])],
      pii: pii ?? false,
    };

    this.trackDrift(embedding.length);

    const existingRow = item.id !== undefined ? this.rowById.get(item.id) : undefined;
    if (existingRow !== undefined) {
      this.documents[existingRow] = { id: this.documents[existingRow].id, text, metadata };
      this.matrix.setRow(existingRow, embedding);

      const document = this.toDocument(existingRow);
      this.emit('document:upserted', { document, replaced: true });
      return document;
    }

    const id = item.id ?? this.nextSyntheticId();
    const row = this.matrix.appendRow(embedding);
    this.documents.push({ id, text, metadata });
    this.rowById.set(id, row);

    const document = this.toDocument(row);
    this.emit('document:upserted', { document, replaced: false });
    return document;
  }

  // --------------------------------------------------------------------------
  // 读取
  // --------------------------------------------------------------------------

  /**
   * 相似度检索
   *
   * 过滤结果为空时返回空数组，是否回退到无过滤检索由调用方决定。
   */
  search(queryText: string, topK: number, filters?: MemoryFilters | null): ScoredDocument[] {
    if (this.documents.length === 0 || topK <= 0) {
      return [];
    }

    const query = normalize(this.embed(queryText));

    const candidates: Array<{ row: number; score: number }> = [];
    this.documents.forEach((doc, row) => {
      if (matchesFilters(key => readDocumentField(doc, key), doc.metadata.tags, filters)) {
        candidates.push({ row, score: this.matrix.dot(row, query) });
      }
    });

    if (candidates.length === 0) {
      return [];
    }

    // Array.prototype.sort 是稳定排序，同分保持插入顺序
    candidates.sort((a, b) => b.score - a.score);

    return candidates
      .slice(0, topK)
      .map(({ row, score }) => ({ ...this.toDocument(row), score }));
  }

  get(id: string): MemoryDocument | undefined {
    const row = this.rowById.get(id);
    return row === undefined ? undefined : this.toDocument(row);
  }

  toArray(): MemoryDocument[] {
    return this.documents.map((_, row) => this.toDocument(row));
  }

  // --------------------------------------------------------------------------
  // 私有方法
  // --------------------------------------------------------------------------

  private embed(text: string): number[] {
    const vector = this.encoder.embed(text);
    const badIndex = vector.findIndex(v => !Number.isFinite(v));
    if (badIndex !== -1) {
      throw new EncoderFailureError('Encoder returned a non-finite component', {
        index: badIndex,
        dimension: vector.length,
      });
    }
    return vector;
  }

  private trackDrift(incoming: number): void {
    const current = this.matrix.width;
    if (this.matrix.rowCount === 0 || incoming === current) return;

    if (incoming > current) {
      this.logger.warn('Encoder dimension grew, zero-padding stored vectors', { from: current, to: incoming });
      this.emit('matrix:widened', { from: current, to: incoming });
    } else {
      this.logger.debug('Zero-padding narrower vector', { incoming, width: current });
    }
  }

  private nextSyntheticId(): string {
    let n = this.documents.length;
    while (this.rowById.has(String(n))) {
      n++;
    }
    return String(n);
  }

  private toDocument(row: number): MemoryDocument {
    const doc = this.documents[row];
    return Object.freeze({
      id: doc.id,
      text: doc.text,
      metadata: Object.freeze({ ...doc.metadata, tags: [...doc.metadata.tags] }),
      embedding: this.matrix.getRow(row),
    });
  }
}

function readDocumentField(doc: StoredDocument, key: string): unknown {
  if (Object.prototype.hasOwnProperty.call(doc.metadata, key)) {
    return doc.metadata[key];
  }
  return key === 'id' ? doc.id : undefined;
}
