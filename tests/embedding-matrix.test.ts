import { describe, it, expect } from 'vitest';
import { EmbeddingMatrix, normalize } from '../src/memory/embedding-matrix.js';

describe('normalize', () => {
  it('should scale to unit length', () => {
    expect(normalize([3, 4])).toEqual([0.6, 0.8]);
  });

  it('should leave a zero vector unchanged', () => {
    expect(normalize([0, 0, 0])).toEqual([0, 0, 0]);
  });
});

describe('EmbeddingMatrix', () => {
  it('should append rows and read them back', () => {
    const matrix = new EmbeddingMatrix();

    expect(matrix.appendRow([1, 2])).toBe(0);
    expect(matrix.appendRow([3, 4])).toBe(1);
    expect(matrix.rowCount).toBe(2);
    expect(matrix.width).toBe(2);
    expect(matrix.getRow(1)).toEqual([3, 4]);
  });

  it('should grow past the initial row capacity', () => {
    const matrix = new EmbeddingMatrix();
    for (let i = 0; i < 40; i++) {
      matrix.appendRow([i, i * 2]);
    }

    expect(matrix.rowCount).toBe(40);
    expect(matrix.getRow(0)).toEqual([0, 0]);
    expect(matrix.getRow(39)).toEqual([39, 78]);
  });

  it('should widen every row with zeros', () => {
    const matrix = new EmbeddingMatrix();
    matrix.appendRow([1, 2]);
    matrix.appendRow([3, 4, 5]);

    expect(matrix.width).toBe(3);
    expect(matrix.getRow(0)).toEqual([1, 2, 0]);
    expect(matrix.getRow(1)).toEqual([3, 4, 5]);
  });

  it('should pad a narrower row', () => {
    const matrix = new EmbeddingMatrix();
    matrix.appendRow([1, 2, 3]);
    matrix.setRow(0, [9]);

    expect(matrix.getRow(0)).toEqual([9, 0, 0]);
  });

  it('should compute dot products over the shared width', () => {
    const matrix = new EmbeddingMatrix();
    matrix.appendRow([1, 2, 3]);

    expect(matrix.dot(0, [1, 1, 1])).toBe(6);
    expect(matrix.dot(0, [1, 1])).toBe(3);
    expect(matrix.dot(0, [1, 1, 1, 100])).toBe(6);
  });

  it('should reject rows out of range', () => {
    const matrix = new EmbeddingMatrix();
    matrix.appendRow([1]);

    expect(() => matrix.getRow(1)).toThrow(RangeError);
    expect(() => matrix.setRow(-1, [1])).toThrow(RangeError);
  });
});
