/**
 * @file Small dense-vector helpers. Stored vectors are unit length, so cosine
 * similarity reduces to a dot product.
 */

import type { FieldError } from '../../utils/errors';
import type { Vector } from './models';

export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function magnitude(vector: ArrayLike<number>): number {
  return Math.sqrt(dot(vector, vector));
}

export function normalize(vector: Vector): Vector {
  const length = magnitude(vector);
  return vector.map((value) => value / length);
}

/**
 * Cosine similarity clamped to [0, 1]. Opposed vectors are as dissimilar as
 * orthogonal ones.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const denominator = magnitude(a) * magnitude(b);
  if (denominator === 0) return 0;
  return clampSimilarity(dot(a, b) / denominator);
}

export function clampSimilarity(cosine: number): number {
  return Math.min(1, Math.max(0, cosine));
}

/**
 * Checks dimension, finiteness and non-zero length.
 */
export function checkVector(vector: unknown, dimension: number, field = 'embedding'): FieldError | null {
  if (!Array.isArray(vector)) {
    return { field, message: 'must be an array of numbers' };
  }
  if (vector.length !== dimension) {
    return { field, message: `expected ${dimension} dimensions, got ${vector.length}` };
  }
  let sumOfSquares = 0;
  for (const value of vector) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return { field, message: 'contains a non-finite value' };
    }
    sumOfSquares += value * value;
  }
  if (sumOfSquares === 0) {
    return { field, message: 'zero vector has no direction' };
  }
  return null;
}
