// Сборка плоских int64-тензоров из закодированных последовательностей.
import { TensorShapeError } from '../errors.js';
import type { EncodedSequence } from '../encoding/types.js';

// Плоский буфер с описанием формы: data.length === product(shape).
export interface TensorBuffer<T extends BigInt64Array | Float32Array> {
  readonly data: T;
  readonly shape: readonly number[];
}

export type Int64TensorBuffer = TensorBuffer<BigInt64Array>;
export type Float32TensorBuffer = TensorBuffer<Float32Array>;

// Три входа модели одной формы [batchSize, maxLength].
export interface AssembledInputs {
  inputIds: Int64TensorBuffer;
  attentionMask: Int64TensorBuffer;
  tokenTypeIds: Int64TensorBuffer;
}

export function shapeSize(shape: readonly number[]): number {
  return shape.reduce((size, dim) => size * dim, 1);
}

export function sameShape(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((dim, i) => dim === b[i]);
}

function copyRow(target: BigInt64Array, offset: number, values: readonly number[]): void {
  values.forEach((value, i) => {
    target[offset + i] = BigInt(value);
  });
}

/**
 * Раскладывает ids / attention mask / type ids всех последовательностей подряд
 * в три буфера формы [sequences.length, maxLength].
 */
export function assembleTensors(
  sequences: readonly EncodedSequence[],
  maxLength: number,
): AssembledInputs {
  const shape = [sequences.length, maxLength];
  const size = sequences.length * maxLength;
  const ids = new BigInt64Array(size);
  const mask = new BigInt64Array(size);
  const typeIds = new BigInt64Array(size);

  sequences.forEach((sequence, row) => {
    if (
      sequence.ids.length !== maxLength ||
      sequence.attentionMask.length !== maxLength ||
      sequence.typeIds.length !== maxLength
    ) {
      throw new TensorShapeError(
        `Sequence ${row} has length ids=${sequence.ids.length}, ` +
        `attentionMask=${sequence.attentionMask.length}, typeIds=${sequence.typeIds.length}; ` +
        `expected ${maxLength}`,
      );
    }

    const offset = row * maxLength;
    copyRow(ids, offset, sequence.ids);
    copyRow(mask, offset, sequence.attentionMask);
    copyRow(typeIds, offset, sequence.typeIds);
  });

  return {
    inputIds: { data: ids, shape },
    attentionMask: { data: mask, shape },
    tokenTypeIds: { data: typeIds, shape },
  };
}
