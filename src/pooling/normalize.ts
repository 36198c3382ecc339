// Пулинг по первому токену и L2-нормализация.
import { TensorShapeError } from '../errors.js';
import { shapeSize } from '../tensors/assembler.js';
import type { Float32TensorBuffer } from '../tensors/assembler.js';

// Добавляется к каждой компоненте после деления на норму, а не в знаменатель.
// Норма результата поэтому чуть больше 1.
export const EPSILON = 1e-12;

// v_i / ||v|| + EPSILON. Для нулевого вектора компоненты получаются NaN.
export function normalize(vector: ArrayLike<number>): number[] {
  const values = Array.from(vector);
  const norm = Math.sqrt(values.reduce((sum, v) => sum + v * v, 0));
  return values.map((v) => v / norm + EPSILON);
}

/**
 * Нарезает скрытые состояния [batch, seqLen, hiddenDim] на векторы входов.
 * Берётся только первая позиция каждой последовательности (CLS-пулинг).
 */
export function extractEmbeddings(hidden: Float32TensorBuffer): number[][] {
  const { data, shape } = hidden;
  const [batch, seqLen, hiddenDim] = shape;
  if (shape.length !== 3 || batch === undefined || seqLen === undefined || hiddenDim === undefined) {
    throw new TensorShapeError(`Expected hidden states of rank 3, got [${shape.join(', ')}]`);
  }
  if (data.length !== shapeSize(shape)) {
    throw new TensorShapeError(
      `Hidden state buffer has ${data.length} values, shape [${shape.join(', ')}] needs ${shapeSize(shape)}`,
    );
  }

  const embeddings: number[][] = [];
  for (let i = 0; i < batch; i++) {
    const start = i * seqLen * hiddenDim;
    embeddings.push(normalize(data.subarray(start, start + hiddenDim)));
  }
  return embeddings;
}
