// Кодирование батча строк в последовательности фиксированной длины.
import { EmbeddingError, EncodingError, errorMessage } from '../errors.js';
import type { EncodedSequence, TokenizedText, Tokenizer } from './types.js';

// Id паддинга в словарях поддерживаемых моделей.
export const PAD_ID = 0;

// Приводит массив к длине maxLength: обрезает хвост или дополняет справа.
function fitToLength(values: readonly number[], maxLength: number, fill: number): number[] {
  if (values.length >= maxLength) {
    return values.slice(0, maxLength);
  }
  return [...values, ...new Array<number>(maxLength - values.length).fill(fill)];
}

export function toEncodedSequence(
  tokenized: TokenizedText,
  maxLength: number,
  padId: number = PAD_ID,
): EncodedSequence {
  const { ids, attentionMask, typeIds } = tokenized;
  if (ids.length !== attentionMask.length || ids.length !== typeIds.length) {
    throw new EncodingError(
      `Tokenizer returned misaligned arrays: ids=${ids.length}, ` +
      `attentionMask=${attentionMask.length}, typeIds=${typeIds.length}`,
    );
  }

  return {
    ids: fitToLength(ids, maxLength, padId),
    attentionMask: fitToLength(attentionMask, maxLength, 0),
    typeIds: fitToLength(typeIds, maxLength, 0),
  };
}

/**
 * Обёртка над токенизатором.
 *
 * Усечение и паддинг делает сам токенизатор (он настраивается на maxLength при загрузке),
 * здесь гарантируется только итоговая длина каждой последовательности.
 */
export class Encoder {
  constructor(
    private readonly tokenizer: Tokenizer,
    readonly maxLength: number,
    private readonly padId: number = PAD_ID,
  ) {
    if (!Number.isInteger(maxLength) || maxLength <= 0) {
      throw new EncodingError(`maxLength must be a positive integer, got ${maxLength}`);
    }
  }

  async encode(batch: readonly string[]): Promise<EncodedSequence[]> {
    if (batch.length === 0) {
      return [];
    }

    let tokenized: TokenizedText[];
    try {
      tokenized = await this.tokenizer.encodeBatch(batch);
    } catch (error) {
      if (error instanceof EmbeddingError) {
        throw error;
      }
      throw new EncodingError(`Tokenization failed: ${errorMessage(error)}`, { cause: error });
    }

    if (tokenized.length !== batch.length) {
      throw new EncodingError(
        `Tokenizer returned ${tokenized.length} encodings for ${batch.length} inputs`,
      );
    }

    return tokenized.map((item) => toEncodedSequence(item, this.maxLength, this.padId));
  }
}
