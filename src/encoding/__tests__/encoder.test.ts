import { describe, it, expect } from 'vitest';
import { Encoder, toEncodedSequence } from '../encoder.js';
import type { TokenizedText, Tokenizer } from '../types.js';
import { EncodingError } from '../../errors.js';
import { FakeTokenizer } from '../../__tests__/fakes.js';

describe('Encoder', () => {
  it('дополняет короткий вход паддингом справа', async () => {
    const encoder = new Encoder(new FakeTokenizer(), 4);

    const [sequence] = await encoder.encode(['hello world']);

    expect(sequence).toEqual({
      ids: [105, 105, 0, 0],
      attentionMask: [1, 1, 0, 0],
      typeIds: [0, 0, 0, 0],
    });
  });

  it('пустая строка даёт последовательность из одного паддинга', async () => {
    const encoder = new Encoder(new FakeTokenizer(), 3);

    const [sequence] = await encoder.encode(['']);

    expect(sequence).toEqual({
      ids: [0, 0, 0],
      attentionMask: [0, 0, 0],
      typeIds: [0, 0, 0],
    });
  });

  it('обрезает длинный вход до maxLength', async () => {
    const encoder = new Encoder(new FakeTokenizer(), 3);

    const [sequence] = await encoder.encode(['a bb ccc dddd eeeee']);

    expect(sequence).toEqual({
      ids: [101, 102, 103],
      attentionMask: [1, 1, 1],
      typeIds: [0, 0, 0],
    });
  });

  it('все последовательности батча имеют длину maxLength', async () => {
    const encoder = new Encoder(new FakeTokenizer(), 5);

    const sequences = await encoder.encode(['one', 'one two three four five six seven', '']);

    expect(sequences).toHaveLength(3);
    for (const sequence of sequences) {
      expect(sequence.ids).toHaveLength(5);
      expect(sequence.attentionMask).toHaveLength(5);
      expect(sequence.typeIds).toHaveLength(5);
    }
  });

  it('пустой батч не вызывает токенизатор', async () => {
    const tokenizer = new FakeTokenizer();
    const encoder = new Encoder(tokenizer, 4);

    expect(await encoder.encode([])).toEqual([]);
    expect(tokenizer.batches).toEqual([]);
  });

  it('оборачивает ошибку токенизатора в EncodingError', async () => {
    const encoder = new Encoder(new FakeTokenizer('bad'), 4);

    await expect(encoder.encode(['good', 'bad input'])).rejects.toThrow(
      new EncodingError('Tokenization failed: cannot tokenize "bad input"'),
    );
    await expect(encoder.encode(['bad'])).rejects.toBeInstanceOf(EncodingError);
  });

  it('отклоняет ответ токенизатора с другим числом кодировок', async () => {
    const tokenizer: Tokenizer = {
      encodeBatch: async () => [],
    };
    const encoder = new Encoder(tokenizer, 4);

    await expect(encoder.encode(['text'])).rejects.toThrow(
      'Tokenizer returned 0 encodings for 1 inputs',
    );
  });

  it('отклоняет неположительный maxLength', () => {
    expect(() => new Encoder(new FakeTokenizer(), 0)).toThrow(EncodingError);
    expect(() => new Encoder(new FakeTokenizer(), 2.5)).toThrow(EncodingError);
  });
});

describe('toEncodedSequence', () => {
  it('использует переданный padId для ids', () => {
    const tokenized: TokenizedText = { ids: [7], attentionMask: [1], typeIds: [1] };

    expect(toEncodedSequence(tokenized, 3, 9)).toEqual({
      ids: [7, 9, 9],
      attentionMask: [1, 0, 0],
      typeIds: [1, 0, 0],
    });
  });

  it('отклоняет массивы разной длины', () => {
    const tokenized: TokenizedText = { ids: [1, 2], attentionMask: [1], typeIds: [0, 0] };

    expect(() => toEncodedSequence(tokenized, 4)).toThrow(EncodingError);
  });
});
