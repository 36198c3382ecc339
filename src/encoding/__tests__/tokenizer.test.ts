import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { HuggingFaceTokenizer } from '../tokenizer.js';
import { Encoder } from '../encoder.js';
import { EncodingError } from '../../errors.js';
import { fixtureTokenizerJson } from '../../__tests__/model-fixture.js';

describe('HuggingFaceTokenizer', () => {
  let tmpDir: string;
  let tokenizerPath: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'embed-tokenizer-'));
    tokenizerPath = join(tmpDir, 'tokenizer.json');
    await writeFile(tokenizerPath, fixtureTokenizerJson(), 'utf-8');
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('дополняет короткий вход паддингом до maxLength', async () => {
    const tokenizer = HuggingFaceTokenizer.fromFile(tokenizerPath, 4);

    const [encoding] = await tokenizer.encodeBatch(['a b']);

    expect(encoding).toEqual({
      ids: [2, 3, 0, 0],
      attentionMask: [1, 1, 0, 0],
      typeIds: [0, 0, 0, 0],
    });
  });

  it('обрезает длинный вход до maxLength', async () => {
    const tokenizer = HuggingFaceTokenizer.fromFile(tokenizerPath, 4);

    const [encoding] = await tokenizer.encodeBatch(['a b c d e']);

    expect(encoding).toEqual({
      ids: [2, 3, 4, 5],
      attentionMask: [1, 1, 1, 1],
      typeIds: [0, 0, 0, 0],
    });
  });

  it('пустая строка даёт только паддинг', async () => {
    const tokenizer = HuggingFaceTokenizer.fromFile(tokenizerPath, 4);

    const [encoding] = await tokenizer.encodeBatch(['']);

    expect(encoding).toEqual({
      ids: [0, 0, 0, 0],
      attentionMask: [0, 0, 0, 0],
      typeIds: [0, 0, 0, 0],
    });
  });

  it('неизвестные слова кодируются как [UNK]', async () => {
    const tokenizer = HuggingFaceTokenizer.fromFile(tokenizerPath, 3);

    const [encoding] = await tokenizer.encodeBatch(['zebra a']);

    expect(encoding?.ids).toEqual([1, 2, 0]);
  });

  it('батч кодируется в исходном порядке', async () => {
    const encoder = new Encoder(HuggingFaceTokenizer.fromFile(tokenizerPath, 4), 4);

    const sequences = await encoder.encode(['e', 'c d', 'a b c d e']);

    expect(sequences.map((sequence) => sequence.ids)).toEqual([
      [6, 0, 0, 0],
      [4, 5, 0, 0],
      [2, 3, 4, 5],
    ]);
  });

  it('нет файла токенизатора → EncodingError', () => {
    expect(() => HuggingFaceTokenizer.fromFile(join(tmpDir, 'missing.json'), 4)).toThrow(
      EncodingError,
    );
  });
});
