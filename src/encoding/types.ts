// Интерфейсы модуля кодирования текста в токены.

// Выход токенизатора для одной строки (длина может быть любой).
export interface TokenizedText {
  ids: number[];
  attentionMask: number[];
  typeIds: number[];
}

// Последовательность ровно maxLength токенов.
export interface EncodedSequence {
  readonly ids: readonly number[];
  readonly attentionMask: readonly number[];
  readonly typeIds: readonly number[];
}

// Абстракция внешнего токенизатора.
export interface Tokenizer {
  encodeBatch(texts: readonly string[]): Promise<TokenizedText[]>;
}
