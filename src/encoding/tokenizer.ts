// Адаптер HuggingFace-токенизатора (tokenizer.json) к интерфейсу Tokenizer.
import { Tokenizer as NativeTokenizer } from '@anush008/tokenizers';
import { EncodingError, errorMessage } from '../errors.js';
import { PAD_ID } from './encoder.js';
import type { TokenizedText, Tokenizer } from './types.js';

export const PAD_TOKEN = '[PAD]';

export class HuggingFaceTokenizer implements Tokenizer {
  private constructor(private readonly native: NativeTokenizer) {}

  /**
   * Загружает tokenizer.json и настраивает усечение (longest-first, по умолчанию
   * в библиотеке) и фиксированный паддинг справа до maxLength.
   */
  static fromFile(path: string, maxLength: number): HuggingFaceTokenizer {
    let native: NativeTokenizer;
    try {
      native = NativeTokenizer.fromFile(path);
    } catch (error) {
      throw new EncodingError(`Cannot load tokenizer from ${path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    native.setTruncation(maxLength);
    native.setPadding({
      maxLength,
      padId: PAD_ID,
      padToken: PAD_TOKEN,
    });

    return new HuggingFaceTokenizer(native);
  }

  async encodeBatch(texts: readonly string[]): Promise<TokenizedText[]> {
    const encodings = await this.native.encodeBatch([...texts]);
    return encodings.map((encoding) => ({
      ids: encoding.getIds(),
      attentionMask: encoding.getAttentionMask(),
      typeIds: encoding.getTypeIds(),
    }));
  }
}
