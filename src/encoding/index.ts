// Barrel-файл модуля кодирования.
export type { EncodedSequence, TokenizedText, Tokenizer } from './types.js';

export { Encoder, toEncodedSequence, PAD_ID } from './encoder.js';
export { HuggingFaceTokenizer, PAD_TOKEN } from './tokenizer.js';
