/**
 * Lexer Module
 * Converts source text into tokens
 */

export { InputStream, type StreamPosition } from './input-stream.js';
export { KEYWORDS, OPERATOR_CHARS, PUNCTUATION } from './operators.js';
export {
  DEFAULT_PATH,
  tokenize,
  Tokenizer,
  type TokenizerOptions,
} from './tokenizer.js';
