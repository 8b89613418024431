export { isLineBreak, isWhitespace, RuneClassifier } from "./classifier.js";
export {
  DecodingError,
  IndentTooWideError,
  InvalidWrapOptionError,
  WrapConfigError,
  WrapSourceError,
} from "./errors.js";
export {
  createWrapConfig,
  DEFAULT_COLUMN_WIDTH,
  DEFAULT_LINE_SEPARATOR,
  DEFAULT_TABSTOP_WIDTH,
  type WrapConfig,
  type WrapOptions,
} from "./options.js";
export {
  type Token,
  Tokenizer,
  type TokenizerStep,
  type WhitespaceToken,
  type WordToken,
} from "./tokenizer.js";
export { WrapSession } from "./session.js";
export {
  type ChunkSource,
  configure,
  type TextChunk,
  Wrapper,
  wrapText,
} from "./wrapper.js";
