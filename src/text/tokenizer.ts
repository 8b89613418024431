import { isLineBreak, type RuneClassifier } from "./classifier.js";
import { DecodingError } from "./errors.js";
import { decodeRune } from "./utf8.js";

export interface WhitespaceToken {
  readonly kind: "whitespace";
  /** Runes as they appeared in the input. */
  readonly runes: readonly string[];
  readonly byteLength: number;
  /** Columns the run occupies once tabs are expanded and breaks folded. */
  readonly width: number;
  /** Preserved line-break units; always 0 when line breaks fold. */
  readonly lineBreaks: number;
}

export interface WordToken {
  readonly kind: "word";
  readonly runes: readonly string[];
  readonly byteLength: number;
}

export type Token = WhitespaceToken | WordToken;

export type TokenizerStep =
  | {
      readonly type: "token";
      readonly token: Token;
      readonly bytesConsumed: number;
    }
  | { readonly type: "incomplete"; readonly bytesRemaining: number }
  | { readonly type: "end" };

export interface TokenizerContext {
  /** Rune immediately before `offset`, used to collapse line-break runs. */
  readonly preceding?: string;
  /** Byte position of `input[0]` within the whole stream, for errors. */
  readonly baseOffset?: number;
}

export class Tokenizer {
  constructor(private readonly classifier: RuneClassifier) {}

  /**
   * Reads the maximal whitespace or word run starting at `offset`. The run
   * stops early at the end of `input` or before a truncated trailing rune, so
   * a run spanning chunks arrives as consecutive tokens of the same kind.
   */
  next(
    input: Uint8Array,
    offset: number,
    context: TokenizerContext = {},
  ): TokenizerStep {
    if (offset >= input.length) {
      return { type: "end" };
    }

    const baseOffset = context.baseOffset ?? 0;
    const runes: string[] = [];
    let cursor = offset;
    let runKindIsWhitespace: boolean | undefined;

    while (cursor < input.length) {
      const decoded = decodeRune(input, cursor);
      if (decoded.status === "invalid") {
        throw new DecodingError(baseOffset + cursor, decoded.reason);
      }
      if (decoded.status === "incomplete") {
        break;
      }

      const whitespace = this.classifier.isWhitespace(decoded.rune);
      if (runKindIsWhitespace === undefined) {
        runKindIsWhitespace = whitespace;
      } else if (runKindIsWhitespace !== whitespace) {
        break;
      }

      runes.push(decoded.rune);
      cursor += decoded.size;
    }

    if (runKindIsWhitespace === undefined) {
      return { type: "incomplete", bytesRemaining: input.length - offset };
    }

    const byteLength = cursor - offset;
    const token: Token = runKindIsWhitespace
      ? this.buildWhitespaceToken(runes, byteLength, context.preceding)
      : { kind: "word", runes, byteLength };

    return { type: "token", token, bytesConsumed: byteLength };
  }

  private buildWhitespaceToken(
    runes: readonly string[],
    byteLength: number,
    preceding: string | undefined,
  ): WhitespaceToken {
    let width = 0;
    let lineBreaks = 0;
    let previous = preceding;

    for (const rune of runes) {
      for (const normalized of this.classifier.normalize(rune, previous)) {
        if (isLineBreak(normalized)) {
          lineBreaks += 1;
        } else {
          width += 1;
        }
      }
      previous = rune;
    }

    return { kind: "whitespace", runes, byteLength, width, lineBreaks };
  }
}
