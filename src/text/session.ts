import { LineBreaker } from "./breaker.js";
import { RuneClassifier } from "./classifier.js";
import { DecodingError } from "./errors.js";
import type { WrapConfig } from "./options.js";
import { Tokenizer } from "./tokenizer.js";

const EMPTY_BYTES = new Uint8Array(0);

/**
 * State of one wrap over a stream of byte chunks. Bytes of a rune cut off at
 * the end of a chunk are carried into the next one, and the last whitespace
 * rune is remembered so line-break runs collapse across chunk boundaries.
 */
export class WrapSession {
  private readonly tokenizer: Tokenizer;
  private readonly breaker: LineBreaker;
  private carry: Uint8Array = EMPTY_BYTES;
  /** Stream position of the first carried byte. */
  private consumedBytes = 0;
  private lastWhitespaceRune: string | undefined;
  private finished = false;

  constructor(config: WrapConfig) {
    this.tokenizer = new Tokenizer(
      new RuneClassifier({
        tabstopWidth: config.tabstopWidth,
        foldLineBreaks: config.foldLineBreaks,
      }),
    );
    this.breaker = new LineBreaker(config);
  }

  addChunk(chunk: Uint8Array): void {
    if (this.finished) {
      throw new Error("Cannot add input to a finished wrap session.");
    }
    if (chunk.length === 0) {
      return;
    }

    const input = this.carry.length > 0 ? concat(this.carry, chunk) : chunk;
    const streamStart = this.consumedBytes;
    let offset = 0;

    for (;;) {
      const step = this.tokenizer.next(input, offset, {
        preceding: this.lastWhitespaceRune,
        baseOffset: streamStart,
      });

      if (step.type === "end") {
        this.carry = EMPTY_BYTES;
        return;
      }

      if (step.type === "incomplete") {
        this.carry = input.slice(offset);
        return;
      }

      const { token, bytesConsumed } = step;
      if (token.kind === "whitespace") {
        this.breaker.acceptWhitespace(token);
        this.lastWhitespaceRune = token.runes[token.runes.length - 1];
      } else {
        this.breaker.acceptWord(token);
        this.lastWhitespaceRune = undefined;
      }

      offset += bytesConsumed;
      this.consumedBytes += bytesConsumed;
    }
  }

  snapshot(): string {
    return this.breaker.preview();
  }

  finish(): string {
    if (this.carry.length > 0) {
      throw new DecodingError(
        this.consumedBytes,
        "input ends inside a multi-byte sequence",
      );
    }

    this.finished = true;
    return this.breaker.finish();
  }
}

function concat(head: Uint8Array, tail: Uint8Array): Uint8Array {
  const joined = new Uint8Array(head.length + tail.length);
  joined.set(head, 0);
  joined.set(tail, head.length);
  return joined;
}
