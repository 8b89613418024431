import { HintedError, type HintedErrorOptions } from "../utils/errors.js";

export class WrapConfigError extends HintedError {
  constructor(headline: string, options: HintedErrorOptions = {}) {
    super(headline, options);
    this.name = "WrapConfigError";
  }
}

export class IndentTooWideError extends WrapConfigError {
  constructor(
    public readonly columnWidth: number,
    public readonly indentName: "firstRowIndent" | "subsequentRowIndent",
    public readonly indentWidth: number,
  ) {
    super(
      `Column width ${columnWidth} must be larger than ${indentName} (${indentWidth} columns).`,
      {
        hintLines: [
          "Increase the column width or shorten the indent and rerun.",
        ],
      },
    );
    this.name = "IndentTooWideError";
  }
}

export class InvalidWrapOptionError extends WrapConfigError {
  constructor(
    public readonly option: string,
    detail: string,
  ) {
    super(`Invalid wrap option \`${option}\`: ${detail}`);
    this.name = "InvalidWrapOptionError";
  }
}

/**
 * Raised when input bytes are not well-formed UTF-8, or when the stream ends
 * in the middle of a multi-byte sequence. `byteOffset` counts from the start
 * of the session.
 */
export class DecodingError extends HintedError {
  constructor(
    public readonly byteOffset: number,
    detail: string,
  ) {
    super(`Malformed UTF-8 input at byte ${byteOffset}: ${detail}`);
    this.name = "DecodingError";
  }
}

export class WrapSourceError extends HintedError {
  constructor(
    cause: unknown,
    public readonly partialOutput: string,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read input: ${detail}`, { cause });
    this.name = "WrapSourceError";
  }
}
