export interface OutputAccumulatorOptions {
  readonly lineSeparator: string;
  readonly subsequentRowIndent: readonly string[];
}

/**
 * Append-only output buffer. Pieces are joined on demand; nothing written is
 * ever retracted.
 */
export class OutputAccumulator {
  private readonly pieces: string[] = [];
  private readonly subsequentIndent: string;
  private cachedText: string | undefined = "";

  constructor(private readonly options: OutputAccumulatorOptions) {
    this.subsequentIndent = options.subsequentRowIndent.join("");
  }

  get isEmpty(): boolean {
    return this.pieces.length === 0;
  }

  appendRunes(runes: readonly string[]): void {
    if (runes.length > 0) {
      this.push(runes.join(""));
    }
  }

  appendSpaces(count: number): void {
    if (count > 0) {
      this.push(" ".repeat(count));
    }
  }

  appendIndent(indent: readonly string[]): void {
    if (indent.length > 0) {
      this.push(indent.join(""));
    }
  }

  appendLineBreakAndIndent(breaks = 1): void {
    this.push(this.options.lineSeparator.repeat(breaks));
    if (this.subsequentIndent.length > 0) {
      this.push(this.subsequentIndent);
    }
  }

  snapshot(): string {
    if (this.cachedText === undefined) {
      this.cachedText = this.pieces.join("");
    }
    return this.cachedText;
  }

  private push(text: string): void {
    this.pieces.push(text);
    this.cachedText = undefined;
  }
}
