import { OutputAccumulator } from "./accumulator.js";
import { LineBudget } from "./budget.js";
import type { WrapConfig } from "./options.js";
import type { WhitespaceToken, WordToken } from "./tokenizer.js";

/**
 * Decides where lines end. Whitespace is held back until the following word
 * is known, and a decided line break is only written once the next word is
 * placed, so the output never ends in a separator, an indent or whitespace.
 *
 * A word may arrive as several tokens when it spans input chunks. It is
 * buffered until its placement is certain, which bounds the buffer to one
 * fresh line.
 */
export class LineBreaker {
  private readonly budget: LineBudget;
  private readonly output: OutputAccumulator;

  private atLineStart = true;
  private hasContent = false;
  /** Line separators decided but not yet written. */
  private pendingBreaks = 0;
  private pendingWhitespace = 0;
  /** Preserved line breaks seen in the current whitespace run. */
  private pendingLineBreaks = 0;
  private word: string[] = [];

  constructor(private readonly config: WrapConfig) {
    this.budget = new LineBudget({
      columnWidth: config.columnWidth,
      firstIndentWidth: config.firstRowIndent.length,
      subsequentIndentWidth: config.subsequentRowIndent.length,
    });
    this.output = new OutputAccumulator({
      lineSeparator: config.lineSeparator,
      subsequentRowIndent: config.subsequentRowIndent,
    });
  }

  acceptWhitespace(token: WhitespaceToken): void {
    this.completeWord();

    if (!this.hasContent) {
      return;
    }

    this.pendingLineBreaks += token.lineBreaks;
    if (!this.atLineStart) {
      this.pendingWhitespace += token.width;
    }
  }

  acceptWord(token: WordToken): void {
    if (this.word.length === 0) {
      this.applyPreservedLineBreaks();
    }

    for (const rune of token.runes) {
      this.word.push(rune);
    }
    this.settleWord();
  }

  /** Output so far plus the pending word, as if the input ended now. */
  preview(): string {
    const committed = this.output.snapshot();
    if (this.word.length === 0) {
      return committed;
    }

    return `${committed}${this.previewPrefix()}${this.word.join("")}`;
  }

  finish(): string {
    this.completeWord();
    this.pendingWhitespace = 0;
    this.pendingBreaks = 0;
    this.pendingLineBreaks = 0;
    return this.output.snapshot();
  }

  private applyPreservedLineBreaks(): void {
    if (this.pendingLineBreaks === 0) {
      return;
    }

    this.pendingBreaks = this.pendingLineBreaks;
    this.pendingLineBreaks = 0;
    this.startFreshLine();
  }

  private settleWord(): void {
    if (
      !this.atLineStart &&
      this.budget.wouldOverflow(this.pendingWhitespace + this.word.length)
    ) {
      this.pendingBreaks = 1;
      this.startFreshLine();
    }

    let start = 0;
    while (
      this.atLineStart &&
      this.budget.wouldOverflow(this.word.length - start)
    ) {
      const end = start + this.budget.remaining;
      this.place(this.word.slice(start, end));
      start = end;
      this.pendingBreaks = 1;
      this.startFreshLine();
    }

    if (start > 0) {
      this.word = this.word.slice(start);
    }
  }

  private completeWord(): void {
    if (this.word.length === 0) {
      return;
    }

    this.place(this.word);
    this.word = [];
  }

  private place(runes: readonly string[]): void {
    if (this.atLineStart) {
      this.commitLineStart();
    } else {
      this.output.appendSpaces(this.pendingWhitespace);
      this.budget.charge(this.pendingWhitespace);
    }

    this.pendingWhitespace = 0;
    this.output.appendRunes(runes);
    this.budget.charge(runes.length);
    this.atLineStart = false;
    this.hasContent = true;
  }

  private commitLineStart(): void {
    if (this.hasContent) {
      this.output.appendLineBreakAndIndent(this.pendingBreaks);
    } else {
      this.output.appendIndent(this.config.firstRowIndent);
    }
    this.pendingBreaks = 0;
  }

  private startFreshLine(): void {
    this.atLineStart = true;
    this.pendingWhitespace = 0;
    this.budget.reset(false);
  }

  private previewPrefix(): string {
    if (!this.atLineStart) {
      return " ".repeat(this.pendingWhitespace);
    }
    if (!this.hasContent) {
      return this.config.firstRowIndent.join("");
    }

    return (
      this.config.lineSeparator.repeat(this.pendingBreaks) +
      this.config.subsequentRowIndent.join("")
    );
  }
}
