const WHITESPACE_PATTERN = /^\p{White_Space}$/u;

const TAB = "\t";
const LINE_FEED = "\n";
const CARRIAGE_RETURN = "\r";
const SPACE = " ";

const NO_RUNES: readonly string[] = Object.freeze([]);
const SINGLE_SPACE: readonly string[] = Object.freeze([SPACE]);

export interface RuneClassifierOptions {
  readonly tabstopWidth: number;
  readonly foldLineBreaks: boolean;
}

export function isWhitespace(rune: string): boolean {
  return WHITESPACE_PATTERN.test(rune);
}

export function isLineBreak(rune: string | undefined): boolean {
  return rune === LINE_FEED || rune === CARRIAGE_RETURN;
}

/**
 * Maps whitespace runes onto the width model: tabs become spaces, and line
 * breaks either fold into a single space or pass through as break units.
 */
export class RuneClassifier {
  public readonly foldLineBreaks: boolean;
  private readonly tabExpansion: readonly string[];

  constructor(options: RuneClassifierOptions) {
    this.foldLineBreaks = options.foldLineBreaks;
    this.tabExpansion = Object.freeze(
      Array.from({ length: options.tabstopWidth }, () => SPACE),
    );
  }

  isWhitespace(rune: string): boolean {
    return isWhitespace(rune);
  }

  normalize(rune: string, previous?: string): readonly string[] {
    if (rune === TAB) {
      return this.tabExpansion;
    }

    if (!isLineBreak(rune)) {
      return [rune];
    }

    if (this.foldLineBreaks) {
      return isLineBreak(previous) ? NO_RUNES : SINGLE_SPACE;
    }

    if (rune === LINE_FEED && previous === CARRIAGE_RETURN) {
      return NO_RUNES;
    }
    return [rune];
  }
}
