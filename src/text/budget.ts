export interface LineBudgetOptions {
  readonly columnWidth: number;
  readonly firstIndentWidth: number;
  readonly subsequentIndentWidth: number;
}

/** Remaining columns on the line being built. */
export class LineBudget {
  private remainingWidth: number;

  constructor(private readonly options: LineBudgetOptions) {
    this.remainingWidth = this.widthFor(true);
  }

  get remaining(): number {
    return this.remainingWidth;
  }

  get freshWidth(): number {
    return this.widthFor(false);
  }

  reset(isFirstLine: boolean): void {
    this.remainingWidth = this.widthFor(isFirstLine);
  }

  charge(columns: number): void {
    this.remainingWidth = Math.max(0, this.remainingWidth - columns);
  }

  wouldOverflow(columns: number): boolean {
    return columns > this.remainingWidth;
  }

  private widthFor(isFirstLine: boolean): number {
    const indentWidth = isFirstLine
      ? this.options.firstIndentWidth
      : this.options.subsequentIndentWidth;
    return this.options.columnWidth - indentWidth;
  }
}
