import { CliError } from "../../cli/errors.js";

export class WrapInputError extends CliError {
  constructor(
    public readonly inputPath: string,
    detail: string,
  ) {
    super(`Failed to read ${inputPath}: ${detail}`);
    this.name = "WrapInputError";
  }
}

export class WrapDecodingError extends CliError {
  constructor(
    public readonly inputPath: string,
    detail: string,
  ) {
    super(`Cannot wrap ${inputPath}: ${detail}`, [], [
      "Convert the input to UTF-8 and rerun.",
    ]);
    this.name = "WrapDecodingError";
  }
}
