import { ValidationError } from "./errors.js";

export function parsePositiveInteger(
  value: unknown,
  invalidMessage: string,
  nonPositiveMessage?: string,
): number {
  if (typeof value !== "string") {
    throw new ValidationError(invalidMessage);
  }

  const trimmed = value.trim();
  if (!/^\d+$/u.test(trimmed)) {
    throw new ValidationError(invalidMessage);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ValidationError(nonPositiveMessage ?? invalidMessage);
  }

  return parsed;
}

const ESCAPE_SEQUENCES: Readonly<Record<string, string>> = {
  n: "\n",
  r: "\r",
  t: "\t",
  "\\": "\\",
};

/**
 * Expands `\n`, `\r`, `\t` and `\\` so separators can be given on a command
 * line. Any other backslash sequence is rejected.
 */
export function parseEscapedText(value: string, invalidMessage: string): string {
  let result = "";
  for (let index = 0; index < value.length; index += 1) {
    const char = value.charAt(index);
    if (char !== "\\") {
      result += char;
      continue;
    }

    const expansion = ESCAPE_SEQUENCES[value.charAt(index + 1)];
    if (expansion === undefined) {
      throw new ValidationError(invalidMessage);
    }
    result += expansion;
    index += 1;
  }
  return result;
}
