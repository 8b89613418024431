import { z } from "zod";

import { IndentTooWideError, InvalidWrapOptionError } from "./errors.js";

export const DEFAULT_COLUMN_WIDTH = 80;
export const DEFAULT_TABSTOP_WIDTH = 4;
export const DEFAULT_LINE_SEPARATOR = "\n";

export const wrapOptionsSchema = z
  .object({
    columnWidth: z
      .number()
      .int("must be an integer")
      .positive("must be greater than 0"),
    firstRowIndent: z.string(),
    subsequentRowIndent: z.string(),
    foldLineBreaks: z.boolean(),
    tabstopWidth: z
      .number()
      .int("must be an integer")
      .positive("must be greater than 0"),
    lineSeparator: z.string().min(1, "must not be empty"),
  })
  .partial()
  .strict();

export type WrapOptions = z.infer<typeof wrapOptionsSchema>;

/**
 * Resolved wrap settings. Indents are held as rune arrays so their widths
 * never depend on UTF-16 length.
 */
export interface WrapConfig {
  readonly columnWidth: number;
  readonly firstRowIndent: readonly string[];
  readonly subsequentRowIndent: readonly string[];
  readonly foldLineBreaks: boolean;
  readonly tabstopWidth: number;
  readonly lineSeparator: string;
}

export function createWrapConfig(options: WrapOptions = {}): WrapConfig {
  const result = wrapOptionsSchema.safeParse(options);
  if (!result.success) {
    const issue = result.error.issues[0];
    const option = issue?.path.join(".") || "options";
    throw new InvalidWrapOptionError(
      option,
      issue?.message ?? "invalid value",
    );
  }

  const parsed = result.data;
  const config: WrapConfig = Object.freeze({
    columnWidth: parsed.columnWidth ?? DEFAULT_COLUMN_WIDTH,
    firstRowIndent: Object.freeze(Array.from(parsed.firstRowIndent ?? "")),
    subsequentRowIndent: Object.freeze(
      Array.from(parsed.subsequentRowIndent ?? ""),
    ),
    foldLineBreaks: parsed.foldLineBreaks ?? true,
    tabstopWidth: parsed.tabstopWidth ?? DEFAULT_TABSTOP_WIDTH,
    lineSeparator: parsed.lineSeparator ?? DEFAULT_LINE_SEPARATOR,
  });

  if (config.columnWidth <= config.firstRowIndent.length) {
    throw new IndentTooWideError(
      config.columnWidth,
      "firstRowIndent",
      config.firstRowIndent.length,
    );
  }
  if (config.columnWidth <= config.subsequentRowIndent.length) {
    throw new IndentTooWideError(
      config.columnWidth,
      "subsequentRowIndent",
      config.subsequentRowIndent.length,
    );
  }

  return config;
}
