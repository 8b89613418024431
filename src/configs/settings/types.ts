import { z } from "zod";

const positiveInteger = z
  .number()
  .int("must be an integer")
  .positive("must be greater than 0");

export const wrapSettingsSchema = z
  .object({
    width: positiveInteger.optional(),
    firstIndent: z.string().optional(),
    indent: z.string().optional(),
    tabstop: positiveInteger.optional(),
    foldLineBreaks: z.boolean().optional(),
    lineSeparator: z.string().min(1, "must not be empty").optional(),
  })
  .strict();

export type WrapSettings = z.infer<typeof wrapSettingsSchema>;
