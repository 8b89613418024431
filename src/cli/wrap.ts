import process from "node:process";

import { Command } from "commander";

import {
  executeWrapCommand,
  resolveWrapOptions,
  type WrapFlags,
} from "../commands/wrap/command.js";
import { loadWrapSettings } from "../configs/settings/loader.js";
import type { ChunkSource } from "../text/index.js";
import { formatWarningMessage } from "../utils/output.js";
import { parseEscapedText, parsePositiveInteger } from "../utils/validators.js";
import { writeWrappedOutput } from "./output.js";

export interface WrapCommandOptions extends WrapFlags {
  files?: readonly string[];
  config?: string;
  root?: string;
  stdin?: ChunkSource;
}

export async function runWrapCommand(
  options: WrapCommandOptions = {},
): Promise<string> {
  const settings = loadWrapSettings({
    root: options.root,
    filePath: options.config,
  });

  const result = await executeWrapCommand({
    files: options.files ?? [],
    options: resolveWrapOptions(settings, options),
    stdin: options.stdin,
  });

  return result.output;
}

interface WrapCommandActionOptions {
  width?: number;
  firstIndent?: string;
  indent?: string;
  tabstop?: number;
  foldLineBreaks?: boolean;
  lineSeparator?: string;
  config?: string;
}

function parseWidthOption(value: string): number {
  return parsePositiveInteger(
    value,
    "Expected positive integer after --width",
    "--width must be greater than 0",
  );
}

function parseTabstopOption(value: string): number {
  return parsePositiveInteger(
    value,
    "Expected positive integer after --tabstop",
    "--tabstop must be greater than 0",
  );
}

function parseLineSeparatorOption(value: string): string {
  return parseEscapedText(
    value,
    "--line-separator accepts only \\n, \\r, \\t and \\\\ escapes",
  );
}

export function createWrapCommand(): Command {
  return new Command("wrap")
    .description("Wrap text files (or standard input) to a column width")
    .argument("[files...]", "Files to wrap; `-` reads standard input")
    .option("-w, --width <columns>", "Maximum line width", parseWidthOption)
    .option("--first-indent <text>", "Text placed before the first line")
    .option("--indent <text>", "Text placed before every following line")
    .option(
      "--tabstop <columns>",
      "Spaces each tab expands to",
      parseTabstopOption,
    )
    .option("--fold-line-breaks", "Fold line breaks into spaces (default)")
    .option("--no-fold-line-breaks", "Keep line breaks from the input")
    .option(
      "--line-separator <text>",
      "Separator written between lines",
      parseLineSeparatorOption,
    )
    .option("-c, --config <path>", "Read settings from this YAML file")
    .action(async (files: string[], options: WrapCommandActionOptions) => {
      if (files.length === 0 && process.stdin.isTTY) {
        process.stderr.write(
          `${formatWarningMessage("no files given; reading standard input.")}\n`,
        );
      }

      const output = await runWrapCommand({ ...options, files });
      writeWrappedOutput(output);
    });
}
