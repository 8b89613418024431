import { createReadStream } from "node:fs";
import process from "node:process";

import type { WrapSettings } from "../../configs/settings/types.js";
import {
  type ChunkSource,
  DecodingError,
  type WrapOptions,
  Wrapper,
  WrapSourceError,
} from "../../text/index.js";
import { toErrorMessage } from "../../utils/errors.js";
import { WrapDecodingError, WrapInputError } from "./errors.js";

export const STDIN_PATH = "-" as const;

export interface WrapFlags {
  width?: number;
  firstIndent?: string;
  indent?: string;
  tabstop?: number;
  foldLineBreaks?: boolean;
  lineSeparator?: string;
}

export interface WrapCommandInput {
  files: readonly string[];
  options: WrapOptions;
  /** Defaults to `process.stdin`, read only when `-` or no file is given. */
  stdin?: ChunkSource;
  openFile?: (path: string) => ChunkSource;
}

export interface WrapCommandResult {
  output: string;
}

/** Command-line flags win over the settings file. */
export function resolveWrapOptions(
  settings: WrapSettings,
  flags: WrapFlags,
): WrapOptions {
  return {
    columnWidth: flags.width ?? settings.width,
    firstRowIndent: flags.firstIndent ?? settings.firstIndent,
    subsequentRowIndent: flags.indent ?? settings.indent,
    tabstopWidth: flags.tabstop ?? settings.tabstop,
    foldLineBreaks: flags.foldLineBreaks ?? settings.foldLineBreaks,
    lineSeparator: flags.lineSeparator ?? settings.lineSeparator,
  };
}

export async function executeWrapCommand(
  input: WrapCommandInput,
): Promise<WrapCommandResult> {
  const wrapper = new Wrapper(input.options);
  const openFile = input.openFile ?? openFileStream;
  const files = input.files.length > 0 ? input.files : [STDIN_PATH];

  let output = "";
  for (const file of files) {
    const label = file === STDIN_PATH ? "standard input" : file;
    const source =
      file === STDIN_PATH ? (input.stdin ?? process.stdin) : openFile(file);
    const wrapped = await wrapSource(wrapper, source, label);
    if (wrapped.length > 0) {
      output += `${wrapped}${wrapper.config.lineSeparator}`;
    }
  }

  return { output };
}

async function wrapSource(
  wrapper: Wrapper,
  source: ChunkSource,
  label: string,
): Promise<string> {
  try {
    return await wrapper.wrapFromStream(source);
  } catch (error) {
    if (error instanceof DecodingError) {
      throw new WrapDecodingError(label, error.headline);
    }
    if (error instanceof WrapSourceError) {
      throw new WrapInputError(label, toErrorMessage(error.cause));
    }
    throw error;
  }
}

function openFileStream(path: string): ChunkSource {
  return createReadStream(path);
}
