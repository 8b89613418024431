#!/usr/bin/env node

import process from "node:process";

import { Command, CommanderError } from "commander";

import { commanderAlreadyRendered } from "./cli/commander-utils.js";
import { CliError, toCliError } from "./cli/errors.js";
import { writeCommandOutput } from "./cli/output.js";
import { createWrapCommand } from "./cli/wrap.js";
import { renderCliError } from "./render/utils/errors.js";
import { toErrorMessage } from "./utils/errors.js";
import { getRunewrapVersion } from "./utils/version.js";

function installProcessGuards(): void {
  process.on("uncaughtException", (error) => {
    console.error(`[runewrap] Uncaught exception: ${toErrorMessage(error)}`);
    console.error(error);
    process.exit(1);
  });

  process.on("unhandledRejection", (reason) => {
    console.error(`[runewrap] Unhandled rejection: ${toErrorMessage(reason)}`);
    console.error(reason);
    process.exit(1);
  });
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("runewrap")
    .description("Word-wrap UTF-8 text to a fixed column width")
    .version(getRunewrapVersion(), "-v, --version", "print the runewrap version")
    .exitOverride()
    .showHelpAfterError()
    .helpCommand(false);

  program.addCommand(createWrapCommand().copyInheritedSettings(program), {
    isDefault: true,
  });

  return program;
}

export async function runCli(
  argv: readonly string[] = process.argv,
): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (commanderAlreadyRendered(error)) {
        process.exitCode = error.exitCode ?? 0;
        return;
      }

      writeCommandOutput({
        body: renderCliError(new CliError(toErrorMessage(error))),
        exitCode: error.exitCode ?? 1,
      });
      return;
    }

    writeCommandOutput({
      body: renderCliError(toCliError(error)),
      exitCode: 1,
    });
  }
}

if (require.main === module) {
  installProcessGuards();
  void runCli();
}
