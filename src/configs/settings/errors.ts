import { HintedError } from "../../utils/errors.js";

export class SettingsFileError extends HintedError {
  constructor(
    public readonly filePath: string,
    detail: string,
  ) {
    super(`Invalid settings file at ${filePath}: ${detail}`, {
      hintLines: ["Fix the settings file or pass --config <path> and rerun."],
    });
    this.name = "SettingsFileError";
  }
}

export class SettingsFileMissingError extends HintedError {
  constructor(public readonly filePath: string) {
    super(`Settings file not found: ${filePath}`);
    this.name = "SettingsFileMissingError";
  }
}
