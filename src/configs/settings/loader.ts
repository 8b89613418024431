import { join } from "node:path";
import process from "node:process";

import { parseYamlDocument } from "../../utils/yaml-reader.js";
import { createConfigLoader } from "../shared/loader-factory.js";
import { formatYamlErrorDetail } from "../shared/yaml-error-formatter.js";
import { SettingsFileError, SettingsFileMissingError } from "./errors.js";
import { type WrapSettings, wrapSettingsSchema } from "./types.js";

export const SETTINGS_FILENAME = ".runewrap.yaml" as const;

const BYTE_ORDER_MARK = "\uFEFF";

export interface LoadWrapSettingsOptions {
  root?: string;
  /** Explicit settings path; unlike the default file it must exist. */
  filePath?: string;
  readFile?: (path: string) => string;
}

const wrapSettingsLoader = createConfigLoader<
  WrapSettings,
  LoadWrapSettingsOptions
>({
  resolveFilePath: (root, options) =>
    options.filePath ?? join(root, SETTINGS_FILENAME),
  selectReadFile: (options) => options.readFile,
  handleMissing: ({ filePath, options }) => {
    if (options.filePath !== undefined) {
      throw new SettingsFileMissingError(filePath);
    }
    return {};
  },
  prepareContent: (content) =>
    content.startsWith(BYTE_ORDER_MARK) ? content.slice(1) : content,
  parse: (content, { filePath }) => parseSettingsYaml(content, filePath),
});

export function loadWrapSettings(
  options: LoadWrapSettingsOptions = {},
): WrapSettings {
  const root = options.root ?? process.cwd();
  return wrapSettingsLoader({ ...options, root });
}

function parseSettingsYaml(content: string, filePath: string): WrapSettings {
  const document = parseYamlDocument(content, {
    formatError: (detail) =>
      new SettingsFileError(
        filePath,
        formatYamlErrorDetail(detail, { fallbackReason: "Unknown YAML error" }),
      ),
  });

  const result = wrapSettingsSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.join(".");
    const message = issue?.message ?? "Invalid settings value";
    throw new SettingsFileError(
      filePath,
      path ? `\`${path}\` ${message}` : message,
    );
  }
  return result.data;
}
