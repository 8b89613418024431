import type { YamlParseErrorDetail } from "../../utils/yaml-reader.js";

export interface FormatYamlErrorDetailOptions {
  /**
   * Default reason to use when the detail provides none.
   */
  fallbackReason?: string;
}

/**
 * Formats the detail portion of a YAML parse error, leaving the file context
 * to the caller:
 * - With location: `(line X, column Y): message`
 * - Without location: `message`
 */
export function formatYamlErrorDetail(
  detail: YamlParseErrorDetail,
  options: FormatYamlErrorDetailOptions = {},
): string {
  const { fallbackReason } = options;
  const message =
    detail.reason ?? detail.message ?? fallbackReason ?? "unknown error";
  const hasLocation =
    typeof detail.line === "number" && typeof detail.column === "number";

  if (hasLocation) {
    return `(line ${detail.line}, column ${detail.column}): ${message}`;
  }

  return message;
}
