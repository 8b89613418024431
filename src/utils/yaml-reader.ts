import { load } from "js-yaml";

import { toErrorMessage } from "./errors.js";
import { isYamlException } from "./yaml.js";

export interface YamlParseErrorDetail {
  reason?: string;
  message?: string;
  line?: number;
  column?: number;
  error: unknown;
  isYamlError: boolean;
}

export interface ParseYamlDocumentOptions<TError extends Error> {
  formatError: (detail: YamlParseErrorDetail) => TError;
}

/**
 * Parses a single YAML document. Blank input, and documents that parse to
 * null, yield an empty object.
 */
export function parseYamlDocument<TError extends Error>(
  content: string,
  options: ParseYamlDocumentOptions<TError>,
): unknown {
  const { formatError } = options;
  if (content.trim().length === 0) {
    return {};
  }

  try {
    return load(content, { json: false }) ?? {};
  } catch (error) {
    throw formatError(buildYamlParseErrorDetail(error));
  }
}

function buildYamlParseErrorDetail(error: unknown): YamlParseErrorDetail {
  if (!isYamlException(error)) {
    return {
      message: toErrorMessage(error),
      error,
      isYamlError: false,
    };
  }

  const { reason, message, mark } = error;
  return {
    reason: reason || undefined,
    message: message || undefined,
    line: toOneBased(mark?.line),
    column: toOneBased(mark?.column),
    error,
    isYamlError: true,
  };
}

function toOneBased(value: number | undefined): number | undefined {
  return typeof value === "number" && Number.isFinite(value)
    ? value + 1
    : undefined;
}
