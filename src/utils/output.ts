import { colorize, type TerminalColor } from "./colors.js";

function formatLabeledMessage(
  label: string,
  color: TerminalColor,
  message: string,
): string {
  return `${colorize(`${label}:`, color)} ${message}`;
}

export function formatErrorMessage(message: string): string {
  return formatLabeledMessage("Error", "red", message);
}

export function formatWarningMessage(message: string): string {
  return formatLabeledMessage("Warning", "yellow", message);
}
