export interface CommandOutputPayload {
  readonly body?: string | readonly string[];
  readonly exitCode?: number;
}

export function writeCommandOutput(payload: CommandOutputPayload): void {
  const body = payload.body;
  if (body !== undefined) {
    const normalizedBody = typeof body === "string" ? body : body.join("\n");
    if (normalizedBody.trim().length > 0) {
      process.stdout.write(`\n${normalizedBody.trimEnd()}\n\n`);
    }
  }

  if (typeof payload.exitCode === "number") {
    process.exitCode = payload.exitCode;
  }
}

/**
 * Writes wrapped text exactly as produced; unlike command bodies it is not
 * padded with blank lines, so the output can be piped.
 */
export function writeWrappedOutput(text: string): void {
  if (text.length > 0) {
    process.stdout.write(text);
  }
}
