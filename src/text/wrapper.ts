import { DecodingError, WrapSourceError } from "./errors.js";
import {
  createWrapConfig,
  type WrapConfig,
  type WrapOptions,
} from "./options.js";
import { WrapSession } from "./session.js";

export type TextChunk = string | Uint8Array;

export type ChunkSource = AsyncIterable<TextChunk> | Iterable<TextChunk>;

const encoder = new TextEncoder();

function toBytes(chunk: TextChunk): Uint8Array {
  return typeof chunk === "string" ? encoder.encode(chunk) : chunk;
}

/**
 * Word-wraps UTF-8 text to a fixed column width.
 *
 * `wrapText` and `wrapFromStream` each run on a private session. `addText`,
 * `accumulatedOutput`, `finish` and `reset` share one long-lived session for
 * callers that feed text piecemeal.
 */
export class Wrapper {
  public readonly config: WrapConfig;
  private session: WrapSession;

  constructor(options: WrapOptions = {}) {
    this.config = createWrapConfig(options);
    this.session = new WrapSession(this.config);
  }

  wrapText(text: string): string {
    const session = new WrapSession(this.config);
    session.addChunk(toBytes(text));
    return session.finish();
  }

  /**
   * Wraps everything `source` yields until it is exhausted. A failure raised by
   * the source rejects with `WrapSourceError`, whose `partialOutput` holds what
   * had been wrapped up to that point.
   */
  async wrapFromStream(source: ChunkSource): Promise<string> {
    const session = new WrapSession(this.config);

    try {
      for await (const chunk of source) {
        session.addChunk(toBytes(chunk));
      }
    } catch (error) {
      if (error instanceof DecodingError) {
        throw error;
      }
      throw new WrapSourceError(error, session.snapshot());
    }

    return session.finish();
  }

  addText(chunk: TextChunk): void {
    this.guard(() => {
      this.session.addChunk(toBytes(chunk));
    });
  }

  accumulatedOutput(): string {
    return this.session.snapshot();
  }

  /** Ends the incremental input and starts a new session. */
  finish(): string {
    const output = this.guard(() => this.session.finish());
    this.reset();
    return output;
  }

  reset(): void {
    this.session = new WrapSession(this.config);
  }

  private guard<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      if (error instanceof DecodingError) {
        this.reset();
      }
      throw error;
    }
  }
}

export function configure(options: WrapOptions = {}): Wrapper {
  return new Wrapper(options);
}

export function wrapText(text: string, options: WrapOptions = {}): string {
  return new Wrapper(options).wrapText(text);
}
