export type RuneDecodeResult =
  | { readonly status: "rune"; readonly rune: string; readonly size: number }
  | { readonly status: "incomplete"; readonly available: number }
  | { readonly status: "invalid"; readonly reason: string };

interface SequenceShape {
  readonly size: number;
  readonly initial: number;
  readonly min: number;
}

function shapeForLeadByte(lead: number): SequenceShape | undefined {
  if (lead < 0x80) {
    return { size: 1, initial: lead, min: 0 };
  }
  if (lead >= 0xc2 && lead <= 0xdf) {
    return { size: 2, initial: lead & 0x1f, min: 0x80 };
  }
  if (lead >= 0xe0 && lead <= 0xef) {
    return { size: 3, initial: lead & 0x0f, min: 0x800 };
  }
  if (lead >= 0xf0 && lead <= 0xf4) {
    return { size: 4, initial: lead & 0x07, min: 0x10000 };
  }
  return undefined;
}

function isContinuation(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

/**
 * Decodes the rune starting at `offset`. A truncated sequence at the end of
 * `bytes` is reported as `incomplete` only when every byte present could still
 * begin a valid sequence; anything that can never become valid is `invalid`.
 */
export function decodeRune(
  bytes: Uint8Array,
  offset: number,
): RuneDecodeResult {
  const lead = bytes[offset];
  if (lead === undefined) {
    return { status: "incomplete", available: 0 };
  }

  const shape = shapeForLeadByte(lead);
  if (!shape) {
    return {
      status: "invalid",
      reason: `unexpected byte 0x${formatByte(lead)}`,
    };
  }

  let codePoint = shape.initial;
  for (let index = 1; index < shape.size; index += 1) {
    const byte = bytes[offset + index];
    if (byte === undefined) {
      return { status: "incomplete", available: index };
    }
    if (!isContinuation(byte)) {
      return {
        status: "invalid",
        reason: `expected continuation byte, found 0x${formatByte(byte)}`,
      };
    }
    codePoint = (codePoint << 6) | (byte & 0x3f);
    if (index === 1 && !secondByteAllowed(lead, byte)) {
      return {
        status: "invalid",
        reason: `invalid sequence starting 0x${formatByte(lead)} 0x${formatByte(byte)}`,
      };
    }
  }

  if (codePoint < shape.min) {
    return { status: "invalid", reason: "overlong encoding" };
  }

  return {
    status: "rune",
    rune: String.fromCodePoint(codePoint),
    size: shape.size,
  };
}

// Rejects overlong 3/4-byte forms, UTF-16 surrogates and code points above
// U+10FFFF as soon as the second byte is known.
function secondByteAllowed(lead: number, second: number): boolean {
  switch (lead) {
    case 0xe0:
      return second >= 0xa0;
    case 0xed:
      return second <= 0x9f;
    case 0xf0:
      return second >= 0x90;
    case 0xf4:
      return second <= 0x8f;
    default:
      return true;
  }
}

function formatByte(byte: number): string {
  return byte.toString(16).padStart(2, "0");
}
