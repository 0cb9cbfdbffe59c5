const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const CRLF = new Uint8Array([13, 10]);

export function fromString(value: string): Uint8Array {
  return encoder.encode(value);
}

export function decodeToString(data: Uint8Array): string {
  return decoder.decode(data);
}

/**
 * Decode bytes one octet per character. Header lines are read this way so
 * that every byte on the wire maps to exactly one character.
 */
export function decodeLatin1(data: Uint8Array): string {
  let out = "";
  for (let i = 0; i < data.length; i += 0x2000) {
    out += String.fromCharCode(...data.subarray(i, i + 0x2000));
  }
  return out;
}

/**
 * Encode one octet per character, the inverse of `decodeLatin1`. Callers
 * guarantee every code point is at most 0xFF.
 */
export function encodeLatin1(value: string): Uint8Array {
  const out = new Uint8Array(value.length);
  for (let i = 0; i < value.length; i++) {
    out[i] = value.charCodeAt(i);
  }
  return out;
}

export function concat(chunks: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) {
    total += chunk.length;
  }
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

export function findSequence(
  buffer: Uint8Array,
  sequence: Uint8Array,
  from = 0,
): number {
  outer: for (let i = from; i <= buffer.length - sequence.length; i++) {
    for (let j = 0; j < sequence.length; j++) {
      if (buffer[i + j] !== sequence[j]) continue outer;
    }
    return i;
  }
  return -1;
}
