import { HttpClientError } from "../errors.js";
import { concat, fromString } from "../utils/buffer.js";
import type { ByteSink } from "./body.js";
import type { ByteReader } from "./byte-reader.js";

const CHUNK_SIZE_LINE_LIMIT = 1024;
// 16 hex digits cover every safe integer; anything longer is hostile.
const MAX_CHUNK_SIZE_DIGITS = 16;
const HEX = /^[0-9A-Fa-f]+$/;

export const LAST_CHUNK = fromString("0\r\n\r\n");

/** Frame one chunk: `<hex-size>\r\n<data>\r\n`. */
export function encodeChunk(data: Uint8Array): Uint8Array {
  return concat([
    fromString(`${data.length.toString(16)}\r\n`),
    data,
    fromString("\r\n"),
  ]);
}

/**
 * Wrap `sink` so every write becomes one chunk. Empty writes are dropped,
 * since a zero-size chunk would end the body. Call `finish()` once to send
 * the terminating chunk.
 */
export function chunkedSink(sink: ByteSink): ByteSink & {
  finish(): Promise<void>;
} {
  return {
    async write(chunk) {
      if (chunk.length === 0) return;
      await sink.write(encodeChunk(chunk));
    },
    async finish() {
      await sink.write(LAST_CHUNK);
    },
  };
}

export interface ReadChunkedOptions {
  /** Maximum decoded size; 0 disables the limit. */
  maxBodySize?: number;
  /** Byte limit for a single trailer line. */
  maxLineLength?: number;
}

/**
 * Decode a chunked body from `reader`. Trailer fields after the last chunk
 * are consumed and dropped.
 */
export async function readChunkedBody(
  reader: ByteReader,
  options?: ReadChunkedOptions,
): Promise<Uint8Array> {
  const maxBodySize = options?.maxBodySize ?? 0;
  const maxLineLength = options?.maxLineLength ?? 8 * 1024;
  const chunks: Uint8Array[] = [];
  let total = 0;

  while (true) {
    const sizeLine = await reader.readLine(
      CHUNK_SIZE_LINE_LIMIT,
      () =>
        new HttpClientError("MALFORMED_CHUNK_SIZE", "Chunk size line too long"),
    );
    const size = parseChunkSize(sizeLine);
    if (size === 0) break;

    total += size;
    if (maxBodySize > 0 && total > maxBodySize) {
      throw new HttpClientError(
        "BODY_TOO_LARGE",
        `Chunked body exceeds ${maxBodySize} bytes`,
      );
    }

    chunks.push(await reader.readExact(size));

    const terminator = await reader.readExact(2);
    if (terminator[0] !== 13 || terminator[1] !== 10) {
      throw new HttpClientError(
        "MALFORMED_CHUNK_SIZE",
        "Chunk data not followed by CRLF",
      );
    }
  }

  // Trailer section: header-shaped lines up to an empty one.
  while (true) {
    const line = await reader.readLine(
      maxLineLength,
      () =>
        new HttpClientError("MALFORMED_HEADER_LINE", "Trailer line too long"),
    );
    if (line === "") break;
  }

  return concat(chunks);
}

export function parseChunkSize(line: string): number {
  const semicolon = line.indexOf(";");
  const digits = (semicolon === -1 ? line : line.slice(0, semicolon)).trim();

  if (!HEX.test(digits) || digits.length > MAX_CHUNK_SIZE_DIGITS) {
    throw new HttpClientError(
      "MALFORMED_CHUNK_SIZE",
      `Invalid chunk size: ${JSON.stringify(line)}`,
    );
  }

  const size = Number.parseInt(digits, 16);
  if (!Number.isSafeInteger(size)) {
    throw new HttpClientError(
      "MALFORMED_CHUNK_SIZE",
      `Chunk size too large: ${digits}`,
    );
  }
  return size;
}
