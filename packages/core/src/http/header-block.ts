import { asProtocolError, HttpClientError } from "../errors.js";
import type { ByteReader } from "./byte-reader.js";
import { assertHeaderName, assertHeaderValue, HeaderMap } from "./header-map.js";

/**
 * Parse one `Name: value` line. Obsolete line folding (a line starting with
 * SP or HTAB) is rejected rather than joined.
 */
export function parseHeaderLine(line: string): [string, string] {
  if (line.startsWith(" ") || line.startsWith("\t")) {
    throw new HttpClientError(
      "MALFORMED_HEADER_LINE",
      `Folded header line: ${JSON.stringify(line)}`,
    );
  }

  const colonIdx = line.indexOf(":");
  if (colonIdx === -1) {
    throw new HttpClientError(
      "MALFORMED_HEADER_LINE",
      `Header line without a colon: ${JSON.stringify(line)}`,
    );
  }

  const name = line.substring(0, colonIdx);
  const value = line.substring(colonIdx + 1).replace(/^[ \t]+|[ \t]+$/g, "");
  try {
    assertHeaderName(name);
    assertHeaderValue(name, value);
  } catch (err) {
    throw asProtocolError(err);
  }
  return [name, value];
}

/**
 * Read header lines up to and including the empty line that ends the block.
 * `maxSize` bounds the whole block, line terminators included.
 */
export async function readHeaderBlock(
  reader: ByteReader,
  maxSize: number,
): Promise<HeaderMap> {
  const headers = new HeaderMap();
  let remaining = maxSize;

  const tooLarge = () =>
    new HttpClientError(
      "MALFORMED_HEADER_LINE",
      `Header block exceeds ${maxSize} bytes`,
    );

  while (true) {
    if (remaining < 2) throw tooLarge();
    const line = await reader.readLine(remaining - 2, tooLarge);
    remaining -= line.length + 2;
    if (line === "") return headers;

    const [name, value] = parseHeaderLine(line);
    headers.append(name, value);
  }
}
