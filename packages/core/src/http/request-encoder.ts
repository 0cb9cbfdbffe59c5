import { HttpClientError } from "../errors.js";
import { concat, encodeLatin1 } from "../utils/buffer.js";
import type { ByteSink } from "./body.js";
import { chunkedSink } from "./chunked.js";
import type { ReadonlyHeaderMap } from "./header-map.js";
import type { Request } from "./request.js";
import { hostHeader, requestTarget } from "./uri.js";
import { supportsChunked, Version } from "./version.js";

export type RequestBodyFraming =
  | { type: "length"; length: number }
  | { type: "chunked" };

export interface EncodedRequestHead {
  /** Request line, header block and the blank line after it. */
  head: Uint8Array;
  framing: RequestBodyFraming;
}

interface FramingPlan {
  framing: RequestBodyFraming;
  /** Header lines the encoder adds to announce the framing. */
  synthesized: string[];
}

function ambiguous(message: string): HttpClientError {
  return new HttpClientError("AMBIGUOUS_BODY_FRAMING", message);
}

function planFraming(request: Request): FramingPlan {
  const { headers, version, body } = request;
  const transferCodings = headers
    .getAll("transfer-encoding")
    .flatMap((v) => v.split(","))
    .map((c) => c.trim().toLowerCase())
    .filter((c) => c !== "");
  const contentLength = headers.getAll("content-length").map((v) => v.trim());
  const known = body.knownLength();

  if (transferCodings.length > 0) {
    if (contentLength.length > 0) {
      throw ambiguous("Both Transfer-Encoding and Content-Length are set");
    }
    if (!supportsChunked(version)) {
      throw ambiguous(`Transfer-Encoding is not available in ${version}`);
    }
    if (transferCodings[transferCodings.length - 1] !== "chunked") {
      throw ambiguous("Transfer-Encoding must end with chunked");
    }
    return { framing: { type: "chunked" }, synthesized: [] };
  }

  if (known !== undefined) {
    if (contentLength.some((v) => v !== String(known))) {
      throw ambiguous(
        `Content-Length ${contentLength.join(", ")} does not match body length ${known}`,
      );
    }
    return {
      framing: { type: "length", length: known },
      synthesized: contentLength.length > 0 ? [] : [`Content-Length: ${known}`],
    };
  }

  if (!supportsChunked(version)) {
    throw ambiguous(`Body of unknown length cannot be framed in ${version}`);
  }
  if (contentLength.length > 0) {
    throw ambiguous("Content-Length set for a body of unknown length");
  }
  return {
    framing: { type: "chunked" },
    synthesized: ["Transfer-Encoding: chunked"],
  };
}

function hostLines(request: Request): string[] {
  const hosts = request.headers.getAll("host");
  if (hosts.length > 1) {
    throw new HttpClientError(
      "INVALID_HEADER_VALUE",
      `Request has ${hosts.length} Host headers`,
    );
  }
  return hosts.length === 0 ? [`Host: ${hostHeader(request.uri)}`] : [];
}

function headerLines(headers: ReadonlyHeaderMap): string[] {
  const lines: string[] = [];
  for (const [name, value] of headers) {
    lines.push(`${name}: ${value}`);
  }
  return lines;
}

/**
 * Serialize everything before the body. Throws for requests that cannot be
 * framed, so callers can reject them before opening a connection.
 */
export function encodeRequestHead(request: Request): EncodedRequestHead {
  const { framing, synthesized } = planFraming(request);

  const lines: string[] = [
    `${request.method} ${requestTarget(request.uri)} ${request.version}`,
    ...hostLines(request),
    ...headerLines(request.headers),
    ...synthesized,
  ];
  if (
    request.version === Version.HTTP_11 &&
    !request.headers.has("connection")
  ) {
    lines.push("Connection: close");
  }
  lines.push("", ""); // \r\n\r\n

  return { head: encodeLatin1(lines.join("\r\n")), framing };
}

/**
 * Write the full request to `sink`: head first, then the body framed as
 * the head announced.
 */
export async function writeRequest(
  request: Request,
  sink: ByteSink,
  encoded: EncodedRequestHead = encodeRequestHead(request),
): Promise<void> {
  await sink.write(encoded.head);

  if (encoded.framing.type === "length") {
    await request.body.writeTo(sink);
    return;
  }

  const chunked = chunkedSink(sink);
  await request.body.writeTo(chunked);
  await chunked.finish();
}

/** Encode the full request into one buffer. */
export async function encodeRequest(request: Request): Promise<Uint8Array> {
  const parts: Uint8Array[] = [];
  await writeRequest(request, {
    async write(chunk) {
      parts.push(chunk);
    },
  });
  return concat(parts);
}
