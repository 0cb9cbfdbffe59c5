import { asProtocolError, HttpClientError } from "../errors.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import { Body } from "./body.js";
import { ByteReader } from "./byte-reader.js";
import { readChunkedBody } from "./chunked.js";
import { readHeaderBlock } from "./header-block.js";
import type { ReadonlyHeaderMap } from "./header-map.js";
import { Method } from "./method.js";
import { Response } from "./response.js";
import { StatusCode } from "./status-code.js";
import { parseVersion, type Version } from "./version.js";

const DEFAULT_MAX_HEADER_SIZE = 8 * 1024; // 8KB
const DEFAULT_MAX_BODY_SIZE = 10 * 1024 * 1024; // 10MB
const STATUS_LINE = /^(\S+) (\d{3})(?: (.*))?$/;

export interface ParseHttpResponseOptions {
  /** Method of the request being answered; HEAD responses carry no body. */
  requestMethod?: Method;
  maxHeaderSize?: number;
  /** 0 disables the limit. */
  maxBodySize?: number;
  /** Bound on the whole read, 0 for none. */
  timeoutMs?: number;
}

export interface HttpResponseHead {
  version: Version;
  status: StatusCode;
  reason: string;
  headers: ReadonlyHeaderMap;
}

export type BodyFramingDecision =
  | { type: "none" }
  | { type: "chunked" }
  | { type: "length"; length: number }
  | { type: "close" };

function parseStatusLine(line: string): {
  version: Version;
  status: StatusCode;
  reason: string;
} {
  const match = STATUS_LINE.exec(line);
  const version = match ? parseVersion(match[1]) : null;
  if (!match || !version || /[\r\n]/.test(line)) {
    throw new HttpClientError(
      "MALFORMED_STATUS_LINE",
      `Malformed status line: ${JSON.stringify(line)}`,
    );
  }

  let status: StatusCode;
  try {
    status = StatusCode.from(Number.parseInt(match[2], 10));
  } catch (err) {
    throw asProtocolError(err);
  }

  return { version, status, reason: match[3] ?? "" };
}

function hasChunkedCoding(headers: ReadonlyHeaderMap): boolean {
  return headers
    .getAll("transfer-encoding")
    .flatMap((v) => v.split(","))
    .some((coding) => coding.trim().toLowerCase() === "chunked");
}

/**
 * Every Content-Length value (comma lists included) must be a plain
 * non-negative integer, and all of them must agree.
 */
function parseContentLength(values: string[]): number {
  let length: number | undefined;
  for (const raw of values.flatMap((v) => v.split(","))) {
    const digits = raw.trim();
    const parsed = /^\d+$/.test(digits) ? Number(digits) : Number.NaN;
    if (!Number.isSafeInteger(parsed)) {
      throw new HttpClientError(
        "INVALID_CONTENT_LENGTH",
        `Invalid Content-Length: ${JSON.stringify(raw)}`,
      );
    }
    if (length !== undefined && length !== parsed) {
      throw new HttpClientError(
        "INVALID_CONTENT_LENGTH",
        `Conflicting Content-Length values: ${values.join(", ")}`,
      );
    }
    length = parsed;
  }
  if (length === undefined) {
    throw new HttpClientError("INVALID_CONTENT_LENGTH", "Empty Content-Length");
  }
  return length;
}

/**
 * Decide how the body after `head` is delimited. Bodiless responses win
 * over any length indicator, then chunked wins over Content-Length.
 */
export function decideBodyFraming(
  head: HttpResponseHead,
  requestMethod?: Method,
): BodyFramingDecision {
  const code = head.status.code;
  if (
    requestMethod === Method.HEAD ||
    head.status.isInformational() ||
    code === 204 ||
    code === 304
  ) {
    return { type: "none" };
  }

  if (hasChunkedCoding(head.headers)) {
    return { type: "chunked" };
  }

  const contentLength = head.headers.getAll("content-length");
  if (contentLength.length > 0) {
    return { type: "length", length: parseContentLength(contentLength) };
  }

  return { type: "close" };
}

export class HttpResponseStreamParser {
  constructor(private readonly reader: ByteReader = new ByteReader()) {}

  /** Feed bytes from the peer. */
  push(data: Uint8Array): void {
    this.reader.push(data);
  }

  /** The peer closed its side. */
  end(): void {
    this.reader.end();
  }

  fail(err: unknown): void {
    this.reader.fail(err);
  }

  async readResponse(options?: ParseHttpResponseOptions): Promise<Response> {
    this.reader.setTimeout(options?.timeoutMs ?? 0);

    let head = await this.readResponseHead(options);
    // Interim 1xx responses precede the final one; 101 ends HTTP/1.1 here.
    while (head.status.isInformational() && head.status.code !== 101) {
      head = await this.readResponseHead(options);
    }

    const framing = decideBodyFraming(head, options?.requestMethod);
    const bytes = await this.readBody(framing, options);

    return new Response({
      ...head,
      body: Body.fromBytes(bytes),
    });
  }

  async readResponseHead(
    options?: ParseHttpResponseOptions,
  ): Promise<HttpResponseHead> {
    const maxHeaderSize = options?.maxHeaderSize ?? DEFAULT_MAX_HEADER_SIZE;

    const statusLine = await this.reader.readLine(
      maxHeaderSize,
      () =>
        new HttpClientError(
          "MALFORMED_STATUS_LINE",
          `Status line not terminated within ${maxHeaderSize} bytes`,
        ),
    );
    const { version, status, reason } = parseStatusLine(statusLine);
    const headers = await readHeaderBlock(this.reader, maxHeaderSize);

    return { version, status, reason, headers };
  }

  async readBody(
    framing: BodyFramingDecision,
    options?: ParseHttpResponseOptions,
  ): Promise<Uint8Array> {
    const maxBodySize = options?.maxBodySize ?? DEFAULT_MAX_BODY_SIZE;
    const tooLarge = () =>
      new HttpClientError(
        "BODY_TOO_LARGE",
        `Response body exceeds ${maxBodySize} bytes`,
      );

    switch (framing.type) {
      case "none":
        return new Uint8Array(0);
      case "chunked":
        return readChunkedBody(this.reader, {
          maxBodySize,
          maxLineLength: options?.maxHeaderSize ?? DEFAULT_MAX_HEADER_SIZE,
        });
      case "length":
        if (maxBodySize > 0 && framing.length > maxBodySize) {
          throw tooLarge();
        }
        return this.reader.readExact(framing.length);
      case "close":
        return this.reader.readToEnd(maxBodySize, tooLarge);
    }
  }
}

/** Attach a response parser to a socket's data, close and error events. */
export function createHttpResponseParser(
  socket: ITcpSocket,
): HttpResponseStreamParser {
  const parser = new HttpResponseStreamParser();
  socket.onData((data) => parser.push(data));
  socket.onClose(() => parser.end());
  socket.onError((err) => parser.fail(err));
  return parser;
}

/** Decode a complete response held in memory. */
export function decodeResponse(
  data: Uint8Array,
  options?: Omit<ParseHttpResponseOptions, "timeoutMs">,
): Promise<Response> {
  const parser = new HttpResponseStreamParser();
  parser.push(data);
  parser.end();
  return parser.readResponse(options);
}
