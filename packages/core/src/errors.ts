export type HttpClientErrorCode =
  | "INVALID_URI"
  | "INVALID_METHOD"
  | "INVALID_HEADER_NAME"
  | "INVALID_HEADER_VALUE"
  | "INVALID_STATUS_CODE"
  | "AMBIGUOUS_BODY_FRAMING"
  | "MALFORMED_STATUS_LINE"
  | "MALFORMED_HEADER_LINE"
  | "MALFORMED_CHUNK_SIZE"
  | "INVALID_CONTENT_LENGTH"
  | "UNEXPECTED_EOF"
  | "BODY_TOO_LARGE"
  | "CONNECTION_ERROR"
  | "CONNECTION_CLOSED"
  | "TIMEOUT"
  | "IO_ERROR";

/**
 * - `input`: rejected before any I/O was attempted.
 * - `transport`: I/O was attempted and failed; the connection was released.
 * - `protocol`: bytes were exchanged but could not be interpreted.
 */
export type HttpClientErrorCategory = "input" | "transport" | "protocol";

const CATEGORY: Record<HttpClientErrorCode, HttpClientErrorCategory> = {
  INVALID_URI: "input",
  INVALID_METHOD: "input",
  INVALID_HEADER_NAME: "input",
  INVALID_HEADER_VALUE: "input",
  INVALID_STATUS_CODE: "input",
  AMBIGUOUS_BODY_FRAMING: "input",
  MALFORMED_STATUS_LINE: "protocol",
  MALFORMED_HEADER_LINE: "protocol",
  MALFORMED_CHUNK_SIZE: "protocol",
  INVALID_CONTENT_LENGTH: "protocol",
  UNEXPECTED_EOF: "protocol",
  BODY_TOO_LARGE: "protocol",
  CONNECTION_ERROR: "transport",
  CONNECTION_CLOSED: "transport",
  TIMEOUT: "transport",
  IO_ERROR: "transport",
};

export class HttpClientError extends Error {
  readonly category: HttpClientErrorCategory;

  constructor(
    readonly code: HttpClientErrorCode,
    message: string,
    options?: { cause?: unknown; category?: HttpClientErrorCategory },
  ) {
    super(message, options);
    this.name = "HttpClientError";
    this.category = options?.category ?? CATEGORY[code];
  }
}

export function isHttpClientError(
  err: unknown,
  code?: HttpClientErrorCode,
): err is HttpClientError {
  return (
    err instanceof HttpClientError && (code === undefined || err.code === code)
  );
}

/**
 * Wrap a foreign error (socket, filesystem) under the given code. Errors
 * that are already classified pass through unchanged.
 */
export function wrapError(
  err: unknown,
  code: HttpClientErrorCode,
  context: string,
): HttpClientError {
  if (err instanceof HttpClientError) {
    return err;
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new HttpClientError(code, `${context}: ${detail}`, { cause: err });
}

/**
 * Reclassify a validation failure raised while interpreting received bytes:
 * a bad header name in a response is a protocol error, not an input error.
 */
export function asProtocolError(err: unknown): unknown {
  if (!(err instanceof HttpClientError) || err.category === "protocol") {
    return err;
  }
  return new HttpClientError(err.code, err.message, {
    cause: err,
    category: "protocol",
  });
}
