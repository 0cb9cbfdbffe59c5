import { HttpClientError } from "../errors.js";

export type StatusClass =
  | "informational"
  | "success"
  | "redirection"
  | "client-error"
  | "server-error";

const CLASS_BY_DIGIT: Record<number, StatusClass> = {
  1: "informational",
  2: "success",
  3: "redirection",
  4: "client-error",
  5: "server-error",
};

export const STATUS_TEXT: Readonly<Record<number, string>> = {
  100: "Continue",
  101: "Switching Protocols",
  200: "OK",
  201: "Created",
  202: "Accepted",
  204: "No Content",
  206: "Partial Content",
  301: "Moved Permanently",
  302: "Found",
  303: "See Other",
  304: "Not Modified",
  307: "Temporary Redirect",
  308: "Permanent Redirect",
  400: "Bad Request",
  401: "Unauthorized",
  403: "Forbidden",
  404: "Not Found",
  405: "Method Not Allowed",
  408: "Request Timeout",
  409: "Conflict",
  411: "Length Required",
  413: "Content Too Large",
  429: "Too Many Requests",
  500: "Internal Server Error",
  501: "Not Implemented",
  502: "Bad Gateway",
  503: "Service Unavailable",
  504: "Gateway Timeout",
};

export class StatusCode {
  private constructor(readonly code: number) {}

  static from(code: number): StatusCode {
    if (!Number.isInteger(code) || code < 100 || code > 599) {
      throw new HttpClientError(
        "INVALID_STATUS_CODE",
        `Status code out of range: ${code}`,
      );
    }
    return new StatusCode(code);
  }

  get statusClass(): StatusClass {
    return CLASS_BY_DIGIT[Math.floor(this.code / 100)];
  }

  /** Registered reason phrase, if this is a commonly used code. */
  get canonicalReason(): string | undefined {
    return STATUS_TEXT[this.code];
  }

  isInformational(): boolean {
    return this.statusClass === "informational";
  }

  isSuccess(): boolean {
    return this.statusClass === "success";
  }

  isRedirection(): boolean {
    return this.statusClass === "redirection";
  }

  isClientError(): boolean {
    return this.statusClass === "client-error";
  }

  isServerError(): boolean {
    return this.statusClass === "server-error";
  }

  equals(other: StatusCode | number): boolean {
    return this.code === (typeof other === "number" ? other : other.code);
  }

  toString(): string {
    return String(this.code);
  }
}
