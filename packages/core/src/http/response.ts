import type { Body } from "./body.js";
import type { ReadonlyHeaderMap } from "./header-map.js";
import type { StatusCode } from "./status-code.js";
import { Version } from "./version.js";

export interface ResponseParts {
  version: Version;
  status: StatusCode;
  reason: string;
  headers: ReadonlyHeaderMap;
  body: Body;
}

/** A fully received response. The body is always held in memory. */
export class Response {
  readonly version: Version;
  readonly status: StatusCode;
  readonly reason: string;
  readonly headers: ReadonlyHeaderMap;
  readonly body: Body;

  constructor(parts: ResponseParts) {
    this.version = parts.version;
    this.status = parts.status;
    this.reason = parts.reason;
    this.headers = parts.headers;
    this.body = parts.body;
  }

  get ok(): boolean {
    return this.status.isSuccess();
  }

  /**
   * Whether the peer offered to keep the connection open. Informational:
   * the client closes every connection after one exchange.
   */
  get keepAlive(): boolean {
    const tokens = this.headers
      .getAll("connection")
      .flatMap((v) => v.split(","))
      .map((t) => t.trim().toLowerCase());

    if (this.version === Version.HTTP_11) {
      return !tokens.includes("close");
    }
    return tokens.includes("keep-alive");
  }

  bytes(): Uint8Array {
    return this.body.bytes();
  }

  text(): string {
    return this.body.text();
  }
}
