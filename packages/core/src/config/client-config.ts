import { Version } from "../http/version.js";

export const CLIENT_VERSION = "0.1.0";

export interface ClientConfig {
  /** Max time to establish the TCP connection. 0 waits forever. Default: 30000ms */
  connectTimeoutMs: number;
  /** Max time to receive the whole response. 0 waits forever. Default: 30000ms */
  readTimeoutMs: number;
  /** Max bytes for the status line plus header block. Default: 8KB */
  maxHeaderSize: number;
  /** Max decoded response body size. 0 disables the limit. Default: 10MB */
  maxBodySize: number;
  /** User-Agent sent when the request has none. Empty string sends none. */
  userAgent: string;
  /** Protocol version for requests built by the client. Default: HTTP/1.1 */
  version: Version;
  /** Disable Nagle's algorithm on client sockets. Default: true */
  noDelay: boolean;
  /** Local interface address to bind before connecting. */
  localAddress?: string;
  /** Suppress the per-exchange info log line. Default: false */
  quiet: boolean;
}

export function defaultConfig(): ClientConfig {
  return {
    connectTimeoutMs: 30_000,
    readTimeoutMs: 30_000,
    maxHeaderSize: 8 * 1024,
    maxBodySize: 10 * 1024 * 1024,
    userAgent: `wirehttp/${CLIENT_VERSION}`,
    version: Version.HTTP_11,
    noDelay: true,
    quiet: false,
  };
}
