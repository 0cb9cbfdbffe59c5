import { HttpClientError } from "../errors.js";

const DEFAULT_PORT = 80;

export interface ParsedUri {
  scheme: "http";
  /** Host as written in a Host header (IPv6 literals keep their brackets). */
  host: string;
  port: number;
  /** Never empty: an absent path is `/`. */
  path: string;
  /** Query without the leading `?`, if the URI had one. */
  query?: string;
  href: string;
}

/**
 * Parse an absolute `http` URI. Anything else, including `https`, fails
 * with INVALID_URI.
 */
export function parseUri(input: string): ParsedUri {
  let url: URL;
  try {
    url = new URL(input);
  } catch (err) {
    throw new HttpClientError("INVALID_URI", `Invalid URI: ${input}`, {
      cause: err,
    });
  }

  if (url.protocol !== "http:") {
    throw new HttpClientError(
      "INVALID_URI",
      `Unsupported scheme ${url.protocol.replace(/:$/, "")} in ${input}`,
    );
  }
  if (!url.hostname) {
    throw new HttpClientError("INVALID_URI", `Missing host in ${input}`);
  }

  return {
    scheme: "http",
    host: url.hostname,
    port: url.port ? Number.parseInt(url.port, 10) : DEFAULT_PORT,
    path: url.pathname || "/",
    query: url.search ? url.search.slice(1) : undefined,
    href: url.href,
  };
}

/** `path[?query]` as written in the request line. */
export function requestTarget(uri: ParsedUri): string {
  return uri.query === undefined ? uri.path : `${uri.path}?${uri.query}`;
}

/** Value for a synthesized Host header: the port only when not 80. */
export function hostHeader(uri: ParsedUri): string {
  return uri.port === DEFAULT_PORT ? uri.host : `${uri.host}:${uri.port}`;
}

/** Host to hand to the socket layer: IPv6 literals without brackets. */
export function connectHost(uri: ParsedUri): string {
  return uri.host.startsWith("[") && uri.host.endsWith("]")
    ? uri.host.slice(1, -1)
    : uri.host;
}
