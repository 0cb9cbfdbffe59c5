import { HttpClientError } from "../errors.js";
import { Body } from "./body.js";
import {
  type HeaderInit,
  HeaderMap,
  type ReadonlyHeaderMap,
} from "./header-map.js";
import { type Method, parseMethod } from "./method.js";
import { type ParsedUri, parseUri } from "./uri.js";
import { Version } from "./version.js";

export class Request {
  constructor(
    readonly method: Method,
    readonly uri: ParsedUri,
    readonly version: Version,
    readonly headers: ReadonlyHeaderMap,
    readonly body: Body,
  ) {}

  static builder(): RequestBuilder {
    return new RequestBuilder();
  }
}

/**
 * Accumulates request fields. Nothing is rejected until `body()` finalizes
 * the request; the first recorded problem is thrown there.
 */
export class RequestBuilder {
  private _method?: string;
  private _uri?: string | ParsedUri;
  private _version: Version = Version.HTTP_11;
  private _headers = new HeaderMap();
  private _error?: HttpClientError;

  method(m: Method | string): this {
    this._method = m;
    return this;
  }

  uri(u: string | ParsedUri): this {
    this._uri = u;
    return this;
  }

  version(v: Version): this {
    this._version = v;
    return this;
  }

  /** Append a header value; an invalid name or value fails at `body()`. */
  header(name: string, value: string | number): this {
    this.record(() => this._headers.append(name, String(value)));
    return this;
  }

  /** Append every field of `init` after the ones already added. */
  headers(init: HeaderInit): this {
    this.record(() => {
      for (const [name, value] of HeaderMap.from(init)) {
        this._headers.append(name, value);
      }
    });
    return this;
  }

  /** Discard the headers added so far and use `map` instead. */
  replaceHeaders(map: ReadonlyHeaderMap): this {
    this._headers = map.clone();
    return this;
  }

  body(b: Body = Body.empty()): Request {
    if (this._error) {
      throw this._error;
    }
    if (this._method === undefined) {
      throw new HttpClientError("INVALID_METHOD", "Request method not set");
    }
    if (this._uri === undefined) {
      throw new HttpClientError("INVALID_URI", "Request target not set");
    }

    const method = parseMethod(this._method);
    const uri = typeof this._uri === "string" ? parseUri(this._uri) : this._uri;

    return new Request(method, uri, this._version, this._headers.clone(), b);
  }

  private record(fn: () => void): void {
    if (this._error) return;
    try {
      fn();
    } catch (err) {
      if (!(err instanceof HttpClientError)) throw err;
      this._error = err;
    }
  }
}
