import { type ClientConfig, defaultConfig } from "../config/client-config.js";
import { isHttpClientError } from "../errors.js";
import { Body } from "../http/body.js";
import { type HeaderInit, HeaderMap } from "../http/header-map.js";
import { Method } from "../http/method.js";
import {
  type EncodedRequestHead,
  encodeRequestHead,
  writeRequest,
} from "../http/request-encoder.js";
import { Request } from "../http/request.js";
import type { Response } from "../http/response.js";
import { connectHost } from "../http/uri.js";
import type { Version } from "../http/version.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { ISocketFactory } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger, filteredLogger } from "../logging/logger.js";
import { Transport } from "../transport/transport.js";
import { EventEmitter } from "../utils/event-emitter.js";

export interface HttpClientOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config?: Partial<ClientConfig>;
  logger?: Logger;
}

export interface RequestOptions {
  headers?: HeaderInit;
  body?: Body;
  /** Overrides the client's configured version for this request. */
  version?: Version;
}

export type HttpClientEvents = {
  request: [request: Request];
  response: [response: Response, request: Request];
  /** `request` is absent when the request could not be built. */
  error: [error: Error, request: Request | undefined];
};

export class HttpClient extends EventEmitter<HttpClientEvents> {
  private readonly fileSystem: IFileSystem;
  private readonly config: ClientConfig;
  private readonly logger: Logger;
  private readonly transport: Transport;

  constructor(options: HttpClientOptions) {
    super();
    this.fileSystem = options.fileSystem;
    this.config = { ...defaultConfig(), ...options.config };
    this.logger = options.logger ?? filteredLogger("warn", basicLogger());
    this.transport = new Transport({
      socketFactory: options.socketFactory,
      connectTimeoutMs: this.config.connectTimeoutMs,
      socketOptions: {
        noDelay: this.config.noDelay,
        localAddress: this.config.localAddress,
      },
      logger: this.logger,
    });
  }

  /**
   * Run one exchange on a fresh connection. Requests that cannot be framed
   * are rejected before connecting; the connection is closed on every path.
   */
  async send(request: Request): Promise<Response> {
    const target = `${request.method} ${request.uri.href}`;
    let encoded: EncodedRequestHead;
    try {
      encoded = encodeRequestHead(request);
    } catch (err) {
      throw this.failed(err, target, request);
    }
    const startedAt = Date.now();

    this.emit("request", request);

    try {
      const connection = await this.transport.connect(
        connectHost(request.uri),
        request.uri.port,
      );
      let response: Response;
      try {
        await writeRequest(request, connection, encoded);
        response = await connection.receive({
          requestMethod: request.method,
          timeoutMs: this.config.readTimeoutMs,
          maxHeaderSize: this.config.maxHeaderSize,
          maxBodySize: this.config.maxBodySize,
        });
      } finally {
        connection.close();
      }

      if (!this.config.quiet) {
        this.logger.info(
          `${target} -> ${response.status.code} (${Date.now() - startedAt}ms)`,
        );
      }
      this.emit("response", response, request);
      return response;
    } catch (err) {
      throw this.failed(err, target, request);
    }
  }

  /** Build a request from parts and send it. */
  async request(
    method: Method | string,
    uri: string,
    options?: RequestOptions,
  ): Promise<Response> {
    let request: Request;
    try {
      const headers = HeaderMap.from(options?.headers);
      if (this.config.userAgent && !headers.has("user-agent")) {
        headers.append("User-Agent", this.config.userAgent);
      }

      request = Request.builder()
        .method(method)
        .uri(uri)
        .version(options?.version ?? this.config.version)
        .replaceHeaders(headers)
        .body(options?.body);
    } catch (err) {
      throw this.failed(err, `${method} ${uri}`, undefined);
    }
    return this.send(request);
  }

  /** Log and announce a failed call; returns `err` for rethrowing. */
  private failed(
    err: unknown,
    target: string,
    request: Request | undefined,
  ): unknown {
    if (err instanceof Error) {
      const code = isHttpClientError(err) ? err.code : err.name;
      this.logger.warn(`${target} failed: ${code}`, err.message);
      this.emit("error", err, request);
    }
    return err;
  }

  get(uri: string, options?: RequestOptions): Promise<Response> {
    return this.request(Method.GET, uri, options);
  }

  post(uri: string, options?: RequestOptions): Promise<Response> {
    return this.request(Method.POST, uri, options);
  }

  put(uri: string, options?: RequestOptions): Promise<Response> {
    return this.request(Method.PUT, uri, options);
  }

  delete(uri: string, options?: RequestOptions): Promise<Response> {
    return this.request(Method.DELETE, uri, options);
  }

  head(uri: string, options?: RequestOptions): Promise<Response> {
    return this.request(Method.HEAD, uri, options);
  }

  patch(uri: string, options?: RequestOptions): Promise<Response> {
    return this.request(Method.PATCH, uri, options);
  }

  options(uri: string, options?: RequestOptions): Promise<Response> {
    return this.request(Method.OPTIONS, uri, options);
  }

  trace(uri: string, options?: RequestOptions): Promise<Response> {
    return this.request(Method.TRACE, uri, options);
  }

  connect(uri: string, options?: RequestOptions): Promise<Response> {
    return this.request(Method.CONNECT, uri, options);
  }

  /** A body that streams `path` from this client's filesystem. */
  fileBody(path: string): Promise<Body> {
    return Body.fromFile(path, this.fileSystem);
  }
}
