import { HttpClientError, wrapError } from "../errors.js";
import type { ByteSink } from "../http/body.js";
import {
  createHttpResponseParser,
  type HttpResponseStreamParser,
  type ParseHttpResponseOptions,
} from "../http/response-parser.js";
import type { Response } from "../http/response.js";
import type {
  ISocketFactory,
  ITcpSocket,
  TcpSocketOptions,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";

export interface TransportOptions {
  socketFactory: ISocketFactory;
  /** 0 waits forever. */
  connectTimeoutMs?: number;
  socketOptions?: TcpSocketOptions;
  logger?: Logger;
}

/**
 * One open byte stream to a peer, good for a single request/response
 * exchange. Always `close()` it, whatever the outcome.
 */
export class Connection implements ByteSink {
  private readonly parser: HttpResponseStreamParser;
  private closed = false;
  private peerClosed = false;

  constructor(
    private readonly socket: ITcpSocket,
    readonly host: string,
    readonly port: number,
    private readonly logger: Logger,
  ) {
    // Listen before anything is sent so no early byte is missed.
    this.parser = createHttpResponseParser(socket);
    socket.onClose(() => {
      this.peerClosed = true;
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Write all of `data`, waiting for the socket to accept it. */
  async write(data: Uint8Array): Promise<void> {
    if (this.closed || this.peerClosed) {
      throw new HttpClientError(
        "IO_ERROR",
        `Connection to ${this.host}:${this.port} is closed`,
      );
    }

    try {
      if (this.socket.sendAndWait) {
        await this.socket.sendAndWait(data);
      } else {
        this.socket.send(data);
      }
    } catch (err) {
      throw wrapError(err, "IO_ERROR", `Write to ${this.host}:${this.port} failed`);
    }
  }

  /** Read until one response is completely framed. */
  async receive(options?: ParseHttpResponseOptions): Promise<Response> {
    const response = await this.parser.readResponse(options);
    this.logger.debug(
      `Received ${response.status.code} from ${this.host}:${this.port}`,
    );
    return response;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.socket.close();
    this.logger.debug(`Closed connection to ${this.host}:${this.port}`);
  }
}

export class Transport {
  private readonly socketFactory: ISocketFactory;
  private readonly connectTimeoutMs: number;
  private readonly socketOptions: TcpSocketOptions;
  private readonly logger: Logger;

  constructor(options: TransportOptions) {
    this.socketFactory = options.socketFactory;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 0;
    this.socketOptions = options.socketOptions ?? {};
    this.logger = options.logger ?? basicLogger();
  }

  async connect(host: string, port: number): Promise<Connection> {
    let socket: ITcpSocket;
    try {
      socket = await this.socketFactory.createTcpSocket(this.socketOptions);
    } catch (err) {
      throw wrapError(err, "CONNECTION_ERROR", "Cannot create socket");
    }

    this.logger.debug(`Connecting to ${host}:${port}`);
    try {
      await withTimeout(
        socket.connect(port, host),
        this.connectTimeoutMs,
        () =>
          new HttpClientError(
            "TIMEOUT",
            `Connecting to ${host}:${port} timed out after ${this.connectTimeoutMs}ms`,
          ),
      );
    } catch (err) {
      socket.close();
      throw wrapError(err, "CONNECTION_ERROR", `Cannot connect to ${host}:${port}`);
    }

    return new Connection(socket, host, port, this.logger);
  }
}

function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  if (timeoutMs <= 0) return promise;

  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
