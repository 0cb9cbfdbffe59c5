/**
 * Abstract Socket Interfaces
 *
 * These interfaces decouple the client from any specific runtime. The
 * transport only needs an outbound byte stream: connect, write, receive
 * data/close/error events, and close.
 */

export interface ITcpSocket {
  /**
   * Connect to a remote peer. Rejects on refusal, unreachable hosts and
   * name resolution failures.
   */
  connect(port: number, host: string): Promise<void>;

  /** Send data to the remote peer. */
  send(data: Uint8Array): void;

  /**
   * Send data and resolve when it has been accepted without backpressure.
   * Implementations can use this to expose drain-aware writes for streaming.
   */
  sendAndWait?(data: Uint8Array): Promise<void>;

  /** Register a callback for incoming data. */
  onData(cb: (data: Uint8Array) => void): void;

  /** Register a callback for connection close. */
  onClose(cb: (hadError: boolean) => void): void;

  /** Register a callback for errors. */
  onError(cb: (err: Error) => void): void;

  /** Close the connection. */
  close(): void;
}

export interface TcpSocketOptions {
  /** Disable Nagle's algorithm. */
  noDelay?: boolean;
  /** Local interface address to bind before connecting. */
  localAddress?: string;
}

export interface ISocketFactory {
  /** Create a new, unconnected TCP socket. */
  createTcpSocket(options?: TcpSocketOptions): Promise<ITcpSocket>;
}
