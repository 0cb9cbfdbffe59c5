import type {
  ISocketFactory,
  ITcpSocket,
  TcpSocketOptions,
} from "../interfaces/socket.js";

export type ConnectionHandler = (socket: InMemoryTcpSocket) => void;

type Dialer = (
  socket: InMemoryTcpSocket,
  port: number,
  host: string,
) => Promise<void>;

export class InMemoryTcpSocket implements ITcpSocket {
  private peer: InMemoryTcpSocket | null = null;
  private closed = false;
  private dataCallbacks: Array<(data: Uint8Array) => void> = [];
  private closeCallbacks: Array<(hadError: boolean) => void> = [];
  private errorCallbacks: Array<(err: Error) => void> = [];
  // Data that arrived before anyone listened, as a paused stream holds it.
  private pending: Uint8Array[] = [];
  private readonly sent: Uint8Array[] = [];

  constructor(private readonly dialer?: Dialer) {}

  static link(client: InMemoryTcpSocket, server: InMemoryTcpSocket): void {
    client.peer = server;
    server.peer = client;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Bytes this side has sent, in order. */
  get sentChunks(): readonly Uint8Array[] {
    return this.sent;
  }

  connect(port: number, host: string): Promise<void> {
    if (!this.dialer || this.peer) {
      return Promise.reject(new Error("Socket cannot connect"));
    }
    return this.dialer(this, port, host);
  }

  send(data: Uint8Array): void {
    if (this.closed || !this.peer) {
      return;
    }

    const copy = data.slice();
    this.sent.push(copy);
    const peer = this.peer;
    queueMicrotask(() => peer.emitData(copy));
  }

  sendAndWait(data: Uint8Array): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error("write EPIPE"));
    }
    this.send(data);
    return Promise.resolve();
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.dataCallbacks.push(cb);
    const pending = this.pending;
    this.pending = [];
    for (const data of pending) {
      cb(data);
    }
  }

  onClose(cb: (hadError: boolean) => void): void {
    if (this.closed) {
      queueMicrotask(() => cb(false));
      return;
    }
    this.closeCallbacks.push(cb);
  }

  onError(cb: (err: Error) => void): void {
    this.errorCallbacks.push(cb);
  }

  close(): void {
    this.closeInternal(false);
  }

  /** Reset the connection: the peer sees `err` followed by a close. */
  abort(err: Error = new Error("read ECONNRESET")): void {
    const peer = this.peer;
    if (this.closed || !peer) return;
    queueMicrotask(() => peer.emitError(err));
    this.closeInternal(false);
  }

  private emitData(data: Uint8Array): void {
    if (this.closed) return;
    if (this.dataCallbacks.length === 0) {
      this.pending.push(data);
      return;
    }
    for (const cb of this.dataCallbacks) {
      cb(data);
    }
  }

  private emitError(err: Error): void {
    if (this.closed) return;
    for (const cb of this.errorCallbacks) {
      cb(err);
    }
  }

  private closeInternal(fromPeer: boolean): void {
    if (this.closed) return;
    this.closed = true;

    for (const cb of this.closeCallbacks) {
      cb(false);
    }

    const peer = this.peer;
    if (!fromPeer && peer) {
      // Queued behind any data already sent, so the peer reads it first.
      queueMicrotask(() => peer.closeInternal(true));
    }
  }
}

/**
 * Socket factory whose connections stay in process. Tests register
 * listeners per port; connecting anywhere else is refused.
 */
export class InMemorySocketFactory implements ISocketFactory {
  private readonly listeners = new Map<string, ConnectionHandler>();
  private readonly blackholes = new Set<string>();
  readonly sockets: InMemoryTcpSocket[] = [];
  readonly socketOptions: TcpSocketOptions[] = [];

  /** Accept connections to `port`, on `host` or on any host when omitted. */
  listen(port: number, handler: ConnectionHandler, host = "*"): void {
    this.listeners.set(key(host, port), handler);
  }

  /** Connections to `port` never complete. */
  blackhole(port: number, host = "*"): void {
    this.blackholes.add(key(host, port));
  }

  unlisten(port: number, host = "*"): void {
    this.listeners.delete(key(host, port));
    this.blackholes.delete(key(host, port));
  }

  async createTcpSocket(options?: TcpSocketOptions): Promise<ITcpSocket> {
    this.socketOptions.push(options ?? {});
    const socket = new InMemoryTcpSocket((client, port, host) =>
      this.dial(client, port, host),
    );
    this.sockets.push(socket);
    return socket;
  }

  private dial(
    client: InMemoryTcpSocket,
    port: number,
    host: string,
  ): Promise<void> {
    if (
      this.blackholes.has(key(host, port)) ||
      this.blackholes.has(key("*", port))
    ) {
      return new Promise<void>(() => {});
    }

    const handler =
      this.listeners.get(key(host, port)) ?? this.listeners.get(key("*", port));
    if (!handler) {
      return Promise.reject(new Error(`connect ECONNREFUSED ${host}:${port}`));
    }

    const server = new InMemoryTcpSocket();
    InMemoryTcpSocket.link(client, server);
    // The peer accepts on a later turn, after the client has attached its
    // listeners.
    setImmediate(() => handler(server));
    return Promise.resolve();
  }
}

function key(host: string, port: number): string {
  return `${host}:${port}`;
}
