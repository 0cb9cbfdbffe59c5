import * as net from "node:net";
import type {
  ISocketFactory,
  ITcpSocket,
  TcpSocketOptions,
} from "../../interfaces/socket.js";

export class NodeTcpSocket implements ITcpSocket {
  private socket: net.Socket;

  constructor(
    private readonly options: TcpSocketOptions = {},
    socket?: net.Socket,
  ) {
    this.socket = socket ?? new net.Socket();
  }

  connect(port: number, host: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        reject(err);
      };

      this.socket.once("error", onError);
      this.socket.connect(
        { port, host, localAddress: this.options.localAddress },
        () => {
          this.socket.off("error", onError);
          if (this.options.noDelay) {
            this.socket.setNoDelay(true);
          }
          resolve();
        },
      );
    });
  }

  send(data: Uint8Array): void {
    if (this.socket.destroyed || !this.socket.writable) {
      return;
    }
    this.socket.write(data);
  }

  sendAndWait(data: Uint8Array): Promise<void> {
    if (this.socket.destroyed || !this.socket.writable) {
      return Promise.reject(new Error("Socket is not writable"));
    }

    return new Promise((resolve, reject) => {
      let settled = false;

      const done = () => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve();
      };

      const fail = (err: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(err);
      };

      const onDrain = () => done();
      const onClose = () => fail(new Error("Socket closed during write"));
      const onError = (err: Error) => fail(err);

      const cleanup = () => {
        this.socket.off("drain", onDrain);
        this.socket.off("close", onClose);
        this.socket.off("error", onError);
      };

      this.socket.once("close", onClose);
      this.socket.once("error", onError);

      try {
        const accepted = this.socket.write(data);
        if (accepted) {
          done();
        } else {
          this.socket.once("drain", onDrain);
        }
      } catch (err) {
        fail(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.socket.on("data", (data: Buffer) => {
      cb(new Uint8Array(data));
    });
  }

  onClose(cb: (hadError: boolean) => void): void {
    this.socket.on("close", cb);
  }

  onError(cb: (err: Error) => void): void {
    this.socket.on("error", cb);
  }

  close(): void {
    this.socket.destroy();
  }
}

export class NodeSocketFactory implements ISocketFactory {
  async createTcpSocket(options?: TcpSocketOptions): Promise<ITcpSocket> {
    return new NodeTcpSocket(options);
  }
}
