import { HttpClientError, wrapError } from "../errors.js";
import { CRLF, concat, decodeLatin1, findSequence } from "../utils/buffer.js";

const EMPTY = new Uint8Array(0);

/**
 * Pull-style reader over bytes that arrive in pieces. Producers `push()`
 * data and eventually `end()` or `fail()`; consumers await exactly what
 * they need and never more, so the same parsing code runs against a
 * socket or an in-memory buffer.
 */
export class ByteReader {
  private chunks: Uint8Array[] = [];
  private buffered = 0;
  private received = 0;
  private ended = false;
  private failure: unknown = null;
  private deadline = Number.POSITIVE_INFINITY;
  private waiters: Array<() => void> = [];

  /** Total bytes pushed so far, consumed or not. */
  get bytesReceived(): number {
    return this.received;
  }

  get isEnded(): boolean {
    return this.ended;
  }

  push(data: Uint8Array): void {
    if (this.ended || data.length === 0) return;
    this.chunks.push(data);
    this.buffered += data.length;
    this.received += data.length;
    this.notifyWaiters();
  }

  end(): void {
    this.ended = true;
    this.notifyWaiters();
  }

  fail(err: unknown): void {
    if (this.ended) return;
    this.failure = err;
    this.ended = true;
    this.notifyWaiters();
  }

  /**
   * Bound every following read by `timeoutMs` from now. 0 removes the
   * bound.
   */
  setTimeout(timeoutMs: number): void {
    this.deadline =
      timeoutMs > 0 ? Date.now() + timeoutMs : Number.POSITIVE_INFINITY;
  }

  /**
   * Read one CRLF-terminated line, without the CRLF. Fails with the error
   * from `tooLong` once more than `limit` bytes arrive without a CRLF.
   */
  async readLine(
    limit: number,
    tooLong: () => HttpClientError,
  ): Promise<string> {
    while (true) {
      const buffer = this.flatten();
      const index = findSequence(buffer, CRLF);
      if (index !== -1) {
        if (index > limit) throw tooLong();
        const line = decodeLatin1(buffer.subarray(0, index));
        this.take(index + CRLF.length);
        return line;
      }
      // One extra byte may be the CR of a CRLF split across reads.
      if (buffer.length > limit + 1) throw tooLong();

      await this.waitForMore();
    }
  }

  async readExact(length: number): Promise<Uint8Array> {
    while (this.buffered < length) {
      await this.waitForMore();
    }
    return this.take(length);
  }

  /**
   * Read until the producer ends. Fails with the error from `tooLarge` as
   * soon as more than `maxBytes` are buffered (0 disables the limit).
   */
  async readToEnd(
    maxBytes: number,
    tooLarge: () => HttpClientError,
  ): Promise<Uint8Array> {
    while (true) {
      if (maxBytes > 0 && this.buffered > maxBytes) throw tooLarge();
      if (this.ended) {
        if (this.failure !== null) throw this.failureError();
        return this.take(this.buffered);
      }
      await this.waitForMore();
    }
  }

  private async waitForMore(): Promise<void> {
    if (this.ended) {
      if (this.failure !== null) throw this.failureError();
      throw this.eofError();
    }

    const hadActivity = await this.waitForActivity(this.deadline - Date.now());
    if (!hadActivity) {
      throw new HttpClientError(
        "TIMEOUT",
        this.received === 0
          ? "Timed out waiting for a response"
          : "Timed out before the response was complete",
      );
    }
  }

  private eofError(): HttpClientError {
    if (this.received === 0) {
      return new HttpClientError(
        "CONNECTION_CLOSED",
        "Connection closed before any response was received",
      );
    }
    return new HttpClientError(
      "UNEXPECTED_EOF",
      "Connection closed before the response was complete",
    );
  }

  private failureError(): HttpClientError {
    return wrapError(this.failure, "IO_ERROR", "Connection failed");
  }

  private flatten(): Uint8Array {
    if (this.chunks.length > 1) {
      this.chunks = [concat(this.chunks)];
    }
    return this.chunks[0] ?? EMPTY;
  }

  private take(length: number): Uint8Array {
    if (length === 0) return EMPTY;

    const out = new Uint8Array(length);
    let position = 0;
    while (position < length) {
      const head = this.chunks[0];
      const want = length - position;
      if (head.length <= want) {
        out.set(head, position);
        position += head.length;
        this.chunks.shift();
      } else {
        out.set(head.subarray(0, want), position);
        position += want;
        this.chunks[0] = head.subarray(want);
      }
    }
    this.buffered -= length;
    return out;
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        if (timer !== undefined) clearTimeout(timer);
        resolve(true);
      };

      if (Number.isFinite(timeoutMs)) {
        timer = setTimeout(() => {
          if (settled) return;
          settled = true;
          this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
          resolve(false);
        }, timeoutMs);
      }

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
