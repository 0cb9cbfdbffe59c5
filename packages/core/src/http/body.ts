import { HttpClientError, wrapError } from "../errors.js";
import type { IFileHandle, IFileSystem } from "../interfaces/filesystem.js";
import { decodeToString, fromString } from "../utils/buffer.js";

const FILE_CHUNK_SIZE = 64 * 1024; // 64KB chunks

/** Destination of body bytes. Resolves once the chunk has been accepted. */
export interface ByteSink {
  write(chunk: Uint8Array): Promise<void>;
}

export type BodySource =
  | { kind: "empty" }
  | { kind: "bytes"; bytes: Uint8Array }
  | { kind: "file"; path: string; size: number; fs: IFileSystem }
  | { kind: "stream"; chunks: AsyncIterable<Uint8Array> };

export type BodyKind = BodySource["kind"];

const EMPTY = new Uint8Array(0);

export class Body {
  private consumed = false;

  private constructor(private readonly source: BodySource) {}

  static empty(): Body {
    return new Body({ kind: "empty" });
  }

  static fromBytes(bytes: Uint8Array): Body {
    if (bytes.length === 0) return Body.empty();
    return new Body({ kind: "bytes", bytes: bytes.slice() });
  }

  static fromString(text: string): Body {
    return Body.fromBytes(fromString(text));
  }

  /**
   * A body backed by a file. The size is read now; the content is read in
   * chunks when the body is written.
   */
  static async fromFile(path: string, fs: IFileSystem): Promise<Body> {
    let size: number;
    try {
      const stat = await fs.stat(path);
      if (!stat.isFile) {
        throw new HttpClientError("IO_ERROR", `Not a regular file: ${path}`);
      }
      size = stat.size;
    } catch (err) {
      throw wrapError(err, "IO_ERROR", `Cannot read ${path}`);
    }
    return new Body({ kind: "file", path, size, fs });
  }

  /** A single-pass body of unknown length; sent with chunked framing. */
  static fromStream(chunks: AsyncIterable<Uint8Array>): Body {
    return new Body({ kind: "stream", chunks });
  }

  get kind(): BodyKind {
    return this.source.kind;
  }

  knownLength(): number | undefined {
    switch (this.source.kind) {
      case "empty":
        return 0;
      case "bytes":
        return this.source.bytes.length;
      case "file":
        return this.source.size;
      case "stream":
        return undefined;
    }
  }

  /**
   * A copy of the in-memory content, for the kinds that hold one. Response
   * bodies are always in memory.
   */
  bytes(): Uint8Array {
    return this.inMemory().slice();
  }

  text(): string {
    return decodeToString(this.inMemory());
  }

  /**
   * Stream the content into `sink`. A rejection may leave the sink with a
   * partial body.
   */
  async writeTo(sink: ByteSink): Promise<void> {
    switch (this.source.kind) {
      case "empty":
        return;
      case "bytes":
        await sink.write(this.source.bytes);
        return;
      case "file":
        await writeFile(
          this.source.fs,
          this.source.path,
          this.source.size,
          sink,
        );
        return;
      case "stream":
        if (this.consumed) {
          throw new HttpClientError(
            "IO_ERROR",
            "Stream body has already been consumed",
          );
        }
        this.consumed = true;
        try {
          for await (const chunk of this.source.chunks) {
            if (chunk.length > 0) await sink.write(chunk);
          }
        } catch (err) {
          throw wrapError(err, "IO_ERROR", "Reading stream body failed");
        }
        return;
    }
  }

  private inMemory(): Uint8Array {
    switch (this.source.kind) {
      case "empty":
        return EMPTY;
      case "bytes":
        return this.source.bytes;
      default:
        throw new HttpClientError(
          "IO_ERROR",
          `A ${this.source.kind} body has no in-memory content`,
        );
    }
  }
}

async function writeFile(
  fs: IFileSystem,
  path: string,
  size: number,
  sink: ByteSink,
): Promise<void> {
  let handle: IFileHandle;
  try {
    handle = await fs.open(path);
  } catch (err) {
    throw wrapError(err, "IO_ERROR", `Cannot open ${path}`);
  }

  try {
    const buffer = new Uint8Array(Math.min(FILE_CHUNK_SIZE, Math.max(size, 1)));
    let position = 0;

    while (position < size) {
      const toRead = Math.min(buffer.length, size - position);
      let bytesRead: number;
      try {
        ({ bytesRead } = await handle.read(buffer, 0, toRead, position));
      } catch (err) {
        throw wrapError(err, "IO_ERROR", `Reading ${path} failed`);
      }
      if (bytesRead === 0) {
        throw new HttpClientError(
          "IO_ERROR",
          `${path} ended at ${position} bytes, expected ${size}`,
        );
      }

      // The sink may hold on to the chunk; hand it a copy.
      await sink.write(buffer.slice(0, bytesRead));
      position += bytesRead;
    }
  } finally {
    await handle.close();
  }
}
