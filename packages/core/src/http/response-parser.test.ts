import { describe, expect, it } from "vitest";
import type { ITcpSocket } from "../interfaces/socket.js";
import { decodeToString, fromString } from "../utils/buffer.js";
import { HeaderMap } from "./header-map.js";
import { Method } from "./method.js";
import {
  createHttpResponseParser,
  decideBodyFraming,
  decodeResponse,
  type HttpResponseHead,
} from "./response-parser.js";
import { StatusCode } from "./status-code.js";
import { Version } from "./version.js";

function decode(raw: string, requestMethod?: Method) {
  return decodeResponse(fromString(raw), { requestMethod });
}

function head(code: number, headers: Record<string, string>): HttpResponseHead {
  return {
    version: Version.HTTP_11,
    status: StatusCode.from(code),
    reason: "",
    headers: HeaderMap.from(headers),
  };
}

/** Create a mock socket that delivers chunks one tick apart and then closes */
function chunkedMockSocket(chunks: string[]): ITcpSocket {
  let dataCallback: ((data: Uint8Array) => void) | null = null;
  let closeCallback: ((hadError: boolean) => void) | null = null;

  return {
    connect: async () => {},
    send() {},
    onData(cb) {
      dataCallback = cb;
      let delay = 0;
      for (const chunk of chunks) {
        const c = chunk;
        setTimeout(() => dataCallback?.(fromString(c)), delay);
        delay += 5;
      }
    },
    onClose(cb) {
      closeCallback = cb;
      setTimeout(() => closeCallback?.(false), chunks.length * 5 + 10);
    },
    onError() {},
    close() {},
  };
}

describe("decodeResponse", () => {
  it("decodes a chunked body", async () => {
    const response = await decode(
      "HTTP/1.1 200 OK\r\nTransfer-Encoding: chunked\r\n\r\n" +
        "4\r\nWiki\r\n5\r\npedia\r\n0\r\n\r\n",
    );

    expect(response.status.code).toBe(200);
    expect(response.text()).toBe("Wikipedia");
  });

  it("decodes a 404 with an empty body", async () => {
    const response = await decode(
      "HTTP/1.1 404 Not Found\r\nContent-Length: 0\r\n\r\n",
    );

    expect(response.status.code).toBe(404);
    expect(response.reason).toBe("Not Found");
    expect(response.bytes().length).toBe(0);
    expect(response.ok).toBe(false);
  });

  it("ignores the length indicator of a HEAD response", async () => {
    const response = await decode(
      "HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\n",
      Method.HEAD,
    );

    expect(response.status.code).toBe(200);
    expect(response.bytes().length).toBe(0);
    expect(response.headers.get("content-length")).toBe("5");
  });

  it("reads a close-delimited body", async () => {
    const response = await decode("HTTP/1.1 200 OK\r\n\r\nOK");

    expect(response.text()).toBe("OK");
  });

  it("reads exactly Content-Length bytes", async () => {
    const response = await decode(
      "HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\nhello world",
    );

    expect(response.text()).toBe("hello");
  });

  it("prefers chunked framing over Content-Length", async () => {
    const response = await decode(
      "HTTP/1.1 200 OK\r\nContent-Length: 100\r\n" +
        "Transfer-Encoding: chunked\r\n\r\n3\r\nabc\r\n0\r\n\r\n",
    );

    expect(response.text()).toBe("abc");
  });

  it("keeps header order, case and repeated fields", async () => {
    const response = await decode(
      "HTTP/1.1 200 OK\r\nSet-Cookie: a=1\r\nX-Trace:  abc \r\n" +
        "set-cookie: b=2\r\nContent-Length: 0\r\n\r\n",
    );

    expect(response.headers.getAll("Set-Cookie")).toEqual(["a=1", "b=2"]);
    expect(response.headers.get("x-trace")).toBe("abc");
    expect(response.headers.names()).toEqual([
      "Set-Cookie",
      "X-Trace",
      "Content-Length",
    ]);
  });

  it("accepts a status line without a reason phrase", async () => {
    const response = await decode("HTTP/1.0 204\r\n\r\n");

    expect(response.version).toBe(Version.HTTP_10);
    expect(response.status.code).toBe(204);
    expect(response.reason).toBe("");
  });

  it("skips interim responses", async () => {
    const response = await decode(
      "HTTP/1.1 100 Continue\r\n\r\n" +
        "HTTP/1.1 201 Created\r\nContent-Length: 2\r\n\r\nid",
    );

    expect(response.status.code).toBe(201);
    expect(response.text()).toBe("id");
  });

  it("returns 101 without reading a body", async () => {
    const response = await decode(
      "HTTP/1.1 101 Switching Protocols\r\nUpgrade: websocket\r\n\r\nframes",
    );

    expect(response.status.code).toBe(101);
    expect(response.bytes().length).toBe(0);
  });

  it("reports keep-alive offers per version", async () => {
    const persistent = await decode("HTTP/1.1 204 No Content\r\n\r\n");
    const closing = await decode(
      "HTTP/1.1 204 No Content\r\nConnection: Close\r\n\r\n",
    );
    const legacy = await decode("HTTP/1.0 204 No Content\r\n\r\n");
    const legacyKeepAlive = await decode(
      "HTTP/1.0 204 No Content\r\nConnection: keep-alive\r\n\r\n",
    );

    expect(persistent.keepAlive).toBe(true);
    expect(closing.keepAlive).toBe(false);
    expect(legacy.keepAlive).toBe(false);
    expect(legacyKeepAlive.keepAlive).toBe(true);
  });

  it("fails a truncated chunked body", async () => {
    await expect(
      decode(
        "HTTP/1.1 200 OK\r\nTransfer-Encoding: chunked\r\n\r\n4\r\nWi",
      ),
    ).rejects.toMatchObject({ code: "UNEXPECTED_EOF" });
  });

  it("fails a body shorter than Content-Length", async () => {
    await expect(
      decode("HTTP/1.1 200 OK\r\nContent-Length: 10\r\n\r\nshort"),
    ).rejects.toMatchObject({
      code: "UNEXPECTED_EOF",
      message: "Connection closed before the response was complete",
    });
  });

  it("fails on an empty stream", async () => {
    await expect(decode("")).rejects.toMatchObject({
      code: "CONNECTION_CLOSED",
    });
  });

  it.each([
    ["HTTP/2 200 OK\r\n\r\n"],
    ["HTTP/1.1 20 OK\r\n\r\n"],
    ["HTTP/1.1  200 OK\r\n\r\n"],
    ["garbage\r\n\r\n"],
  ])("rejects the status line of %j", async (raw) => {
    await expect(decode(raw)).rejects.toMatchObject({
      code: "MALFORMED_STATUS_LINE",
    });
  });

  it("rejects status codes outside 100-599", async () => {
    await expect(decode("HTTP/1.1 700 Odd\r\n\r\n")).rejects.toMatchObject({
      code: "INVALID_STATUS_CODE",
    });
  });

  it("classifies invalid received fields as protocol errors", async () => {
    await expect(decode("HTTP/1.1 600 Weird\r\n\r\n")).rejects.toMatchObject({
      code: "INVALID_STATUS_CODE",
      category: "protocol",
    });
    await expect(
      decode("HTTP/1.1 200 OK\r\nBad Name: x\r\n\r\n"),
    ).rejects.toMatchObject({
      code: "INVALID_HEADER_NAME",
      category: "protocol",
    });
    await expect(
      decode("HTTP/1.1 200 OK\r\nX-Nul: a\0b\r\n\r\n"),
    ).rejects.toMatchObject({
      code: "INVALID_HEADER_VALUE",
      category: "protocol",
    });
  });

  it("rejects folded and colon-less header lines", async () => {
    await expect(
      decode("HTTP/1.1 200 OK\r\nX-A: 1\r\n continued\r\n\r\n"),
    ).rejects.toMatchObject({ code: "MALFORMED_HEADER_LINE" });
    await expect(
      decode("HTTP/1.1 200 OK\r\nNoColonHere\r\n\r\n"),
    ).rejects.toMatchObject({ code: "MALFORMED_HEADER_LINE" });
  });

  it("rejects an oversized header block", async () => {
    const raw = `HTTP/1.1 200 OK\r\nX-Big: ${"a".repeat(200)}\r\n\r\n`;

    await expect(
      decodeResponse(fromString(raw), { maxHeaderSize: 100 }),
    ).rejects.toMatchObject({
      code: "MALFORMED_HEADER_LINE",
      message: "Header block exceeds 100 bytes",
    });
  });

  it("rejects invalid and conflicting Content-Length values", async () => {
    await expect(
      decode("HTTP/1.1 200 OK\r\nContent-Length: -1\r\n\r\n"),
    ).rejects.toMatchObject({ code: "INVALID_CONTENT_LENGTH" });
    await expect(
      decode("HTTP/1.1 200 OK\r\nContent-Length: 3\r\nContent-Length: 4\r\n\r\nabcd"),
    ).rejects.toMatchObject({
      code: "INVALID_CONTENT_LENGTH",
      message: "Conflicting Content-Length values: 3, 4",
    });
  });

  it("accepts repeated Content-Length values that agree", async () => {
    const response = await decode(
      "HTTP/1.1 200 OK\r\nContent-Length: 3, 3\r\n\r\nabc",
    );

    expect(response.text()).toBe("abc");
  });

  it("enforces the body size limit", async () => {
    await expect(
      decodeResponse(
        fromString("HTTP/1.1 200 OK\r\nContent-Length: 11\r\n\r\nhello world"),
        { maxBodySize: 10 },
      ),
    ).rejects.toMatchObject({
      code: "BODY_TOO_LARGE",
      message: "Response body exceeds 10 bytes",
    });
    await expect(
      decodeResponse(fromString("HTTP/1.1 200 OK\r\n\r\nhello world"), {
        maxBodySize: 10,
      }),
    ).rejects.toMatchObject({ code: "BODY_TOO_LARGE" });
  });
});

describe("decideBodyFraming", () => {
  it("treats 1xx, 204 and 304 as bodiless", () => {
    for (const code of [100, 204, 304]) {
      expect(decideBodyFraming(head(code, { "Content-Length": "5" }))).toEqual({
        type: "none",
      });
    }
  });

  it("picks chunked, then length, then close", () => {
    expect(
      decideBodyFraming(head(200, { "Transfer-Encoding": "gzip, chunked" })),
    ).toEqual({ type: "chunked" });
    expect(decideBodyFraming(head(200, { "Content-Length": "42" }))).toEqual({
      type: "length",
      length: 42,
    });
    expect(decideBodyFraming(head(200, {}))).toEqual({ type: "close" });
  });
});

describe("createHttpResponseParser", () => {
  it("reads a response delivered in pieces by a socket", async () => {
    const socket = chunkedMockSocket([
      "HTTP/1.1 200 OK\r\nTransfer-",
      "Encoding: chunked\r\n\r\n4\r\nWi",
      "ki\r\n5\r\npedia\r\n0\r\n\r\n",
    ]);
    const parser = createHttpResponseParser(socket);
    const response = await parser.readResponse();

    expect(decodeToString(response.bytes())).toBe("Wikipedia");
  });

  it("reads a close-delimited body until the socket closes", async () => {
    const socket = chunkedMockSocket(["HTTP/1.0 200 OK\r\n\r\nO", "K"]);
    const parser = createHttpResponseParser(socket);
    const response = await parser.readResponse();

    expect(response.text()).toBe("OK");
  });
});
