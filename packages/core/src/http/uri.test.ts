import { describe, expect, it } from "vitest";
import { connectHost, hostHeader, parseUri, requestTarget } from "./uri.js";

describe("parseUri", () => {
  it("parses host, port, path and query", () => {
    const uri = parseUri("http://example.com:8080/search?q=wire&lang=en");

    expect(uri.host).toBe("example.com");
    expect(uri.port).toBe(8080);
    expect(uri.path).toBe("/search");
    expect(uri.query).toBe("q=wire&lang=en");
    expect(requestTarget(uri)).toBe("/search?q=wire&lang=en");
  });

  it("defaults the port to 80 and the path to /", () => {
    const uri = parseUri("http://example.com");

    expect(uri.port).toBe(80);
    expect(uri.path).toBe("/");
    expect(uri.query).toBeUndefined();
    expect(requestTarget(uri)).toBe("/");
  });

  it("adds the port to the Host value only when it is not 80", () => {
    expect(hostHeader(parseUri("http://example.com:80/"))).toBe("example.com");
    expect(hostHeader(parseUri("http://127.0.0.1:8080/"))).toBe(
      "127.0.0.1:8080",
    );
  });

  it("strips IPv6 brackets for connecting but not for Host", () => {
    const uri = parseUri("http://[::1]:9000/");

    expect(hostHeader(uri)).toBe("[::1]:9000");
    expect(connectHost(uri)).toBe("::1");
  });

  it("drops the fragment", () => {
    const uri = parseUri("http://example.com/page#section");

    expect(requestTarget(uri)).toBe("/page");
  });

  it.each([
    ["https://example.com/", "Unsupported scheme https in https://example.com/"],
    ["ftp://example.com/", "Unsupported scheme ftp in ftp://example.com/"],
    ["/relative/path", "Invalid URI: /relative/path"],
    ["not a uri", "Invalid URI: not a uri"],
  ])("rejects %s", (input, message) => {
    let caught: unknown;
    try {
      parseUri(input);
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({ code: "INVALID_URI", message });
  });
});
