// Client
export type {
  HttpClientEvents,
  HttpClientOptions,
  RequestOptions,
} from "./client/http-client.js";
export { HttpClient } from "./client/http-client.js";
// Config
export type { ClientConfig } from "./config/client-config.js";
export { CLIENT_VERSION, defaultConfig } from "./config/client-config.js";
// Errors
export type {
  HttpClientErrorCategory,
  HttpClientErrorCode,
} from "./errors.js";
export {
  asProtocolError,
  HttpClientError,
  isHttpClientError,
} from "./errors.js";
// HTTP
export type { BodyKind, ByteSink } from "./http/body.js";
export { Body } from "./http/body.js";
export { encodeChunk, readChunkedBody } from "./http/chunked.js";
export type {
  HeaderEntry,
  HeaderInit,
  ReadonlyHeaderMap,
} from "./http/header-map.js";
export {
  HeaderMap,
  isValidHeaderName,
  isValidHeaderValue,
} from "./http/header-map.js";
export { isMethod, Method, parseMethod } from "./http/method.js";
export type { RequestBuilder } from "./http/request.js";
export { Request } from "./http/request.js";
export type {
  EncodedRequestHead,
  RequestBodyFraming,
} from "./http/request-encoder.js";
export {
  encodeRequest,
  encodeRequestHead,
  writeRequest,
} from "./http/request-encoder.js";
export type { ResponseParts } from "./http/response.js";
export { Response } from "./http/response.js";
export type {
  BodyFramingDecision,
  HttpResponseHead,
  ParseHttpResponseOptions,
} from "./http/response-parser.js";
export {
  createHttpResponseParser,
  decideBodyFraming,
  decodeResponse,
  HttpResponseStreamParser,
} from "./http/response-parser.js";
export type { StatusClass } from "./http/status-code.js";
export { STATUS_TEXT, StatusCode } from "./http/status-code.js";
export type { ParsedUri } from "./http/uri.js";
export { parseUri } from "./http/uri.js";
export { parseVersion, Version } from "./http/version.js";
// Interfaces
export type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpSocket,
  TcpSocketOptions,
} from "./interfaces/socket.js";
// Node adapters
export {
  NodeFileHandle,
  NodeFileSystem,
  NodeSocketFactory,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  prefixedLogger,
  silentLogger,
} from "./logging/logger.js";
// Presets
export type { NodeClientOptions } from "./presets/node.js";
export { createNodeClient, get, post, request } from "./presets/node.js";
// Testing
export type {
  ExchangeHandler,
  ReceivedRequest,
  Reply,
} from "./testing/in-memory-http-server.js";
export { InMemoryHttpServer } from "./testing/in-memory-http-server.js";
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export { InMemorySocketFactory } from "./testing/in-memory-socket-factory.js";
// Transport
export type { TransportOptions } from "./transport/transport.js";
export { Connection, Transport } from "./transport/transport.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export type { EventMap, Listener } from "./utils/event-emitter.js";
export { EventEmitter } from "./utils/event-emitter.js";
