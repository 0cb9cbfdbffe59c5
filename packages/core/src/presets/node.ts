import { NodeFileSystem, NodeSocketFactory } from "../adapters/node/index.js";
import {
  HttpClient,
  type RequestOptions,
} from "../client/http-client.js";
import type { ClientConfig } from "../config/client-config.js";
import type { Method } from "../http/method.js";
import type { Response } from "../http/response.js";
import type { Logger } from "../logging/logger.js";

export interface NodeClientOptions {
  config?: Partial<ClientConfig>;
  logger?: Logger;
}

export function createNodeClient(options?: NodeClientOptions): HttpClient {
  return new HttpClient({
    socketFactory: new NodeSocketFactory(),
    fileSystem: new NodeFileSystem(),
    config: options?.config,
    logger: options?.logger,
  });
}

/** One-call request over a fresh Node client with default configuration. */
export function request(
  method: Method | string,
  uri: string,
  options?: RequestOptions,
): Promise<Response> {
  return createNodeClient().request(method, uri, options);
}

export function get(uri: string, options?: RequestOptions): Promise<Response> {
  return createNodeClient().get(uri, options);
}

export function post(
  uri: string,
  options?: RequestOptions,
): Promise<Response> {
  return createNodeClient().post(uri, options);
}
