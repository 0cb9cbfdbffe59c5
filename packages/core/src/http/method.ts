import { HttpClientError } from "../errors.js";

export const Method = {
  GET: "GET",
  HEAD: "HEAD",
  POST: "POST",
  PUT: "PUT",
  DELETE: "DELETE",
  PATCH: "PATCH",
  OPTIONS: "OPTIONS",
  CONNECT: "CONNECT",
  TRACE: "TRACE",
} as const;

export type Method = (typeof Method)[keyof typeof Method];

const METHODS: ReadonlySet<string> = new Set(Object.values(Method));

export function isMethod(token: string): token is Method {
  return METHODS.has(token);
}

/** Methods are case-sensitive tokens: `get` is not `GET`. */
export function parseMethod(token: string): Method {
  if (!isMethod(token)) {
    throw new HttpClientError(
      "INVALID_METHOD",
      `Unsupported request method: ${JSON.stringify(token)}`,
    );
  }
  return token;
}
