export const Version = {
  HTTP_10: "HTTP/1.0",
  HTTP_11: "HTTP/1.1",
} as const;

export type Version = (typeof Version)[keyof typeof Version];

export function parseVersion(token: string): Version | null {
  if (token === Version.HTTP_10 || token === Version.HTTP_11) {
    return token;
  }
  return null;
}

/** Chunked transfer coding exists from HTTP/1.1 on. */
export function supportsChunked(version: Version): boolean {
  return version === Version.HTTP_11;
}
