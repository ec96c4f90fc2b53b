// ============================================================================
// multipart/mixed wire serialization
// ============================================================================

import { HTTP_VERSION, getStatusMessage } from './http.js';

export type LineWriter = {
  write(text: string): void;
  writeLine(text?: string): void;
};

/**
 * How an operation's request line spells its URI.
 * - 'absolute-uri': `GET https://host/service/Customers HTTP/1.1`
 * - 'absolute-path-and-host': `GET /service/Customers HTTP/1.1` plus a `Host` header
 * - 'relative-path': `GET Customers HTTP/1.1`, relative to the base URL
 */
export type BatchPayloadUriOption = 'absolute-uri' | 'absolute-path-and-host' | 'relative-path';

export const CONTENT_TYPE_HEADER = 'Content-Type';
export const CONTENT_ID_HEADER = 'Content-ID';

/**
 * Normalizes URL path segments by:
 * - Removing trailing slashes from baseUrl (preserving protocol ://)
 * - Removing leading slashes from path segments
 * - Joining with single /
 * - Normalizing multiple consecutive slashes (except protocol)
 */
export function normalizePath(baseUrl: string, ...paths: string[]): string {
  // Remove trailing slashes from baseUrl, but preserve protocol ://
  let normalized = baseUrl.replace(/([^:]\/)\/+$/, '$1');

  for (const path of paths) {
    if (!path) continue;

    const cleanPath = path.replace(/^\/+/, '');
    if (!cleanPath) continue;

    if (normalized && !normalized.endsWith('/')) {
      normalized += '/';
    }
    normalized += cleanPath;
  }

  // Normalize multiple consecutive slashes (except protocol ://)
  normalized = normalized.replace(/([^:]\/)\/+/g, '$1');

  return normalized;
}

export function isAbsoluteUri(uri: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(uri);
}

export function createMultipartMixedContentType(boundary: string): string {
  return `multipart/mixed; boundary=${boundary}`;
}

// ============================================================================
// Boundaries
// ============================================================================

/**
 * Writes `--<boundary>`. Every delimiter but the very first carries the CRLF
 * that ends the previous part (RFC 2046, 5.1.1).
 */
export function writeStartBoundary(writer: LineWriter, boundary: string, firstBoundary: boolean): void {
  if (!firstBoundary) writer.writeLine();
  writer.writeLine(`--${boundary}`);
}

/**
 * Writes `--<boundary>--` without a trailing line break. When the scope never
 * got an opening delimiter, the closing one is written on its own.
 */
export function writeEndBoundary(writer: LineWriter, boundary: string, missingStartBoundary: boolean): void {
  if (!missingStartBoundary) writer.writeLine();
  writer.write(`--${boundary}--`);
}

// ============================================================================
// Part preambles
// ============================================================================

export function writeChangesetPreamble(writer: LineWriter, changesetBoundary: string): void {
  writer.writeLine(`${CONTENT_TYPE_HEADER}: ${createMultipartMixedContentType(changesetBoundary)}`);
  // empty line between the batch part headers and the (empty) changeset preamble
  writer.writeLine();
}

function writeApplicationHttpHeaders(writer: LineWriter): void {
  writer.writeLine(`${CONTENT_TYPE_HEADER}: application/http`);
  writer.writeLine('Content-Transfer-Encoding: binary');
  writer.writeLine();
}

export function writeRequestPreamble(
  writer: LineWriter,
  method: string,
  uri: string,
  baseUrl: string | undefined,
  uriOption: BatchPayloadUriOption
): void {
  writeApplicationHttpHeaders(writer);

  if (!isAbsoluteUri(uri)) {
    writer.writeLine(`${method} ${uri} ${HTTP_VERSION}`);
    return;
  }

  switch (uriOption) {
    case 'absolute-uri':
      writer.writeLine(`${method} ${uri} ${HTTP_VERSION}`);
      break;
    case 'absolute-path-and-host': {
      const url = new URL(uri);
      writer.writeLine(`${method} ${url.pathname}${url.search} ${HTTP_VERSION}`);
      writer.writeLine(`Host: ${url.host}`);
      break;
    }
    case 'relative-path':
      writer.writeLine(`${method} ${toRelativeUri(uri, baseUrl)} ${HTTP_VERSION}`);
      break;
  }
}

export function writeResponsePreamble(writer: LineWriter): void {
  writeApplicationHttpHeaders(writer);
}

export function formatStatusLine(statusCode: number): string {
  return `${HTTP_VERSION} ${statusCode} ${getStatusMessage(statusCode)}`;
}

/**
 * `https://host/service/Customers(1)` relative to `https://host/service/` is
 * `Customers(1)`. URIs outside the base stay absolute.
 */
export function toRelativeUri(uri: string, baseUrl: string | undefined): string {
  if (!baseUrl) return uri;
  const base = normalizePath(baseUrl);
  const prefix = base.endsWith('/') ? base : `${base}/`;
  return uri.startsWith(prefix) ? uri.slice(prefix.length) : uri;
}
