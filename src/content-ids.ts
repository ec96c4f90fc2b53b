// ============================================================================
// Content-ID references
// ============================================================================

import { throwError } from './errors.js';
import { isAbsoluteUri, normalizePath } from './serialization.js';

/**
 * What a URI resolver may see of the Content-ID table.
 */
export interface ReadonlyContentIds {
  has(contentId: string): boolean;
  get(contentId: string): string | undefined;
}

/**
 * Map from a completed operation's Content-ID to its resolved URI. Owned by one
 * writer for the whole batch, but it only ever holds the ids of the open
 * changeset: the writer empties it when the changeset completes.
 */
export class ContentIdTable implements ReadonlyContentIds {
  #entries = new Map<string, string>();

  /** Read-only view handed to URI resolvers. */
  readonly view: ReadonlyContentIds = {
    has: (contentId) => this.has(contentId),
    get: (contentId) => this.get(contentId),
  };

  has(contentId: string): boolean {
    return this.#entries.has(contentId);
  }

  get(contentId: string): string | undefined {
    return this.#entries.get(contentId);
  }

  /** @internal Only the writer registers ids, after an operation's preamble is written. */
  register(contentId: string, uri: string): void {
    this.#entries.set(contentId, uri);
  }

  /** @internal */
  clear(): void {
    this.#entries.clear();
  }

  get size(): number {
    return this.#entries.size;
  }
}

export type UriResolutionContext = {
  baseUrl?: string;
  contentIds: ReadonlyContentIds;
};

export type UriResolver = (uri: string, context: UriResolutionContext) => string;

// `$`-prefixed resources of the protocol itself; never Content-ID references.
const SYSTEM_RESOURCES = new Set(['metadata', 'batch', 'entity', 'crossjoin', 'all', 'root']);

/**
 * Extracts `1` from `$1/Orders` or `$1`. Returns undefined for URIs that are not
 * Content-ID references.
 */
export function parseContentIdReference(uri: string): string | undefined {
  const match = /^\$([^/?#(]+)/.exec(uri);
  const contentId = match?.[1];
  if (!contentId || SYSTEM_RESOURCES.has(contentId)) return undefined;
  return contentId;
}

/**
 * Default URI resolver.
 *
 * Content-ID references stay as written, the receiving service substitutes them,
 * but they must name an earlier operation of the same changeset. Other relative
 * URIs are joined to `baseUrl` when one is configured.
 */
export const resolveOperationUri: UriResolver = (uri, { baseUrl, contentIds }) => {
  if (isAbsoluteUri(uri)) return uri;

  const contentId = parseContentIdReference(uri);
  if (contentId !== undefined) {
    if (!contentIds.has(contentId)) {
      throwError('ContentIdReferenceNotFound', `Content-ID '${contentId}' referenced by '${uri}' was not found`, {
        contentId,
        uri,
      });
    }
    return uri;
  }

  return baseUrl ? normalizePath(baseUrl, uri) : uri;
};

/**
 * Resolver that replaces a Content-ID reference with the URI it was registered
 * under, for receivers that cannot resolve references themselves.
 */
export const substituteContentIdReferences: UriResolver = (uri, context) => {
  const contentId = parseContentIdReference(uri);
  const target = contentId === undefined ? undefined : context.contentIds.get(contentId);
  if (contentId === undefined || target === undefined) {
    return resolveOperationUri(uri, context);
  }
  const rest = uri.slice(contentId.length + 1);
  return rest === '' || rest.startsWith('/') ? normalizePath(target, rest) : `${target}${rest}`;
};
