import { z } from 'zod';
import { createError } from './errors.js';
import type { UriResolver } from './content-ids.js';
import { resolveOperationUri } from './content-ids.js';
import type { BatchPayloadUriOption } from './serialization.js';
import type { RandomId } from './boundary.js';

/**
 * Whether the writer produces a batch request or a batch response.
 */
export type BatchWriterMode = 'request' | 'response';

/**
 * - 'sync': flushes block; use `flush()` and `getStream()`.
 * - 'async': flushes may suspend; use `flushAsync()` and `getStreamAsync()`.
 */
export type ConcurrencyMode = 'sync' | 'async';

/**
 * Settings passed to `new MultipartMixedBatchWriter(output, settings)`.
 */
export interface BatchWriterSettings {
  /**
   * Batch request (default) or batch response.
   */
  mode?: BatchWriterMode;

  /**
   * Fixed for the lifetime of the writer. Defaults to 'sync'.
   */
  concurrency?: ConcurrencyMode;

  /**
   * Service root that relative operation URIs are resolved against,
   * e.g. 'https://host/service/'.
   */
  baseUrl?: string;

  /**
   * Default spelling of request-line URIs; can be overridden per operation.
   * Defaults to 'absolute-uri'.
   */
  uriOption?: BatchPayloadUriOption;

  /**
   * Boundary of the batch itself. Generated when omitted; must then also be
   * announced in the outer `Content-Type` header (see `writer.contentType`).
   */
  batchBoundary?: string;

  /**
   * Top-level parts (operations and changesets) allowed in one batch. Default 100.
   */
  maxPartsPerBatch?: number;

  /**
   * Operations allowed in one changeset. Default 1000.
   */
  maxOperationsPerChangeset?: number;

  /**
   * Hook mapping an operation URI to the one written on the wire.
   * Defaults to `resolveOperationUri`.
   */
  resolveUri?: UriResolver;

  /**
   * Source of the random part of generated boundaries.
   */
  randomId?: RandomId;
}

export type ResolvedBatchWriterSettings = {
  mode: BatchWriterMode;
  concurrency: ConcurrencyMode;
  baseUrl?: string;
  uriOption: BatchPayloadUriOption;
  batchBoundary?: string;
  maxPartsPerBatch: number;
  maxOperationsPerChangeset: number;
  resolveUri: UriResolver;
  randomId?: RandomId;
};

// RFC 2046 boundary characters, 1 to 70 of them, not ending in a space.
const BOUNDARY_PATTERN = /^[0-9A-Za-z'()+_,\-./:=? ]{0,69}[0-9A-Za-z'()+_,\-./:=?]$/;

const SettingsSchema = z.object({
  mode: z.enum(['request', 'response']).default('request'),
  concurrency: z.enum(['sync', 'async']).default('sync'),
  baseUrl: z.string().url().optional(),
  uriOption: z.enum(['absolute-uri', 'absolute-path-and-host', 'relative-path']).default('absolute-uri'),
  batchBoundary: z.string().regex(BOUNDARY_PATTERN, 'not a valid multipart boundary').optional(),
  maxPartsPerBatch: z.number().int().positive().default(100),
  maxOperationsPerChangeset: z.number().int().positive().default(1000),
});

export function defineSettings(settings: BatchWriterSettings): BatchWriterSettings {
  return settings;
}

/**
 * Applies defaults and validates. Throws `InvalidWriterSettings`.
 */
export function resolveSettings(settings: BatchWriterSettings = {}): ResolvedBatchWriterSettings {
  const { resolveUri, randomId, ...rest } = settings;
  const parsed = SettingsSchema.safeParse(rest);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw createError('InvalidWriterSettings', `Invalid batch writer settings: ${issues.join('; ')}`, { issues });
  }

  return {
    ...parsed.data,
    resolveUri: resolveUri ?? resolveOperationUri,
    randomId,
  };
}
