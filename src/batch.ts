// ============================================================================
// OData $batch request builder
// ============================================================================

import { getBatchLogger } from './logger.js';
import { MultipartMixedBatchWriter } from './multipart-writer.js';
import { MemoryOutput } from './output.js';
import { CONTENT_TYPE_HEADER, normalizePath, type BatchPayloadUriOption } from './serialization.js';

// ============================================================================
// Types
// ============================================================================

type Fetch = (input: Request, init?: RequestInit) => Promise<Response>;

export type OdataBatchClientOptions = {
  baseUrl: string;
  transport: Fetch;
  /**
   * Defaults to 'absolute-path-and-host': the request line carries the full
   * pathname (e.g. "POST /api/data/v9.0/emails HTTP/1.1"). Some services resolve
   * batch URLs from the host root, so a path relative to the service root would
   * become https://host/emails and 404.
   */
  uriOption?: BatchPayloadUriOption;
};

export type BatchOperationOptions = {
  headers?: Record<string, string>;
};

type BatchRequest = {
  id: number;
  method: string;
  path: string;
  body?: string;
  headers: Record<string, string>;
  contentId?: string;
};

type BatchItem =
  | { kind: 'operation'; request: BatchRequest }
  | { kind: 'changeset'; requests: BatchRequest[] };

const logger = getBatchLogger('batch');

function serializeBody(body: unknown): string | undefined {
  if (body === undefined) return undefined;
  return typeof body === 'string' ? body : JSON.stringify(body);
}

/**
 * Reference to an operation of an earlier part of the same changeset,
 * usable as the start of a later operation's path: `${ref}/Orders`.
 */
export function contentIdReference(contentId: string | number): string {
  return `$${contentId}`;
}

// ============================================================================
// Batch Builder
// ============================================================================

export class OdataBatch {
  #options: OdataBatchClientOptions;
  #items: BatchItem[] = [];
  #nextId = 1;

  constructor(options: OdataBatchClientOptions) {
    this.#options = options;
  }

  /**
   * Queue a GET request outside any changeset.
   */
  get(path: string, o?: BatchOperationOptions): number {
    return this.addOperation('GET', path, undefined, o);
  }

  post(path: string, body: unknown, o?: BatchOperationOptions): number {
    return this.addOperation('POST', path, body, o);
  }

  put(path: string, body: unknown, o?: BatchOperationOptions): number {
    return this.addOperation('PUT', path, body, o);
  }

  patch(path: string, body: unknown, o?: BatchOperationOptions): number {
    return this.addOperation('PATCH', path, body, o);
  }

  delete(path: string, o?: BatchOperationOptions): number {
    return this.addOperation('DELETE', path, undefined, o);
  }

  /**
   * Group write operations into one atomic changeset. Every operation gets a
   * Content-ID equal to its batch-wide id.
   */
  changeset(build: (changeset: BatchChangeset) => void): void {
    const requests: BatchRequest[] = [];
    build(new BatchChangeset((method, path, body, o) => {
      const request = this.createRequest(method, path, body, o);
      request.contentId = String(request.id);
      requests.push(request);
      return contentIdReference(request.id);
    }));
    this.#items.push({ kind: 'changeset', requests });
  }

  /**
   * Build the HTTP Request representing this $batch.
   *
   * This does not execute the request itself.
   */
  async buildRequest(): Promise<Request> {
    const output = new MemoryOutput();
    const writer = new MultipartMixedBatchWriter(output, {
      baseUrl: this.#options.baseUrl,
      uriOption: this.#options.uriOption ?? 'absolute-path-and-host',
      concurrency: 'async',
    });

    writer.startBatch();
    for (const item of this.#items) {
      if (item.kind === 'operation') {
        await writeOperation(writer, item.request);
        continue;
      }
      writer.startChangeset();
      for (const request of item.requests) {
        await writeOperation(writer, request);
      }
      writer.endChangeset();
    }
    writer.endBatch();
    await writer.flushAsync();

    logger.debug('Built $batch with {count} part(s)', { count: this.#items.length });

    return new Request(normalizePath(this.#options.baseUrl, '$batch'), {
      method: 'POST',
      headers: new Headers({ [CONTENT_TYPE_HEADER]: writer.contentType }),
      body: output.text(),
    });
  }

  /**
   * Build the batch request and send it via the configured transport.
   */
  async execute(): Promise<Response> {
    const request = await this.buildRequest();
    return this.#options.transport(request);
  }

  private addOperation(method: string, path: string, body: unknown, o?: BatchOperationOptions): number {
    const request = this.createRequest(method, path, body, o);
    this.#items.push({ kind: 'operation', request });
    return request.id;
  }

  private createRequest(method: string, path: string, body: unknown, o?: BatchOperationOptions): BatchRequest {
    const headers: Record<string, string> = { ...o?.headers };
    const serialized = serializeBody(body);
    if (serialized !== undefined && !Object.keys(headers).some((name) => name.toLowerCase() === 'content-type')) {
      headers[CONTENT_TYPE_HEADER] = 'application/json';
    }
    return { id: this.#nextId++, method, path, body: serialized, headers };
  }
}

type AddChangesetRequest = (method: string, path: string, body: unknown, o?: BatchOperationOptions) => string;

/**
 * Write operations of one changeset. Each method returns the Content-ID
 * reference (`$<id>`) of the queued operation.
 */
export class BatchChangeset {
  #add: AddChangesetRequest;

  constructor(add: AddChangesetRequest) {
    this.#add = add;
  }

  post(path: string, body: unknown, o?: BatchOperationOptions): string {
    return this.#add('POST', path, body, o);
  }

  put(path: string, body: unknown, o?: BatchOperationOptions): string {
    return this.#add('PUT', path, body, o);
  }

  patch(path: string, body: unknown, o?: BatchOperationOptions): string {
    return this.#add('PATCH', path, body, o);
  }

  delete(path: string, o?: BatchOperationOptions): string {
    return this.#add('DELETE', path, undefined, o);
  }
}

async function writeOperation(writer: MultipartMixedBatchWriter, request: BatchRequest): Promise<void> {
  const message = writer.createOperationRequestMessage(request.method, request.path, request.contentId);
  for (const [name, value] of Object.entries(request.headers)) {
    message.setHeader(name, value);
  }

  if (request.body === undefined) return;

  const stream = await message.getStreamAsync();
  stream.write(request.body);
  stream.close();
}
