// ============================================================================
// multipart/mixed batch writer
// ============================================================================

import type { Logger } from '@logtape/logtape';
import { BoundaryAllocator } from './boundary.js';
import { resolveSettings, type BatchWriterSettings, type ResolvedBatchWriterSettings } from './config.js';
import { ContentIdTable } from './content-ids.js';
import { BatchOperationError, createError, isBatchOperationError, throwError } from './errors.js';
import { isQueryMethod } from './http.js';
import { getBatchLogger } from './logger.js';
import {
  OperationMessageFactory,
  OperationRequestMessage,
  type OperationMessage,
  type OperationResponseMessage,
} from './messages.js';
import { BatchTextWriter, type BatchOutput } from './output.js';
import {
  CONTENT_ID_HEADER,
  createMultipartMixedContentType,
  formatStatusLine,
  writeChangesetPreamble,
  writeEndBoundary,
  writeRequestPreamble,
  writeResponsePreamble,
  writeStartBoundary,
  type BatchPayloadUriOption,
} from './serialization.js';
import { validateChangesetScope, validateTransition, type BatchWriterState } from './states.js';
import type { BatchWriter } from './types.js';

/**
 * Writes a batch request or response as a multipart/mixed payload.
 *
 * ```ts
 * const writer = new MultipartMixedBatchWriter(output, { baseUrl: 'https://host/service/' });
 * writer.startBatch();
 * writer.startChangeset();
 * const op = writer.createOperationRequestMessage('POST', 'Customers', '1');
 * op.setHeader('Content-Type', 'application/json');
 * const body = op.getStream();
 * body.write('{"Name":"Ada"}');
 * body.close();
 * writer.endChangeset();
 * writer.endBatch();
 * writer.flush();
 * ```
 *
 * A writer is single-use. Any rejected call moves it to the `Error` state, after
 * which every call fails with the same error.
 */
export class MultipartMixedBatchWriter implements BatchWriter {
  readonly batchBoundary: string;

  #output: BatchOutput;
  #settings: ResolvedBatchWriterSettings;
  #textWriter: BatchTextWriter;
  #boundaries: BoundaryAllocator;
  #messages: OperationMessageFactory;
  // references of the open changeset
  #contentIds = new ContentIdTable();
  // every request Content-ID of the batch
  #usedContentIds = new Set<string>();
  #logger: Logger;

  #state: BatchWriterState = 'Start';
  #changesetBoundary?: string;
  #batchStartBoundaryWritten = false;
  #changesetStartBoundaryWritten = false;

  #currentRequest?: OperationRequestMessage;
  #currentResponse?: OperationResponseMessage;
  // Message whose body was streamed; completed at the next flush point.
  #streamedMessage?: OperationMessage;

  #batchSize = 0;
  #changesetSize = 0;
  #fault?: BatchOperationError;

  constructor(output: BatchOutput, settings?: BatchWriterSettings) {
    this.#output = output;
    this.#settings = resolveSettings(settings);
    this.#boundaries = new BoundaryAllocator(this.writingResponse, this.#settings.randomId);
    this.batchBoundary = this.#settings.batchBoundary ?? this.#boundaries.batch();
    this.#textWriter = new BatchTextWriter(output);
    this.#messages = new OperationMessageFactory(output, this, (message) => this.operationCompleted(message));
    this.#logger = getBatchLogger('writer').with({ batchBoundary: this.batchBoundary });
  }

  get state(): BatchWriterState {
    return this.#state;
  }

  get writingResponse(): boolean {
    return this.#settings.mode === 'response';
  }

  /**
   * Value for the `Content-Type` header of the enclosing HTTP message.
   */
  get contentType(): string {
    return createMultipartMixedContentType(this.batchBoundary);
  }

  // ==========================================================================
  // Batch and changeset scopes
  // ==========================================================================

  startBatch(): void {
    this.intercept(() => {
      this.validate('BatchStarted');
      this.setState('BatchStarted');
    });
  }

  startChangeset(): void {
    this.intercept(() => {
      this.validate('ChangesetStarted');
      this.increaseBatchSize();

      this.writePendingMessageData(true);

      // allocates the changeset boundary
      this.setState('ChangesetStarted');
      const changesetBoundary = this.requireChangesetBoundary();
      this.#changesetSize = 0;

      writeStartBoundary(this.#textWriter, this.batchBoundary, !this.#batchStartBoundaryWritten);
      this.#batchStartBoundaryWritten = true;

      writeChangesetPreamble(this.#textWriter, changesetBoundary);
      this.#changesetStartBoundaryWritten = false;
    });
  }

  endChangeset(): void {
    this.intercept(() => {
      this.validate('ChangesetCompleted');
      this.writePendingMessageData(true);

      const changesetBoundary = this.requireChangesetBoundary();
      this.setState('ChangesetCompleted');

      // An empty changeset is written as its closing delimiter only; older
      // readers fail on an open/close pair with nothing in between.
      writeEndBoundary(this.#textWriter, changesetBoundary, !this.#changesetStartBoundaryWritten);
    });
  }

  endBatch(): void {
    this.intercept(() => {
      this.validate('BatchCompleted');
      this.writePendingMessageData(true);

      this.setState('BatchCompleted');

      writeEndBoundary(this.#textWriter, this.batchBoundary, !this.#batchStartBoundaryWritten);
      // trailing line break expected by older readers
      this.#textWriter.writeLine();
      this.#textWriter.flush();

      this.#logger.debug('Batch completed with {parts} part(s)', { parts: this.#batchSize });
    });
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  createOperationRequestMessage(
    method: string,
    uri: string,
    contentId?: string,
    uriOption?: BatchPayloadUriOption
  ): OperationRequestMessage {
    return this.intercept(() => {
      if (this.writingResponse) {
        throwError('CannotCreateRequestWhenWritingResponse', 'Cannot create a request operation in a batch response');
      }
      this.validate('OperationCreated');
      this.verifyCanCreateOperationRequestMessage(method, contentId);
      this.increaseOperationCount();

      this.writePendingMessageData(true);

      if (contentId && this.#usedContentIds.has(contentId)) {
        throwError('DuplicateContentId', `Content-ID '${contentId}' is already used in this batch`, { contentId });
      }

      const resolvedUri = this.#settings.resolveUri(uri, {
        baseUrl: this.#settings.baseUrl,
        contentIds: this.#contentIds.view,
      });

      const message = this.#messages.request(method, resolvedUri, contentId || undefined);
      this.#currentRequest = message;
      if (contentId) this.#usedContentIds.add(contentId);

      this.setState('OperationCreated');

      this.writeStartBoundaryForOperation();
      writeRequestPreamble(
        this.#textWriter,
        method,
        resolvedUri,
        this.#settings.baseUrl,
        uriOption ?? this.#settings.uriOption
      );

      return message;
    });
  }

  createOperationResponseMessage(contentId?: string): OperationResponseMessage {
    return this.intercept(() => {
      if (!this.writingResponse) {
        throwError('CannotCreateResponseWhenWritingRequest', 'Cannot create a response operation in a batch request');
      }
      this.validate('OperationCreated');
      this.increaseOperationCount();

      this.writePendingMessageData(true);

      // Responses are never referenced, so the Content-ID is not registered.
      const message = this.#messages.response(contentId || undefined);
      this.#currentResponse = message;

      this.setState('OperationCreated');

      this.writeStartBoundaryForOperation();
      writeResponsePreamble(this.#textWriter);

      return message;
    });
  }

  // ==========================================================================
  // Operation body hand-off
  // ==========================================================================

  notifyContentStreamRequested(): void {
    this.intercept(() => {
      this.verifyConcurrency('sync');
      this.validate('OperationStreamRequested');

      this.startBatchOperationContent();
      this.#output.flush();

      this.disposeTextWriterAndSetStreamRequestedState();
    });
  }

  async notifyContentStreamRequestedAsync(): Promise<void> {
    this.intercept(() => {
      this.verifyConcurrency('async');
      this.validate('OperationStreamRequested');

      this.startBatchOperationContent();
    });

    await this.#output.flushAsync();

    this.intercept(() => this.disposeTextWriterAndSetStreamRequestedState());
  }

  notifyContentStreamDisposed(): void {
    this.intercept(() => {
      this.validate('OperationStreamDisposed');
      this.setState('OperationStreamDisposed');

      this.#streamedMessage = this.currentOperationMessage;
      this.#currentRequest = undefined;
      this.#currentResponse = undefined;
      this.#textWriter = new BatchTextWriter(this.#output);
    });
  }

  notifyInStreamError(): never {
    return this.intercept(() => {
      this.setState('Error');
      if (!this.#textWriter.closed) this.#textWriter.flush();

      // multipart/mixed has no representation for an error inside the payload
      throwError('InStreamErrorNotSupported', 'An in-stream error cannot be written into a multipart/mixed batch');
    });
  }

  // ==========================================================================
  // Flushing
  // ==========================================================================

  flush(): void {
    this.intercept(() => {
      this.verifyConcurrency('sync');
      this.verifyCanFlush();
    });
    this.#textWriter.flush();
    this.#output.flush();
  }

  async flushAsync(): Promise<void> {
    this.intercept(() => {
      this.verifyConcurrency('async');
      this.verifyCanFlush();
    });
    this.#textWriter.flush();
    await this.#output.flushAsync();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private get currentOperationMessage(): OperationMessage | undefined {
    return this.#currentRequest ?? this.#currentResponse;
  }

  /**
   * Runs `action`, moving the writer to `Error` when it rejects the call.
   * Errors from the output pass through untouched.
   */
  private intercept<T>(action: () => T): T {
    if (this.#fault) {
      throw this.faultedError();
    }

    try {
      return action();
    } catch (error) {
      if (isBatchOperationError(error)) {
        this.fail(error);
      }
      throw error;
    }
  }

  private fail(error: BatchOperationError): void {
    if (this.#fault) return;
    this.#fault = error;
    if (this.#state !== 'Error') this.setState('Error');
    this.#logger.warn('Batch writer faulted: {reason}', { reason: error.reason, message: error.message });
  }

  private faultedError(): BatchOperationError {
    return createError(
      'InvalidStateTransition',
      "The batch writer is in the 'Error' state and cannot be used any more",
      { from: 'Error', faultReason: this.#fault?.reason }
    );
  }

  private validate(newState: BatchWriterState): void {
    validateChangesetScope(newState, this.#changesetBoundary !== undefined);
    validateTransition(this.#state, newState);
  }

  private setState(newState: BatchWriterState): void {
    validateTransition(this.#state, newState);
    this.#logger.trace('{from} -> {to}', { from: this.#state, to: newState });
    this.#state = newState;

    switch (newState) {
      case 'ChangesetStarted':
        this.#changesetBoundary = this.#boundaries.changeset();
        this.#logger.debug('Changeset opened: {changesetBoundary}', { changesetBoundary: this.#changesetBoundary });
        break;
      case 'ChangesetCompleted':
        this.#changesetBoundary = undefined;
        this.#contentIds.clear();
        break;
    }
  }

  private requireChangesetBoundary(): string {
    const boundary = this.#changesetBoundary;
    if (boundary === undefined) {
      return throwError(
        'CannotCompleteChangesetWithoutActiveChangeset',
        'Cannot complete a changeset when no changeset is active'
      );
    }
    return boundary;
  }

  private verifyConcurrency(required: 'sync' | 'async'): void {
    const actual = this.#settings.concurrency;
    if (actual === required) return;
    if (required === 'sync') {
      throwError('SyncCallOnAsyncWriter', 'A blocking call was made on a batch writer created for async use');
    }
    throwError('AsyncCallOnSyncWriter', 'An async call was made on a batch writer created for sync use');
  }

  private verifyCanFlush(): void {
    if (this.#state === 'OperationStreamRequested') {
      throwError('FlushInStreamRequestedState', 'Cannot flush the batch writer while an operation body is being written');
    }
  }

  private verifyCanCreateOperationRequestMessage(method: string, contentId: string | undefined): void {
    if (!method) {
      throwError('InvalidHttpMethod', 'An operation request needs an HTTP method', { method });
    }

    if (this.#changesetBoundary !== undefined) {
      if (isQueryMethod(method)) {
        throwError(
          'InvalidHttpMethodForChangesetRequest',
          `HTTP method '${method}' is not allowed for a request inside a changeset`,
          { method }
        );
      }

      if (!contentId) {
        throwError('MissingContentIdInChangeset', `A request inside a changeset needs a ${CONTENT_ID_HEADER}`);
      }
    }
  }

  private increaseOperationCount(): void {
    if (this.#changesetBoundary !== undefined) {
      this.increaseChangesetSize();
    } else {
      this.increaseBatchSize();
    }
  }

  private increaseBatchSize(): void {
    const limit = this.#settings.maxPartsPerBatch;
    if (++this.#batchSize > limit) {
      throwError('MaxBatchSizeExceeded', `The batch holds more than ${limit} parts`, { limit });
    }
  }

  private increaseChangesetSize(): void {
    const limit = this.#settings.maxOperationsPerChangeset;
    if (++this.#changesetSize > limit) {
      throwError('MaxChangesetSizeExceeded', `The changeset holds more than ${limit} operations`, { limit });
    }
  }

  private writeStartBoundaryForOperation(): void {
    if (this.#changesetBoundary === undefined) {
      writeStartBoundary(this.#textWriter, this.batchBoundary, !this.#batchStartBoundaryWritten);
      this.#batchStartBoundaryWritten = true;
    } else {
      writeStartBoundary(this.#textWriter, this.#changesetBoundary, !this.#changesetStartBoundaryWritten);
      this.#changesetStartBoundaryWritten = true;
    }
  }

  /**
   * Writes the status line (responses), headers and the blank line of the
   * current operation. With `reportCompleted` the operation is finished and its
   * Content-ID becomes visible to later operations.
   */
  private writePendingMessageData(reportCompleted: boolean): void {
    const message = this.currentOperationMessage;

    if (!message) {
      if (reportCompleted && this.#streamedMessage) {
        this.#streamedMessage.partHeaderProcessingCompleted();
        this.#streamedMessage = undefined;
      }
      return;
    }

    if (this.#currentResponse) {
      this.#textWriter.writeLine(formatStatusLine(this.#currentResponse.statusCode));
    }

    for (const [name, value] of message.headers) {
      this.#textWriter.writeLine(`${name}: ${value}`);
    }
    if (message.contentId && !message.headers.has(CONTENT_ID_HEADER)) {
      this.#textWriter.writeLine(`${CONTENT_ID_HEADER}: ${message.contentId}`);
    }

    this.#textWriter.writeLine();
    message.headers.freeze();

    if (reportCompleted) {
      message.partHeaderProcessingCompleted();
      this.#currentRequest = undefined;
      this.#currentResponse = undefined;
    }
  }

  private startBatchOperationContent(): void {
    this.writePendingMessageData(false);
    this.#textWriter.flush();
  }

  private disposeTextWriterAndSetStreamRequestedState(): void {
    this.#textWriter.close();
    this.setState('OperationStreamRequested');
  }

  /**
   * Only requests of the open changeset can be referenced. A top-level operation
   * is always completed before the next changeset opens, and the last one of a
   * changeset before it closes.
   */
  private operationCompleted(message: OperationMessage): void {
    if (this.#changesetBoundary === undefined) return;
    if (message instanceof OperationRequestMessage && message.contentId) {
      this.#contentIds.register(message.contentId, message.url);
    }
  }
}
